import { Player } from '../entities/player.entity';
import { escapeHtml, renderPlayersTable } from './players.html';

function makePlayer(p: Partial<Player>): Player {
  return Object.assign(new Player(), {
    id: 1,
    name: 'Bukayo Saka',
    team: 'Arsenal',
    position: 'Forward / Midfielder',
    understatId: '7322',
    matches: 35,
    minutes: 2900,
    goals: 16,
    assists: 9,
    shots: 90,
    keyPasses: 70,
    yellowCards: 4,
    redCards: 0,
    xg: 14.256,
    xa: 8.5,
    ...p,
  });
}

describe('players.html', () => {
  it('escapeHtml', () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe('&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;');
    expect(escapeHtml(null)).toBe('');
    expect(escapeHtml(3)).toBe('3');
  });

  it('renderiza una fila por jugador con xG/xA a 2 decimales', () => {
    const html = renderPlayersTable('Arsenal', [makePlayer({})]);
    expect(html).toContain('<h1>Players matching "Arsenal" (1)</h1>');
    expect(html).toContain(
      '<tr><td>Bukayo Saka</td><td>Arsenal</td><td>Forward / Midfielder</td><td>35</td><td>2900</td>' +
        '<td>16</td><td>9</td><td>14.26</td><td>8.50</td></tr>',
    );
  });

  it('escapa el término y los valores', () => {
    const html = renderPlayersTable('<script>', [makePlayer({ name: 'A <b>', position: null })]);
    expect(html).toContain('<title>Players matching "&lt;script&gt;"</title>');
    expect(html).toContain('<tr><td>A &lt;b&gt;</td><td>Arsenal</td><td></td>');
  });

  it('sin resultados', () => {
    expect(renderPlayersTable('zzz', [])).toContain('<tr><td colspan="9">No players found</td></tr>');
  });
});
