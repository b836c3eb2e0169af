import { Player } from '../entities/player.entity';

const ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(v: unknown): string {
  return String(v ?? '').replace(/[&<>"']/g, (c) => ENTITIES[c]);
}

const COLUMNS: Array<[string, (p: Player) => unknown]> = [
  ['Name', (p) => p.name],
  ['Team', (p) => p.team],
  ['Position', (p) => p.position],
  ['Matches', (p) => p.matches],
  ['Minutes', (p) => p.minutes],
  ['Goals', (p) => p.goals],
  ['Assists', (p) => p.assists],
  ['xG', (p) => p.xg.toFixed(2)],
  ['xA', (p) => p.xa.toFixed(2)],
];

export function renderPlayersTable(term: string, players: Player[]): string {
  const head = COLUMNS.map(([h]) => `<th>${h}</th>`).join('');
  const body = players.length
    ? players
        .map((p) => `<tr>${COLUMNS.map(([, get]) => `<td>${escapeHtml(get(p))}</td>`).join('')}</tr>`)
        .join('\n')
    : `<tr><td colspan="${COLUMNS.length}">No players found</td></tr>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Players matching "${escapeHtml(term)}"</title>
  <style>
    body { font-family: sans-serif; margin: 2rem; }
    table { border-collapse: collapse; }
    th, td { border: 1px solid #ccc; padding: 4px 8px; text-align: left; }
  </style>
</head>
<body>
  <h1>Players matching "${escapeHtml(term)}" (${players.length})</h1>
  <table>
    <thead><tr>${head}</tr></thead>
    <tbody>
${body}
    </tbody>
  </table>
</body>
</html>`;
}
