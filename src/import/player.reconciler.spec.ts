import { InMemoryPlayerUnitOfWork, player } from 'test/helpers/in-memory-player.store';
import { StorageError } from './import.errors';
import { reconcilePlayers } from './player.reconciler';

const AT = new Date('2025-08-20T05:15:00Z');

const row = (name: string, team: string, extra: Record<string, unknown> = {}) => ({
  player_name: name,
  team_title: team,
  games: '3',
  time: '270',
  goals: '1',
  ...extra,
});

describe('reconcilePlayers', () => {
  let uow: InMemoryPlayerUnitOfWork;

  beforeEach(() => {
    uow = new InMemoryPlayerUnitOfWork();
  });

  it('inserta filas nuevas y cuenta el resumen', async () => {
    const summary = await uow.transaction((s) =>
      reconcilePlayers(s, [row('Bukayo Saka', 'Arsenal'), row('Cole Palmer', 'Chelsea')], AT),
    );

    expect(summary).toEqual({ fetched: 2, inserted: 2, updated: 0, skipped: 0, skipReasons: [] });
    expect(uow.rows).toHaveLength(2);
    expect(uow.find('Cole Palmer', 'Chelsea')).toMatchObject({ matches: 3, minutes: 270, goals: 1, lastUpdated: AT });
  });

  it('re-importar el mismo lote no crea duplicados', async () => {
    const batch = [row('Bukayo Saka', 'Arsenal'), row('Cole Palmer', 'Chelsea')];
    await uow.transaction((s) => reconcilePlayers(s, batch, AT));
    const ids = uow.rows.map((r) => r.id);

    const second = await uow.transaction((s) => reconcilePlayers(s, batch, AT));

    expect(second).toMatchObject({ inserted: 0, updated: 2 });
    expect(uow.rows.map((r) => r.id)).toEqual(ids);
  });

  it('actualiza en sitio por (name, team) y conserva el id', async () => {
    const seeded = uow.seed(player({ name: 'Mohamed Salah', team: 'Liverpool', goals: 10, xg: 9.1 }));

    const summary = await uow.transaction((s) =>
      reconcilePlayers(s, [row('Mohamed Salah', 'Liverpool', { goals: '29', xG: '27.706', position: 'F M' })], AT),
    );

    expect(summary).toMatchObject({ inserted: 0, updated: 1 });
    const salah = uow.find('Mohamed Salah', 'Liverpool');
    expect(salah?.id).toBe(seeded.id);
    expect(salah?.goals).toBe(29);
    expect(salah?.xg).toBe(27.706);
    expect(salah?.position).toBe('Forward / Midfielder');
    expect(salah?.createdAt).toEqual(seeded.createdAt);
    expect(salah?.lastUpdated).toEqual(AT);
  });

  it('un mismo nombre en otro equipo es otro jugador', async () => {
    uow.seed(player({ name: 'Danny Ward', team: 'Leicester' }));

    const summary = await uow.transaction((s) => reconcilePlayers(s, [row('Danny Ward', 'Watford')], AT));

    expect(summary).toMatchObject({ inserted: 1, updated: 0 });
    expect(uow.rows).toHaveLength(2);
  });

  it('omite registros sin clave natural y sigue con el resto', async () => {
    const batch = [
      row('Bukayo Saka', 'Arsenal'),
      row('Cole Palmer', 'Chelsea'),
      row('Erling Haaland', 'Manchester City'),
      row('Alexander Isak', 'Newcastle United'),
      row('Ollie Watkins', 'Aston Villa'),
      row('', 'Arsenal'),
    ];

    const summary = await uow.transaction((s) => reconcilePlayers(s, batch, AT));

    expect(summary).toEqual({
      fetched: 6,
      inserted: 5,
      updated: 0,
      skipped: 1,
      skipReasons: ['record #6 (name="", team="Arsenal"): name is missing or empty'],
    });
    expect(uow.rows).toHaveLength(5);
  });

  it('describe el registro omitido aunque falte el team', async () => {
    const summary = await uow.transaction((s) => reconcilePlayers(s, [{ player_name: ' Rodri ' }], AT));
    expect(summary.skipReasons).toEqual(['record #1 (name="Rodri", team=""): team is missing or empty']);
  });

  it('dentro de un run gana la última aparición de la clave', async () => {
    const summary = await uow.transaction((s) =>
      reconcilePlayers(s, [row('X', 'A', { goals: '3' }), row('X', 'A', { goals: '5' })], AT),
    );

    expect(summary).toMatchObject({ fetched: 2, inserted: 1, updated: 1 });
    expect(uow.rows).toHaveLength(1);
    expect(uow.find('X', 'A')?.goals).toBe(5);
  });

  it('reemplaza todas las stats (no suma)', async () => {
    uow.seed(player({ name: 'Cole Palmer', team: 'Chelsea', goals: 22, assists: 11, shots: 120 }));

    await uow.transaction((s) => reconcilePlayers(s, [row('Cole Palmer', 'Chelsea', { goals: '2' })], AT));

    expect(uow.find('Cole Palmer', 'Chelsea')).toMatchObject({ goals: 2, assists: 0, shots: 0, matches: 3 });
  });

  it('si falla el commit no queda nada escrito', async () => {
    uow.seed(player({ name: 'Mohamed Salah', team: 'Liverpool', goals: 10 }));
    const before = uow.rows.map((r) => ({ ...r }));
    uow.failOnCommit = true;

    await expect(
      uow.transaction((s) =>
        reconcilePlayers(s, [row('Mohamed Salah', 'Liverpool', { goals: '29' }), row('Cole Palmer', 'Chelsea')], AT),
      ),
    ).rejects.toBeInstanceOf(StorageError);

    expect(uow.rows).toEqual(before);
  });

  it('un fallo de upsert a mitad de run revierte lo anterior', async () => {
    uow.failOnUpsert = 2;

    await expect(
      uow.transaction((s) => reconcilePlayers(s, [row('A', 'T'), row('B', 'T'), row('C', 'T')], AT)),
    ).rejects.toThrow('Player upsert rolled back: duplicate key value violates unique constraint');

    expect(uow.rows).toEqual([]);
  });

  it('lote vacío → resumen a cero', async () => {
    const summary = await uow.transaction((s) => reconcilePlayers(s, [], AT));
    expect(summary).toEqual({ fetched: 0, inserted: 0, updated: 0, skipped: 0, skipReasons: [] });
  });
});
