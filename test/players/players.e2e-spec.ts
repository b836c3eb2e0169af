import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { Player } from 'src/entities/player.entity';
import { createTestApp } from 'test/helpers/app';
import { FakePlayersService, makePlayer } from 'test/helpers/fake-players.service';

describe('Players E2E', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const players = new FakePlayersService().seed(
      makePlayer({ id: 1, name: 'Mohamed Salah', team: 'Liverpool', position: 'Forward / Midfielder', goals: 29 }),
      makePlayer({ id: 2, name: 'Bukayo Saka', team: 'Arsenal', position: 'Forward / Midfielder' }),
      makePlayer({ id: 3, name: 'Martin Odegaard', team: 'Arsenal', position: 'Midfielder' }),
      makePlayer({ id: 4, name: 'Cole Palmer', team: 'Chelsea', position: 'Midfielder / Forward' }),
      makePlayer({ id: 5, name: 'Erling Haaland', team: 'Manchester City', position: 'Forward' }),
      makePlayer({ id: 6, name: 'Bruno Fernandes', team: 'Manchester United', position: 'Midfielder' }),
      makePlayer({ id: 7, name: 'Virgil van Dijk', team: 'Liverpool', position: 'Defender' }),
    );
    app = await createTestApp({ players });
  });

  afterAll(async () => {
    await app.close();
  });

  const names = (body: Player[]) => body.map((p) => p.name);

  it('GET /api → bienvenida', async () => {
    const res = await request(app.getHttpServer()).get('/api').expect(200);
    expect(res.body.message).toBe('Football Stats API: Premier League player statistics');
  });

  it('GET /api/health', async () => {
    const res = await request(app.getHttpServer()).get('/api/health').expect(200);
    expect(res.body).toMatchObject({ status: 'ok', db: 'up' });
  });

  describe('GET /api/players', () => {
    it('filtra por equipo sin distinguir mayúsculas', async () => {
      const res = await request(app.getHttpServer()).get('/api/players?team=arsenal').expect(200);
      expect(names(res.body)).toEqual(['Bukayo Saka', 'Martin Odegaard']);
    });

    it('filtra por posición', async () => {
      const res = await request(app.getHttpServer()).get('/api/players?position=defender').expect(200);
      expect(names(res.body)).toEqual(['Virgil van Dijk']);
    });

    it('limit y offset', async () => {
      const res = await request(app.getHttpServer()).get('/api/players?limit=2&offset=1').expect(200);
      expect(res.body.map((p: Player) => p.id)).toEqual([2, 3]);
    });

    it.each(['limit=0', 'limit=101', 'limit=abc', 'offset=-1'])('%s → 400', async (qs) => {
      const res = await request(app.getHttpServer()).get(`/api/players?${qs}`).expect(400);
      expect(res.body.code).toBe('BAD_REQUEST');
    });
  });

  describe('GET /api/players/paginated', () => {
    it('devuelve la página pedida y los totales', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/paginated?page=2&per_page=3').expect(200);
      expect(res.body.players.map((p: Player) => p.id)).toEqual([4, 5, 6]);
      expect(res.body).toMatchObject({ total_items: 7, total_pages: 3, current_page: 2, per_page: 3 });
    });

    it('name busca en nombre o equipo', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/paginated?name=manchester').expect(200);
      expect(names(res.body.players)).toEqual(['Erling Haaland', 'Bruno Fernandes']);
      expect(res.body).toMatchObject({ total_items: 2, total_pages: 1, current_page: 1, per_page: 10 });
    });

    it('página fuera de rango → lista vacía', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/paginated?page=5').expect(200);
      expect(res.body).toEqual({ players: [], total_items: 7, total_pages: 1, current_page: 5, per_page: 10 });
    });

    it('per_page > 100 → 400', async () => {
      await request(app.getHttpServer()).get('/api/players/paginated?per_page=101').expect(400);
    });
  });

  describe('búsqueda', () => {
    it('search/json ordena por nombre', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/search/json?name=liverpool').expect(200);
      expect(names(res.body)).toEqual(['Mohamed Salah', 'Virgil van Dijk']);
    });

    it('search/json sin name → 400', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/search/json').expect(400);
      expect(res.body.code).toBe('BAD_REQUEST');
    });

    it('search/html devuelve una tabla', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/search/html?name=Arsenal').expect(200);
      expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(res.text).toContain('<h1>Players matching "Arsenal" (2)</h1>');
      expect(res.text).toContain('<td>Bukayo Saka</td>');
    });

    it('search/html sin name → 400', async () => {
      await request(app.getHttpServer()).get('/api/players/search/html').expect(400);
    });

    it.each(['json', 'html'])('search/%s con name en blanco → 400', async (format) => {
      const res = await request(app.getHttpServer()).get(`/api/players/search/${format}?name=%20%20%20`).expect(400);
      expect(res.body).toMatchObject({ code: 'BAD_REQUEST', message: 'name should not be empty' });
    });

    it('search/json recorta el término', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/search/json?name=%20chelsea%20').expect(200);
      expect(names(res.body)).toEqual(['Cole Palmer']);
    });
  });

  describe('GET /api/players/:id', () => {
    it('devuelve el jugador', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/1').expect(200);
      expect(res.body).toMatchObject({ id: 1, name: 'Mohamed Salah', team: 'Liverpool', goals: 29 });
    });

    it('inexistente → 404', async () => {
      const res = await request(app.getHttpServer()).get('/api/players/99').expect(404);
      expect(res.body).toMatchObject({ code: 'HTTP_404', message: 'Player 99 not found' });
    });

    it('id no numérico → 400', async () => {
      await request(app.getHttpServer()).get('/api/players/abc').expect(400);
    });
  });
});
