import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BuildTeamResult, Player, Session, TeamBuild } from '@team-builder/shared';
import { openDatabase, type DB } from './db.js';
import { createApp } from './app.js';
import type { TeamAgentClient } from './services/team-agent.js';
import { createPlayerInput } from './test-utils/fixtures.js';

const ui = { title: 'VALORANT Team Builder', icon: '🎮' };

const agent: TeamAgentClient = {
  async invoke() {
    return { completion: 'Cinder leads as IGL.', trace: {}, citations: [] };
  },
};

function postRaw(body: string): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  };
}

function postJson(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

describe('API', () => {
  let db: DB;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    db = openDatabase(':memory:');
    app = createApp({ db, agent, ui, corsOrigins: ['http://localhost:5173'] });
  });

  afterEach(() => {
    db.close();
  });

  it('reports health and UI config', async () => {
    const health = await app.request('/health');
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'ok', agentConfigured: true });

    const config = await app.request('/api/config');
    expect(await config.json()).toEqual(ui);
  });

  it('lists the six submission types', async () => {
    const res = await app.request('/api/team-builder/types');
    const types: Array<{ teamType: string }> = await res.json();

    expect(types.map((t) => t.teamType)).toEqual([
      'Professional Team Submission',
      'Semi-Professional Team Submission',
      'Game Changers Team Submission',
      'Mixed-Gender Team Submission',
      'Cross-Regional Team Submission',
      'Rising Star Team Submission',
    ]);
  });

  describe('players', () => {
    it('creates, lists and deletes players', async () => {
      const created = await app.request('/api/players', postJson(createPlayerInput({ name: 'Cinder' })));
      expect(created.status).toBe(201);
      const player: Player = await created.json();
      expect(player.name).toBe('Cinder');

      const list: Player[] = await (await app.request('/api/players')).json();
      expect(list.map((p) => p.name)).toEqual(['Cinder']);

      const deleted = await app.request(`/api/players/${player.id}`, { method: 'DELETE' });
      expect(deleted.status).toBe(200);

      const missing = await app.request(`/api/players/${player.id}`);
      expect(missing.status).toBe(404);
    });

    it('imports an array of players', async () => {
      const res = await app.request(
        '/api/players',
        postJson([createPlayerInput({ name: 'Lumen' }), createPlayerInput({ name: 'Oxide' })])
      );

      expect(res.status).toBe(201);
      const players: Player[] = await res.json();
      expect(players.map((p) => p.id)).toEqual([1, 2]);
    });

    it('rejects an invalid player with the index of the bad entry', async () => {
      const res = await app.request(
        '/api/players',
        postJson([createPlayerInput(), { name: 'Rook', org: 'Rising' }])
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Player 1: Missing required fields: name, org, agent' });
    });

    it('rejects a malformed JSON body', async () => {
      const res = await app.request('/api/players', postRaw('{not json'));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body must be valid JSON' });
    });

    it('rejects a non-numeric id', async () => {
      const res = await app.request('/api/players/abc');
      expect(res.status).toBe(400);
    });
  });

  describe('sessions', () => {
    it('creates, resets and deletes a session', async () => {
      const created = await app.request('/api/sessions', { method: 'POST' });
      expect(created.status).toBe(201);
      const session: Session = await created.json();

      const reset = await app.request(`/api/sessions/${session.id}/reset`, { method: 'POST' });
      const fresh: Session = await reset.json();
      expect(fresh.id).not.toBe(session.id);

      const deleted = await app.request(`/api/sessions/${session.id}`, { method: 'DELETE' });
      expect(deleted.status).toBe(200);
      expect((await app.request(`/api/sessions/${session.id}`)).status).toBe(404);
    });
  });

  describe('team builder', () => {
    let session: Session;

    beforeEach(async () => {
      session = await (await app.request('/api/sessions', { method: 'POST' })).json();
      await app.request('/api/players', postJson([createPlayerInput({ name: 'Cinder', org: 'Rising' })]));
    });

    it('builds a team and records it in the session history', async () => {
      const res = await app.request(
        '/api/team-builder/build',
        postJson({ sessionId: session.id, teamType: 'Rising Star Team Submission' })
      );

      expect(res.status).toBe(200);
      const result: BuildTeamResult = await res.json();
      expect(result.success).toBe(true);
      expect(result.teamComposition).toBe('Cinder leads as IGL.');

      const latest: TeamBuild = await (
        await app.request(`/api/team-builder/builds/${session.id}/latest`)
      ).json();
      expect(latest.teamComposition).toBe('Cinder leads as IGL.');
      expect(latest.sessionId).toBe(session.id);
    });

    it('records failed builds too', async () => {
      const res = await app.request(
        '/api/team-builder/build',
        postJson({ sessionId: session.id, teamType: 'Game Changers Team Submission' })
      );
      const result: BuildTeamResult = await res.json();
      expect(result.errors[0].type).toBe('no_players');

      const builds: TeamBuild[] = await (await app.request(`/api/team-builder/builds/${session.id}`)).json();
      expect(builds).toHaveLength(1);
      expect(builds[0].success).toBe(false);

      const deleted = await app.request(`/api/team-builder/build/${builds[0].id}`, { method: 'DELETE' });
      expect(deleted.status).toBe(200);
    });

    it('requires sessionId and teamType', async () => {
      const res = await app.request('/api/team-builder/build', postJson({ teamType: 'Rising Star Team Submission' }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'sessionId and teamType are required' });
    });

    it('rejects a malformed JSON body', async () => {
      const res = await app.request('/api/team-builder/build', postRaw('{not json'));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body must be valid JSON' });
    });

    it('answers 500 with the cause when the build cannot run', async () => {
      db.close();

      const res = await app.request(
        '/api/team-builder/build',
        postJson({ sessionId: session.id, teamType: 'Rising Star Team Submission' })
      );

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'Failed to build team',
        message: expect.stringContaining('not open'),
      });
    });

    it.each(['0', '-2', 'abc', '5abc', '2.5', ''])('rejects limit=%s when listing builds', async (limit) => {
      const res = await app.request(`/api/team-builder/builds/${session.id}?limit=${limit}`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'limit must be a positive integer' });
    });

    it('caps large limits when listing builds', async () => {
      const res = await app.request(`/api/team-builder/builds/${session.id}?limit=5000`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });

    it('rejects builds for an unknown session', async () => {
      const res = await app.request(
        '/api/team-builder/build',
        postJson({ sessionId: 'missing', teamType: 'Rising Star Team Submission' })
      );
      expect(res.status).toBe(404);
    });

    it('returns 404 when a session has no builds', async () => {
      const res = await app.request(`/api/team-builder/builds/${session.id}/latest`);
      expect(res.status).toBe(404);
    });
  });

  it('answers unknown routes with 404 JSON', async () => {
    const res = await app.request('/api/nothing-here');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  describe('with a built UI', () => {
    let staticDir: string;
    let uiApp: ReturnType<typeof createApp>;

    beforeAll(() => {
      staticDir = mkdtempSync(join(tmpdir(), 'team-builder-ui-'));
      writeFileSync(join(staticDir, 'index.html'), '<html>spa</html>');
      writeFileSync(join(staticDir, 'app.js'), 'console.log("ui");');
    });

    afterAll(() => {
      rmSync(staticDir, { recursive: true, force: true });
    });

    beforeEach(() => {
      uiApp = createApp({ db, agent, ui, corsOrigins: [], staticDir });
    });

    it('serves assets and falls back to index.html for client routes', async () => {
      const asset = await uiApp.request('/app.js');
      expect(asset.status).toBe(200);
      expect(await asset.text()).toBe('console.log("ui");');

      const page = await uiApp.request('/history');
      expect(page.status).toBe(200);
      expect(page.headers.get('Content-Type')).toContain('text/html');
      expect(await page.text()).toBe('<html>spa</html>');
    });

    it('keeps API routes and API 404s as JSON', async () => {
      const config = await uiApp.request('/api/config');
      expect(await config.json()).toEqual(ui);

      const missing = await uiApp.request('/api/nothing-here');
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: 'Not found' });
    });
  });
});
