import { Hono } from 'hono';
import type { Env } from '../app.js';
import * as playersService from '../services/players.js';
import { parsePlayerInput } from '../services/player-input.js';
import type { CreatePlayerInput } from '@team-builder/shared';
import { readJsonBody, INVALID_JSON_ERROR } from '../utils/request.js';

const router = new Hono<Env>();

function parseId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

// GET /api/players - List all players
router.get('/', (c) => {
  const players = playersService.listPlayers(c.get('db'));
  return c.json(players);
});

// GET /api/players/:id - Get a specific player
router.get('/:id', (c) => {
  const id = parseId(c.req.param('id'));
  if (id === null) {
    return c.json({ error: 'Invalid player id' }, 400);
  }

  const player = playersService.getPlayerById(c.get('db'), id);
  if (!player) {
    return c.json({ error: 'Player not found' }, 404);
  }

  return c.json(player);
});

// POST /api/players - Create a player, or a batch when the body is an array
router.post('/', async (c) => {
  const parsedBody = await readJsonBody(c.req);
  if (!parsedBody.ok) {
    return c.json({ error: INVALID_JSON_ERROR }, 400);
  }

  const body = parsedBody.body;
  const items = Array.isArray(body) ? body : [body];

  if (items.length === 0) {
    return c.json({ error: 'No players given' }, 400);
  }

  const inputs: CreatePlayerInput[] = [];
  for (const [index, item] of items.entries()) {
    const parsed = parsePlayerInput(item);
    if (!parsed.ok) {
      const prefix = Array.isArray(body) ? `Player ${index}: ` : '';
      return c.json({ error: `${prefix}${parsed.error}` }, 400);
    }
    inputs.push(parsed.input);
  }

  if (Array.isArray(body)) {
    const players = playersService.createPlayers(c.get('db'), inputs);
    console.log(`[players] Imported ${players.length} players`);
    return c.json(players, 201);
  }

  const player = playersService.createPlayer(c.get('db'), inputs[0]);
  return c.json(player, 201);
});

// DELETE /api/players/:id - Delete a player
router.delete('/:id', (c) => {
  const id = parseId(c.req.param('id'));
  if (id === null) {
    return c.json({ error: 'Invalid player id' }, 400);
  }

  const deleted = playersService.deletePlayer(c.get('db'), id);
  if (!deleted) {
    return c.json({ error: 'Player not found' }, 404);
  }

  return c.json({ message: 'Player deleted successfully' });
});

export default router;
