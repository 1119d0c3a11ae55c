import { Hono } from 'hono';
import type { Env } from '../app.js';
import * as sessionsService from '../services/sessions.js';

const router = new Hono<Env>();

// POST /api/sessions - Start a new session
router.post('/', (c) => {
  const session = sessionsService.createSession(c.get('db'));
  return c.json(session, 201);
});

// GET /api/sessions/:id - Get a specific session
router.get('/:id', (c) => {
  const session = sessionsService.getSessionById(c.get('db'), c.req.param('id'));

  if (!session) {
    return c.json({ error: 'Session not found' }, 404);
  }

  return c.json(session);
});

// POST /api/sessions/:id/reset - Replace a session with a fresh one
router.post('/:id/reset', (c) => {
  const session = sessionsService.resetSession(c.get('db'), c.req.param('id'));

  if (!session) {
    return c.json({ error: 'Session not found' }, 404);
  }

  return c.json(session, 201);
});

// DELETE /api/sessions/:id - Delete a session and its team builds
router.delete('/:id', (c) => {
  const deleted = sessionsService.deleteSession(c.get('db'), c.req.param('id'));

  if (!deleted) {
    return c.json({ error: 'Session not found' }, 404);
  }

  return c.json({ message: 'Session deleted successfully' });
});

export default router;
