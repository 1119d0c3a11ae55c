import { Hono } from 'hono';
import type { Env } from '../app.js';
import { isJsonObject, listTeamTypes, type BuildTeamRequest } from '@team-builder/shared';
import { buildTeam } from '../services/team-builder.js';
import { getSessionById } from '../services/sessions.js';
import {
  saveTeamBuild,
  getLatestTeamBuild,
  listTeamBuilds,
  deleteTeamBuild,
} from '../services/team-builds.js';
import { readJsonBody, INVALID_JSON_ERROR } from '../utils/request.js';

const DEFAULT_BUILDS_LIMIT = 10;
const MAX_BUILDS_LIMIT = 100;

const router = new Hono<Env>();

// GET /api/team-builder/types - List the team submission types
router.get('/types', (c) => {
  return c.json(listTeamTypes());
});

// POST /api/team-builder/build - Build a team composition
router.post('/build', async (c) => {
  const parsed = await readJsonBody(c.req);
  if (!parsed.ok) {
    return c.json({ error: INVALID_JSON_ERROR }, 400);
  }

  try {
    const body = parsed.body;
    if (!isJsonObject(body)) {
      return c.json({ error: 'sessionId and teamType are required' }, 400);
    }

    const { sessionId, teamType, additionalConstraints } = body;
    if (typeof sessionId !== 'string' || typeof teamType !== 'string') {
      return c.json({ error: 'sessionId and teamType are required' }, 400);
    }
    if (additionalConstraints !== undefined && typeof additionalConstraints !== 'string') {
      return c.json({ error: 'additionalConstraints must be a string' }, 400);
    }

    const request: BuildTeamRequest = { sessionId, teamType, additionalConstraints };

    const db = c.get('db');
    if (!getSessionById(db, request.sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }

    console.log(`[team-builder] Build requested: ${request.teamType} (session ${request.sessionId})`);
    const result = await buildTeam(db, c.get('agent'), request);

    // Save the build so the session history includes failed attempts
    try {
      saveTeamBuild(db, request.sessionId, request.additionalConstraints, result);
    } catch (saveError) {
      console.error('[team-builder] Failed to save team build:', saveError);
      // Don't fail the request if saving fails
    }

    return c.json(result);
  } catch (error) {
    console.error('[team-builder] Error building team:', error);
    return c.json(
      { error: 'Failed to build team', message: error instanceof Error ? error.message : String(error) },
      500
    );
  }
});

// GET /api/team-builder/builds/:sessionId/latest - Get the latest build for a session
router.get('/builds/:sessionId/latest', (c) => {
  const build = getLatestTeamBuild(c.get('db'), c.req.param('sessionId'));

  if (!build) {
    return c.json({ error: 'No team builds found for this session' }, 404);
  }

  return c.json(build);
});

// GET /api/team-builder/builds/:sessionId - List builds for a session, newest first
router.get('/builds/:sessionId', (c) => {
  const limitParam = c.req.query('limit');
  const limit = limitParam === undefined ? DEFAULT_BUILDS_LIMIT : Number(limitParam);

  if (!Number.isInteger(limit) || limit < 1) {
    return c.json({ error: 'limit must be a positive integer' }, 400);
  }

  const builds = listTeamBuilds(c.get('db'), c.req.param('sessionId'), Math.min(limit, MAX_BUILDS_LIMIT));
  return c.json(builds);
});

// DELETE /api/team-builder/build/:id - Delete a stored build
router.delete('/build/:id', (c) => {
  const deleted = deleteTeamBuild(c.get('db'), c.req.param('id'));

  if (!deleted) {
    return c.json({ error: 'Team build not found' }, 404);
  }

  return c.json({ message: 'Team build deleted successfully' });
});

export default router;
