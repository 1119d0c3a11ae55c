import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';
import { serveStatic } from '@hono/node-server/serve-static';
import { relative, resolve } from 'node:path';
import type { AppConfig } from '@team-builder/shared';
import type { DB } from './db.js';
import type { TeamAgentClient } from './services/team-agent.js';
import playersRouter from './routes/players.js';
import sessionsRouter from './routes/sessions.js';
import teamBuilderRouter from './routes/team-builder.js';

export type Env = {
  Variables: {
    db: DB;
    agent: TeamAgentClient | null;
  };
};

export interface AppDependencies {
  db: DB;
  agent: TeamAgentClient | null;
  ui: AppConfig;
  corsOrigins: string[];
  /** Directory of the built UI; served for every non-API path when set */
  staticDir?: string;
}

function isApiPath(path: string): boolean {
  return path === '/api' || path.startsWith('/api/');
}

function skipApiPaths(handler: MiddlewareHandler<Env>): MiddlewareHandler<Env> {
  return async (c, next) => (isApiPath(c.req.path) ? next() : handler(c, next));
}

export function createApp({ db, agent, ui, corsOrigins, staticDir }: AppDependencies) {
  const app = new Hono<Env>();

  // CORS middleware
  app.use(
    '/*',
    cors({
      origin: corsOrigins,
      credentials: true,
    })
  );

  app.use('/*', async (c, next) => {
    c.set('db', db);
    c.set('agent', agent);
    await next();
  });

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', agentConfigured: agent !== null, timestamp: new Date().toISOString() });
  });

  app.get('/api/config', (c) => {
    return c.json(ui);
  });

  // API routes
  app.route('/api/players', playersRouter);
  app.route('/api/sessions', sessionsRouter);
  app.route('/api/team-builder', teamBuilderRouter);

  // Built UI, with index.html as the fallback for client-side routes
  if (staticDir) {
    // serve-static resolves its root against the working directory
    const root = relative(process.cwd(), resolve(staticDir)) || '.';
    app.use('/*', skipApiPaths(serveStatic({ root })));
    app.get('/*', skipApiPaths(serveStatic({ root, rewriteRequestPath: () => '/index.html' })));
  }

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error('Error:', err);
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  return app;
}
