import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { createApp } from './app.js';
import { createTeamAgent } from './services/team-agent.js';
import { countPlayers } from './services/players.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const agent = createTeamAgent(config.bedrock);

if (!agent) {
  console.warn('BEDROCK_AGENT_ID is not set; team builds will fail until an agent is configured');
}
console.log(`Database ${config.databasePath} has ${countPlayers(db)} players`);

const app = createApp({
  db,
  agent,
  ui: config.ui,
  corsOrigins: config.corsOrigins,
  staticDir: config.staticDir,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`API running on http://localhost:${info.port}`);
});

function shutdown() {
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
