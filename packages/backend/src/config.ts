/**
 * Server configuration, read from environment variables.
 * `server.ts` loads `.env` into `process.env` before calling `loadConfig`.
 */
export interface ServerConfig {
  port: number;
  databasePath: string;
  corsOrigins: string[];
  staticDir?: string;
  ui: {
    title: string;
    icon: string;
  };
  bedrock: {
    agentId?: string;
    agentAliasId: string;
    region: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    enableTrace: boolean;
  };
}

type EnvSource = Record<string, string | undefined>;

function readString(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readPort(env: EnvSource): number {
  const raw = readString(env, 'PORT');
  if (!raw) return 8787;

  const port = parseInt(raw, 10);
  if (Number.isNaN(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

export function loadConfig(env: EnvSource = process.env): ServerConfig {
  const corsOrigins = readString(env, 'CORS_ORIGINS');

  return {
    port: readPort(env),
    databasePath: readString(env, 'DATABASE_PATH') ?? 'valorant_players.db',
    corsOrigins: corsOrigins
      ? corsOrigins.split(',').map((origin) => origin.trim()).filter(Boolean)
      : ['http://localhost:5173', 'http://localhost:3000'],
    staticDir: readString(env, 'STATIC_DIR'),
    ui: {
      title: readString(env, 'BEDROCK_AGENT_TEST_UI_TITLE') ?? 'VALORANT Team Builder',
      icon: readString(env, 'BEDROCK_AGENT_TEST_UI_ICON') ?? '🎮',
    },
    bedrock: {
      agentId: readString(env, 'BEDROCK_AGENT_ID'),
      agentAliasId: readString(env, 'BEDROCK_AGENT_ALIAS_ID') ?? 'TSTALIASID', // test alias
      region: readString(env, 'BEDROCK_REGION') ?? 'us-west-2',
      accessKeyId: readString(env, 'AWS_ACCESS_KEY_ID'),
      secretAccessKey: readString(env, 'AWS_SECRET_ACCESS_KEY'),
      enableTrace: readString(env, 'BEDROCK_ENABLE_TRACE') !== 'false',
    },
  };
}
