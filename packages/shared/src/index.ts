export * from './types/player.js';
export * from './types/agent-role.js';
export * from './types/team-type.js';
export * from './types/agent-trace.js';
export * from './types/team-builder.js';
export * from './types/session.js';
export * from './utils/trace-steps.js';
