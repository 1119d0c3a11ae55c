import type { AgentCitation, AgentTrace } from './agent-trace.js';

/**
 * Request to build a team composition for a session
 */
export interface BuildTeamRequest {
  sessionId: string;
  teamType: string;
  additionalConstraints?: string;
}

export type TeamBuildErrorType =
  | 'invalid_team_type'
  | 'no_players'
  | 'constraint_violation'
  | 'agent_error'
  | 'agent_not_configured'
  | 'database_error';

export interface TeamBuildError {
  type: TeamBuildErrorType;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Result of a team build attempt
 */
export interface BuildTeamResult {
  success: boolean;
  teamType: string;
  playerCount: number;
  teamComposition: string;
  errors: TeamBuildError[];
  trace: AgentTrace;
  citations: AgentCitation[];
}

/**
 * A stored team build, as listed in a session's history
 */
export interface TeamBuild extends BuildTeamResult {
  id: string;
  sessionId: string;
  additionalConstraints?: string;
  createdAt: string;
}
