import { isTeamType, type BuildTeamRequest, type BuildTeamResult, type Player } from '@team-builder/shared';
import type { DB } from '../db.js';
import { fetchPlayersForSubmission } from './players.js';
import { validateConstraints } from './team-constraints.js';
import { buildPrompt } from './prompt-builder.js';
import type { TeamAgentClient } from './team-agent.js';

function failure(
  teamType: string,
  playerCount: number,
  errors: BuildTeamResult['errors']
): BuildTeamResult {
  return {
    success: false,
    teamType,
    playerCount,
    teamComposition: '',
    errors,
    trace: {},
    citations: [],
  };
}

/**
 * Build a team composition for one request.
 *
 * Selects the player pool for the submission type, checks the type's
 * composition rules, then asks the agent for a composition. Expected
 * failures (bad type, empty pool, unmet rule, agent errors) come back as a
 * result with `success: false` rather than a thrown error.
 */
export async function buildTeam(
  db: DB,
  agent: TeamAgentClient | null,
  request: BuildTeamRequest
): Promise<BuildTeamResult> {
  const { teamType, sessionId } = request;

  if (!isTeamType(teamType)) {
    return failure(teamType, 0, [
      {
        type: 'invalid_team_type',
        message: 'Invalid team submission type selected.',
        details: { teamType },
      },
    ]);
  }

  let players: Player[];
  try {
    players = fetchPlayersForSubmission(db, teamType);
  } catch (error) {
    console.error('[team-builder] Player query failed:', error);
    return failure(teamType, 0, [
      {
        type: 'database_error',
        message: `An error occurred while querying the database: ${
          error instanceof Error ? error.message : String(error)
        }`,
      },
    ]);
  }

  console.log(`[team-builder] ${teamType}: ${players.length} players selected`);

  if (players.length === 0) {
    return failure(teamType, 0, [
      {
        type: 'no_players',
        message:
          'No players found matching the selected criteria. Please try a different team submission type.',
      },
    ]);
  }

  const constraintErrors = validateConstraints(teamType, players);
  if (constraintErrors.length > 0) {
    return failure(teamType, players.length, constraintErrors);
  }

  if (!agent) {
    return failure(teamType, players.length, [
      {
        type: 'agent_not_configured',
        message: 'No agent is configured on the server (BEDROCK_AGENT_ID is missing).',
      },
    ]);
  }

  const prompt = buildPrompt(teamType, request.additionalConstraints, players);

  try {
    const response = await agent.invoke(sessionId, prompt);
    const teamComposition = response.completion;

    if (teamComposition.trim() === '') {
      return {
        ...failure(teamType, players.length, [
          { type: 'agent_error', message: 'The agent returned an empty response.' },
        ]),
        trace: response.trace,
        citations: response.citations,
      };
    }

    return {
      success: true,
      teamType,
      playerCount: players.length,
      teamComposition,
      errors: [],
      trace: response.trace,
      citations: response.citations,
    };
  } catch (error) {
    console.error('[team-builder] Agent call failed:', error);
    return failure(teamType, players.length, [
      {
        type: 'agent_error',
        message: `An error occurred while generating the team: ${
          error instanceof Error ? error.message : String(error)
        }`,
      },
    ]);
  }
}
