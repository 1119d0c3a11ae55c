import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type DB } from '../db.js';
import { createPlayers } from './players.js';
import { buildTeam } from './team-builder.js';
import type { AgentResponse, TeamAgentClient } from './team-agent.js';
import { createPlayerInput } from '../test-utils/fixtures.js';

// Agent stand-in that records prompts and returns a fixed response
function createAgent(response: Partial<AgentResponse> = {}) {
  const calls: Array<{ sessionId: string; prompt: string }> = [];
  const agent: TeamAgentClient = {
    async invoke(sessionId, prompt) {
      calls.push({ sessionId, prompt });
      return { completion: '## Suggested Team', trace: {}, citations: [], ...response };
    },
  };
  return { agent, calls };
}

describe('buildTeam', () => {
  let db: DB;

  beforeEach(() => {
    db = openDatabase(':memory:');
    createPlayers(db, [
      createPlayerInput({ name: 'Cinder', org: 'Rising', region: 'EU' }),
      createPlayerInput({ name: 'Lumen', org: 'OrgZ', region: 'Japan' }),
      createPlayerInput({ name: 'Oxide', org: 'OrgZ', region: 'Japan' }),
    ]);
  });

  afterEach(() => {
    db.close();
  });

  it('returns the agent composition for a valid request', async () => {
    const { agent, calls } = createAgent({
      trace: { orchestrationTrace: [{ rationale: { traceId: 't-1' } }] },
    });

    const result = await buildTeam(db, agent, {
      sessionId: 'session-1',
      teamType: 'Game Changers Team Submission',
      additionalConstraints: 'Two controllers',
    });

    expect(result).toEqual({
      success: true,
      teamType: 'Game Changers Team Submission',
      playerCount: 2,
      teamComposition: '## Suggested Team',
      errors: [],
      trace: { orchestrationTrace: [{ rationale: { traceId: 't-1' } }] },
      citations: [],
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].sessionId).toBe('session-1');
    expect(calls[0].prompt).toContain('Player Name: Lumen\n');
    expect(calls[0].prompt).toContain('Player Name: Oxide\n');
    expect(calls[0].prompt).toContain('Additional Constraints: Two controllers\n');
  });

  it('rejects an unknown submission type without calling the agent', async () => {
    const { agent, calls } = createAgent();

    const result = await buildTeam(db, agent, { sessionId: 's', teamType: 'Pickup Team' });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      {
        type: 'invalid_team_type',
        message: 'Invalid team submission type selected.',
        details: { teamType: 'Pickup Team' },
      },
    ]);
    expect(calls).toHaveLength(0);
  });

  it('reports an empty player pool', async () => {
    db.prepare('DELETE FROM players').run();
    const { agent } = createAgent();

    const result = await buildTeam(db, agent, { sessionId: 's', teamType: 'Semi-Professional Team Submission' });

    expect(result.errors).toEqual([
      {
        type: 'no_players',
        message:
          'No players found matching the selected criteria. Please try a different team submission type.',
      },
    ]);
  });

  it('reports unmet composition rules', async () => {
    const { agent, calls } = createAgent();

    // Only Japan is in the cross-regional set, so the pool spans one region
    const result = await buildTeam(db, agent, { sessionId: 's', teamType: 'Cross-Regional Team Submission' });

    expect(result.success).toBe(false);
    expect(result.playerCount).toBe(2);
    expect(result.errors.map((e) => e.type)).toEqual(['constraint_violation']);
    expect(calls).toHaveLength(0);
  });

  it('fails when no agent is configured', async () => {
    const result = await buildTeam(db, null, { sessionId: 's', teamType: 'Rising Star Team Submission' });

    expect(result.success).toBe(false);
    expect(result.errors[0].type).toBe('agent_not_configured');
  });

  it('turns agent failures into an agent_error result', async () => {
    const agent: TeamAgentClient = {
      async invoke() {
        throw new Error('throttled');
      },
    };

    const result = await buildTeam(db, agent, { sessionId: 's', teamType: 'Rising Star Team Submission' });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      { type: 'agent_error', message: 'An error occurred while generating the team: throttled' },
    ]);
  });

  it('returns the completion unchanged', async () => {
    const { agent } = createAgent({ completion: '\n## Suggested Team\n' });

    const result = await buildTeam(db, agent, { sessionId: 's', teamType: 'Rising Star Team Submission' });

    expect(result.success).toBe(true);
    expect(result.teamComposition).toBe('\n## Suggested Team\n');
  });

  it('reports a failed player query as a database_error', async () => {
    const closed = openDatabase(':memory:');
    closed.close();
    const { agent, calls } = createAgent();

    const result = await buildTeam(closed, agent, { sessionId: 's', teamType: 'Rising Star Team Submission' });

    expect(result.success).toBe(false);
    expect(result.playerCount).toBe(0);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].type).toBe('database_error');
    expect(result.errors[0].message).toMatch(/^An error occurred while querying the database: /);
    expect(calls).toHaveLength(0);
  });

  it('treats an empty completion as a failure but keeps the trace', async () => {
    const { agent } = createAgent({
      completion: '  \n',
      trace: { failureTrace: [{ traceId: 'f-1', failureReason: 'timeout' }] },
    });

    const result = await buildTeam(db, agent, { sessionId: 's', teamType: 'Rising Star Team Submission' });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([{ type: 'agent_error', message: 'The agent returned an empty response.' }]);
    expect(result.trace).toEqual({ failureTrace: [{ traceId: 'f-1', failureReason: 'timeout' }] });
  });
});
