import type { Player, CreatePlayerInput, TeamType } from '@team-builder/shared';
import type { DB } from '../db.js';

interface PlayerRow {
  id: number;
  player: string;
  org: string;
  rds: number;
  average_combat_score: number;
  kill_deaths: number;
  average_damage_per_round: number;
  kills_per_round: number;
  assists_per_round: number;
  first_kills_per_round: number;
  first_deaths_per_round: number;
  headshot_percentage: number;
  clutch_success_percentage: number;
  clutch_won_played: number;
  total_kills: number;
  total_deaths: number;
  total_assists: number;
  total_first_kills: number;
  total_first_deaths: number;
  map_id: string;
  agent: string;
  region: string | null;
}

function rowToPlayer(row: PlayerRow): Player {
  return {
    id: row.id,
    name: row.player,
    org: row.org,
    roundsPlayed: row.rds,
    averageCombatScore: row.average_combat_score,
    killDeathRatio: row.kill_deaths,
    averageDamagePerRound: row.average_damage_per_round,
    killsPerRound: row.kills_per_round,
    assistsPerRound: row.assists_per_round,
    firstKillsPerRound: row.first_kills_per_round,
    firstDeathsPerRound: row.first_deaths_per_round,
    headshotPercentage: row.headshot_percentage,
    clutchSuccessPercentage: row.clutch_success_percentage,
    clutchWonPlayed: row.clutch_won_played,
    totalKills: row.total_kills,
    totalDeaths: row.total_deaths,
    totalAssists: row.total_assists,
    totalFirstKills: row.total_first_kills,
    totalFirstDeaths: row.total_first_deaths,
    mapId: row.map_id,
    agent: row.agent,
    region: row.region,
  };
}

/**
 * Selection rule for each submission type: a WHERE clause over `players`
 * with its parameters, and an optional cap on the number of rows.
 */
interface SubmissionQuery {
  where: string;
  params: string[];
  limit?: number;
}

const PROFESSIONAL_ORGS = ['Ascend', 'Mystic', 'Legion', 'Phantom', 'Rising', 'Nebula', 'OrgZ', 'T1A'];
const CROSS_REGIONAL_REGIONS = ['Japan', 'Russia', 'China', 'ME', 'LATAM'];

function placeholders(values: string[]): string {
  return values.map(() => '?').join(', ');
}

export const SUBMISSION_QUERIES: Record<TeamType, SubmissionQuery> = {
  'Professional Team Submission': {
    where: `org IN (${placeholders(PROFESSIONAL_ORGS)})`,
    params: PROFESSIONAL_ORGS,
  },
  'Semi-Professional Team Submission': { where: 'org = ?', params: ['Rising'] },
  'Game Changers Team Submission': { where: 'org = ?', params: ['OrgZ'] },
  'Mixed-Gender Team Submission': { where: 'org = ?', params: ['OrgZ'], limit: 1 },
  'Cross-Regional Team Submission': {
    where: `region IN (${placeholders(CROSS_REGIONAL_REGIONS)})`,
    params: CROSS_REGIONAL_REGIONS,
    limit: 3,
  },
  'Rising Star Team Submission': { where: 'org = ?', params: ['Rising'] },
};

export function listPlayers(db: DB): Player[] {
  const rows = db.prepare<[], PlayerRow>('SELECT * FROM players ORDER BY player, id').all();
  return rows.map(rowToPlayer);
}

export function getPlayerById(db: DB, id: number): Player | null {
  const row = db.prepare<[number], PlayerRow>('SELECT * FROM players WHERE id = ?').get(id);
  return row ? rowToPlayer(row) : null;
}

/**
 * Fetch the player pool for a submission type, in insertion order.
 */
export function fetchPlayersForSubmission(db: DB, teamType: TeamType): Player[] {
  const query = SUBMISSION_QUERIES[teamType];
  const limit = query.limit !== undefined ? ` LIMIT ${query.limit}` : '';
  const rows = db
    .prepare<string[], PlayerRow>(`SELECT * FROM players WHERE ${query.where} ORDER BY id${limit}`)
    .all(...query.params);

  return rows.map(rowToPlayer);
}

const INSERT_PLAYER_SQL = `INSERT INTO players (
  player, org, rds, average_combat_score, kill_deaths, average_damage_per_round,
  kills_per_round, assists_per_round, first_kills_per_round, first_deaths_per_round,
  headshot_percentage, clutch_success_percentage, clutch_won_played,
  total_kills, total_deaths, total_assists, total_first_kills, total_first_deaths,
  map_id, agent, region
) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`;

function insertPlayer(db: DB, input: CreatePlayerInput): number {
  const result = db
    .prepare(INSERT_PLAYER_SQL)
    .run(
      input.name,
      input.org,
      input.roundsPlayed,
      input.averageCombatScore,
      input.killDeathRatio,
      input.averageDamagePerRound,
      input.killsPerRound,
      input.assistsPerRound,
      input.firstKillsPerRound,
      input.firstDeathsPerRound,
      input.headshotPercentage,
      input.clutchSuccessPercentage,
      input.clutchWonPlayed,
      input.totalKills,
      input.totalDeaths,
      input.totalAssists,
      input.totalFirstKills,
      input.totalFirstDeaths,
      input.mapId,
      input.agent,
      input.region
    );

  return Number(result.lastInsertRowid);
}

export function createPlayer(db: DB, input: CreatePlayerInput): Player {
  const id = insertPlayer(db, input);

  const player = getPlayerById(db, id);
  if (!player) {
    throw new Error('Failed to create player');
  }

  return player;
}

/**
 * Insert a batch of players in one transaction
 */
export function createPlayers(db: DB, inputs: CreatePlayerInput[]): Player[] {
  const ids = db.transaction((batch: CreatePlayerInput[]) => batch.map((input) => insertPlayer(db, input)))(
    inputs
  );

  return ids.map((id) => {
    const player = getPlayerById(db, id);
    if (!player) {
      throw new Error(`Failed to create player ${id}`);
    }
    return player;
  });
}

export function deletePlayer(db: DB, id: number): boolean {
  const result = db.prepare('DELETE FROM players WHERE id = ?').run(id);
  return result.changes > 0;
}

/**
 * Swap the whole player pool for `inputs` in one transaction
 */
export function replacePlayers(db: DB, inputs: CreatePlayerInput[]): Player[] {
  return db.transaction((batch: CreatePlayerInput[]) => {
    db.prepare('DELETE FROM players').run();
    return createPlayers(db, batch);
  })(inputs);
}

export function countPlayers(db: DB): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM players').get();
  return row?.count ?? 0;
}
