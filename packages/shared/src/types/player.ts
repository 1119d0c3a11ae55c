/**
 * Player represents one row of competitive statistics for a player on a given map and agent.
 * Rates are per round; percentages are stored as plain numbers (e.g. 27.5 means 27.5%).
 */
export interface Player {
  id: number;
  name: string;
  org: string;
  roundsPlayed: number;
  averageCombatScore: number;
  killDeathRatio: number;
  averageDamagePerRound: number;
  killsPerRound: number;
  assistsPerRound: number;
  firstKillsPerRound: number;
  firstDeathsPerRound: number;
  headshotPercentage: number;
  clutchSuccessPercentage: number;
  clutchWonPlayed: number;
  totalKills: number;
  totalDeaths: number;
  totalAssists: number;
  totalFirstKills: number;
  totalFirstDeaths: number;
  mapId: string;
  agent: string;
  region: string | null;
}

export type CreatePlayerInput = Omit<Player, 'id'>;
