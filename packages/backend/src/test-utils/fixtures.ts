import type { CreatePlayerInput, Player } from '@team-builder/shared';

// Helper to create a player input with plausible stats
export function createPlayerInput(overrides: Partial<CreatePlayerInput> = {}): CreatePlayerInput {
  return {
    name: 'Vanta',
    org: 'Ascend',
    roundsPlayed: 285,
    averageCombatScore: 269.2,
    killDeathRatio: 1.43,
    averageDamagePerRound: 125,
    killsPerRound: 0.93,
    assistsPerRound: 0.16,
    firstKillsPerRound: 0.17,
    firstDeathsPerRound: 0.06,
    headshotPercentage: 20,
    clutchSuccessPercentage: 71,
    clutchWonPlayed: 0.7,
    totalKills: 265,
    totalDeaths: 185,
    totalAssists: 46,
    totalFirstKills: 48,
    totalFirstDeaths: 17,
    mapId: 'Ascent',
    agent: 'Jett',
    region: 'na',
    ...overrides,
  };
}

export function createPlayer(id: number, overrides: Partial<CreatePlayerInput> = {}): Player {
  return { id, ...createPlayerInput(overrides) };
}
