import type { CreatePlayerInput } from '@team-builder/shared';
import { isJsonObject } from '@team-builder/shared';

type NumericField = {
  [K in keyof CreatePlayerInput]: CreatePlayerInput[K] extends number ? K : never;
}[keyof CreatePlayerInput];

const NUMERIC_FIELDS: NumericField[] = [
  'roundsPlayed',
  'averageCombatScore',
  'killDeathRatio',
  'averageDamagePerRound',
  'killsPerRound',
  'assistsPerRound',
  'firstKillsPerRound',
  'firstDeathsPerRound',
  'headshotPercentage',
  'clutchSuccessPercentage',
  'clutchWonPlayed',
  'totalKills',
  'totalDeaths',
  'totalAssists',
  'totalFirstKills',
  'totalFirstDeaths',
];

const EMPTY_STATS: Record<NumericField, number> = {
  roundsPlayed: 0,
  averageCombatScore: 0,
  killDeathRatio: 0,
  averageDamagePerRound: 0,
  killsPerRound: 0,
  assistsPerRound: 0,
  firstKillsPerRound: 0,
  firstDeathsPerRound: 0,
  headshotPercentage: 0,
  clutchSuccessPercentage: 0,
  clutchWonPlayed: 0,
  totalKills: 0,
  totalDeaths: 0,
  totalAssists: 0,
  totalFirstKills: 0,
  totalFirstDeaths: 0,
};

export type PlayerInputResult =
  | { ok: true; input: CreatePlayerInput }
  | { ok: false; error: string };

function readText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Validate a request body as a new player. Stats that are left out count as 0;
 * a missing region is stored as null.
 */
export function parsePlayerInput(value: unknown): PlayerInputResult {
  if (!isJsonObject(value)) {
    return { ok: false, error: 'Player must be an object' };
  }

  const name = readText(value.name);
  const org = readText(value.org);
  const agent = readText(value.agent);
  if (!name || !org || !agent) {
    return { ok: false, error: 'Missing required fields: name, org, agent' };
  }

  const stats = { ...EMPTY_STATS };
  for (const field of NUMERIC_FIELDS) {
    const raw = value[field];
    if (raw === undefined || raw === null) {
      continue;
    }
    if (typeof raw === 'number' && Number.isFinite(raw)) {
      stats[field] = raw;
    } else {
      return { ok: false, error: `Field ${field} must be a number` };
    }
  }

  const mapId = value.mapId;
  if (mapId !== undefined && typeof mapId !== 'string' && typeof mapId !== 'number') {
    return { ok: false, error: 'Field mapId must be a string' };
  }

  const region = value.region;
  if (region !== undefined && region !== null && typeof region !== 'string') {
    return { ok: false, error: 'Field region must be a string or null' };
  }

  return {
    ok: true,
    input: {
      name,
      org,
      agent,
      ...stats,
      mapId: mapId === undefined ? '' : String(mapId),
      region: readText(region) ?? null,
    },
  };
}
