export const TEAM_TYPES = [
  'Professional Team Submission',
  'Semi-Professional Team Submission',
  'Game Changers Team Submission',
  'Mixed-Gender Team Submission',
  'Cross-Regional Team Submission',
  'Rising Star Team Submission',
] as const;

export type TeamType = (typeof TEAM_TYPES)[number];

export interface TeamTypeInfo {
  teamType: TeamType;
  description: string;
}

export function isTeamType(value: unknown): value is TeamType {
  return typeof value === 'string' && (TEAM_TYPES as readonly string[]).includes(value);
}

export const TEAM_TYPE_DESCRIPTIONS: Record<TeamType, string> = {
  'Professional Team Submission':
    'Players from the professional organizations (Ascend, Mystic, Legion, Phantom, Rising, Nebula, OrgZ, T1A).',
  'Semi-Professional Team Submission': 'Players from the Rising organization.',
  'Game Changers Team Submission': 'Players from OrgZ, the Game Changers roster.',
  'Mixed-Gender Team Submission': 'Anchored on a player from OrgZ; needs at least one OrgZ player.',
  'Cross-Regional Team Submission':
    'Up to three players from Japan, Russia, China, ME or LATAM; needs three distinct regions.',
  'Rising Star Team Submission': 'Up-and-coming players from the Rising organization.',
};

export function listTeamTypes(): TeamTypeInfo[] {
  return TEAM_TYPES.map((teamType) => ({ teamType, description: TEAM_TYPE_DESCRIPTIONS[teamType] }));
}
