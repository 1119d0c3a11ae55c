import type { Player, TeamBuildError, TeamType } from '@team-builder/shared';

/**
 * Check the composition rules a submission type places on its player pool.
 * Returns one error per rule that is not met; an empty list means the pool is usable.
 */
export function validateConstraints(teamType: TeamType, players: Player[]): TeamBuildError[] {
  const errors: TeamBuildError[] = [];

  if (teamType === 'Mixed-Gender Team Submission') {
    const orgZPlayers = players.filter((p) => p.org === 'OrgZ');
    if (orgZPlayers.length < 1) {
      errors.push({
        type: 'constraint_violation',
        message:
          'Not enough players from underrepresented groups (OrgZ) to build a Mixed-Gender team.',
        details: { required: 1, found: orgZPlayers.length },
      });
    }
  } else if (teamType === 'Cross-Regional Team Submission') {
    const regions = distinctRegions(players);
    if (regions.length < 3) {
      errors.push({
        type: 'constraint_violation',
        message: 'Not enough players from different regions to build a Cross-Regional team.',
        details: { required: 3, found: regions.length, regions },
      });
    }
  }

  return errors;
}

/**
 * Upper-cased regions present in the pool, players without a region skipped
 */
export function distinctRegions(players: Player[]): string[] {
  const regions = new Set<string>();
  for (const player of players) {
    if (player.region) {
      regions.add(player.region.toUpperCase());
    }
  }
  return [...regions].sort();
}
