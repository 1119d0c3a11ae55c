import { assignRole, type Player } from '@team-builder/shared';

const TEAM_TASKS = [
  '1. Assign roles to each player on the team and explain their contribution.',
  '2. Specify Offensive vs. Defensive roles.',
  '3. Categorize each agent (Duelist, Sentinel, Controller, Initiator).',
  '4. Assign a team IGL (In-Game Leader) and explain their role as the primary strategist and shotcaller.',
  '5. Provide insights on team strategy and hypothesize team strengths and weaknesses.',
];

export function formatPlayerBlock(player: Player): string {
  const role = assignRole(player.agent);
  const region = player.region ? player.region.toUpperCase() : 'UNKNOWN';

  return [
    `Player Name: ${player.name}`,
    `Organization: ${player.org}`,
    `Rounds Played: ${player.roundsPlayed}`,
    `Average Combat Score: ${player.averageCombatScore}`,
    `Kill/Death Ratio: ${player.killDeathRatio}`,
    `Average Damage Per Round: ${player.averageDamagePerRound}`,
    `Kills Per Round: ${player.killsPerRound}`,
    `Assists Per Round: ${player.assistsPerRound}`,
    `First Kills Per Round: ${player.firstKillsPerRound}`,
    `First Deaths Per Round: ${player.firstDeathsPerRound}`,
    `Headshot Percentage: ${player.headshotPercentage}%`,
    `Clutch Success Percentage: ${player.clutchSuccessPercentage}%`,
    `Clutches Won/Played: ${player.clutchWonPlayed.toFixed(2)}`,
    `Total Kills: ${player.totalKills}`,
    `Total Deaths: ${player.totalDeaths}`,
    `Total Assists: ${player.totalAssists}`,
    `Total First Kills: ${player.totalFirstKills}`,
    `Total First Deaths: ${player.totalFirstDeaths}`,
    `Map ID: ${player.mapId}`,
    `Agent: ${player.agent} (${role})`,
    `Region: ${region}`,
    '-----',
  ]
    .map((line) => `${line}\n`)
    .join('');
}

/**
 * Build the agent prompt: every player's stat block, the submission type,
 * the user's extra constraints when given, then the analysis tasks.
 */
export function buildPrompt(
  teamType: string,
  additionalConstraints: string | undefined,
  players: Player[]
): string {
  const playerInfo = players.map(formatPlayerBlock).join('');

  let prompt =
    'Build a team for a VALORANT esports team based on the following player data:\n\n' +
    `${playerInfo}\n\n` +
    `Team Submission Type: ${teamType}\n`;

  if (additionalConstraints && additionalConstraints.trim() !== '') {
    prompt += `Additional Constraints: ${additionalConstraints}\n\n`;
  }

  prompt += 'For each team composition, perform the following tasks:\n';
  prompt += TEAM_TASKS.map((task) => `${task}\n`).join('');

  return prompt;
}
