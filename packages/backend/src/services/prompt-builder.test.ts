import { describe, it, expect } from 'vitest';
import { buildPrompt, formatPlayerBlock } from './prompt-builder.js';
import { createPlayer } from '../test-utils/fixtures.js';

const VANTA_BLOCK =
  'Player Name: Vanta\n' +
  'Organization: Ascend\n' +
  'Rounds Played: 285\n' +
  'Average Combat Score: 269.2\n' +
  'Kill/Death Ratio: 1.43\n' +
  'Average Damage Per Round: 125\n' +
  'Kills Per Round: 0.93\n' +
  'Assists Per Round: 0.16\n' +
  'First Kills Per Round: 0.17\n' +
  'First Deaths Per Round: 0.06\n' +
  'Headshot Percentage: 20%\n' +
  'Clutch Success Percentage: 71%\n' +
  'Clutches Won/Played: 0.70\n' +
  'Total Kills: 265\n' +
  'Total Deaths: 185\n' +
  'Total Assists: 46\n' +
  'Total First Kills: 48\n' +
  'Total First Deaths: 17\n' +
  'Map ID: Ascent\n' +
  'Agent: Jett (Duelist)\n' +
  'Region: NA\n' +
  '-----\n';

const TASKS =
  'For each team composition, perform the following tasks:\n' +
  '1. Assign roles to each player on the team and explain their contribution.\n' +
  '2. Specify Offensive vs. Defensive roles.\n' +
  '3. Categorize each agent (Duelist, Sentinel, Controller, Initiator).\n' +
  '4. Assign a team IGL (In-Game Leader) and explain their role as the primary strategist and shotcaller.\n' +
  '5. Provide insights on team strategy and hypothesize team strengths and weaknesses.\n';

describe('Prompt Builder', () => {
  describe('formatPlayerBlock', () => {
    it('lists every stat with the agent role and upper-cased region', () => {
      expect(formatPlayerBlock(createPlayer(1))).toBe(VANTA_BLOCK);
    });

    it('uses UNKNOWN when the region is missing', () => {
      const block = formatPlayerBlock(createPlayer(1, { region: null }));
      expect(block).toContain('Region: UNKNOWN\n');
    });

    it('labels agents without a role as Undefined', () => {
      const block = formatPlayerBlock(createPlayer(1, { agent: 'Harbor' }));
      expect(block).toContain('Agent: Harbor (Undefined)\n');
    });

    it('rounds clutches won/played to two decimals', () => {
      const block = formatPlayerBlock(createPlayer(1, { clutchWonPlayed: 0.456 }));
      expect(block).toContain('Clutches Won/Played: 0.46\n');
    });
  });

  describe('buildPrompt', () => {
    it('builds the prompt without constraints', () => {
      const prompt = buildPrompt('Professional Team Submission', undefined, [createPlayer(1)]);

      expect(prompt).toBe(
        'Build a team for a VALORANT esports team based on the following player data:\n\n' +
          VANTA_BLOCK +
          '\n\n' +
          'Team Submission Type: Professional Team Submission\n' +
          TASKS
      );
    });

    it('adds additional constraints before the tasks', () => {
      const prompt = buildPrompt('Rising Star Team Submission', 'Prefer aggressive entry players', [
        createPlayer(1),
      ]);

      expect(prompt).toContain(
        'Team Submission Type: Rising Star Team Submission\n' +
          'Additional Constraints: Prefer aggressive entry players\n\n' +
          'For each team composition'
      );
    });

    it('keeps the constraints text as entered', () => {
      const prompt = buildPrompt('Rising Star Team Submission', '  Two controllers  ', [createPlayer(1)]);
      expect(prompt).toContain('Additional Constraints:   Two controllers  \n\n');
    });

    it('ignores blank constraints', () => {
      const prompt = buildPrompt('Rising Star Team Submission', '   ', [createPlayer(1)]);
      expect(prompt).not.toContain('Additional Constraints');
    });

    it('includes one block per player in order', () => {
      const prompt = buildPrompt('Professional Team Submission', undefined, [
        createPlayer(1, { name: 'Vanta' }),
        createPlayer(2, { name: 'Kestrel', agent: 'Omen' }),
      ]);

      expect(prompt.indexOf('Player Name: Vanta')).toBeLessThan(prompt.indexOf('Player Name: Kestrel'));
      expect(prompt).toContain('Agent: Omen (Controller)\n');
      expect(prompt.match(/-----\n/g)).toHaveLength(2);
    });
  });
});
