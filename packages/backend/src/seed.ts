import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { countPlayers, createPlayers, replacePlayers } from './services/players.js';
import { parsePlayerInput } from './services/player-input.js';
import type { CreatePlayerInput } from '@team-builder/shared';

/**
 * Load the player pool from a JSON file (default: seed/players.json).
 * Skips loading when the table already has players; --force replaces them.
 */
const args = process.argv.slice(2);
const force = args.includes('--force');
const file = args.find((arg) => !arg.startsWith('--')) ?? new URL('../seed/players.json', import.meta.url);

const config = loadConfig();
const db = openDatabase(config.databasePath);

try {
  const existing = countPlayers(db);
  if (existing > 0 && !force) {
    console.log(`${config.databasePath} already has ${existing} players; pass --force to replace them`);
  } else {
    const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (!Array.isArray(raw)) {
      throw new Error('Seed file must contain a JSON array of players');
    }

    const inputs: CreatePlayerInput[] = raw.map((item, index) => {
      const parsed = parsePlayerInput(item);
      if (!parsed.ok) {
        throw new Error(`Player ${index}: ${parsed.error}`);
      }
      return parsed.input;
    });

    const players = force ? replacePlayers(db, inputs) : createPlayers(db, inputs);
    console.log(`Loaded ${players.length} players into ${config.databasePath}`);
  }
} finally {
  db.close();
}
