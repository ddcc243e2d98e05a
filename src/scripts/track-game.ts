/**
 * Track a single game from a JSON file
 *
 * Usage:
 *   npx tsx src/scripts/track-game.ts <game.json> [period] [clock]
 *
 * The file may be a normalized game record or an NBA.com game page payload.
 *
 * Environment (via .env file):
 *   GAME_JSON_PATH          - default file when no argument is given
 *   LINEUP_LOG_DIAGNOSTICS  - "true" to print diagnostics as they occur
 */

import { config } from 'dotenv';

// Load environment variables from .env file
config();

import { readFileSync } from 'fs';

import { getErrorMessage } from '../errors/index.js';
import { LineupTracker } from '../tracker/lineup-tracker.js';
import type { LineupState } from '../types/index.js';

// ============ Formatting Helpers ============

const SEPARATOR = '─'.repeat(70);

function formatState(tracker: LineupTracker, state: LineupState): string {
  const names = (ids: number[]) => ids.map((id) => tracker.directory.getDisplayName(id)).join(', ');
  return [
    `Q${state.period} ${state.clock} (${state.elapsedSeconds}s)`,
    `  Home: ${names(state.homePlayers)}`,
    `  Away: ${names(state.awayPlayers)}`,
  ].join('\n');
}

// ============ Main ============

function main(): void {
  const [pathArg, periodArg, clockArg] = process.argv.slice(2);
  const path = pathArg || process.env.GAME_JSON_PATH;

  if (!path) {
    console.error('Usage: track-game <game.json> [period] [clock]');
    process.exit(1);
  }

  const input: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const tracker = LineupTracker.fromInput(input, {
    logDiagnostics: process.env.LINEUP_LOG_DIAGNOSTICS === 'true',
  });

  const result = tracker.track();

  console.log(SEPARATOR);
  console.log(`Game ${result.gameId}: ${result.timeline.length} lineup states, ${result.substitutions.length} substitutions`);
  console.log(`Substitution chains: ${tracker.getSubstitutionChains().length}`);
  console.log(SEPARATOR);

  for (const state of result.timeline) {
    console.log(formatState(tracker, state));
  }

  if (result.diagnostics.length > 0) {
    console.log(SEPARATOR);
    console.log(`Diagnostics (${result.diagnostics.length}):`);
    for (const diagnostic of result.diagnostics) {
      const where = diagnostic.actionNumber !== undefined ? ` #${diagnostic.actionNumber}` : '';
      console.log(`  ${diagnostic.code}${where}: ${diagnostic.message}`);
    }
  }

  if (periodArg && clockArg) {
    const onCourt = tracker.getPlayersOnCourt(parseInt(periodArg, 10), clockArg);
    console.log(SEPARATOR);
    console.log(`On court at Q${onCourt.period} ${onCourt.clock}:`);
    console.log(`  Home: ${onCourt.homePlayerNames.join(', ')}`);
    console.log(`  Away: ${onCourt.awayPlayerNames.join(', ')}`);
  }
}

try {
  main();
} catch (error) {
  console.error(`[track-game] ${getErrorMessage(error)}`);
  process.exit(1);
}
