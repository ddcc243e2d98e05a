/**
 * Point Query
 *
 * Looks up the lineup on court at an arbitrary (period, clock).
 */

import { clockToElapsedSeconds } from '../clock/clock-converter.js';
import { InvariantViolation } from '../errors/index.js';
import type { PlayerDirectory } from '../roster/player-directory.js';
import type { LineupState, OnCourtPlayers } from '../types/index.js';

/**
 * Most recent state at or before the given elapsed time.
 * Times before the first state resolve to the first state.
 *
 * @param timeline States ordered by elapsedSeconds
 */
export function findStateAt(timeline: readonly LineupState[], elapsedSeconds: number): LineupState {
  if (timeline.length === 0) {
    throw new InvariantViolation('Cannot query an empty lineup timeline');
  }

  let current = timeline[0];
  for (const state of timeline) {
    if (state.elapsedSeconds > elapsedSeconds) break;
    current = state;
  }
  return current;
}

/**
 * Players on court at (period, clock), with display names.
 *
 * @throws FormatError if the clock is not a PT clock
 */
export function queryPlayersOnCourt(
  timeline: readonly LineupState[],
  directory: PlayerDirectory,
  period: number,
  clock: string
): OnCourtPlayers {
  const state = findStateAt(timeline, clockToElapsedSeconds(period, clock));

  return {
    gameId: state.gameId,
    period,
    clock,
    homeTeamId: state.homeTeamId,
    awayTeamId: state.awayTeamId,
    homePlayers: [...state.homePlayers],
    awayPlayers: [...state.awayPlayers],
    homePlayerNames: state.homePlayers.map((id) => directory.getDisplayName(id)),
    awayPlayerNames: state.awayPlayers.map((id) => directory.getDisplayName(id)),
  };
}
