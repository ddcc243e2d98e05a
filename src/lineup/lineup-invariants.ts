/**
 * Lineup Invariants
 *
 * Every emitted lineup state must hold five distinct players per team,
 * disjoint between teams, each on the team it is listed for.
 */

import { LINEUP } from '../config/tracker.js';
import { InvariantViolation } from '../errors/index.js';
import type { PlayerDirectory } from '../roster/player-directory.js';
import type { LineupState } from '../types/index.js';

function checkSide(
  state: LineupState,
  side: 'home' | 'away',
  directory: PlayerDirectory
): string | null {
  const players = side === 'home' ? state.homePlayers : state.awayPlayers;
  const teamId = side === 'home' ? state.homeTeamId : state.awayTeamId;

  if (players.length !== LINEUP.SIZE) {
    return `${side} lineup has ${players.length} players instead of ${LINEUP.SIZE}`;
  }
  if (new Set(players).size !== LINEUP.SIZE) {
    return `${side} lineup has duplicate players`;
  }
  for (const playerId of players) {
    const player = directory.get(playerId);
    if (!player) return `${side} lineup has unknown player ${playerId}`;
    if (player.teamId !== teamId) {
      return `${side} lineup has player ${playerId} from team ${player.teamId}`;
    }
  }
  return null;
}

/**
 * Describe the first invariant a state breaks, or null if it holds.
 */
export function findLineupViolation(
  state: LineupState,
  directory: PlayerDirectory,
  previous?: LineupState
): string | null {
  const problem = checkSide(state, 'home', directory) ?? checkSide(state, 'away', directory);
  if (problem) return problem;

  const home = new Set(state.homePlayers);
  const shared = state.awayPlayers.find((playerId) => home.has(playerId));
  if (shared !== undefined) {
    return `player ${shared} is on both lineups`;
  }

  if (previous && state.elapsedSeconds < previous.elapsedSeconds) {
    return `elapsed time went back from ${previous.elapsedSeconds}s to ${state.elapsedSeconds}s`;
  }
  return null;
}

/**
 * @throws InvariantViolation if the state breaks an invariant
 */
export function assertLineupState(
  state: LineupState,
  directory: PlayerDirectory,
  previous?: LineupState
): void {
  const problem = findLineupViolation(state, directory, previous);
  if (problem) {
    throw new InvariantViolation(`Invalid lineup state at ${state.elapsedSeconds}s: ${problem}`, {
      gameId: state.gameId,
      period: state.period,
      clock: state.clock,
      homePlayers: state.homePlayers,
      awayPlayers: state.awayPlayers,
    });
  }
}
