/**
 * Substitution Chains
 *
 * Groups substitutions made in quick succession, typically several
 * changes during one dead ball. An event joins the running chain when it
 * follows the previous event within the time window and shares its team,
 * swaps one of its players back, or sits within a few action numbers.
 */

import { CHAINS } from '../config/tracker.js';
import type { SubstitutionEvent } from '../types/index.js';

export type ChainLink = 'same-team' | 'player-overlap' | 'consecutive-actions';

/**
 * How two chronologically adjacent substitutions are linked, or null.
 */
export function linkBetween(
  previous: SubstitutionEvent,
  current: SubstitutionEvent
): ChainLink | null {
  if (current.period !== previous.period) return null;
  if (current.elapsedSeconds - previous.elapsedSeconds > CHAINS.TIME_WINDOW_SECONDS) return null;

  if (current.playerOutId === previous.playerInId || current.playerInId === previous.playerOutId) {
    return 'player-overlap';
  }
  if (current.teamId === previous.teamId) {
    return 'same-team';
  }
  if (Math.abs(current.actionNumber - previous.actionNumber) <= CHAINS.MAX_ACTION_GAP) {
    return 'consecutive-actions';
  }
  return null;
}

/**
 * Split chronologically sorted substitutions into chains.
 *
 * @param substitutions Events sorted by (period, elapsedSeconds)
 * @returns Chains in order; every event belongs to exactly one chain
 */
export function detectSubstitutionChains(
  substitutions: readonly SubstitutionEvent[]
): SubstitutionEvent[][] {
  const chains: SubstitutionEvent[][] = [];
  let current: SubstitutionEvent[] = [];

  for (const substitution of substitutions) {
    const previous = current[current.length - 1];
    if (previous && linkBetween(previous, substitution) !== null) {
      current.push(substitution);
      continue;
    }

    if (current.length > 0) chains.push(current);
    current = [substitution];
  }

  if (current.length > 0) chains.push(current);
  return chains;
}
