/**
 * Quarter Boundary Analyzer
 *
 * Records the first and last action number seen in each period.
 */

import type { Action, QuarterBoundary } from '../types/index.js';

/**
 * Scan the log once and return one boundary per period, ordered by period.
 */
export function analyzeQuarterBoundaries(actions: readonly Action[]): QuarterBoundary[] {
  const boundaries = new Map<number, QuarterBoundary>();

  for (const action of actions) {
    const boundary = boundaries.get(action.period);
    if (!boundary) {
      boundaries.set(action.period, {
        period: action.period,
        firstActionNumber: action.actionNumber,
        lastActionNumber: action.actionNumber,
      });
      continue;
    }

    boundary.firstActionNumber = Math.min(boundary.firstActionNumber, action.actionNumber);
    boundary.lastActionNumber = Math.max(boundary.lastActionNumber, action.actionNumber);
  }

  return Array.from(boundaries.values()).sort((a, b) => a.period - b.period);
}
