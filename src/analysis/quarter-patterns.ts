/**
 * Quarter Pattern Analyzer
 *
 * Classifies each player's regulation quarters by how they began:
 *
 *   first substitution OUT -> STARTED     (on court, later subbed out)
 *   first substitution IN  -> BENCHED     (entered later)
 *   no substitution, on-court actions -> PLAYED_FULL
 *   no substitution, no actions       -> BENCHED
 *
 * There is no per-quarter lineup field in the log, so substitution
 * direction is the only signal for who opened a quarter.
 */

import { ACTIONS, CLOCK } from '../config/tracker.js';
import type { PlayerDirectory } from '../roster/player-directory.js';
import type {
  Action,
  PlayerQuarterStatus,
  QuarterBoundary,
  QuarterStatus,
  SubstitutionDirection,
  SubstitutionEvent,
} from '../types/index.js';

const ON_COURT_ACTION_TYPES: ReadonlySet<string> = new Set(ACTIONS.ON_COURT_TYPES);

/**
 * NBA team ids (10 digits, 1610612xxx) show up as personId on team-level actions.
 */
export function isTeamId(id: number): boolean {
  const digits = String(id);
  return digits.length === ACTIONS.TEAM_ID_LENGTH && digits.startsWith(ACTIONS.TEAM_ID_PREFIX);
}

function periodPlayerKey(period: number, playerId: number): string {
  return `${period}:${playerId}`;
}

/**
 * Count on-court actions per (period, player).
 */
export function countOnCourtActions(actions: readonly Action[]): Map<string, number> {
  const counts = new Map<string, number>();

  for (const action of actions) {
    const { personId } = action;
    if (personId === undefined || isTeamId(personId)) continue;
    if (!ON_COURT_ACTION_TYPES.has(action.actionType)) continue;

    const key = periodPlayerKey(action.period, personId);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return counts;
}

export interface FirstSubstitutions {
  firstIn?: SubstitutionEvent;
  firstOut?: SubstitutionEvent;
}

function indexFirstSubstitutions(
  substitutions: readonly SubstitutionEvent[]
): Map<string, FirstSubstitutions> {
  const index = new Map<string, FirstSubstitutions>();

  const entry = (period: number, playerId: number): FirstSubstitutions => {
    const key = periodPlayerKey(period, playerId);
    const existing = index.get(key);
    if (existing) return existing;
    const created: FirstSubstitutions = {};
    index.set(key, created);
    return created;
  };

  for (const sub of substitutions) {
    const incoming = entry(sub.period, sub.playerInId);
    if (!incoming.firstIn || sub.actionNumber < incoming.firstIn.actionNumber) {
      incoming.firstIn = sub;
    }

    const outgoing = entry(sub.period, sub.playerOutId);
    if (!outgoing.firstOut || sub.actionNumber < outgoing.firstOut.actionNumber) {
      outgoing.firstOut = sub;
    }
  }

  return index;
}

/**
 * Direction and action number of a player's first substitution in a period.
 */
export function firstSubstitution(
  subs: FirstSubstitutions | undefined
): { direction: SubstitutionDirection; actionNumber: number } | null {
  const firstIn = subs?.firstIn;
  const firstOut = subs?.firstOut;

  if (firstIn && firstOut) {
    return firstOut.actionNumber < firstIn.actionNumber
      ? { direction: 'OUT', actionNumber: firstOut.actionNumber }
      : { direction: 'IN', actionNumber: firstIn.actionNumber };
  }
  if (firstOut) return { direction: 'OUT', actionNumber: firstOut.actionNumber };
  if (firstIn) return { direction: 'IN', actionNumber: firstIn.actionNumber };
  return null;
}

export function statusFor(
  direction: SubstitutionDirection | null,
  onCourtActionCount: number
): QuarterStatus {
  if (direction === 'OUT') return 'STARTED';
  if (direction === 'IN') return 'BENCHED';
  return onCourtActionCount > 0 ? 'PLAYED_FULL' : 'BENCHED';
}

/**
 * Classify every (player, regulation period) pair for the periods that
 * have a recorded boundary.
 *
 * @returns Statuses ordered by period, then roster order
 */
export function analyzeQuarterPatterns(
  directory: PlayerDirectory,
  boundaries: readonly QuarterBoundary[],
  substitutions: readonly SubstitutionEvent[],
  actions: readonly Action[]
): PlayerQuarterStatus[] {
  const firstSubs = indexFirstSubstitutions(substitutions);
  const actionCounts = countOnCourtActions(actions);
  const players = directory.getAll();
  const statuses: PlayerQuarterStatus[] = [];

  const periods = boundaries
    .map((boundary) => boundary.period)
    .filter((period) => period <= CLOCK.REGULATION_PERIODS);

  for (const period of periods) {
    for (const player of players) {
      const key = periodPlayerKey(period, player.id);
      const first = firstSubstitution(firstSubs.get(key));
      const onCourtActionCount = actionCounts.get(key) ?? 0;

      statuses.push({
        playerId: player.id,
        teamId: player.teamId,
        period,
        firstSubType: first?.direction ?? null,
        firstSubAction: first?.actionNumber ?? null,
        onCourtActionCount,
        inferredStatus: statusFor(first?.direction ?? null, onCourtActionCount),
      });
    }
  }

  return statuses;
}
