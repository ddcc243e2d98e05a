/**
 * Substitution Parser
 *
 * Extracts "SUB: {in} FOR {out}" actions into substitution events.
 * The outgoing player comes from the action itself; the incoming player
 * is only named in the description and is resolved by name.
 *
 * A substitution whose incoming player cannot be resolved, or whose team
 * is not playing, is dropped and reported as a diagnostic.
 */

import { SUBSTITUTION } from '../config/tracker.js';
import { parseClock, periodLength, remainingToElapsedSeconds } from '../clock/clock-converter.js';
import type { DiagnosticLog } from '../diagnostics/diagnostic-log.js';
import { isLineupTrackerError } from '../errors/index.js';
import type { PlayerNameResolver } from '../matching/player-name-resolver.js';
import type { Action, SubstitutionEvent } from '../types/index.js';

// ============ Description Parsing ============

export interface ParsedSubstitutionText {
  playerInName: string;
  playerOutName: string;
}

/**
 * Parse a substitution description.
 *
 * @param description - e.g., "SUB: Brooks FOR Ward"
 * @returns Incoming and outgoing names, or null if the text does not match
 */
export function parseSubstitutionDescription(description: string): ParsedSubstitutionText | null {
  const match = description.match(SUBSTITUTION.DESCRIPTION_PATTERN);
  if (!match) return null;

  const [, playerIn, playerOut] = match;
  return {
    playerInName: playerIn.trim(),
    playerOutName: playerOut.trim(),
  };
}

export function isSubstitution(action: Action): boolean {
  return action.actionType === SUBSTITUTION.ACTION_TYPE;
}

// ============ Event Extraction ============

/**
 * Seconds remaining in the period, kept within the period so that events
 * never fall outside it. Unparseable clocks count as zero remaining.
 */
function remainingSeconds(action: Action, diagnostics: DiagnosticLog): number {
  try {
    const remaining = parseClock(action.clock);
    const length = periodLength(action.period);
    if (remaining > length) {
      diagnostics.add('CLOCK_OUT_OF_RANGE', `Clock "${action.clock}" exceeds the ${length}s period, treating as ${length}s`, {
        actionNumber: action.actionNumber,
        context: { period: action.period, clock: action.clock },
      });
      return length;
    }
    return remaining;
  } catch (error) {
    if (!isLineupTrackerError(error)) throw error;
    diagnostics.add('CLOCK_UNPARSEABLE', `Invalid clock "${action.clock}", treating remaining time as 0`, {
      actionNumber: action.actionNumber,
      context: { period: action.period, clock: action.clock },
    });
    return 0;
  }
}

/**
 * Parse all substitution actions into events, sorted by
 * (period, elapsedSeconds). Ties keep log order.
 *
 * @param teamIds Teams playing the game; substitutions by any other team are dropped
 */
export function parseSubstitutions(
  gameId: string,
  actions: readonly Action[],
  teamIds: readonly number[],
  resolver: PlayerNameResolver,
  diagnostics: DiagnosticLog
): SubstitutionEvent[] {
  const events: SubstitutionEvent[] = [];

  for (const action of actions) {
    if (!isSubstitution(action)) continue;

    const parsed = parseSubstitutionDescription(action.description);
    if (!parsed) {
      diagnostics.add('SUBSTITUTION_UNPARSEABLE', `Could not parse substitution description: ${action.description}`, {
        actionNumber: action.actionNumber,
      });
      continue;
    }

    const { teamId, personId } = action;
    if (teamId === undefined || personId === undefined) {
      diagnostics.add('SUBSTITUTION_MISSING_PLAYER', `Substitution has no team or outgoing player: ${action.description}`, {
        actionNumber: action.actionNumber,
        context: { teamId, personId },
      });
      continue;
    }

    if (!teamIds.includes(teamId)) {
      diagnostics.add('UNKNOWN_TEAM', `Substitution for team ${teamId}, which is not playing: ${action.description}`, {
        actionNumber: action.actionNumber,
        context: { teamId },
      });
      continue;
    }

    const playerInId = resolver.resolve(parsed.playerInName, teamId, true);
    if (playerInId === null) {
      diagnostics.add('PLAYER_UNRESOLVED', `Could not find player '${parsed.playerInName}' on team ${teamId}`, {
        actionNumber: action.actionNumber,
        context: { name: parsed.playerInName, teamId },
      });
      continue;
    }

    events.push({
      gameId,
      actionNumber: action.actionNumber,
      period: action.period,
      clock: action.clock,
      elapsedSeconds: remainingToElapsedSeconds(action.period, remainingSeconds(action, diagnostics)),
      teamId,
      playerOutId: personId,
      playerOutName: action.playerName ?? '',
      playerInId,
      playerInName: parsed.playerInName,
      description: action.description,
    });
  }

  // Stable sort: simultaneous substitutions keep log order
  return events.sort((a, b) => a.period - b.period || a.elapsedSeconds - b.elapsedSeconds);
}
