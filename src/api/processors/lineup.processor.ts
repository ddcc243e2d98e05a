/**
 * Lineup Processor
 *
 * Runs the tracker on a request body and shapes the API responses.
 */

import { z } from 'zod';

import {
  StructuralError,
  getErrorMessage,
  isLineupTrackerError,
} from '../../errors/index.js';
import { LineupTracker } from '../../tracker/lineup-tracker.js';
import type {
  Diagnostic,
  DiagnosticCode,
  LineupState,
  OnCourtPlayers,
  SubstitutionEvent,
} from '../../types/index.js';

// ============ API Response Types ============

export interface LineupTimelineResponse {
  gameId: string;
  timeline: LineupState[];
  substitutions: SubstitutionEvent[];
  diagnostics: Diagnostic[];
  meta: {
    stateCount: number;
    substitutionCount: number;
    /** Substitution actions that produced no event */
    droppedSubstitutions: number;
  };
}

export interface ErrorResponse {
  status: number;
  body: {
    error: string;
    code: string;
    context?: Record<string, unknown>;
  };
}

const DROPPED_SUBSTITUTION_CODES: ReadonlySet<DiagnosticCode> = new Set<DiagnosticCode>([
  'SUBSTITUTION_UNPARSEABLE',
  'SUBSTITUTION_MISSING_PLAYER',
  'PLAYER_UNRESOLVED',
  'UNKNOWN_TEAM',
]);

/** Error codes caused by the request data rather than the server */
const CLIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'STRUCTURAL_ERROR',
  'FORMAT_ERROR',
  'DATA_ERROR',
]);

const OnCourtQuerySchema = z.object({
  period: z.coerce.number().int().min(1),
  clock: z.string().min(1),
});

// ============ Processors ============

/**
 * Build the lineup timeline for a game body.
 *
 * @throws StructuralError if the body is not a game record
 */
export function processLineupRequest(body: unknown): LineupTimelineResponse {
  const result = LineupTracker.fromInput(body).track();

  return {
    ...result,
    meta: {
      stateCount: result.timeline.length,
      substitutionCount: result.substitutions.length,
      droppedSubstitutions: result.diagnostics.filter((d) => DROPPED_SUBSTITUTION_CODES.has(d.code)).length,
    },
  };
}

/**
 * Look up the players on court for a game body at (period, clock).
 *
 * @throws StructuralError if period or clock is missing
 */
export function processOnCourtRequest(body: unknown, query: unknown): OnCourtPlayers {
  const parsed = OnCourtQuerySchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'query';
    throw new StructuralError(`Invalid query parameter ${field}`, field);
  }

  return LineupTracker.fromInput(body).getPlayersOnCourt(parsed.data.period, parsed.data.clock);
}

/**
 * Map an error to an HTTP status and body.
 * Tracker errors caused by bad input are 422; anything else is 500.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (isLineupTrackerError(error) && CLIENT_ERROR_CODES.has(error.code)) {
    return {
      status: 422,
      body: { error: error.message, code: error.code, context: error.context },
    };
  }

  return {
    status: 500,
    body: { error: 'Internal server error', code: 'INTERNAL_ERROR', context: { message: getErrorMessage(error) } },
  };
}
