/**
 * Clock Converter
 *
 * Converts the play-by-play countdown clock into seconds elapsed since
 * tip-off, the time axis every lineup state is ordered on.
 *
 * Clock format: PT{mm}M{ss.ss}S, time *remaining* in the period.
 * Example: (2, "PT07M30.00S") -> 720 + 270 = 990
 */

import { CLOCK } from '../config/tracker.js';
import { FormatError } from '../errors/index.js';

// ============ Constants ============

/** Regex to parse a PT clock; both groups optional */
const PT_CLOCK_REGEX = /^PT(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?$/;

/** Regex to parse box-score minutes, e.g. "34:12" */
const MINUTES_REGEX = /^(\d+):(\d{1,2})(?:\.\d+)?$/;

const REGULATION_SECONDS = CLOCK.REGULATION_PERIODS * CLOCK.REGULATION_PERIOD_SECONDS;

// ============ Period Arithmetic ============

function assertPeriod(period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new FormatError(`Invalid period: ${period}`, String(period));
  }
}

export function isOvertime(period: number): boolean {
  return period > CLOCK.REGULATION_PERIODS;
}

/**
 * Length of a period in seconds (720 regulation, 300 overtime).
 */
export function periodLength(period: number): number {
  return isOvertime(period)
    ? CLOCK.OVERTIME_PERIOD_SECONDS
    : CLOCK.REGULATION_PERIOD_SECONDS;
}

/**
 * Elapsed seconds at the opening tip of a period.
 */
export function periodStartElapsed(period: number): number {
  assertPeriod(period);
  if (!isOvertime(period)) {
    return (period - 1) * CLOCK.REGULATION_PERIOD_SECONDS;
  }
  return REGULATION_SECONDS + (period - CLOCK.REGULATION_PERIODS - 1) * CLOCK.OVERTIME_PERIOD_SECONDS;
}

/**
 * Clock string shown at the start of a period.
 */
export function periodStartClock(period: number): string {
  return isOvertime(period) ? CLOCK.OVERTIME_START_CLOCK : CLOCK.REGULATION_START_CLOCK;
}

// ============ Parsing ============

/**
 * Parse a PT clock into seconds remaining in the period.
 *
 * @param clock - e.g., "PT07M30.00S"
 * @throws FormatError if the clock does not match PT(mm M)?(ss.ss S)?
 */
export function parseClock(clock: string): number {
  const match = clock.trim().match(PT_CLOCK_REGEX);
  if (!match) {
    throw new FormatError(`Invalid clock format: ${clock}`, clock);
  }

  const [, minutes, seconds] = match;
  return (minutes ? parseInt(minutes, 10) : 0) * 60 + (seconds ? parseFloat(seconds) : 0);
}

/**
 * Convert (period, clock) to whole seconds elapsed since game start.
 *
 * @throws FormatError for an invalid clock or a period below 1
 */
export function clockToElapsedSeconds(period: number, clock: string): number {
  return remainingToElapsedSeconds(period, parseClock(clock));
}

/**
 * Convert seconds remaining in a period to whole seconds elapsed since game start.
 */
export function remainingToElapsedSeconds(period: number, remaining: number): number {
  const start = periodStartElapsed(period);
  return Math.trunc(start + (periodLength(period) - remaining));
}

/**
 * Parse box-score minutes ("MM:SS") into seconds.
 *
 * @throws FormatError if the value is not MM:SS
 */
export function parseMinutes(minutes: string): number {
  const match = minutes.trim().match(MINUTES_REGEX);
  if (!match) {
    throw new FormatError(`Invalid minutes format: ${minutes}`, minutes);
  }

  const [, mm, ss] = match;
  return parseInt(mm, 10) * 60 + parseInt(ss, 10);
}
