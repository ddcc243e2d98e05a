/**
 * Tracker Configuration
 *
 * Centralized constants for clock arithmetic, lineup inference,
 * substitution parsing and the HTTP API.
 */

// ============ Game Clock ============

export const CLOCK = {
  /** Number of regulation periods */
  REGULATION_PERIODS: 4,

  /** Length of a regulation period (seconds) */
  REGULATION_PERIOD_SECONDS: 720,

  /** Length of an overtime period (seconds) */
  OVERTIME_PERIOD_SECONDS: 300,

  /** Clock value at the start of a regulation period */
  REGULATION_START_CLOCK: 'PT12M00.00S',

  /** Clock value at the start of an overtime period */
  OVERTIME_START_CLOCK: 'PT05M00.00S',
} as const;

// ============ Lineups ============

export const LINEUP = {
  /** Players on court per team */
  SIZE: 5,

  /** Backfill prefers players who logged more than this many seconds */
  BACKFILL_MIN_SECONDS: 300,
} as const;

// ============ Play-by-Play Actions ============

export const ACTIONS = {
  /** Action types that place the acting player on the court */
  ON_COURT_TYPES: [
    'Made Shot',
    'Missed Shot',
    'Rebound',
    'Foul',
    'Free Throw',
    'Turnover',
    'Jump Ball',
    'Assist',
    'Block',
    'Steal',
  ],

  /** NBA team ids are 10 digits with this prefix; actions may carry them as personId */
  TEAM_ID_PREFIX: '1610612',
  TEAM_ID_LENGTH: 10,
} as const;

// ============ Substitutions ============

export const SUBSTITUTION = {
  /** actionType of substitution entries */
  ACTION_TYPE: 'Substitution',

  /** "SUB: Brooks FOR Ward" -> incoming, outgoing */
  DESCRIPTION_PATTERN: /SUB:\s*(.+?)\s+FOR\s+(.+)/,
} as const;

// ============ Substitution Chains ============

export const CHAINS = {
  /** Max seconds between consecutive substitutions in one chain */
  TIME_WINDOW_SECONDS: 15,

  /** Max action-number gap for substitutions to count as consecutive */
  MAX_ACTION_GAP: 5,
} as const;

// ============ Tracker ============

export const TRACKER = {
  /** Print diagnostics to the console as they are recorded */
  LOG_DIAGNOSTICS: false,
} as const;

// ============ API ============

export const API = {
  /** Default port for the lineup API */
  DEFAULT_PORT: 3001,

  /** Maximum accepted request body (game payloads run to a few MB) */
  BODY_LIMIT: '20mb',

  /** Service name reported by the health check */
  SERVICE_NAME: 'lineup-tracker-api',
} as const;
