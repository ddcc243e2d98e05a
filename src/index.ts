/**
 * Lineup Tracker
 *
 * Infers on-court lineups from a game's play-by-play log.
 */

// Tracker
export { LineupTracker, trackGame } from './tracker/lineup-tracker.js';
export type { LineupTrackerOptions } from './tracker/lineup-tracker.js';

// Pipeline stages
export {
  clockToElapsedSeconds,
  parseClock,
  parseMinutes,
  periodStartClock,
  periodStartElapsed,
} from './clock/clock-converter.js';
export { buildRoster, identifyStarters } from './roster/roster-builder.js';
export { PlayerDirectory } from './roster/player-directory.js';
export { PlayerNameResolver } from './matching/player-name-resolver.js';
export type { NameResolution } from './matching/player-name-resolver.js';
export { DEFAULT_NAME_STRATEGIES } from './matching/name-strategies.js';
export type { NameCandidate, NameMatchStrategy } from './matching/name-strategies.js';
export { analyzeQuarterBoundaries } from './analysis/quarter-boundaries.js';
export { analyzeQuarterPatterns } from './analysis/quarter-patterns.js';
export { parseSubstitutions, parseSubstitutionDescription } from './substitutions/substitution-parser.js';
export { detectSubstitutionChains } from './substitutions/substitution-chains.js';
export { LineupInferencer } from './lineup/lineup-inferencer.js';
export { TimelineBuilder } from './lineup/timeline-builder.js';
export { findStateAt, queryPlayersOnCourt } from './lineup/point-query.js';
export { assertLineupState, findLineupViolation } from './lineup/lineup-invariants.js';
export { DiagnosticLog } from './diagnostics/diagnostic-log.js';

// Input validation
export { parseGameInput, parseGameRecord, parseNbaGamePayload } from './schema/game-record.js';

// Errors
export {
  LineupTrackerError,
  StructuralError,
  FormatError,
  DataError,
  InvariantViolation,
  isLineupTrackerError,
  getErrorMessage,
} from './errors/index.js';

// Types
export type * from './types/index.js';
