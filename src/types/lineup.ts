/**
 * Lineup Types
 *
 * Entities derived from a single game record.
 */

// ============ Players ============

export interface Player {
  id: number;
  firstName: string;
  familyName: string;
  /** Name as printed in play-by-play text (e.g. "J. Brunson") */
  displayName: string;
  jersey: string;
  position: string;
  teamId: number;
  /** Nominal starter: top 5 by minutes among players with a position */
  isStarter: boolean;
  /** Total game minutes, in seconds */
  minutesPlayed: number;
}

// ============ Substitutions ============

export interface SubstitutionEvent {
  gameId: string;
  actionNumber: number;
  period: number;
  clock: string;
  elapsedSeconds: number;
  teamId: number;
  playerOutId: number;
  playerOutName: string;
  playerInId: number;
  playerInName: string;
  description: string;
}

// ============ Quarter Analysis ============

export interface QuarterBoundary {
  period: number;
  firstActionNumber: number;
  lastActionNumber: number;
}

export type SubstitutionDirection = 'IN' | 'OUT';

export type QuarterStatus = 'STARTED' | 'BENCHED' | 'PLAYED_FULL';

export interface PlayerQuarterStatus {
  playerId: number;
  teamId: number;
  period: number;
  /** Direction of the player's first substitution in the period */
  firstSubType: SubstitutionDirection | null;
  firstSubAction: number | null;
  onCourtActionCount: number;
  inferredStatus: QuarterStatus;
}

// ============ Lineup Timeline ============

export interface LineupState {
  gameId: string;
  period: number;
  clock: string;
  elapsedSeconds: number;
  homeTeamId: number;
  awayTeamId: number;
  homePlayers: number[];
  awayPlayers: number[];
}

export interface StartingLineup {
  home: number[];
  away: number[];
}

export interface OnCourtPlayers {
  gameId: string;
  period: number;
  clock: string;
  homeTeamId: number;
  awayTeamId: number;
  homePlayers: number[];
  awayPlayers: number[];
  homePlayerNames: string[];
  awayPlayerNames: string[];
}

// ============ Diagnostics ============

export type DiagnosticCode =
  | 'SUBSTITUTION_UNPARSEABLE'
  | 'SUBSTITUTION_MISSING_PLAYER'
  | 'PLAYER_UNRESOLVED'
  | 'CLOCK_UNPARSEABLE'
  | 'CLOCK_OUT_OF_RANGE'
  | 'MINUTES_UNPARSEABLE'
  | 'PLAYER_OUT_NOT_ON_COURT'
  | 'PLAYER_IN_ALREADY_ON_COURT'
  | 'UNKNOWN_TEAM'
  | 'NOMINAL_STARTERS_USED';

/**
 * Non-fatal data problem found while processing a game.
 * Callers decide how severe each code is.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  actionNumber?: number;
  context?: Record<string, unknown>;
}

// ============ Tracker Output ============

export interface TrackerResult {
  gameId: string;
  timeline: LineupState[];
  substitutions: SubstitutionEvent[];
  diagnostics: Diagnostic[];
}
