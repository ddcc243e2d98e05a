/**
 * Lineup Tracker
 *
 * Runs the full pipeline for one game: roster, substitutions, quarter
 * patterns, inferred starting fives and the lineup timeline.
 *
 * One instance per game. Each stage is computed on first use and cached;
 * public methods hand out copies of the cached results.
 */

import { TRACKER } from '../config/tracker.js';
import { analyzeQuarterBoundaries } from '../analysis/quarter-boundaries.js';
import { analyzeQuarterPatterns } from '../analysis/quarter-patterns.js';
import { DiagnosticLog } from '../diagnostics/diagnostic-log.js';
import { LineupInferencer } from '../lineup/lineup-inferencer.js';
import { queryPlayersOnCourt } from '../lineup/point-query.js';
import { TimelineBuilder } from '../lineup/timeline-builder.js';
import { PlayerNameResolver } from '../matching/player-name-resolver.js';
import { buildRoster } from '../roster/roster-builder.js';
import type { PlayerDirectory } from '../roster/player-directory.js';
import { parseGameInput } from '../schema/game-record.js';
import { detectSubstitutionChains } from '../substitutions/substitution-chains.js';
import { parseSubstitutions } from '../substitutions/substitution-parser.js';
import type {
  GameRecord,
  LineupState,
  OnCourtPlayers,
  PlayerQuarterStatus,
  QuarterBoundary,
  StartingLineup,
  SubstitutionEvent,
  TrackerResult,
} from '../types/index.js';

export interface LineupTrackerOptions {
  /** Print diagnostics as they are recorded (default: TRACKER.LOG_DIAGNOSTICS) */
  logDiagnostics?: boolean;
}

export class LineupTracker {
  readonly gameId: string;
  readonly homeTeamId: number;
  readonly awayTeamId: number;
  readonly directory: PlayerDirectory;

  private readonly diagnostics: DiagnosticLog;
  private readonly resolver: PlayerNameResolver;

  private boundaries: QuarterBoundary[] | null = null;
  private substitutions: SubstitutionEvent[] | null = null;
  private patterns: PlayerQuarterStatus[] | null = null;
  private inferencer: LineupInferencer | null = null;
  private timeline: LineupState[] | null = null;

  /**
   * @throws DataError if a player id is listed on both teams
   */
  constructor(
    private readonly game: GameRecord,
    options: LineupTrackerOptions = {}
  ) {
    this.gameId = game.gameId;
    this.homeTeamId = game.homeTeam.id;
    this.awayTeamId = game.awayTeam.id;
    this.diagnostics = new DiagnosticLog('LineupTracker', options.logDiagnostics ?? TRACKER.LOG_DIAGNOSTICS);
    this.directory = buildRoster(game.homeTeam, game.awayTeam, this.diagnostics);
    this.resolver = new PlayerNameResolver(this.directory);
  }

  /**
   * Validate raw input (normalized record or NBA.com page payload) and
   * create a tracker for it.
   *
   * @throws StructuralError if required fields are missing
   */
  static fromInput(input: unknown, options: LineupTrackerOptions = {}): LineupTracker {
    return new LineupTracker(parseGameInput(input), options);
  }

  // ============ Pipeline Stages ============

  getQuarterBoundaries(): QuarterBoundary[] {
    return this.boundaryStage().map((boundary) => ({ ...boundary }));
  }

  /**
   * Substitution events sorted by (period, elapsedSeconds).
   */
  getSubstitutions(): SubstitutionEvent[] {
    return this.substitutionStage().map((sub) => ({ ...sub }));
  }

  /**
   * Substitutions grouped into chains made in quick succession.
   * Analysis only: the timeline replays substitutions one instant at a time.
   */
  getSubstitutionChains(): SubstitutionEvent[][] {
    return detectSubstitutionChains(this.getSubstitutions());
  }

  getQuarterPatterns(): PlayerQuarterStatus[] {
    return this.patternStage().map((status) => ({ ...status }));
  }

  /**
   * Inferred starting five per team for a period.
   */
  inferStartingLineup(period: number): StartingLineup {
    return this.getInferencer().infer(period, this.homeTeamId, this.awayTeamId);
  }

  /**
   * Lineup snapshots ordered by elapsed time. Returns copies; the built
   * timeline itself never changes.
   *
   * @throws StructuralError if a team cannot field five players
   */
  buildTimeline(): LineupState[] {
    return this.timelineStage().map(copyState);
  }

  /**
   * Players on court at a moment in the game.
   *
   * @param period Period number (5+ for overtime)
   * @param clock PT clock, e.g. "PT07M30.00S"
   */
  getPlayersOnCourt(period: number, clock: string): OnCourtPlayers {
    return queryPlayersOnCourt(this.timelineStage(), this.directory, period, clock);
  }

  /**
   * Run the whole pipeline and return its outputs with diagnostics.
   */
  track(): TrackerResult {
    return {
      gameId: this.gameId,
      timeline: this.buildTimeline(),
      substitutions: this.getSubstitutions(),
      diagnostics: this.diagnostics.toArray(),
    };
  }

  // ============ Cached Stages ============

  private boundaryStage(): QuarterBoundary[] {
    if (!this.boundaries) {
      this.boundaries = analyzeQuarterBoundaries(this.game.actions);
    }
    return this.boundaries;
  }

  private substitutionStage(): SubstitutionEvent[] {
    if (!this.substitutions) {
      this.substitutions = parseSubstitutions(
        this.gameId,
        this.game.actions,
        [this.homeTeamId, this.awayTeamId],
        this.resolver,
        this.diagnostics
      );
    }
    return this.substitutions;
  }

  private patternStage(): PlayerQuarterStatus[] {
    if (!this.patterns) {
      this.patterns = analyzeQuarterPatterns(
        this.directory,
        this.boundaryStage(),
        this.substitutionStage(),
        this.game.actions
      );
    }
    return this.patterns;
  }

  private timelineStage(): LineupState[] {
    if (!this.timeline) {
      const builder = new TimelineBuilder({
        gameId: this.gameId,
        homeTeamId: this.homeTeamId,
        awayTeamId: this.awayTeamId,
        directory: this.directory,
        inferencer: this.getInferencer(),
        diagnostics: this.diagnostics,
      });
      this.timeline = builder.build(this.boundaryStage(), this.substitutionStage());
    }
    return this.timeline;
  }

  private getInferencer(): LineupInferencer {
    if (!this.inferencer) {
      this.inferencer = new LineupInferencer(this.directory, this.patternStage());
    }
    return this.inferencer;
  }
}

function copyState(state: LineupState): LineupState {
  return {
    ...state,
    homePlayers: [...state.homePlayers],
    awayPlayers: [...state.awayPlayers],
  };
}

/**
 * Track one game from raw input.
 *
 * @throws StructuralError if required fields are missing
 */
export function trackGame(input: unknown, options: LineupTrackerOptions = {}): TrackerResult {
  return LineupTracker.fromInput(input, options).track();
}
