/**
 * Timeline Builder
 *
 * Replays substitutions on top of each period's inferred starting five
 * and records a lineup snapshot at tip-off, at every period start and at
 * every substitution instant.
 */

import { CLOCK, LINEUP } from '../config/tracker.js';
import { periodStartClock, periodStartElapsed } from '../clock/clock-converter.js';
import type { DiagnosticLog } from '../diagnostics/diagnostic-log.js';
import { StructuralError } from '../errors/index.js';
import type { PlayerDirectory } from '../roster/player-directory.js';
import type { LineupState, QuarterBoundary, SubstitutionEvent } from '../types/index.js';
import type { LineupInferencer } from './lineup-inferencer.js';
import { assertLineupState } from './lineup-invariants.js';

export interface TimelineContext {
  gameId: string;
  homeTeamId: number;
  awayTeamId: number;
  directory: PlayerDirectory;
  inferencer: LineupInferencer;
  diagnostics: DiagnosticLog;
}

/**
 * Group a period's substitutions by the instant they happen at.
 */
function groupByInstant(substitutions: readonly SubstitutionEvent[]): SubstitutionEvent[][] {
  const groups: SubstitutionEvent[][] = [];
  for (const sub of substitutions) {
    const last = groups[groups.length - 1];
    if (last && last[0].elapsedSeconds === sub.elapsedSeconds) {
      last.push(sub);
    } else {
      groups.push([sub]);
    }
  }
  return groups;
}

export class TimelineBuilder {
  private home: number[] = [];
  private away: number[] = [];
  private timeline: LineupState[] = [];

  constructor(private readonly ctx: TimelineContext) {}

  /**
   * Build the full timeline.
   *
   * @param boundaries Periods present in the log
   * @param substitutions Events sorted by (period, elapsedSeconds)
   * @throws StructuralError if a team cannot field five players
   * @throws InvariantViolation if a snapshot breaks a lineup invariant
   */
  build(
    boundaries: readonly QuarterBoundary[],
    substitutions: readonly SubstitutionEvent[]
  ): LineupState[] {
    this.timeline = [];

    const periods = new Set<number>([1]);
    for (const boundary of boundaries) periods.add(boundary.period);
    for (const sub of substitutions) periods.add(sub.period);

    for (const period of Array.from(periods).sort((a, b) => a - b)) {
      if (period === 1) {
        this.startGame();
      } else {
        this.startPeriod(period);
      }

      const periodSubs = substitutions.filter((sub) => sub.period === period);
      for (const group of groupByInstant(periodSubs)) {
        for (const sub of group) {
          this.applySubstitution(sub);
        }
        const last = group[group.length - 1];
        this.emit(period, last.clock, last.elapsedSeconds);
      }
    }

    return this.timeline;
  }

  // ============ Period Starts ============

  private startGame(): void {
    const { homeTeamId, awayTeamId } = this.ctx;
    const inferred = this.ctx.inferencer.infer(1, homeTeamId, awayTeamId);

    this.home = this.openingFive(inferred.home, homeTeamId, 'homeTeam');
    this.away = this.openingFive(inferred.away, awayTeamId, 'awayTeam');

    this.emit(1, CLOCK.REGULATION_START_CLOCK, 0);
  }

  private openingFive(inferred: number[], teamId: number, field: string): number[] {
    if (inferred.length === LINEUP.SIZE) return [...inferred];

    const starters = this.ctx.directory.getNominalStarters(teamId);
    this.ctx.diagnostics.add(
      'NOMINAL_STARTERS_USED',
      `Inferred ${inferred.length} opening players for team ${teamId}, using nominal starters`,
      { context: { teamId, inferred } }
    );

    if (starters.length !== LINEUP.SIZE) {
      throw new StructuralError(
        `Team ${teamId} has ${starters.length} starters, expected ${LINEUP.SIZE}`,
        `${field}.players`,
        { teamId }
      );
    }
    return starters;
  }

  private startPeriod(period: number): void {
    const { homeTeamId, awayTeamId } = this.ctx;
    const inferred = this.ctx.inferencer.infer(period, homeTeamId, awayTeamId);

    // Teams are updated independently
    if (inferred.home.length === LINEUP.SIZE) this.home = [...inferred.home];
    if (inferred.away.length === LINEUP.SIZE) this.away = [...inferred.away];

    this.emit(period, periodStartClock(period), periodStartElapsed(period));
  }

  // ============ Substitutions ============

  private applySubstitution(sub: SubstitutionEvent): void {
    const { homeTeamId, awayTeamId, diagnostics, directory } = this.ctx;

    let lineup: number[];
    if (sub.teamId === homeTeamId) {
      lineup = this.home;
    } else if (sub.teamId === awayTeamId) {
      lineup = this.away;
    } else {
      // Only reachable when the builder is fed events directly; the parser drops these
      diagnostics.add('UNKNOWN_TEAM', `Substitution for team ${sub.teamId}, which is not playing`, {
        actionNumber: sub.actionNumber,
        context: { teamId: sub.teamId },
      });
      return;
    }

    if (lineup.includes(sub.playerInId)) {
      diagnostics.add(
        'PLAYER_IN_ALREADY_ON_COURT',
        `${sub.playerInName} (${sub.playerInId}) is already on court: ${sub.description}`,
        { actionNumber: sub.actionNumber, context: { lineup: lineup.map((id) => directory.getDisplayName(id)) } }
      );
      return;
    }

    const slot = lineup.indexOf(sub.playerOutId);
    if (slot === -1) {
      diagnostics.add(
        'PLAYER_OUT_NOT_ON_COURT',
        `${sub.playerOutName || sub.playerOutId} is not in the current lineup: ${sub.description}`,
        { actionNumber: sub.actionNumber, context: { lineup: lineup.map((id) => directory.getDisplayName(id)) } }
      );
      return;
    }

    lineup[slot] = sub.playerInId;
  }

  // ============ Snapshots ============

  private emit(period: number, clock: string, elapsedSeconds: number): void {
    const state: LineupState = {
      gameId: this.ctx.gameId,
      period,
      clock,
      elapsedSeconds,
      homeTeamId: this.ctx.homeTeamId,
      awayTeamId: this.ctx.awayTeamId,
      homePlayers: [...this.home],
      awayPlayers: [...this.away],
    };

    assertLineupState(state, this.ctx.directory, this.timeline[this.timeline.length - 1]);
    this.timeline.push(state);
  }
}
