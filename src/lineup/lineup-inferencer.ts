/**
 * Lineup Inferencer
 *
 * Derives a period's starting five per team from quarter patterns:
 * players classified STARTED or PLAYED_FULL, ranked by on-court actions,
 * then backfilled by game minutes when fewer than five are found.
 */

import { LINEUP } from '../config/tracker.js';
import type { PlayerDirectory } from '../roster/player-directory.js';
import type { Player, PlayerQuarterStatus, StartingLineup } from '../types/index.js';

function byMinutesDescending(a: Player, b: Player): number {
  return b.minutesPlayed - a.minutesPlayed;
}

export class LineupInferencer {
  constructor(
    private readonly directory: PlayerDirectory,
    private readonly statuses: readonly PlayerQuarterStatus[]
  ) {}

  /**
   * Infer both teams' starting five for a period.
   */
  infer(period: number, homeTeamId: number, awayTeamId: number): StartingLineup {
    return {
      home: this.inferTeam(period, homeTeamId),
      away: this.inferTeam(period, awayTeamId),
    };
  }

  /**
   * Infer one team's starting five for a period.
   * Returns fewer than five ids only when the roster runs out.
   */
  inferTeam(period: number, teamId: number): number[] {
    const ranked = this.statuses
      .filter(
        (status) =>
          status.period === period &&
          status.teamId === teamId &&
          (status.inferredStatus === 'STARTED' || status.inferredStatus === 'PLAYED_FULL')
      )
      .sort((a, b) => b.onCourtActionCount - a.onCourtActionCount)
      .slice(0, LINEUP.SIZE)
      .map((status) => status.playerId);

    if (ranked.length >= LINEUP.SIZE) {
      return ranked;
    }

    return this.backfill(ranked, teamId).slice(0, LINEUP.SIZE);
  }

  /**
   * Fill open spots with the team's highest-minute players,
   * those over the rotation threshold first.
   */
  private backfill(lineup: number[], teamId: number): number[] {
    const chosen = new Set(lineup);
    const remaining = this.directory
      .getTeamPlayers(teamId)
      .filter((player) => !chosen.has(player.id));

    const rotation = remaining
      .filter((player) => player.minutesPlayed > LINEUP.BACKFILL_MIN_SECONDS)
      .sort(byMinutesDescending);
    const deepBench = remaining
      .filter((player) => player.minutesPlayed <= LINEUP.BACKFILL_MIN_SECONDS)
      .sort(byMinutesDescending);

    const filled = [...lineup];
    for (const player of [...rotation, ...deepBench]) {
      if (filled.length >= LINEUP.SIZE) break;
      filled.push(player.id);
    }
    return filled;
  }
}
