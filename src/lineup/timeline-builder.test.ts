import { describe, it, expect } from 'vitest';

import { LineupInferencer } from './lineup-inferencer.js';
import { TimelineBuilder } from './timeline-builder.js';
import { DiagnosticLog } from '../diagnostics/diagnostic-log.js';
import { StructuralError } from '../errors/index.js';
import { buildRoster } from '../roster/roster-builder.js';
import {
  AWAY_TEAM_ID,
  GAME_ID,
  HOME_PLAYERS,
  HOME_TEAM_ID,
  captureError,
  makeGame,
} from '../test/fixtures.js';
import type { PlayerRecordInput, StartingLineup, SubstitutionEvent } from '../types/index.js';

/** Returns a fixed opening five for every period */
class FixedInferencer extends LineupInferencer {
  constructor(private readonly lineup: StartingLineup) {
    super(buildRoster(makeGame().homeTeam, makeGame().awayTeam), []);
  }

  override infer(): StartingLineup {
    return { home: [...this.lineup.home], away: [...this.lineup.away] };
  }
}

function sub(
  actionNumber: number,
  elapsedSeconds: number,
  teamId: number,
  playerOutId: number,
  playerInId: number,
  period = 1
): SubstitutionEvent {
  return {
    gameId: GAME_ID,
    actionNumber,
    period,
    clock: `T${elapsedSeconds}`,
    elapsedSeconds,
    teamId,
    playerOutId,
    playerOutName: `P${playerOutId}`,
    playerInId,
    playerInName: `P${playerInId}`,
    description: `SUB: P${playerInId} FOR P${playerOutId}`,
  };
}

function setup(options: { homePlayers?: PlayerRecordInput[]; inferencer?: LineupInferencer } = {}) {
  const game = makeGame([], { homePlayers: options.homePlayers });
  const directory = buildRoster(game.homeTeam, game.awayTeam);
  const diagnostics = new DiagnosticLog();
  const builder = new TimelineBuilder({
    gameId: GAME_ID,
    homeTeamId: HOME_TEAM_ID,
    awayTeamId: AWAY_TEAM_ID,
    directory,
    inferencer: options.inferencer ?? new LineupInferencer(directory, []),
    diagnostics,
  });
  return { builder, diagnostics };
}

describe('TimelineBuilder', () => {
  it('starts with one state at tip-off', () => {
    const { builder } = setup();

    expect(builder.build([], [])).toEqual([
      {
        gameId: GAME_ID,
        period: 1,
        clock: 'PT12M00.00S',
        elapsedSeconds: 0,
        homeTeamId: HOME_TEAM_ID,
        awayTeamId: AWAY_TEAM_ID,
        homePlayers: [101, 102, 103, 104, 105],
        awayPlayers: [201, 202, 203, 204, 205],
      },
    ]);
  });

  it('replaces the outgoing player in place', () => {
    const { builder } = setup();
    const timeline = builder.build([], [sub(10, 300, HOME_TEAM_ID, 103, 106)]);

    expect(timeline[1]).toMatchObject({
      clock: 'T300',
      elapsedSeconds: 300,
      homePlayers: [101, 102, 106, 104, 105],
      awayPlayers: [201, 202, 203, 204, 205],
    });
  });

  it('emits one state for substitutions at the same instant', () => {
    const { builder } = setup();
    const timeline = builder.build(
      [],
      [
        sub(10, 300, HOME_TEAM_ID, 101, 106),
        sub(11, 300, AWAY_TEAM_ID, 201, 206),
        sub(12, 300, HOME_TEAM_ID, 106, 107),
      ]
    );

    expect(timeline).toHaveLength(2);
    expect(timeline[1]).toMatchObject({
      clock: 'T300',
      homePlayers: [107, 102, 103, 104, 105],
      awayPlayers: [206, 202, 203, 204, 205],
    });
  });

  it('keeps the lineup when the outgoing player is not on court', () => {
    const { builder, diagnostics } = setup();
    const timeline = builder.build([], [sub(10, 300, HOME_TEAM_ID, 106, 107)]);

    expect(timeline).toHaveLength(2);
    expect(timeline[1].homePlayers).toEqual([101, 102, 103, 104, 105]);
    expect(diagnostics.toArray()).toMatchObject([{ code: 'PLAYER_OUT_NOT_ON_COURT', actionNumber: 10 }]);
  });

  it('keeps the lineup when the incoming player is already on court', () => {
    const { builder, diagnostics } = setup();
    const timeline = builder.build([], [sub(10, 300, HOME_TEAM_ID, 101, 102)]);

    expect(timeline[1].homePlayers).toEqual([101, 102, 103, 104, 105]);
    expect(diagnostics.count('PLAYER_IN_ALREADY_ON_COURT')).toBe(1);
  });

  it('reports substitutions for a team not in the game', () => {
    const { builder, diagnostics } = setup();
    const timeline = builder.build([], [sub(10, 300, 1610612999, 101, 106)]);

    expect(timeline).toHaveLength(2);
    expect(diagnostics.count('UNKNOWN_TEAM')).toBe(1);
  });

  it('re-infers the lineup at each later period', () => {
    const { builder } = setup();
    const timeline = builder.build(
      [
        { period: 1, firstActionNumber: 1, lastActionNumber: 10 },
        { period: 5, firstActionNumber: 500, lastActionNumber: 520 },
      ],
      [sub(10, 300, HOME_TEAM_ID, 101, 106)]
    );

    expect(timeline.map((state) => [state.period, state.clock, state.elapsedSeconds])).toEqual([
      [1, 'PT12M00.00S', 0],
      [1, 'T300', 300],
      [5, 'PT05M00.00S', 2880],
    ]);
    expect(timeline[2].homePlayers).toEqual([101, 102, 103, 104, 105]);
  });

  it('adds periods that only appear in substitutions', () => {
    const { builder } = setup();
    const timeline = builder.build([], [sub(40, 900, HOME_TEAM_ID, 101, 106, 2)]);

    expect(timeline.map((state) => [state.period, state.elapsedSeconds])).toEqual([
      [1, 0],
      [2, 720],
      [2, 900],
    ]);
  });

  it('falls back to nominal starters when inference is short', () => {
    const inferencer = new FixedInferencer({ home: [106, 107], away: [201, 202, 203, 204, 205] });
    const { builder, diagnostics } = setup({ inferencer });
    const timeline = builder.build([], []);

    expect(timeline[0].homePlayers).toEqual([101, 102, 103, 104, 105]);
    expect(diagnostics.toArray()).toEqual([
      {
        code: 'NOMINAL_STARTERS_USED',
        message: `Inferred 2 opening players for team ${HOME_TEAM_ID}, using nominal starters`,
        context: { teamId: HOME_TEAM_ID, inferred: [106, 107] },
      },
    ]);
  });

  it('keeps the current five when a later period cannot be inferred', () => {
    const inferencer = new FixedInferencer({ home: [106, 107], away: [201, 202, 203, 204, 205] });
    const { builder } = setup({ inferencer });
    const timeline = builder.build([{ period: 2, firstActionNumber: 40, lastActionNumber: 50 }], []);

    expect(timeline[1].homePlayers).toEqual([101, 102, 103, 104, 105]);
  });

  it('fails when a team cannot field five players', () => {
    const { builder } = setup({ homePlayers: HOME_PLAYERS.slice(0, 4) });
    const error = captureError(() => builder.build([], []));

    expect(error).toBeInstanceOf(StructuralError);
    expect(error instanceof StructuralError && error.field).toBe('homeTeam.players');
  });
});
