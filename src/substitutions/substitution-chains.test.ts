import { describe, it, expect } from 'vitest';

import { detectSubstitutionChains, linkBetween } from './substitution-chains.js';
import { AWAY_TEAM_ID, GAME_ID, HOME_TEAM_ID } from '../test/fixtures.js';
import type { SubstitutionEvent } from '../types/index.js';

function event(
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
    clock: '',
    elapsedSeconds,
    teamId,
    playerOutId,
    playerOutName: '',
    playerInId,
    playerInName: '',
    description: '',
  };
}

describe('linkBetween', () => {
  it('links a player swapped straight back', () => {
    const previous = event(10, 100, HOME_TEAM_ID, 101, 106);
    const current = event(40, 110, HOME_TEAM_ID, 106, 107);

    expect(linkBetween(previous, current)).toBe('player-overlap');
  });

  it('links substitutions by the same team', () => {
    expect(linkBetween(event(10, 100, HOME_TEAM_ID, 101, 106), event(40, 110, HOME_TEAM_ID, 102, 107))).toBe(
      'same-team'
    );
  });

  it('links nearby action numbers across teams', () => {
    expect(linkBetween(event(10, 100, HOME_TEAM_ID, 101, 106), event(15, 100, AWAY_TEAM_ID, 201, 206))).toBe(
      'consecutive-actions'
    );
    expect(linkBetween(event(10, 100, HOME_TEAM_ID, 101, 106), event(16, 100, AWAY_TEAM_ID, 201, 206))).toBeNull();
  });

  it('requires the same period and a 15 second window', () => {
    const previous = event(10, 100, HOME_TEAM_ID, 101, 106);

    expect(linkBetween(previous, event(11, 115, HOME_TEAM_ID, 102, 107))).toBe('same-team');
    expect(linkBetween(previous, event(11, 116, HOME_TEAM_ID, 102, 107))).toBeNull();
    expect(linkBetween(previous, event(11, 100, HOME_TEAM_ID, 102, 107, 2))).toBeNull();
  });
});

describe('detectSubstitutionChains', () => {
  it('groups events into chains', () => {
    const a = event(10, 100, HOME_TEAM_ID, 101, 106);
    const b = event(11, 105, AWAY_TEAM_ID, 201, 206);
    const c = event(40, 110, AWAY_TEAM_ID, 202, 207);
    const d = event(60, 200, AWAY_TEAM_ID, 203, 208);
    const e = event(61, 205, AWAY_TEAM_ID, 204, 202, 2);

    expect(detectSubstitutionChains([a, b, c, d, e])).toEqual([[a, b, c], [d], [e]]);
  });

  it('returns no chains for no events', () => {
    expect(detectSubstitutionChains([])).toEqual([]);
  });
});
