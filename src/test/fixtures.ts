/**
 * Test fixtures: a synthetic two-team game and action factories.
 */

import { parseGameRecord } from '../schema/game-record.js';
import type {
  ActionInput,
  GameRecord,
  PlayerRecordInput,
} from '../types/index.js';

export const GAME_ID = '0022400001';
export const HOME_TEAM_ID = 1610612743;
export const AWAY_TEAM_ID = 1610612750;

function player(
  personId: number,
  firstName: string,
  familyName: string,
  displayName: string,
  position: string,
  minutes: string
): PlayerRecordInput {
  return {
    personId,
    firstName,
    familyName,
    displayName,
    jersey: String(personId % 100),
    position,
    statistics: { minutes },
  };
}

/** Ranked by minutes: 101-105 are the nominal starters; 107 has no position */
export const HOME_PLAYERS: PlayerRecordInput[] = [
  player(101, 'Casey', 'Ward', 'C. Ward', 'G', '36:00'),
  player(102, 'Nikola', 'Jokić', 'N. Jokić', 'C', '35:00'),
  player(103, 'Jaylin', 'Williams', 'Jay. Williams', 'F', '33:00'),
  player(104, 'Jalen', 'Williams', 'Jal. Williams', 'G', '31:00'),
  player(105, 'Aaron', 'Gordon', 'A. Gordon', 'F', '30:00'),
  player(106, 'Dillon', 'Brooks', 'D. Brooks', 'F', '18:00'),
  player(107, 'Tony', 'Bradley', 'T. Bradley', '', '22:00'),
  player(108, 'Sam', 'Deep', 'S. Deep', 'G', '02:00'),
];

/** 201-205 are the nominal starters; 202 and 208 share a family name */
export const AWAY_PLAYERS: PlayerRecordInput[] = [
  player(201, 'Marcus', 'Hill', 'M. Hill', 'G', '36:00'),
  player(202, 'Derek', 'Stone', 'D. Stone', 'G', '34:00'),
  player(203, 'Kevin', 'Lane', 'K. Lane', 'F', '33:00'),
  player(204, 'Omar', 'Price', 'O. Price', 'F', '32:00'),
  player(205, 'Victor', 'Reyes', 'V. Reyes', 'C', '30:00'),
  player(206, 'Ben', 'Carter', 'B. Carter', 'F', '20:00'),
  player(207, 'Luis', 'Moreno', 'L. Moreno', 'G', '10:00'),
  player(208, 'Eli', 'Stone', 'E. Stone', 'C', '03:00'),
];

// ============ Action Factories ============

export function action(
  actionNumber: number,
  period: number,
  clock: string,
  actionType: string,
  details: { teamId?: number; personId?: number; playerName?: string; description?: string } = {}
): ActionInput {
  return {
    actionNumber,
    period,
    clock,
    actionType,
    teamId: details.teamId,
    personId: details.personId,
    playerName: details.playerName,
    description: details.description ?? actionType,
  };
}

/**
 * "SUB: {inName} FOR {outName}" by the given team.
 */
export function substitution(
  actionNumber: number,
  period: number,
  clock: string,
  teamId: number,
  outId: number,
  outName: string,
  inName: string
): ActionInput {
  return action(actionNumber, period, clock, 'Substitution', {
    teamId,
    personId: outId,
    playerName: outName,
    description: `SUB: ${inName} FOR ${outName}`,
  });
}

/**
 * An on-court action (shot, rebound, ...) by one player.
 */
export function play(
  actionNumber: number,
  period: number,
  clock: string,
  actionType: string,
  teamId: number,
  personId: number
): ActionInput {
  return action(actionNumber, period, clock, actionType, { teamId, personId });
}

// ============ Games ============

export function gameInput(
  actions: ActionInput[],
  overrides: { homePlayers?: PlayerRecordInput[]; awayPlayers?: PlayerRecordInput[] } = {}
) {
  return {
    gameId: GAME_ID,
    homeTeam: { id: HOME_TEAM_ID, players: overrides.homePlayers ?? HOME_PLAYERS },
    awayTeam: { id: AWAY_TEAM_ID, players: overrides.awayPlayers ?? AWAY_PLAYERS },
    actions,
  };
}

export function makeGame(
  actions: ActionInput[] = [],
  overrides: { homePlayers?: PlayerRecordInput[]; awayPlayers?: PlayerRecordInput[] } = {}
): GameRecord {
  return parseGameRecord(gameInput(actions, overrides));
}

/**
 * Two periods of play:
 *
 * Q1  #1  jump ball (Jokić)             #2 made shot (Hill)
 *     #10 6:00 home: Brooks for Ward    #11 6:00 away: Carter for Stone
 * Q2  #30-34 actions by Brooks, Jokić, Jay. Williams, Jal. Williams, Gordon
 *     #35 8:00 home: Ward for Brooks
 */
export function twoPeriodActions(): ActionInput[] {
  return [
    play(1, 1, 'PT12M00.00S', 'Jump Ball', HOME_TEAM_ID, 102),
    play(2, 1, 'PT11M40.00S', 'Made Shot', AWAY_TEAM_ID, 201),
    substitution(10, 1, 'PT06M00.00S', HOME_TEAM_ID, 101, 'Ward', 'Brooks'),
    substitution(11, 1, 'PT06M00.00S', AWAY_TEAM_ID, 202, 'Stone', 'Carter'),
    play(30, 2, 'PT11M30.00S', 'Made Shot', HOME_TEAM_ID, 106),
    play(31, 2, 'PT11M10.00S', 'Rebound', HOME_TEAM_ID, 102),
    play(32, 2, 'PT10M50.00S', 'Missed Shot', HOME_TEAM_ID, 103),
    play(33, 2, 'PT10M20.00S', 'Foul', HOME_TEAM_ID, 104),
    play(34, 2, 'PT09M40.00S', 'Turnover', HOME_TEAM_ID, 105),
    substitution(35, 2, 'PT08M00.00S', HOME_TEAM_ID, 106, 'Brooks', 'Ward'),
  ];
}

/**
 * Run fn and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
