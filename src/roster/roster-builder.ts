/**
 * Roster Builder
 *
 * Flattens both teams' box-score player arrays into a player directory
 * and flags nominal starters: the five players with a listed position who
 * logged the most minutes.
 */

import { LINEUP } from '../config/tracker.js';
import { parseMinutes } from '../clock/clock-converter.js';
import type { DiagnosticLog } from '../diagnostics/diagnostic-log.js';
import { DataError, isLineupTrackerError } from '../errors/index.js';
import type { Player, PlayerRecord, TeamRecord } from '../types/index.js';
import { PlayerDirectory } from './player-directory.js';

/**
 * Minutes in seconds, or null when missing or unparseable.
 */
function minutesToSeconds(
  record: PlayerRecord,
  diagnostics?: DiagnosticLog
): number | null {
  const minutes = record.statistics.minutes.trim();
  if (!minutes) return null;

  try {
    return parseMinutes(minutes);
  } catch (error) {
    if (!isLineupTrackerError(error)) throw error;
    diagnostics?.add('MINUTES_UNPARSEABLE', `Could not parse minutes "${minutes}" for player ${record.personId}`, {
      context: { playerId: record.personId, minutes },
    });
    return null;
  }
}

function displayNameOf(record: PlayerRecord): string {
  return record.displayName ?? `${record.firstName} ${record.familyName}`.trim();
}

/**
 * Select nominal starters: players with a position and parsed minutes,
 * ranked by minutes descending, top five.
 *
 * @param minutesById Parsed minutes (seconds); players without a value are ineligible
 */
export function identifyStarters(
  players: PlayerRecord[],
  minutesById: Map<number, number>
): Set<number> {
  const eligible = players.filter(
    (player) => player.position.trim() !== '' && minutesById.has(player.personId)
  );

  const ranked = [...eligible].sort(
    (a, b) => (minutesById.get(b.personId) ?? 0) - (minutesById.get(a.personId) ?? 0)
  );

  return new Set(ranked.slice(0, LINEUP.SIZE).map((player) => player.personId));
}

function buildTeamPlayers(team: TeamRecord, diagnostics?: DiagnosticLog): Player[] {
  const minutesById = new Map<number, number>();
  for (const record of team.players) {
    const seconds = minutesToSeconds(record, diagnostics);
    if (seconds !== null) minutesById.set(record.personId, seconds);
  }

  const starters = identifyStarters(team.players, minutesById);

  return team.players.map((record) => ({
    id: record.personId,
    firstName: record.firstName,
    familyName: record.familyName,
    displayName: displayNameOf(record),
    jersey: record.jersey,
    position: record.position,
    teamId: team.id,
    isStarter: starters.has(record.personId),
    minutesPlayed: minutesById.get(record.personId) ?? 0,
  }));
}

/**
 * Build the player directory for both teams.
 *
 * @throws DataError if a player id appears on both teams
 */
export function buildRoster(
  homeTeam: TeamRecord,
  awayTeam: TeamRecord,
  diagnostics?: DiagnosticLog
): PlayerDirectory {
  const homePlayers = buildTeamPlayers(homeTeam, diagnostics);
  const awayPlayers = buildTeamPlayers(awayTeam, diagnostics);

  const homeIds = new Set(homePlayers.map((player) => player.id));
  const collision = awayPlayers.find((player) => homeIds.has(player.id));
  if (collision) {
    throw new DataError(`Player ${collision.id} is listed on both teams`, {
      playerId: collision.id,
      homeTeamId: homeTeam.id,
      awayTeamId: awayTeam.id,
    });
  }

  return new PlayerDirectory([...homePlayers, ...awayPlayers]);
}
