/**
 * Player Directory
 *
 * Per-game lookup of players by id and by team.
 * Built once by the roster builder; read-only afterwards.
 */

import type { Player } from '../types/index.js';

export class PlayerDirectory {
  private players = new Map<number, Player>();
  private teamIndex = new Map<number, number[]>(); // teamId -> playerIds, input order

  constructor(players: Player[]) {
    for (const player of players) {
      this.players.set(player.id, player);
      const teamPlayers = this.teamIndex.get(player.teamId) ?? [];
      teamPlayers.push(player.id);
      this.teamIndex.set(player.teamId, teamPlayers);
    }
  }

  /**
   * Get player by id.
   */
  get(playerId: number): Player | undefined {
    return this.players.get(playerId);
  }

  has(playerId: number): boolean {
    return this.players.has(playerId);
  }

  /**
   * Players of one team, in roster order.
   */
  getTeamPlayers(teamId: number): Player[] {
    const ids = this.teamIndex.get(teamId) ?? [];
    return ids.flatMap((id) => {
      const player = this.players.get(id);
      return player ? [player] : [];
    });
  }

  /**
   * Nominal starters of one team, in roster order.
   */
  getNominalStarters(teamId: number): number[] {
    return this.getTeamPlayers(teamId)
      .filter((player) => player.isStarter)
      .map((player) => player.id);
  }

  /**
   * Display name of a player, or "ID:{id}" for unknown ids.
   */
  getDisplayName(playerId: number): string {
    return this.players.get(playerId)?.displayName ?? `ID:${playerId}`;
  }

  /**
   * Get all players, home roster first.
   */
  getAll(): Player[] {
    return Array.from(this.players.values());
  }

  get size(): number {
    return this.players.size;
  }
}
