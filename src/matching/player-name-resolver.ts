/**
 * Player Name Resolver
 *
 * Resolves free-text names from substitution descriptions to player ids,
 * scoped to one team, by running the name strategies in order.
 */

import {
  DEFAULT_NAME_STRATEGIES,
  toNameCandidate,
  type NameCandidate,
  type NameMatchStrategy,
} from './name-strategies.js';
import { normalizeName } from './text-normalizer.js';
import type { PlayerDirectory } from '../roster/player-directory.js';

export interface NameResolution {
  playerId: number;
  /** Strategy that produced the match */
  strategy: string;
}

export class PlayerNameResolver {
  private candidatesByTeam = new Map<number, NameCandidate[]>();

  constructor(
    private readonly directory: PlayerDirectory,
    private readonly strategies: readonly NameMatchStrategy[] = DEFAULT_NAME_STRATEGIES
  ) {}

  /**
   * Resolve a name to a player id on the given team.
   *
   * @param name Name as printed in the description
   * @param teamId Team to search
   * @param suppressWarnings Skip the console warning on a miss
   */
  resolve(name: string, teamId: number, suppressWarnings = false): number | null {
    return this.resolveWithStrategy(name, teamId, suppressWarnings)?.playerId ?? null;
  }

  /**
   * Like resolve(), but also reports which strategy matched.
   */
  resolveWithStrategy(
    name: string,
    teamId: number,
    suppressWarnings = false
  ): NameResolution | null {
    const search = normalizeName(name);

    if (search !== '') {
      const candidates = this.getCandidates(teamId);
      for (const strategy of this.strategies) {
        const playerId = strategy.match(search, candidates);
        if (playerId !== null) {
          return { playerId, strategy: strategy.name };
        }
      }
    }

    if (!suppressWarnings) {
      console.warn(`[PlayerNameResolver] Could not find player '${name}' on team ${teamId}`);
    }
    return null;
  }

  private getCandidates(teamId: number): NameCandidate[] {
    const cached = this.candidatesByTeam.get(teamId);
    if (cached) return cached;

    const candidates = this.directory.getTeamPlayers(teamId).map(toNameCandidate);
    this.candidatesByTeam.set(teamId, candidates);
    return candidates;
  }
}
