/**
 * Name Matching Strategies
 *
 * Ordered matchers for resolving a play-by-play name to a player.
 * Exact identity checks come before fuzzy ones so that a teammate with a
 * similar surname is never picked over an exact hit.
 */

import { lookupVariants } from './name-variants.js';
import { abbreviatedName, lastToken, normalizeName } from './text-normalizer.js';
import type { Player } from '../types/index.js';

// ============ Types ============

/**
 * Pre-normalized name forms of one player.
 */
export interface NameCandidate {
  playerId: number;
  /** "first family" */
  fullName: string;
  /** "f. family" */
  shortName: string;
  displayName: string;
  familyName: string;
}

export interface NameMatchStrategy {
  readonly name: string;
  /**
   * @param search Normalized search name
   * @param candidates Players of the acting team, roster order
   * @returns Matching player id, or null to defer to the next strategy
   */
  match(search: string, candidates: readonly NameCandidate[]): number | null;
}

export function toNameCandidate(player: Player): NameCandidate {
  return {
    playerId: player.id,
    fullName: normalizeName(`${player.firstName} ${player.familyName}`),
    shortName: abbreviatedName(player.firstName, player.familyName),
    displayName: normalizeName(player.displayName),
    familyName: normalizeName(player.familyName),
  };
}

function firstMatch(
  candidates: readonly NameCandidate[],
  predicate: (candidate: NameCandidate) => boolean
): number | null {
  const hit = candidates.find(predicate);
  return hit ? hit.playerId : null;
}

// ============ Strategies ============

/** Known ambiguous abbreviations, e.g. "Jay. Williams" */
export const variantTableStrategy: NameMatchStrategy = {
  name: 'variant-table',
  match(search, candidates) {
    for (const fullName of lookupVariants(search)) {
      const playerId = firstMatch(candidates, (c) => c.fullName === fullName);
      if (playerId !== null) return playerId;
    }
    return null;
  },
};

/** Full name, "f. family" or display name */
export const exactNameStrategy: NameMatchStrategy = {
  name: 'exact-name',
  match(search, candidates) {
    return firstMatch(
      candidates,
      (c) => c.displayName === search || c.fullName === search || c.shortName === search
    );
  },
};

/** Family name alone */
export const familyNameStrategy: NameMatchStrategy = {
  name: 'family-name',
  match(search, candidates) {
    return firstMatch(candidates, (c) => c.familyName !== '' && c.familyName === search);
  },
};

/** Search contained in the full name, or equal to its last token */
export const partialNameStrategy: NameMatchStrategy = {
  name: 'partial-name',
  match(search, candidates) {
    return firstMatch(
      candidates,
      (c) => c.fullName.includes(search) || lastToken(c.fullName) === search
    );
  },
};

/** Evaluation order: highest precision first */
export const DEFAULT_NAME_STRATEGIES: readonly NameMatchStrategy[] = [
  variantTableStrategy,
  exactNameStrategy,
  familyNameStrategy,
  partialNameStrategy,
];
