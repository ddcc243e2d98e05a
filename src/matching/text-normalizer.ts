/**
 * Text Normalizer
 *
 * Name preprocessing for player matching. Play-by-play text drops
 * accents that box-score names keep ("Jokic" vs "Jokić"), so both sides
 * are folded to unaccented lowercase before comparison.
 */

/**
 * Normalize a name for comparison.
 * Strips diacritics, lowercases, trims and collapses whitespace.
 * Punctuation is kept: "J. Brooks" and "J Brooks" stay distinct.
 *
 * @param name Raw name
 * @returns Normalized name
 */
export function normalizeName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Split a normalized name into tokens.
 */
export function nameTokens(name: string): string[] {
  return name.split(' ').filter((token) => token.length > 0);
}

/**
 * Last token of a normalized name, or '' for an empty name.
 */
export function lastToken(name: string): string {
  const tokens = nameTokens(name);
  return tokens.length > 0 ? tokens[tokens.length - 1] : '';
}

/**
 * Abbreviated form "f. family" used by play-by-play text.
 * Falls back to the family name when there is no first name.
 */
export function abbreviatedName(firstName: string, familyName: string): string {
  const first = normalizeName(firstName);
  const family = normalizeName(familyName);
  return first ? `${first[0]}. ${family}` : family;
}
