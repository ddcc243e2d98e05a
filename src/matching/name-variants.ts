/**
 * Ambiguous Name Abbreviations
 *
 * Play-by-play descriptions truncate first names to tell teammates
 * apart ("Jal. Williams" vs "Jay. Williams"). The generic "f. family"
 * check cannot expand these, so known variants map to the full names
 * they stand for, most likely first.
 *
 * Keys and values are normalized (see normalizeName).
 */

export const ABBREVIATED_NAME_VARIANTS: Readonly<Record<string, readonly string[]>> = {
  'jay. williams': ['jaylin williams'],
  'jal. williams': ['jalen williams'],
  'jo. williams': ['johnny williams'],
  'ja. green': ['jalen green', 'javonte green', 'jamychal green'],
  'je. green': ['jeff green'],
  'jo. green': ['josh green'],
  'ke. johnson': ['keldon johnson', 'keyontae johnson'],
  'ka. johnson': ['kameron johnson'],
  'jr. holiday': ['jrue holiday'],
  'ju. holiday': ['justin holiday'],
  'aa. holiday': ['aaron holiday'],
  'mar. morris': ['markieff morris'],
  'marc. morris': ['marcus morris'],
  'ca. martin': ['caleb martin'],
  'co. martin': ['cody martin'],
  'je. grant': ['jerami grant', 'jerian grant'],
  'ja. jackson jr.': ['jaren jackson jr.'],
  'jal. smith': ['jalen smith'],
  'jab. smith': ['jabari smith jr.'],
};

/**
 * Full-name candidates for an abbreviated name, or an empty list.
 */
export function lookupVariants(normalizedName: string): readonly string[] {
  return ABBREVIATED_NAME_VARIANTS[normalizedName] ?? [];
}
