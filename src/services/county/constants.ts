/** Minimum token-set score (0-100) for a county match to be accepted. */
export const MATCH_THRESHOLD = 70;

export const ABBREVIATIONS: Readonly<Record<string, string>> = {
  st: 'saint',
  ste: 'sainte',
  mt: 'mount',
  ft: 'fort',
};

/**
 * `s` expands only before a proper-noun token ("S. Clara" → "santa clara").
 * It never becomes "san" or "south".
 */
export const SINGLE_LETTER_ABBREVIATION = { token: 's', expansion: 'santa' } as const;

export const FILLER_WORDS: ReadonlySet<string> = new Set(['county', 'of', 'the']);
