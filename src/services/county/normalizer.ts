import { ABBREVIATIONS, FILLER_WORDS, SINGLE_LETTER_ABBREVIATION } from './constants.js';

/**
 * Canonicalizes a free-text county name for matching.
 *
 * 1. Fold case, drop diacritics and apostrophes, turn other punctuation into spaces
 * 2. Expand abbreviations (St → saint, Mt → mount, S → santa before a name)
 * 3. Remove filler words (county, of, the)
 * 4. Collapse whitespace
 *
 * Never looks at the catalog. Applying it twice gives the same string.
 *
 * @example
 * normalizeCountyName('S. Clara')            // 'santa clara'
 * normalizeCountyName('County of St. Louis') // 'saint louis'
 */
export function normalizeCountyName(raw: string): string {
  const tokens = raw
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .split(' ')
    .filter((token) => token.length > 0);

  return tokens
    .map((token, index) => expandAbbreviation(token, nextNameToken(tokens, index)))
    .filter((token) => !FILLER_WORDS.has(token))
    .join(' ');
}

function expandAbbreviation(token: string, next: string | undefined): string {
  if (token === SINGLE_LETTER_ABBREVIATION.token) {
    return next !== undefined ? SINGLE_LETTER_ABBREVIATION.expansion : token;
  }
  return ABBREVIATIONS[token] ?? token;
}

// Fillers are skipped so "S County Clara" and "S Clara" expand alike.
function nextNameToken(tokens: string[], index: number): string | undefined {
  return tokens.slice(index + 1).find((token) => !FILLER_WORDS.has(token));
}
