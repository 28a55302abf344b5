import natural from 'natural';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CountyCatalog, CountyReference } from '../../domain/types.js';
import { MATCH_THRESHOLD } from './constants.js';
import { normalizeCountyName } from './normalizer.js';

// Substitution at twice the cost of insert/delete makes Levenshtein the Indel distance.
const INDEL_COSTS = { insertion_cost: 1, deletion_cost: 1, substitution_cost: 2 };

export interface CountyMatch {
  county: CountyReference;
  score: number;
}

export interface ScoredCounty {
  county: CountyReference;
  normalizedName: string;
  score: number;
}

/** Normalized Indel similarity, 0-100. */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  const distance = natural.LevenshteinDistance(a, b, INDEL_COSTS);
  return 100 * (1 - distance / total);
}

/**
 * Word-order independent similarity, 0-100. Compares the shared tokens against
 * each side's remainder and keeps the best of the three pairings; a name whose
 * tokens are a subset of the other's scores 100.
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(a.split(' ').filter((t) => t.length > 0));
  const tokensB = new Set(b.split(' ').filter((t) => t.length > 0));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const shared = [...tokensA].filter((t) => tokensB.has(t)).sort();
  const onlyA = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const onlyB = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) return 100;

  const sect = shared.join(' ');
  const combinedA = [...shared, ...onlyA].join(' ');
  const combinedB = [...shared, ...onlyB].join(' ');

  const scores = [ratio(combinedA, combinedB)];
  if (sect.length > 0) {
    scores.push(ratio(sect, combinedA), ratio(sect, combinedB));
  }
  return Math.max(...scores);
}

export function scoreCatalog(normalizedInput: string, catalog: CountyCatalog): ScoredCounty[] {
  return catalog.map((county) => {
    const normalizedName = normalizeCountyName(county.canonicalName);
    return { county, normalizedName, score: tokenSetRatio(normalizedInput, normalizedName) };
  });
}

/**
 * Picks the single best catalog entry for an already-normalized county name.
 * Fails closed: a best score under the threshold, or a tie at the best score,
 * is UNKNOWN_COUNTY.
 */
export function matchCounty(normalizedInput: string, catalog: CountyCatalog): Result<CountyMatch, AppError> {
  if (normalizedInput.length === 0) {
    return err(createAppError(ErrorCode.UNKNOWN_COUNTY, 'County name is empty after normalization', false));
  }

  const scored = scoreCatalog(normalizedInput, catalog);
  if (scored.length === 0) {
    return err(createAppError(ErrorCode.UNKNOWN_COUNTY, 'County catalog is empty', false));
  }

  const bestScore = Math.max(...scored.map((entry) => entry.score));
  const best = scored.filter((entry) => entry.score === bestScore);

  if (bestScore < MATCH_THRESHOLD) {
    return err(
      createAppError(
        ErrorCode.UNKNOWN_COUNTY,
        `No confident county match for '${normalizedInput}' (best='${best[0].county.canonicalName}', score=${formatScore(bestScore)}, threshold=${MATCH_THRESHOLD})`,
        false,
      ),
    );
  }

  if (best.length > 1) {
    const names = best.map((entry) => `'${entry.county.canonicalName}'`).join(', ');
    return err(
      createAppError(
        ErrorCode.UNKNOWN_COUNTY,
        `Ambiguous county match for '${normalizedInput}': ${names} all scored ${formatScore(bestScore)}`,
        false,
      ),
    );
  }

  return ok({ county: best[0].county, score: bestScore });
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}
