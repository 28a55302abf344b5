import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, type AppError } from '../../domain/errors.js';
import type { CountyCatalog, EnrichedDeed, ParsedDeed } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { matchCounty, formatScore } from './matcher.js';
import { normalizeCountyName } from './normalizer.js';

export { normalizeCountyName } from './normalizer.js';
export { matchCounty, tokenSetRatio, ratio, scoreCatalog } from './matcher.js';
export type { CountyMatch, ScoredCounty } from './matcher.js';
export { MATCH_THRESHOLD } from './constants.js';

const log = logger.child({ module: 'county-enrichment' });

export function enrichDeed(deed: ParsedDeed, catalog: CountyCatalog): Result<EnrichedDeed, AppError> {
  const normalized = normalizeCountyName(deed.countyRaw);
  const match = matchCounty(normalized, catalog);

  if (!match.ok) {
    log.info({ documentId: deed.documentId, countyRaw: deed.countyRaw, normalized }, 'County not matched');
    return err(
      createAppError(
        match.error.code,
        `Unable to match county '${deed.countyRaw}': ${match.error.message}`,
        false,
      ),
    );
  }

  const { county, score } = match.value;
  log.debug(
    { documentId: deed.documentId, countyRaw: deed.countyRaw, countyCanonical: county.canonicalName, score: formatScore(score) },
    'County matched',
  );

  return ok(
    Object.freeze({
      ...deed,
      countyCanonical: county.canonicalName,
      taxRate: county.taxRate,
    }),
  );
}
