import type { Logger } from 'pino';
import { createAppError, ErrorCode, isRejectionReason, type AppError } from '../../domain/errors.js';
import type { CountyCatalog, EnrichedDeed, PipelineState, ValidationOutcome } from '../../domain/types.js';
import { createRecordLogger } from '../../infrastructure/logger.js';
import { coerceDeed } from '../coercion/index.js';
import { enrichDeed } from '../county/index.js';
import { extractCandidateRecord } from '../extraction/index.js';
import { runValidators } from '../validation/index.js';
import { PIPELINE_TRANSITIONS } from './types.js';
import type { PipelineDeps } from './types.js';

export type { PipelineDeps } from './types.js';
export { PIPELINE_TRANSITIONS, isTerminalState } from './types.js';

class PipelineRun {
  private readonly log: Logger;
  private state: PipelineState = 'received';

  constructor(log: Logger) {
    this.log = log;
  }

  advance(to: PipelineState): void {
    if (!PIPELINE_TRANSITIONS[this.state].has(to)) {
      throw new Error(`Illegal pipeline transition from '${this.state}' to '${to}'`);
    }
    this.log.debug({ fromState: this.state, toState: to }, 'Pipeline state transition');
    this.state = to;
  }

  accept(deed: EnrichedDeed): ValidationOutcome {
    this.advance('accepted');
    this.log.info({ countyCanonical: deed.countyCanonical, taxRate: deed.taxRate }, 'Deed accepted');
    return { status: 'accepted', deed };
  }

  reject(error: AppError): ValidationOutcome {
    if (!isRejectionReason(error.code)) {
      throw new Error(`Stage reported '${error.code}', which is not a rejection reason`);
    }
    const failedAt = this.state;
    this.advance('rejected');
    this.log.info({ failedAt, reason: error.code, message: error.message }, 'Deed rejected');
    return { status: 'rejected', reason: error.code, message: error.message, failedAt };
  }
}

/**
 * Runs coercion, validation and enrichment in that order and stops at the
 * first failure. The only place an accept/reject decision is made.
 */
export function validateDeed(candidate: unknown, catalog: CountyCatalog, log?: Logger): ValidationOutcome {
  const documentId =
    typeof candidate === 'object' && candidate !== null && 'document_id' in candidate && typeof candidate.document_id === 'string'
      ? candidate.document_id
      : undefined;
  const run = new PipelineRun(log ?? createRecordLogger(documentId));

  const coerced = coerceDeed(candidate);
  if (!coerced.ok) return run.reject(coerced.error);
  run.advance('coerced');

  const validated = runValidators(coerced.value);
  if (!validated.ok) return run.reject(validated.error);
  run.advance('validated');

  const enriched = enrichDeed(validated.value, catalog);
  if (!enriched.ok) return run.reject(enriched.error);
  run.advance('enriched');

  return run.accept(enriched.value);
}

/** Extracts a candidate record from raw text, then validates it. */
export async function processDocument(deps: PipelineDeps, rawText: string): Promise<ValidationOutcome> {
  const log = createRecordLogger(undefined, 'document');

  const extraction = await extractCandidateRecord(deps.llm, rawText);
  if (!extraction.ok) {
    const { code, message } = extraction.error;
    return new PipelineRun(log).reject(
      createAppError(ErrorCode.EXTRACTION_FAILURE, `Extraction failed [${code}]: ${message}`, false),
    );
  }

  return validateDeed(extraction.value.record, deps.catalog);
}
