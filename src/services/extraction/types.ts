import type { CandidateRecord } from '../../domain/types.js';

export interface ExtractionResult {
  record: CandidateRecord;
  rawResponse: string;
  model: string;
  latencyMs: number;
}
