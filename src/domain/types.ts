import type { RejectionReason } from './errors.js';

export const DEED_STATUSES = ['PRELIMINARY', 'RECORDED', 'RELEASED', 'VOID'] as const;

export type DeedStatus = (typeof DEED_STATUSES)[number];

/** Calendar date in `YYYY-MM-DD` form; lexical order is date order. */
export type IsoDate = string;

/** Untyped field map as returned by the extraction step. */
export type CandidateRecord = Record<string, unknown>;

export interface ParsedDeed {
  readonly documentType: string;
  readonly documentId: string;
  readonly countyRaw: string;
  readonly state: string;
  readonly dateSigned: IsoDate;
  readonly dateRecorded: IsoDate;
  readonly grantor: string;
  readonly grantee: string;
  /** `amount_numeric` as integer cents. */
  readonly amountCents: number;
  readonly amountText: string;
  readonly apn: string;
  readonly status: DeedStatus;
}

export interface EnrichedDeed extends ParsedDeed {
  readonly countyCanonical: string;
  readonly taxRate: number;
}

export interface CountyReference {
  readonly canonicalName: string;
  readonly taxRate: number;
}

export type CountyCatalog = ReadonlyArray<CountyReference>;

export const PIPELINE_STATES = [
  'received',
  'coerced',
  'validated',
  'enriched',
  'accepted',
  'rejected',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export type ValidationOutcome =
  | { readonly status: 'accepted'; readonly deed: EnrichedDeed }
  | {
      readonly status: 'rejected';
      readonly reason: RejectionReason;
      readonly message: string;
      readonly failedAt: PipelineState;
    };
