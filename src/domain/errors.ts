export const ErrorCode = {
  // Deed rejection reasons
  SCHEMA_ERROR: 'SCHEMA_ERROR',
  AMOUNT_PARSE_ERROR: 'AMOUNT_PARSE_ERROR',
  INVALID_DATE_ORDER: 'INVALID_DATE_ORDER',
  AMOUNT_MISMATCH: 'AMOUNT_MISMATCH',
  UNKNOWN_COUNTY: 'UNKNOWN_COUNTY',
  EXTRACTION_FAILURE: 'EXTRACTION_FAILURE',

  // LLM Extraction
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',

  // Reference data
  CATALOG_LOAD_FAILED: 'CATALOG_LOAD_FAILED',
  CATALOG_INVALID: 'CATALOG_INVALID',

  // API
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export const REJECTION_REASONS = [
  ErrorCode.SCHEMA_ERROR,
  ErrorCode.AMOUNT_PARSE_ERROR,
  ErrorCode.INVALID_DATE_ORDER,
  ErrorCode.AMOUNT_MISMATCH,
  ErrorCode.UNKNOWN_COUNTY,
  ErrorCode.EXTRACTION_FAILURE,
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function isRejectionReason(code: ErrorCode): code is RejectionReason {
  return REJECTION_REASONS.some((reason) => reason === code);
}
