import type { Request, Response, NextFunction } from 'express';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import type { ValidationOutcome } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.SCHEMA_ERROR:
    case ErrorCode.AMOUNT_PARSE_ERROR:
    case ErrorCode.INVALID_DATE_ORDER:
    case ErrorCode.AMOUNT_MISMATCH:
    case ErrorCode.UNKNOWN_COUNTY:
    case ErrorCode.VALIDATION_ERROR:
      return 422;

    case ErrorCode.EXTRACTION_FAILURE:
      return 502;

    default:
      return 500;
  }
}

export function sendOutcome(res: Response, outcome: ValidationOutcome): void {
  if (outcome.status === 'accepted') {
    res.json(successResponse(outcome.deed));
    return;
  }
  res
    .status(mapErrorCodeToStatus(outcome.reason))
    .json(errorResponse(outcome.reason, outcome.message, outcome.failedAt, false));
}

// express.json() reports an unparseable body as an error carrying status 400.
function isMalformedBody(value: Error): boolean {
  return 'status' in value && value.status === 400;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isMalformedBody(err)) {
    res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON', err.message, false));
    return;
  }

  if (isAppError(err)) {
    const status = mapErrorCodeToStatus(err.code);
    res.status(status).json(errorResponse(err.code, err.message, err.details, err.retryable));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', undefined, false));
}
