import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { candidateDeedSchema, DEED_FIELDS } from '../../domain/schemas.js';
import type { ParsedDeed } from '../../domain/types.js';

function schemaError(message: string, field?: string): AppError {
  return createAppError(ErrorCode.SCHEMA_ERROR, message, false, field);
}

/**
 * Turns an untyped candidate record into a ParsedDeed. Fails on the first
 * missing or malformed field, in DEED_FIELDS order; nothing is defaulted,
 * trimmed or case-folded. `details` carries the field name.
 */
export function coerceDeed(candidate: unknown): Result<ParsedDeed, AppError> {
  if (typeof candidate !== 'object' || candidate === null || Array.isArray(candidate)) {
    return err(schemaError('Candidate record must be an object'));
  }

  for (const field of DEED_FIELDS) {
    if (!(field in candidate) || Reflect.get(candidate, field) === undefined) {
      return err(schemaError(`Field '${field}' is missing`, field));
    }
  }

  const parsed = candidateDeedSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = firstIssue(parsed.error.issues);
    const field = String(issue.path[0] ?? 'record');
    return err(schemaError(`Field '${field}' is invalid: ${issue.message}`, field));
  }

  return ok(Object.freeze(parsed.data));
}

function firstIssue<T extends { path: (string | number)[] }>(issues: T[]): T {
  const rank = (issue: T): number => {
    const index = DEED_FIELDS.findIndex((field) => field === issue.path[0]);
    return index === -1 ? DEED_FIELDS.length : index;
  };
  return issues.reduce((first, issue) => (rank(issue) < rank(first) ? issue : first));
}
