import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { formatCents } from '../../domain/money.js';
import type { ParsedDeed } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { parseAmountText } from '../amount-text/index.js';
import type { DeedValidator } from './types.js';

export type { DeedValidator } from './types.js';

const log = logger.child({ module: 'validation' });

/** Recording on the signing day is allowed. */
export function validateDateOrder(deed: ParsedDeed): Result<ParsedDeed, AppError> {
  if (deed.dateRecorded < deed.dateSigned) {
    return err(
      createAppError(
        ErrorCode.INVALID_DATE_ORDER,
        `Invalid date order: recorded date (${deed.dateRecorded}) is earlier than signed date (${deed.dateSigned})`,
        false,
      ),
    );
  }
  return ok(deed);
}

export function validateAmountConsistency(deed: ParsedDeed): Result<ParsedDeed, AppError> {
  const written = parseAmountText(deed.amountText);
  if (!written.ok) return written;

  if (written.value !== deed.amountCents) {
    return err(
      createAppError(
        ErrorCode.AMOUNT_MISMATCH,
        `Amount mismatch: numeric amount (${formatCents(deed.amountCents)}) does not match textual amount (${formatCents(written.value)})`,
        false,
        deed.amountText,
      ),
    );
  }
  return ok(deed);
}

/** Run order is part of the contract: the first failure wins. */
export const DEED_VALIDATORS: readonly DeedValidator[] = [
  { name: 'date-order', validate: validateDateOrder },
  { name: 'amount-consistency', validate: validateAmountConsistency },
];

export function runValidators(
  deed: ParsedDeed,
  validators: readonly DeedValidator[] = DEED_VALIDATORS,
): Result<ParsedDeed, AppError> {
  for (const validator of validators) {
    const result = validator.validate(deed);
    if (!result.ok) {
      log.info(
        { documentId: deed.documentId, validator: validator.name, errorCode: result.error.code },
        'Deed failed validation',
      );
      return result;
    }
  }

  log.debug({ documentId: deed.documentId, validators: validators.length }, 'Deed passed all validators');
  return ok(deed);
}
