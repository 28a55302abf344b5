import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { ParsedDeed } from '../../domain/types.js';

export interface DeedValidator {
  name: string;
  validate(deed: ParsedDeed): Result<ParsedDeed, AppError>;
}
