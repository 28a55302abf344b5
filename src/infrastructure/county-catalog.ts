import { readFileSync } from 'node:fs';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { countyCatalogFileSchema, formatIssues } from '../domain/schemas.js';
import type { CountyCatalog } from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'county-catalog' });

export function parseCountyCatalog(raw: unknown): Result<CountyCatalog, AppError> {
  const parsed = countyCatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      createAppError(ErrorCode.CATALOG_INVALID, 'County catalog failed schema validation', false, formatIssues(parsed.error)),
    );
  }

  const entries = parsed.data.map((entry) =>
    Object.freeze({ canonicalName: entry.canonical_name, taxRate: entry.tax_rate }),
  );
  return ok(Object.freeze(entries));
}

export function loadCountyCatalog(path: string): Result<CountyCatalog, AppError> {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ path, errorCode: ErrorCode.CATALOG_LOAD_FAILED, details }, 'Failed to read county catalog');
    return err(createAppError(ErrorCode.CATALOG_LOAD_FAILED, `Cannot read county catalog at '${path}'`, false, details));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ path, errorCode: ErrorCode.CATALOG_INVALID, details }, 'County catalog is not valid JSON');
    return err(createAppError(ErrorCode.CATALOG_INVALID, `County catalog at '${path}' is not valid JSON`, false, details));
  }

  const result = parseCountyCatalog(raw);
  if (!result.ok) {
    log.error({ path, errorCode: result.error.code, details: result.error.details }, 'County catalog rejected');
    return result;
  }

  log.info({ path, counties: result.value.length }, 'County catalog loaded');
  return result;
}

let instance: CountyCatalog | null = null;

/**
 * Loads the catalog once per process; later calls keep the first catalog.
 * @throws {Error} If the catalog cannot be read or fails validation
 */
export function initCountyCatalog(path: string): void {
  if (instance) return;

  const result = loadCountyCatalog(path);
  if (!result.ok) {
    throw new Error(`[${result.error.code}] ${result.error.message}: ${result.error.details ?? ''}`);
  }
  instance = result.value;
}

/** @throws {Error} If initCountyCatalog has not run */
export function getCountyCatalog(): CountyCatalog {
  if (!instance) {
    throw new Error('County catalog has not been initialized');
  }
  return instance;
}
