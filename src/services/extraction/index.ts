import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CandidateRecord } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import { SYSTEM_PROMPT, buildUserPrompt } from './prompt.js';
import type { ExtractionResult } from './types.js';

export type { ExtractionResult } from './types.js';

const log = logger.child({ module: 'extraction' });

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Asks the LLM to turn raw deed text into a candidate record. The record is
 * untrusted: this only guarantees a JSON object came back. Not retried.
 */
export async function extractCandidateRecord(
  llm: LLMProvider,
  rawText: string,
): Promise<Result<ExtractionResult, AppError>> {
  log.info({ textLength: rawText.length, step: 'extracting' }, 'Starting deed extraction');

  const chatResult = await llm.chat(SYSTEM_PROMPT, buildUserPrompt(rawText), { responseFormat: 'json' });
  if (!chatResult.ok) return chatResult;

  const response = chatResult.value;
  const record = tryParseJsonObject(stripCodeFence(response.content));

  if (!record) {
    log.error({ model: response.model, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE }, 'LLM did not return a JSON object');
    return err(
      createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'LLM did not return a JSON object', false, response.content),
    );
  }

  log.info({ model: response.model, latencyMs: response.latencyMs, fields: Object.keys(record).length }, 'Extraction completed');

  return ok({
    record,
    rawResponse: response.content,
    model: response.model,
    latencyMs: response.latencyMs,
  });
}

export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? match[1] : trimmed;
}

function tryParseJsonObject(content: string): CandidateRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}
