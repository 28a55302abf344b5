import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { LLMProvider, LLMResponse } from './types.js';

const STUB_MODEL = 'offline-stub';
export const STUB_SAMPLE_PATH = fileURLToPath(new URL('../../../data/sample-extraction.json', import.meta.url));

const log = logger.child({ module: 'llm-stub' });

/**
 * Offline provider for environments without network access. Ignores the
 * prompt and always answers with the same content.
 */
export class StubProvider implements LLMProvider {
  private readonly content: string;

  constructor(content?: string) {
    this.content = content ?? readFileSync(STUB_SAMPLE_PATH, 'utf-8');
  }

  async chat(): Promise<Result<LLMResponse, AppError>> {
    log.debug({ model: STUB_MODEL }, 'Returning stubbed completion');

    return ok({
      content: this.content,
      model: STUB_MODEL,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      latencyMs: 0,
    });
  }
}
