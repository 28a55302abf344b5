import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { LLMProvider, LLMResponse, LLMRequestOptions } from './types.js';

const DEFAULT_MODEL = 'llama-3.3-70b-versatile';
const DEFAULT_MAX_TOKENS = 2048;

const log = logger.child({ module: 'llm-groq' });

/** The slice of the groq-sdk client this provider calls. */
export interface GroqClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
        temperature?: number;
        max_tokens?: number;
        response_format?: { type: 'json_object' | 'text' };
      }): Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
        model: string;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
      }>;
    };
  };
}

export class GroqProvider implements LLMProvider {
  private readonly client: GroqClient;
  private readonly model: string;

  constructor(client: GroqClient, model?: string) {
    this.client = client;
    this.model = model ?? DEFAULT_MODEL;
  }

  async chat(
    systemPrompt: string,
    userMessage: string,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const startTime = Date.now();

    log.debug({ model: this.model }, 'Requesting deed extraction from Groq');

    let response: Awaited<ReturnType<GroqClient['chat']['completions']['create']>>;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
        // Extraction must be reproducible for the same document.
        temperature: options?.temperature ?? 0,
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(options?.responseFormat === 'json' && {
          response_format: { type: 'json_object' },
        }),
      });
    } catch (cause) {
      return err(this.toAppError(cause, Date.now() - startTime));
    }

    const latencyMs = Date.now() - startTime;
    const content = response.choices[0]?.message?.content;

    if (!content) {
      log.error({ model: this.model, latencyMs, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE }, 'Groq returned no content');
      return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Groq returned empty response content', false));
    }

    const usage = response.usage;
    log.info(
      { model: response.model, latencyMs, totalTokens: usage?.total_tokens ?? 0 },
      'Groq extraction completed',
    );

    return ok({
      content,
      model: response.model,
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs,
    });
  }

  private toAppError(cause: unknown, latencyMs: number): AppError {
    const details = cause instanceof Error ? cause.message : String(cause);
    const status = statusOf(cause);
    const ctx = { model: this.model, latencyMs, status, details };

    if (status === 401) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_AUTH_ERROR }, 'Groq rejected the API key');
      return createAppError(ErrorCode.LLM_AUTH_ERROR, 'Groq API authentication failed', false, details);
    }

    if (status === 429) {
      log.warn({ ...ctx, errorCode: ErrorCode.LLM_RATE_LIMITED }, 'Groq rate limited');
      return createAppError(ErrorCode.LLM_RATE_LIMITED, 'Groq API rate limited', true, details);
    }

    const message = status !== undefined && status >= 500 ? `Groq API returned ${status}` : 'Groq API call failed';
    log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR }, message);
    return createAppError(ErrorCode.LLM_API_ERROR, message, true, details);
  }
}

function statusOf(cause: unknown): number | undefined {
  if (typeof cause !== 'object' || cause === null || !('status' in cause)) return undefined;
  const { status } = cause;
  return typeof status === 'number' ? status : undefined;
}
