import OpenAI, { APIConnectionTimeoutError, APIError, RateLimitError } from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { LlmConfig } from '../config';
import { UpstreamUnavailableError } from '../errors';
import { createLogger, describeError } from '../logger';

const logger = createLogger('llm');

export const FALLBACK_REPLY =
  'Lo siento, ahora mismo no puedo generar una respuesta. Por favor, inténtalo de nuevo en unos minutos.';

export type GenerateFailure = 'timeout' | 'rate_limit' | 'error' | 'empty' | 'unconfigured';

export type GenerateResult =
  | { ok: true; text: string }
  | { ok: false; reason: GenerateFailure; error?: UpstreamUnavailableError };

/** The slice of the OpenAI SDK this client needs; `openai.chat.completions` satisfies it. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface LanguageModel {
  generate(prompt: string): Promise<GenerateResult>;
  generateReply(prompt: string): Promise<string>;
}

function classify(error: unknown): Exclude<GenerateFailure, 'empty' | 'unconfigured'> {
  if (error instanceof APIConnectionTimeoutError) return 'timeout';
  if (error instanceof RateLimitError) return 'rate_limit';
  if (error instanceof APIError && error.status === 429) return 'rate_limit';
  return 'error';
}

/**
 * Chat-completions client for any OpenAI-compatible endpoint. Failures come
 * back as `{ ok: false }` results; nothing here throws.
 */
export class LanguageModelClient implements LanguageModel {
  private readonly completions: ChatCompletionsApi | null;

  constructor(
    private readonly config: LlmConfig,
    completions?: ChatCompletionsApi,
  ) {
    if (completions) {
      this.completions = completions;
    } else if (config.apiKey) {
      const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
      this.completions = openai.chat.completions;
    } else {
      this.completions = null;
    }
  }

  async generate(prompt: string): Promise<GenerateResult> {
    if (!this.completions) {
      logger.warn('no API key configured, skipping the model call');
      return { ok: false, reason: 'unconfigured' };
    }

    try {
      const completion = await this.completions.create({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
        temperature: this.config.temperature,
      });

      const text = completion.choices[0]?.message?.content?.trim() ?? '';
      if (!text) {
        logger.warn(`model ${this.config.model} returned an empty completion`);
        return { ok: false, reason: 'empty' };
      }
      return { ok: true, text };
    } catch (error) {
      const reason = classify(error);
      logger.warn(`completion failed (${reason}): ${describeError(error)}`);
      return {
        ok: false,
        reason,
        error: new UpstreamUnavailableError('llm', `completion failed: ${reason}`, error),
      };
    }
  }

  async generateReply(prompt: string): Promise<string> {
    const result = await this.generate(prompt);
    return result.ok ? result.text : FALLBACK_REPLY;
  }
}
