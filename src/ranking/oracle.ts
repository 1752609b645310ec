/**
 * Reasoning oracle client
 *
 * @module ReasoningOracle
 */

import { z } from 'zod';
import { OracleFailure, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface OracleRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  /** Aborted when the caller's time budget runs out */
  signal?: AbortSignal;
}

/**
 * A text-completion capability. Implementations reject with `OracleFailure`.
 */
export interface ReasoningOracle {
  complete(request: OracleRequest): Promise<string>;
}

// ============================================================================
// OpenAI-compatible chat completions
// ============================================================================

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

export interface OpenAICompatibleOracleOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

export class OpenAICompatibleOracle implements ReasoningOracle {
  private readonly url: string;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: OpenAICompatibleOracleOptions) {
    const base = options.baseUrl.replace(/\/+$/, '');
    this.url = base.endsWith('/chat/completions') ? base : `${base}/chat/completions`;
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? getLogger('oracle');
  }

  async complete(request: OracleRequest): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new OracleFailure('transport', `Oracle request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new OracleFailure('transport', `Oracle answered ${response.status}: ${detail.slice(0, 200)}`, {
        isRetryable: response.status >= 500 || response.status === 429,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new OracleFailure('malformed', 'Oracle reply is not JSON', { cause: error });
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new OracleFailure('malformed', 'Oracle reply has no completion', { details: parsed.error.issues });
    }

    const content = parsed.data.choices[0].message.content ?? '';
    this.logger.debug('Oracle completion received', { model: this.model, length: content.length });
    return content;
  }
}
