/**
 * Embedding model providers
 *
 * An `EmbeddingModel` maps text to a fixed-length vector. Vectors returned
 * here are raw; unit normalization is the generator's job.
 *
 * @module EmbeddingProvider
 */

import { z } from 'zod';
import { EmbeddingUnavailable, isMatchError, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { Vector } from '../utils/vector-math.js';

export interface EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  encode(text: string): Promise<Vector>;
}

// ============================================================================
// OpenAI-compatible HTTP provider
// ============================================================================

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().int().optional(),
      })
    )
    .min(1),
});

export interface OpenAICompatibleEmbeddingOptions {
  baseUrl: string;
  model: string;
  dimension: number;
  apiKey?: string;
  timeoutMs?: number;
  /** Injected for tests */
  fetch?: typeof fetch;
  logger?: Logger;
}

function embeddingsUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/embeddings') ? trimmed : `${trimmed}/embeddings`;
}

/**
 * Client for `POST {baseUrl}/embeddings`. Every failure, including a reply
 * of the wrong shape, surfaces as `EmbeddingUnavailable`.
 */
export class OpenAICompatibleEmbeddingModel implements EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: OpenAICompatibleEmbeddingOptions) {
    this.name = options.model;
    this.dimension = options.dimension;
    this.url = embeddingsUrl(options.baseUrl);
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? getLogger('embedding');
  }

  async encode(text: string): Promise<Vector> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const body: { model: string; input: string[]; dimensions?: number } = {
      model: this.name,
      input: [text],
    };
    // Only the text-embedding-3 family accepts a requested size
    if (this.name.includes('text-embedding-3')) {
      body.dimensions = this.dimension;
    }

    try {
      const payload = await withTimeout('embedding request', this.timeoutMs, async signal => {
        const response = await this.fetchImpl(this.url, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal,
        });

        if (!response.ok) {
          const detail = await response.text();
          throw new EmbeddingUnavailable(
            `Embedding endpoint answered ${response.status}: ${detail.slice(0, 200)}`,
            { model: this.name }
          );
        }
        const json: unknown = await response.json();
        return json;
      });

      const parsed = embeddingResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new EmbeddingUnavailable('Embedding endpoint returned an unexpected payload', {
          model: this.name,
          details: parsed.error.issues,
        });
      }

      return parsed.data.data[0].embedding;
    } catch (error) {
      if (error instanceof EmbeddingUnavailable) {
        throw error;
      }
      this.logger.warn('Embedding request failed', { model: this.name, error: errorMessage(error) });
      throw new EmbeddingUnavailable(`Embedding model ${this.name} unreachable: ${errorMessage(error)}`, {
        model: this.name,
        cause: error,
        isRetryable: !isMatchError(error) || error.isRetryable,
      });
    }
  }
}

// ============================================================================
// Deterministic hashing provider
// ============================================================================

const TOKEN = /[\p{L}\p{N}]+/gu;

function hashToken(token: string): number {
  let hash = 0;
  for (let i = 0; i < token.length; i++) {
    hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Offline bag-of-words model: every lower-cased token increments the bucket
 * its hash falls into. Same text, same vector. Texts sharing words point in
 * similar directions, which is enough for development and tests.
 */
export class HashingEmbeddingModel implements EmbeddingModel {
  readonly name = 'hashing';
  readonly dimension: number;

  constructor(dimension = 384) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  async encode(text: string): Promise<Vector> {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const match of text.toLowerCase().matchAll(TOKEN)) {
      vector[hashToken(match[0]) % this.dimension] += 1;
    }
    return vector;
  }
}
