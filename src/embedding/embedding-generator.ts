/**
 * Embedding Generator
 *
 * Profile text → one unit vector. Single-chunk profiles use their chunk's
 * vector; multi-chunk profiles use the component-wise mean of the normalized
 * chunk vectors, re-normalized, so every chunk weighs the same. No retries here: `EmbeddingUnavailable` goes to the
 * caller.
 *
 * @module EmbeddingGenerator
 */

import { prepareProfile, type PreparedProfile, type PrepareOptions } from '../text/profile-text.js';
import { normalizeText } from '../text/normalizer.js';
import { EmbeddingUnavailable, ValidationError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { meanVector, normalizeVector, type Vector } from '../utils/vector-math.js';
import type { EmbeddingModel } from './provider.js';

export interface EmbeddingGeneratorOptions {
  prepare?: Omit<PrepareOptions, 'logger'>;
  logger?: Logger;
}

export class EmbeddingGenerator {
  private readonly model: EmbeddingModel;
  private readonly prepareOptions: Omit<PrepareOptions, 'logger'>;
  private readonly logger: Logger;

  constructor(model: EmbeddingModel, options: EmbeddingGeneratorOptions = {}) {
    this.model = model;
    this.prepareOptions = options.prepare ?? {};
    this.logger = options.logger ?? getLogger('embedding');
  }

  get dimension(): number {
    return this.model.dimension;
  }

  get modelName(): string {
    return this.model.name;
  }

  prepare(field: string, seeking: string, offering: string): PreparedProfile {
    return prepareProfile(field, seeking, offering, { ...this.prepareOptions, logger: this.logger });
  }

  async embedProfile(field: string, seeking: string, offering: string): Promise<Vector> {
    return this.embedPrepared(this.prepare(field, seeking, offering));
  }

  async embedPrepared(prepared: PreparedProfile): Promise<Vector> {
    const vectors: Vector[] = [];
    for (const chunk of prepared.chunks) {
      vectors.push(this.unit(await this.encodeChecked(chunk)));
    }

    if (vectors.length === 0) {
      throw new ValidationError('Profile produced no text to embed');
    }

    const combined = vectors.length === 1 ? vectors[0] : meanVector(vectors);
    if (vectors.length > 1) {
      this.logger.debug('Averaged chunk embeddings', { chunks: vectors.length });
    }
    return this.unit(combined);
  }

  /**
   * Ad hoc query embedding: one chunk, normalized, no averaging.
   */
  async embedText(text: string): Promise<Vector> {
    const normalized = normalizeText(text);
    if (!normalized) {
      throw new ValidationError('Cannot embed empty text', { field: 'text', value: text });
    }
    return this.unit(await this.encodeChecked(normalized));
  }

  private async encodeChecked(text: string): Promise<Vector> {
    let vector: Vector;
    try {
      vector = await this.model.encode(text);
    } catch (error) {
      if (error instanceof EmbeddingUnavailable) {
        throw error;
      }
      throw new EmbeddingUnavailable(`Embedding model ${this.model.name} failed`, {
        model: this.model.name,
        cause: error,
      });
    }

    if (vector.length !== this.model.dimension) {
      throw new EmbeddingUnavailable(
        `Embedding model ${this.model.name} returned ${vector.length} dimensions, expected ${this.model.dimension}`,
        { model: this.model.name, isRetryable: false }
      );
    }
    return vector;
  }

  private unit(vector: Vector): Vector {
    const normalized = normalizeVector(vector);
    if (!normalized) {
      throw new EmbeddingUnavailable(`Embedding model ${this.model.name} returned a zero vector`, {
        model: this.model.name,
        isRetryable: false,
      });
    }
    return normalized;
  }
}
