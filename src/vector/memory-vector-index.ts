/**
 * In-process vector index
 *
 * Exact cosine scan over a fixed-dimension map. Optionally persisted to a JSON
 * file: loaded on `initialize`, written by a periodic auto-save when dirty,
 * and flushed on `close`.
 *
 * @module MemoryVectorIndex
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { IndexUnavailable, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { cosineSimilarity, type Vector } from '../utils/vector-math.js';
import type { VectorIndex, VectorRecord, VectorSearchHit, VectorSearchQuery } from './vector-index.js';

const SNAPSHOT_VERSION = 1;

interface PersistenceOptions<P> {
  persistencePath: string;
  /** Validates payloads read back from disk */
  payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>;
  /** 0 disables the timer; the index is still flushed on close */
  autoSaveIntervalMs?: number;
}

export type MemoryVectorIndexOptions<P> = {
  dimension: number;
  logger?: Logger;
} & (PersistenceOptions<P> | { persistencePath?: undefined });

export class MemoryVectorIndex<P> implements VectorIndex<P> {
  readonly dimension: number;
  private readonly points = new Map<number, VectorRecord<P>>();
  private readonly persistence?: PersistenceOptions<P>;
  private readonly logger: Logger;
  private autoSaveTimer?: NodeJS.Timeout;
  private initialized = false;
  private dirty = false;
  private flushing: Promise<void> = Promise.resolve();

  constructor(options: MemoryVectorIndexOptions<P>) {
    if (!Number.isInteger(options.dimension) || options.dimension <= 0) {
      throw new RangeError(`dimension must be a positive integer, got ${options.dimension}`);
    }
    this.dimension = options.dimension;
    this.logger = options.logger ?? getLogger('vector');
    if (options.persistencePath !== undefined) {
      this.persistence = {
        persistencePath: options.persistencePath,
        payloadSchema: options.payloadSchema,
        autoSaveIntervalMs: options.autoSaveIntervalMs,
      };
    }
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.persistence) {
      await this.loadFromDisk(this.persistence);

      const interval = this.persistence.autoSaveIntervalMs ?? 60000;
      if (interval > 0) {
        this.autoSaveTimer = setInterval(() => {
          this.flush().catch((error: unknown) => {
            this.logger.error('Vector index auto-save failed', { error: errorMessage(error) });
          });
        }, interval);
        this.autoSaveTimer.unref();
      }
    }

    this.initialized = true;
    this.logger.info('Vector index initialized', {
      dimension: this.dimension,
      points: this.points.size,
      persistent: this.persistence !== undefined,
    });
  }

  async close(): Promise<void> {
    if (!this.initialized) return;

    if (this.autoSaveTimer) {
      clearInterval(this.autoSaveTimer);
      this.autoSaveTimer = undefined;
    }

    await this.flush();
    this.points.clear();
    this.initialized = false;
    this.logger.info('Vector index closed');
  }

  /**
   * Writes the snapshot when something changed since the last write. Calls
   * are chained: the auto-save and `close` share one temporary file.
   */
  flush(): Promise<void> {
    const next = this.flushing.then(() => this.writeSnapshot());
    // The chain only orders writes; each caller gets its own rejection.
    this.flushing = next.catch(() => undefined);
    return next;
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  async upsert(id: number, vector: Vector, payload: P): Promise<void> {
    this.ensureReady('upsert');
    this.checkDimension('upsert', vector);
    this.points.set(id, { id, vector: [...vector], payload });
    this.dirty = true;
  }

  async retrieve(id: number): Promise<VectorRecord<P> | null> {
    this.ensureReady('retrieve');
    const point = this.points.get(id);
    return point ? { id: point.id, vector: [...point.vector], payload: point.payload } : null;
  }

  async search(query: VectorSearchQuery): Promise<VectorSearchHit<P>[]> {
    this.ensureReady('search');
    this.checkDimension('search', query.vector);
    if (query.limit <= 0) return [];

    const hits: VectorSearchHit<P>[] = [];
    for (const point of this.points.values()) {
      if (point.id === query.excludeId) continue;
      hits.push({
        id: point.id,
        score: cosineSimilarity(query.vector, point.vector),
        payload: point.payload,
      });
    }

    hits.sort((a, b) => b.score - a.score || a.id - b.id);
    return hits.slice(0, query.limit);
  }

  async delete(id: number): Promise<boolean> {
    this.ensureReady('delete');
    const removed = this.points.delete(id);
    if (removed) {
      this.dirty = true;
    }
    return removed;
  }

  async count(): Promise<number> {
    this.ensureReady('count');
    return this.points.size;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async writeSnapshot(): Promise<void> {
    if (!this.persistence || !this.dirty) return;
    const target = this.persistence.persistencePath;

    // Taken before the first await; upserts made while writing mark the
    // index dirty again and go out with the next flush.
    const snapshot = {
      version: SNAPSHOT_VERSION,
      dimension: this.dimension,
      savedAt: Date.now(),
      points: Array.from(this.points.values()),
    };
    this.dirty = false;

    try {
      await fs.mkdir(path.dirname(path.resolve(target)), { recursive: true });
      // Written beside the target, then renamed over it
      const temp = `${target}.tmp`;
      await fs.writeFile(temp, JSON.stringify(snapshot));
      await fs.rename(temp, target);
      this.logger.debug('Vector index flushed', { points: snapshot.points.length, path: target });
    } catch (error) {
      this.dirty = true;
      throw new IndexUnavailable('flush', `Cannot write ${target}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private ensureReady(operation: string): void {
    if (!this.initialized) {
      throw new IndexUnavailable(operation, 'Vector index is not initialized');
    }
  }

  private checkDimension(operation: string, vector: Vector): void {
    if (vector.length !== this.dimension) {
      throw new IndexUnavailable(
        operation,
        `Vector has ${vector.length} dimensions, index expects ${this.dimension}`,
        { isRetryable: false }
      );
    }
  }

  private async loadFromDisk(persistence: PersistenceOptions<P>): Promise<void> {
    const source = persistence.persistencePath;

    let content: string;
    try {
      content = await fs.readFile(source, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.debug('No vector snapshot yet', { path: source });
        return;
      }
      throw new IndexUnavailable('load', `Cannot read ${source}: ${errorMessage(error)}`, { cause: error });
    }

    const snapshotSchema = z.object({
      version: z.literal(SNAPSHOT_VERSION),
      dimension: z.literal(this.dimension),
      points: z.array(
        z.object({
          id: z.number().int(),
          vector: z.array(z.number()).length(this.dimension),
          payload: z.unknown(),
        })
      ),
    });

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new IndexUnavailable('load', `${source} is not valid JSON`, { cause: error, isRetryable: false });
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexUnavailable('load', `${source} is not a compatible vector snapshot`, {
        details: parsed.error.issues.slice(0, 5),
        isRetryable: false,
      });
    }

    for (const point of parsed.data.points) {
      const payload = persistence.payloadSchema.safeParse(point.payload);
      if (!payload.success) {
        throw new IndexUnavailable('load', `${source} holds an invalid payload for point ${point.id}`, {
          details: payload.error.issues.slice(0, 5),
          isRetryable: false,
        });
      }
      this.points.set(point.id, { id: point.id, vector: point.vector, payload: payload.data });
    }
    this.logger.info('Loaded vector snapshot', { path: source, points: this.points.size });
  }
}
