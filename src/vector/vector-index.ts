/**
 * Vector index contract
 *
 * @module VectorIndex
 */

import type { Vector } from '../utils/vector-math.js';

export interface VectorRecord<P> {
  id: number;
  vector: Vector;
  payload: P;
}

export interface VectorSearchQuery {
  vector: Vector;
  /** Never returned, even when it is the closest point */
  excludeId?: number;
  limit: number;
}

export interface VectorSearchHit<P> {
  id: number;
  /** Cosine similarity, -1..1 */
  score: number;
  payload: P;
}

/**
 * Nearest-neighbour store keyed by integer id. Every method rejects with
 * `IndexUnavailable` when the index cannot serve the call.
 */
export interface VectorIndex<P> {
  initialize(): Promise<void>;
  close(): Promise<void>;
  /** Inserts or replaces the point for `id` */
  upsert(id: number, vector: Vector, payload: P): Promise<void>;
  retrieve(id: number): Promise<VectorRecord<P> | null>;
  /** Highest similarity first; equal scores by ascending id */
  search(query: VectorSearchQuery): Promise<VectorSearchHit<P>[]>;
  /** False when there was no point for `id` */
  delete(id: number): Promise<boolean>;
  count(): Promise<number>;
}
