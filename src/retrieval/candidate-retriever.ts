/**
 * Candidate Retriever
 *
 * Two sources, one list:
 * - lexical: active profiles containing any of the requester's top keywords
 * - semantic: nearest neighbours of the requester's vector
 *
 * When the semantic side cannot run, every active profile stands in for it.
 * Keyword hits come first, each user appears once, the requester never, and
 * the list is capped. Retrieval never rejects; a source that fails
 * contributes nothing.
 *
 * @module CandidateRetriever
 */

import type { EmbeddingGenerator } from '../embedding/embedding-generator.js';
import type { ProfileStore } from '../storage/profile-store.js';
import { toSnapshot, type Candidate, type Profile, type ProfileSnapshot } from '../types/index.js';
import { safeExecute, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { Vector } from '../utils/vector-math.js';
import type { VectorIndex } from '../vector/vector-index.js';

export interface RetrievalSettings {
  keywordLimit: number;
  vectorLimit: number;
  candidateCeiling: number;
  /** How many of the requester's keywords go into the lexical query */
  keywordQueryCount: number;
}

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
  keywordLimit: 15,
  vectorLimit: 15,
  candidateCeiling: 20,
  keywordQueryCount: 5,
};

export interface CandidateRetrieverDeps {
  store: ProfileStore;
  index: VectorIndex<ProfileSnapshot>;
  embeddings: EmbeddingGenerator;
  settings?: Partial<RetrievalSettings>;
  logger?: Logger;
}

/**
 * Keeps the first occurrence of every user id, drops `excludeUserId`, and
 * stops at `ceiling` entries.
 */
export function mergeCandidates(
  lists: Candidate[][],
  excludeUserId: number,
  ceiling: number
): Candidate[] {
  const seen = new Set<number>([excludeUserId]);
  const merged: Candidate[] = [];

  for (const list of lists) {
    for (const candidate of list) {
      if (merged.length >= ceiling) return merged;
      if (seen.has(candidate.profile.userId)) continue;
      seen.add(candidate.profile.userId);
      merged.push(candidate);
    }
  }

  return merged;
}

export class CandidateRetriever {
  private readonly store: ProfileStore;
  private readonly index: VectorIndex<ProfileSnapshot>;
  private readonly embeddings: EmbeddingGenerator;
  private readonly settings: RetrievalSettings;
  private readonly logger: Logger;

  constructor(deps: CandidateRetrieverDeps) {
    this.store = deps.store;
    this.index = deps.index;
    this.embeddings = deps.embeddings;
    this.settings = { ...DEFAULT_RETRIEVAL_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? getLogger('retrieval');
  }

  async retrieve(
    requestingUserId: number,
    profile: Profile,
    keywordLimit: number = this.settings.keywordLimit,
    vectorLimit: number = this.settings.vectorLimit
  ): Promise<Candidate[]> {
    const [lexical, semantic] = await Promise.all([
      this.keywordCandidates(requestingUserId, profile, keywordLimit),
      this.semanticOrFallback(requestingUserId, profile, vectorLimit),
    ]);

    const merged = mergeCandidates([lexical, semantic], requestingUserId, this.settings.candidateCeiling);

    this.logger.info('Candidates retrieved', {
      userId: requestingUserId,
      keyword: lexical.length,
      semantic: semantic.length,
      merged: merged.length,
    });
    return merged;
  }

  // --------------------------------------------------------------------------
  // Sources
  // --------------------------------------------------------------------------

  private async keywordCandidates(userId: number, profile: Profile, limit: number): Promise<Candidate[]> {
    if (profile.keywords.length === 0 || limit <= 0) {
      return [];
    }

    const keywords = profile.keywords.slice(0, this.settings.keywordQueryCount);
    const result = await safeExecute(
      () => this.store.findByKeywords({ keywords, excludeUserId: userId, limit }),
      { operationName: 'keyword search', logger: this.logger }
    );
    if (!result.success) {
      return [];
    }

    return result.data.map((found): Candidate => ({ profile: toSnapshot(found), source: 'keyword' }));
  }

  private async semanticOrFallback(userId: number, profile: Profile, limit: number): Promise<Candidate[]> {
    if (limit <= 0) {
      return [];
    }

    const semantic = await safeExecute(() => this.vectorCandidates(userId, profile, limit), {
      operationName: 'vector search',
      logger: this.logger,
    });
    if (semantic.success) {
      return semantic.data;
    }

    this.logger.warn('Falling back to active profile list', { userId, code: semantic.error.code });
    const fallback = await safeExecute(
      () => this.store.listActive({ excludeUserId: userId, limit: this.settings.candidateCeiling }),
      { operationName: 'fallback listing', logger: this.logger }
    );
    if (!fallback.success) {
      return [];
    }
    return fallback.data.map((found): Candidate => ({ profile: toSnapshot(found), source: 'fallback' }));
  }

  /**
   * Rejects when the index or the embedding model is unreachable; the caller
   * turns that into the fallback listing. An inactive requester is searched
   * with a vector computed on the spot and never written to the index.
   */
  private async vectorCandidates(userId: number, profile: Profile, limit: number): Promise<Candidate[]> {
    const stored = await this.index.retrieve(userId);

    let vector: Vector;
    if (stored) {
      vector = stored.vector;
    } else {
      const { field, seeking, offering } = profile.answers;
      vector = await this.embeddings.embedProfile(field, seeking, offering);

      if (profile.active && !(await this.backfill(userId, profile, vector))) {
        return [];
      }
    }

    const hits = await this.index.search({ vector, excludeId: userId, limit });
    return hits.map((hit): Candidate => ({ profile: hit.payload, source: 'vector', similarity: hit.score }));
  }

  /**
   * Stores the vector computed for a requester that had none. Inactive
   * requesters never reach this, so they stay out of other members' hits.
   */
  private async backfill(userId: number, profile: Profile, vector: Vector): Promise<boolean> {
    try {
      await this.index.upsert(userId, vector, toSnapshot(profile));
      this.logger.info('Backfilled missing vector', { userId });
      return true;
    } catch (error) {
      this.logger.warn('Vector backfill failed, skipping semantic search', {
        userId,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
