import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EmbeddingGenerator } from '../src/embedding/embedding-generator.js';
import { CandidateRetriever, mergeCandidates, type RetrievalSettings } from '../src/retrieval/candidate-retriever.js';
import { SqliteProfileStore } from '../src/storage/sqlite-profile-store.js';
import { toSnapshot, type Profile, type ProfileSnapshot } from '../src/types/index.js';
import { EmbeddingUnavailable, IndexUnavailable } from '../src/utils/errors.js';
import { createSilentLogger, type Logger } from '../src/utils/logger.js';
import type { Vector } from '../src/utils/vector-math.js';
import { MemoryVectorIndex } from '../src/vector/memory-vector-index.js';
import { answers, candidate, FailingEmbeddingModel, StaticEmbeddingModel } from './helpers.js';

describe('mergeCandidates', () => {
  it('should keep the first occurrence and drop the requester', () => {
    const merged = mergeCandidates(
      [
        [candidate(1), candidate(9), candidate(2)],
        [candidate(2, 'vector'), candidate(3, 'vector')],
      ],
      9,
      10
    );

    expect(merged.map(found => [found.profile.userId, found.source])).toEqual([
      [1, 'keyword'],
      [2, 'keyword'],
      [3, 'vector'],
    ]);
  });

  it('should stop at the ceiling', () => {
    const merged = mergeCandidates([[candidate(1), candidate(2)], [candidate(3, 'vector')]], 9, 2);
    expect(merged.map(found => found.profile.userId)).toEqual([1, 2]);
  });
});

describe('CandidateRetriever', () => {
  const time = { now: 1000 };
  let logger: Logger;
  let store: SqliteProfileStore;
  let index: MemoryVectorIndex<ProfileSnapshot>;
  let requester: Profile;

  async function save(userId: number, at: number, field: string, keywords: string[] = []): Promise<Profile> {
    time.now = at;
    return store.saveProfile({ userId, answers: answers(field, 'seeking text', 'offering text'), keywords });
  }

  async function indexed(profile: Profile, vector: Vector): Promise<void> {
    await index.upsert(profile.userId, vector, toSnapshot(profile));
  }

  function retriever(vectorFor: (text: string) => Vector = () => [1, 0], settings: Partial<RetrievalSettings> = {}) {
    return new CandidateRetriever({
      store,
      index,
      embeddings: new EmbeddingGenerator(new StaticEmbeddingModel(2, vectorFor), { logger }),
      settings,
      logger,
    });
  }

  beforeEach(async () => {
    logger = createSilentLogger('retrieval');
    store = new SqliteProfileStore({ path: ':memory:', clock: () => time.now, logger });
    index = new MemoryVectorIndex<ProfileSnapshot>({ dimension: 2, logger });
    await store.initialize();
    await index.initialize();

    requester = await save(10, 500, 'Golang backend', ['golang']);
    const kw1 = await save(1, 1000, 'Golang tooling');
    const kw2 = await save(2, 2000, 'Golang courses');
    const vec1 = await save(3, 3000, 'Product design');

    await indexed(requester, [1, 0]);
    await indexed(vec1, [0.82, 0.5724]);
    await indexed(kw2, [0, 1]);
    expect(kw1.userId).toBe(1);
  });

  afterEach(async () => {
    await index.close();
    await store.close();
  });

  it('should list keyword hits first, then vector hits, each user once', async () => {
    const found = await retriever().retrieve(10, requester);

    expect(found.map(item => [item.profile.userId, item.source])).toEqual([
      [2, 'keyword'],
      [1, 'keyword'],
      [3, 'vector'],
    ]);
    expect(found[0].similarity).toBeUndefined();
    expect(found[2].similarity).toBeCloseTo(0.82, 3);
  });

  it('should never include the requester', async () => {
    await save(10, 4000, 'Golang backend', ['golang']);
    const found = await retriever().retrieve(10, requester);
    expect(found.some(item => item.profile.userId === 10)).toBe(false);
  });

  it('should cap the merged list', async () => {
    const found = await retriever(undefined, { candidateCeiling: 2 }).retrieve(10, requester);
    expect(found.map(item => item.profile.userId)).toEqual([2, 1]);
  });

  it('should only query the first keywords', async () => {
    const spy = vi.spyOn(store, 'findByKeywords');
    const profile = { ...requester, keywords: ['a', 'b', 'c', 'd', 'e', 'f'] };

    await retriever(undefined, { keywordQueryCount: 2 }).retrieve(10, profile, 7);
    expect(spy).toHaveBeenCalledWith({ keywords: ['a', 'b'], excludeUserId: 10, limit: 7 });
  });

  it('should backfill a missing requester vector', async () => {
    await index.delete(10);
    const found = await retriever(() => [1, 0]).retrieve(10, requester);

    expect(await index.retrieve(10)).toEqual({ id: 10, vector: [1, 0], payload: toSnapshot(requester) });
    expect(found.map(item => item.profile.userId)).toEqual([2, 1, 3]);
  });

  it('should search for an inactive requester without storing their vector', async () => {
    await index.delete(10);
    const inactive = { ...requester, active: false };

    const found = await retriever(() => [1, 0]).retrieve(10, inactive);
    expect(await index.retrieve(10)).toBeNull();
    expect(found.map(item => [item.profile.userId, item.source])).toEqual([
      [2, 'keyword'],
      [1, 'keyword'],
      [3, 'vector'],
    ]);
  });

  it('should query both sources at once', async () => {
    let open: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      open = resolve;
    });
    const findByKeywords = store.findByKeywords.bind(store);
    vi.spyOn(store, 'findByKeywords').mockImplementationOnce(async query => {
      await gate;
      return findByKeywords(query);
    });
    const lookup = vi.spyOn(index, 'retrieve');

    const pending = retriever().retrieve(10, requester);
    await vi.waitFor(() => {
      expect(lookup).toHaveBeenCalledWith(10);
    });
    open();

    expect((await pending).map(item => item.profile.userId)).toEqual([2, 1, 3]);
  });

  it('should skip semantic search when the backfill cannot be stored', async () => {
    await index.delete(10);
    vi.spyOn(index, 'upsert').mockRejectedValueOnce(new IndexUnavailable('upsert', 'index is read-only'));
    const search = vi.spyOn(index, 'search');

    const found = await retriever().retrieve(10, requester);
    expect(found.map(item => item.source)).toEqual(['keyword', 'keyword']);
    expect(search).not.toHaveBeenCalled();
  });

  it('should fall back to active profiles when the index is down', async () => {
    vi.spyOn(index, 'retrieve').mockRejectedValue(new IndexUnavailable('retrieve', 'connection refused'));

    const found = await retriever().retrieve(10, requester);
    expect(found.map(item => [item.profile.userId, item.source])).toEqual([
      [2, 'keyword'],
      [1, 'keyword'],
      [3, 'fallback'],
    ]);
  });

  it('should fall back when the embedding model is unavailable', async () => {
    await index.delete(10);
    const model = new FailingEmbeddingModel(2, new EmbeddingUnavailable('model offline'));
    const withFailingModel = new CandidateRetriever({
      store,
      index,
      embeddings: new EmbeddingGenerator(model, { logger }),
      logger,
    });

    const found = await withFailingModel.retrieve(10, requester);
    expect(model.calls).toBe(1);
    expect(found.map(item => item.source)).toEqual(['keyword', 'keyword', 'fallback']);
  });

  it('should treat a failing keyword search as no keyword hits', async () => {
    vi.spyOn(store, 'findByKeywords').mockRejectedValue(new Error('disk I/O error'));

    const found = await retriever().retrieve(10, requester);
    expect(found.map(item => [item.profile.userId, item.source])).toEqual([
      [3, 'vector'],
      [2, 'vector'],
    ]);
  });

  it('should resolve to an empty list when every source fails', async () => {
    vi.spyOn(store, 'findByKeywords').mockRejectedValue(new Error('disk I/O error'));
    vi.spyOn(store, 'listActive').mockRejectedValue(new Error('disk I/O error'));
    vi.spyOn(index, 'retrieve').mockRejectedValue(new IndexUnavailable('retrieve', 'connection refused'));

    await expect(retriever().retrieve(10, requester)).resolves.toEqual([]);
    expect(logger.getAllLogs().some(log => log.message === 'Falling back to active profile list')).toBe(true);
  });

  it('should skip a source whose limit is zero', async () => {
    const found = await retriever().retrieve(10, requester, 0, 0);
    expect(found).toEqual([]);
  });
});
