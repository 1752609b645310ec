import { describe, it, expect, vi } from 'vitest';
import { resolveMatchingConfig } from '../src/config/matching-config.js';
import { HashingEmbeddingModel } from '../src/embedding/provider.js';
import { createMatchingEngine, withMatchingEngine } from '../src/engine.js';
import { SqliteProfileStore } from '../src/storage/sqlite-profile-store.js';
import type { ProfileSnapshot } from '../src/types/index.js';
import { IndexUnavailable } from '../src/utils/errors.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { MemoryVectorIndex } from '../src/vector/memory-vector-index.js';
import { answers, FakeOracle } from './helpers.js';

const config = resolveMatchingConfig();

function parts() {
  const logger = createSilentLogger();
  return {
    logger,
    store: new SqliteProfileStore({ path: ':memory:', logger }),
    index: new MemoryVectorIndex<ProfileSnapshot>({ dimension: config.embedding.dimension, logger }),
    oracle: new FakeOracle(),
  };
}

describe('createMatchingEngine', () => {
  it('should open, serve and close', async () => {
    const overrides = parts();
    const engine = createMatchingEngine(config, overrides);

    await engine.open();
    const saved = await engine.service.submitProfile(
      1,
      answers('Backend developer', 'Product designer', 'Code reviews')
    );
    expect(saved.status).toBe('saved');
    expect(await engine.service.stats()).toEqual({ profiles: 1, activeProfiles: 1, vectors: 1 });

    await engine.close();
    expect(overrides.logger.getAllLogs().some(entry => entry.message === 'Matching engine open')).toBe(true);
  });

  it('should close the store when the index cannot open', async () => {
    const overrides = parts();
    vi.spyOn(overrides.index, 'initialize').mockRejectedValueOnce(new IndexUnavailable('initialize', 'unreadable'));
    const closeStore = vi.spyOn(overrides.store, 'close');

    await expect(createMatchingEngine(config, overrides).open()).rejects.toThrow('unreadable');
    expect(closeStore).toHaveBeenCalledTimes(1);
  });

  it('should warn when the model dimension differs from configuration', () => {
    const overrides = { ...parts(), embeddingModel: new HashingEmbeddingModel(16) };
    createMatchingEngine(config, overrides);

    const warning = overrides.logger.getAllLogs().find(entry => entry.level === 'warn');
    expect(warning?.message).toBe('Embedding model dimension differs from configuration');
    expect(warning?.context).toEqual({ model: 'hashing', modelDimension: 16, configured: 384 });
  });
});

describe('withMatchingEngine', () => {
  it('should close the engine when the callback throws', async () => {
    const overrides = parts();
    const closeIndex = vi.spyOn(overrides.index, 'close');
    const closeStore = vi.spyOn(overrides.store, 'close');

    await expect(
      withMatchingEngine(config, async () => {
        throw new Error('boom');
      }, overrides)
    ).rejects.toThrow('boom');
    expect(closeIndex).toHaveBeenCalledTimes(1);
    expect(closeStore).toHaveBeenCalledTimes(1);
  });

  it('should resolve to the callback result', async () => {
    expect(await withMatchingEngine(config, async engine => engine.config.ranking.topK, parts())).toBe(5);
  });
});
