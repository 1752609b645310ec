/**
 * Engine assembly
 *
 * Builds every component once from a validated configuration and hands them
 * to each other explicitly. Nothing here is a module-level singleton: two
 * engines in one process do not share state.
 *
 * @module Engine
 */

import type { MatchingConfig } from './config/matching-config.js';
import { EmbeddingGenerator } from './embedding/embedding-generator.js';
import {
  HashingEmbeddingModel,
  OpenAICompatibleEmbeddingModel,
  type EmbeddingModel,
} from './embedding/provider.js';
import { OpenAICompatibleOracle, type ReasoningOracle } from './ranking/oracle.js';
import { RelevanceRanker } from './ranking/relevance-ranker.js';
import { CandidateRetriever } from './retrieval/candidate-retriever.js';
import { MatchService } from './service/match-service.js';
import type { ProfileStore } from './storage/profile-store.js';
import { SqliteProfileStore } from './storage/sqlite-profile-store.js';
import type { ProfileSnapshot } from './types/index.js';
import { profileSnapshotSchema } from './types/schemas.js';
import { createLogger, type Logger } from './utils/logger.js';
import { MemoryVectorIndex } from './vector/memory-vector-index.js';
import type { VectorIndex } from './vector/vector-index.js';

export interface EngineOverrides {
  store?: ProfileStore;
  index?: VectorIndex<ProfileSnapshot>;
  embeddingModel?: EmbeddingModel;
  oracle?: ReasoningOracle;
  logger?: Logger;
  clock?: () => number;
}

export interface MatchingEngine {
  readonly config: MatchingConfig;
  readonly logger: Logger;
  readonly store: ProfileStore;
  readonly index: VectorIndex<ProfileSnapshot>;
  readonly embeddings: EmbeddingGenerator;
  readonly retriever: CandidateRetriever;
  readonly ranker: RelevanceRanker;
  readonly service: MatchService;
  open(): Promise<void>;
  close(): Promise<void>;
}

function buildEmbeddingModel(config: MatchingConfig, logger: Logger): EmbeddingModel {
  const { embedding } = config;
  if (embedding.provider === 'hashing') {
    return new HashingEmbeddingModel(embedding.dimension);
  }
  return new OpenAICompatibleEmbeddingModel({
    baseUrl: embedding.baseUrl,
    model: embedding.model,
    dimension: embedding.dimension,
    apiKey: embedding.apiKey,
    timeoutMs: embedding.timeoutMs,
    logger,
  });
}

function buildIndex(config: MatchingConfig, logger: Logger): VectorIndex<ProfileSnapshot> {
  const { storage, embedding } = config;
  if (!storage.vectorIndexPath) {
    return new MemoryVectorIndex<ProfileSnapshot>({ dimension: embedding.dimension, logger });
  }
  return new MemoryVectorIndex<ProfileSnapshot>({
    dimension: embedding.dimension,
    persistencePath: storage.vectorIndexPath,
    payloadSchema: profileSnapshotSchema,
    autoSaveIntervalMs: storage.autoSaveIntervalMs,
    logger,
  });
}

export function createMatchingEngine(config: MatchingConfig, overrides: EngineOverrides = {}): MatchingEngine {
  const ownsLogger = overrides.logger === undefined;
  const logger =
    overrides.logger ??
    createLogger({
      name: 'profile-matcher',
      level: config.logging.level,
      format: config.logging.format,
      enableFile: config.logging.file !== undefined,
      filePath: config.logging.file,
    });

  const model = overrides.embeddingModel ?? buildEmbeddingModel(config, logger.forModule('embedding'));
  if (model.dimension !== config.embedding.dimension) {
    logger.warn('Embedding model dimension differs from configuration', {
      model: model.name,
      modelDimension: model.dimension,
      configured: config.embedding.dimension,
    });
  }

  const embeddings = new EmbeddingGenerator(model, {
    prepare: {
      chunkSize: config.text.chunkSize,
      chunkOverlap: config.text.chunkOverlap,
      chunkThreshold: config.text.chunkThreshold,
      maxKeywords: config.text.maxKeywords,
    },
    logger: logger.forModule('embedding'),
  });

  const store =
    overrides.store ??
    new SqliteProfileStore({
      path: config.storage.databasePath,
      clock: overrides.clock,
      logger: logger.forModule('store'),
    });

  const index = overrides.index ?? buildIndex(config, logger.forModule('vector'));

  const oracle =
    overrides.oracle ??
    new OpenAICompatibleOracle({
      baseUrl: config.oracle.baseUrl,
      model: config.oracle.model,
      apiKey: config.oracle.apiKey,
      logger: logger.forModule('oracle'),
    });

  const retriever = new CandidateRetriever({
    store,
    index,
    embeddings,
    settings: config.retrieval,
    logger: logger.forModule('retrieval'),
  });

  const ranker = new RelevanceRanker({
    oracle,
    settings: config.ranking,
    logger: logger.forModule('ranking'),
  });

  const service = new MatchService({
    store,
    index,
    embeddings,
    retriever,
    ranker,
    settings: {
      minAnswerLength: config.answers.minLength,
      maxAnswerLength: config.answers.maxLength,
      updateIntervalDays: config.updateIntervalDays,
    },
    clock: overrides.clock,
    logger: logger.forModule('service'),
  });

  let opened = false;

  return {
    config,
    logger,
    store,
    index,
    embeddings,
    retriever,
    ranker,
    service,

    async open(): Promise<void> {
      if (opened) return;
      await store.initialize();
      try {
        await index.initialize();
      } catch (error) {
        await store.close();
        throw error;
      }
      opened = true;
      logger.forModule('system').info('Matching engine open', {
        embedding: model.name,
        dimension: model.dimension,
      });
    },

    async close(): Promise<void> {
      if (!opened) return;
      opened = false;
      try {
        await index.close();
      } finally {
        await store.close();
        if (ownsLogger) {
          await logger.close();
        }
      }
    },
  };
}

/**
 * Opens an engine, runs `fn`, and always closes the engine afterwards.
 */
export async function withMatchingEngine<T>(
  config: MatchingConfig,
  fn: (engine: MatchingEngine) => Promise<T>,
  overrides: EngineOverrides = {}
): Promise<T> {
  const engine = createMatchingEngine(config, overrides);
  await engine.open();
  try {
    return await fn(engine);
  } finally {
    await engine.close();
  }
}
