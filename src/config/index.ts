/**
 * Config Module
 *
 * @module Config
 */

export {
  DEFAULT_MATCHING_CONFIG,
  matchingConfigSchema,
  mergeLayers,
  parseMatchingConfig,
  resolveMatchingConfig,
  configFromEnvironment,
  loadMatchingConfig,
} from './matching-config.js';

export type {
  MatchingConfig,
  TextConfig,
  RetrievalConfig,
  RankingConfig,
  EmbeddingConfig,
  OracleConfig,
  StorageConfig,
  LoggingSettings,
  DeepPartial,
  LoadConfigOptions,
} from './matching-config.js';
