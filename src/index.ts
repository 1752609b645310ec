/**
 * profile-matcher
 *
 * Candidate retrieval and ranking for community member profiles.
 *
 * ```typescript
 * import { loadMatchingConfig, withMatchingEngine } from 'profile-matcher';
 *
 * const config = await loadMatchingConfig();
 * await withMatchingEngine(config, async (engine) => {
 *   await engine.service.submitProfile(42, {
 *     field: 'Backend developer',
 *     seeking: 'co-founder',
 *     offering: 'mentoring',
 *   });
 *   const result = await engine.service.findMatches(42);
 * });
 * ```
 *
 * @packageDocumentation
 */

// ============================================
// Engine
// ============================================
export { createMatchingEngine, withMatchingEngine } from './engine.js';
export type { MatchingEngine, EngineOverrides } from './engine.js';

// ============================================
// Components
// ============================================
export * from './config/index.js';
export * from './text/index.js';
export * from './embedding/index.js';
export * from './storage/index.js';
export * from './vector/index.js';
export * from './retrieval/index.js';
export * from './ranking/index.js';
export * from './service/index.js';

// ============================================
// Domain types
// ============================================
export { toSnapshot, displayName } from './types/index.js';
export type {
  ProfileAnswers,
  MemberInfo,
  Profile,
  ProfileSnapshot,
  ProfileHistoryEntry,
  Candidate,
  CandidateSource,
  Match,
} from './types/index.js';
export { memberInfoSchema, profileAnswersSchema, profileSnapshotSchema } from './types/schemas.js';

// ============================================
// Utilities
// ============================================
export {
  MatchError,
  EmbeddingUnavailable,
  IndexUnavailable,
  StoreFailure,
  OracleFailure,
  ValidationError,
  TimeoutError,
  ConfigError,
  ErrorCodes,
  isMatchError,
  errorMessage,
  toMatchError,
  safeExecute,
} from './utils/errors.js';
export type { ErrorCodeType, OracleFailureKind, SafeResult } from './utils/errors.js';

export {
  Logger,
  MemoryTransport,
  createLogger,
  createSilentLogger,
  getLogger,
} from './utils/logger.js';
export type { LogLevel, LogModule, LogFormat, LoggerConfig, LogEntry, LogTransport } from './utils/logger.js';

export { withTimeout } from './utils/timeout.js';
export { UserGuard } from './utils/user-guard.js';
export { cosineSimilarity, normalizeVector, meanVector, dotProduct, l2Norm } from './utils/vector-math.js';
export type { Vector } from './utils/vector-math.js';

export { runCli } from './cli/index.js';
