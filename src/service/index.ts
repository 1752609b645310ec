export { MatchService, DEFAULT_SERVICE_SETTINGS } from './match-service.js';
export type {
  MatchServiceDeps,
  MatchServiceSettings,
  SubmitProfileResult,
  FindMatchesResult,
  DeleteProfileResult,
  RebuildReport,
  TextSearchHit,
  ServiceStats,
} from './match-service.js';
