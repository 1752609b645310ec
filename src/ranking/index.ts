export { RelevanceRanker, DEFAULT_RANKING_SETTINGS, clampScore, MIN_SCORE, MAX_SCORE } from './relevance-ranker.js';
export type { RankingSettings, RelevanceRankerDeps } from './relevance-ranker.js';

export { OpenAICompatibleOracle } from './oracle.js';
export type { ReasoningOracle, OracleRequest, OpenAICompatibleOracleOptions } from './oracle.js';

export { parseRankingReply, stripCodeFences } from './oracle-response.js';
export type { OracleOutcome, RankedEntry } from './oracle-response.js';

export { systemPrompt, rankingPrompt, summaryPrompt } from './prompts.js';
