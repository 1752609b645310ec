/**
 * Relevance Ranker
 *
 * Asks the oracle to pick and explain the best candidates. Whatever the oracle
 * does, `rank` resolves: an unusable consultation falls back to the first
 * candidates in retrieval order with a neutral score.
 *
 * @module RelevanceRanker
 */

import type { Candidate, Match, ProfileSnapshot } from '../types/index.js';
import { OracleFailure, TimeoutError, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { OracleRequest, ReasoningOracle } from './oracle.js';
import { parseRankingReply, type OracleOutcome, type RankedEntry } from './oracle-response.js';
import { rankingPrompt, summaryPrompt, systemPrompt } from './prompts.js';

export interface RankingSettings {
  topK: number;
  temperature: number;
  maxTokens: number;
  summaryMaxTokens: number;
  timeoutMs: number;
  fallbackScore: number;
  fallbackReason: string;
  fallbackSummary: string;
  responseLanguage: string;
}

export const DEFAULT_RANKING_SETTINGS: RankingSettings = {
  topK: 5,
  temperature: 0.7,
  maxTokens: 700,
  summaryMaxTokens: 300,
  timeoutMs: 30000,
  fallbackScore: 5,
  fallbackReason: 'Подходящий кандидат',
  fallbackSummary: 'Вот подходящие контакты для знакомства! 🤝',
  responseLanguage: 'Russian',
};

export const MIN_SCORE = 1;
export const MAX_SCORE = 10;

export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

export interface RelevanceRankerDeps {
  oracle: ReasoningOracle;
  settings?: Partial<RankingSettings>;
  logger?: Logger;
}

export class RelevanceRanker {
  private readonly oracle: ReasoningOracle;
  private readonly settings: RankingSettings;
  private readonly logger: Logger;

  constructor(deps: RelevanceRankerDeps) {
    this.oracle = deps.oracle;
    this.settings = { ...DEFAULT_RANKING_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? getLogger('ranking');
  }

  async rank(
    profile: ProfileSnapshot,
    candidates: Candidate[],
    topK: number = this.settings.topK
  ): Promise<Match[]> {
    const wanted = Math.min(topK, candidates.length);
    if (wanted <= 0) {
      return [];
    }

    const outcome = await this.consult('ranking', {
      systemPrompt: systemPrompt(this.settings.responseLanguage),
      userPrompt: rankingPrompt(profile.answers, candidates, wanted, this.settings.responseLanguage),
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    });

    const parsed: OracleOutcome<RankedEntry[]> =
      outcome.kind === 'ok' ? parseRankingReply(outcome.value) : outcome;

    if (parsed.kind === 'ok') {
      const matches = this.selectMatches(parsed.value, candidates, wanted);
      if (matches.length > 0) {
        this.logger.info('Oracle ranking accepted', {
          userId: profile.userId,
          candidates: candidates.length,
          matches: matches.length,
          dropped: parsed.value.length - matches.length,
        });
        return matches;
      }
      this.logger.warn('Oracle ranking had no usable entry', { userId: profile.userId });
    } else {
      this.logger.warn('Oracle ranking unusable, using retrieval order', {
        userId: profile.userId,
        outcome: parsed.kind,
        ...(parsed.kind === 'parse_error' ? { raw: parsed.raw.slice(0, 500) } : {}),
      });
    }

    return this.fallback(candidates, wanted);
  }

  async summarize(profile: ProfileSnapshot, matches: Match[]): Promise<string> {
    if (matches.length === 0) {
      return this.settings.fallbackSummary;
    }

    const outcome = await this.consult('summary', {
      systemPrompt: systemPrompt(this.settings.responseLanguage),
      userPrompt: summaryPrompt(profile.answers, matches, this.settings.responseLanguage),
      temperature: this.settings.temperature,
      maxTokens: this.settings.summaryMaxTokens,
    });

    if (outcome.kind === 'ok') {
      const text = outcome.value.trim();
      if (text) {
        return text;
      }
    }

    this.logger.warn('Summary unavailable, using default text', { userId: profile.userId, outcome: outcome.kind });
    return this.settings.fallbackSummary;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /**
   * Trusts the oracle's order. Indices outside the candidate list and repeats
   * are dropped; scores are clamped.
   */
  private selectMatches(entries: RankedEntry[], candidates: Candidate[], wanted: number): Match[] {
    const used = new Set<number>();
    const matches: Match[] = [];

    for (const entry of entries) {
      if (matches.length >= wanted) break;

      const { candidateIndex } = entry;
      if (candidateIndex < 1 || candidateIndex > candidates.length || used.has(candidateIndex)) {
        continue;
      }
      used.add(candidateIndex);

      matches.push({
        candidate: candidates[candidateIndex - 1],
        candidateIndex,
        score: clampScore(entry.score),
        reason: entry.reason ?? this.settings.fallbackReason,
      });
    }

    return matches;
  }

  private fallback(candidates: Candidate[], wanted: number): Match[] {
    return candidates.slice(0, wanted).map((candidate, i) => ({
      candidate,
      candidateIndex: i + 1,
      score: this.settings.fallbackScore,
      reason: this.settings.fallbackReason,
    }));
  }

  private async consult(
    purpose: string,
    request: Omit<OracleRequest, 'signal'>
  ): Promise<OracleOutcome<string>> {
    try {
      const text = await this.logger.time(`oracle ${purpose}`, () =>
        withTimeout(`oracle ${purpose}`, this.settings.timeoutMs, signal =>
          this.oracle.complete({ ...request, signal })
        )
      );
      return { kind: 'ok', value: text };
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { kind: 'timeout', timeoutMs: error.timeoutMs };
      }
      if (error instanceof OracleFailure && error.kind === 'malformed') {
        return { kind: 'parse_error', reason: error.message, raw: '' };
      }
      if (error instanceof OracleFailure && error.kind === 'timeout') {
        return { kind: 'timeout', timeoutMs: this.settings.timeoutMs };
      }
      return { kind: 'transport_error', reason: errorMessage(error) };
    }
  }
}
