/**
 * Profile text preparation
 *
 * Turns three raw answers into the normalized form used by every other
 * layer: cleaned answers, a labelled text for embedding, its chunks, and
 * keywords.
 *
 * @module ProfileText
 */

import type { ProfileAnswers } from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { chunkText } from './chunker.js';
import { extractKeywords, normalizeText, DEFAULT_MAX_KEYWORDS } from './normalizer.js';

export interface PrepareOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  /** Structured texts longer than this are chunked */
  chunkThreshold?: number;
  maxKeywords?: number;
  logger?: Logger;
}

export interface PreparedProfile {
  answers: ProfileAnswers;
  structuredText: string;
  keywords: string[];
  chunks: string[];
  totalLength: number;
}

export const DEFAULT_PREPARE_OPTIONS = {
  chunkSize: 1200,
  chunkOverlap: 150,
  chunkThreshold: 400,
  maxKeywords: DEFAULT_MAX_KEYWORDS,
} as const;

export function normalizeAnswers(answers: ProfileAnswers): ProfileAnswers {
  return {
    field: normalizeText(answers.field),
    seeking: normalizeText(answers.seeking),
    offering: normalizeText(answers.offering),
  };
}

export function buildStructuredText(answers: ProfileAnswers): string {
  return `field: ${answers.field}\nseeking: ${answers.seeking}\noffering: ${answers.offering}`;
}

export function prepareProfile(
  field: string,
  seeking: string,
  offering: string,
  options: PrepareOptions = {}
): PreparedProfile {
  const chunkSize = options.chunkSize ?? DEFAULT_PREPARE_OPTIONS.chunkSize;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_PREPARE_OPTIONS.chunkOverlap;
  const chunkThreshold = options.chunkThreshold ?? DEFAULT_PREPARE_OPTIONS.chunkThreshold;
  const maxKeywords = options.maxKeywords ?? DEFAULT_PREPARE_OPTIONS.maxKeywords;

  const answers = normalizeAnswers({ field, seeking, offering });
  const structuredText = buildStructuredText(answers);

  let chunks: string[];
  if (structuredText.length > chunkThreshold) {
    chunks = chunkText(structuredText, { maxSize: chunkSize, overlap: chunkOverlap });
    (options.logger ?? getLogger('text')).debug('Profile text chunked', {
      length: structuredText.length,
      chunks: chunks.length,
    });
  } else {
    chunks = [structuredText];
  }

  const keywords = extractKeywords(
    `${answers.field} ${answers.seeking} ${answers.offering}`,
    { limit: maxKeywords }
  );

  return {
    answers,
    structuredText,
    keywords,
    chunks,
    totalLength: structuredText.length,
  };
}

/**
 * Compact query built from the strongest keywords of each answer, what the
 * member seeks first.
 */
export function buildSearchQuery(answers: ProfileAnswers): string {
  const parts: string[] = [];

  const seeking = extractKeywords(answers.seeking, { limit: 3 });
  const field = extractKeywords(answers.field, { limit: 3 });
  const offering = extractKeywords(answers.offering, { limit: 3 });

  if (seeking.length > 0) parts.push(`Seeking: ${seeking.join(' ')}`);
  if (field.length > 0) parts.push(`Field: ${field.join(' ')}`);
  if (offering.length > 0) parts.push(`Offering: ${offering.join(' ')}`);

  return parts.join('. ');
}
