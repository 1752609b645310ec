/**
 * Text normalization and keyword extraction
 *
 * @module TextNormalizer
 */

// ============================================================================
// Normalization
// ============================================================================

/**
 * Anything that is not a letter, digit, underscore, whitespace, basic
 * punctuation or a quote mark.
 */
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s.,!?;:\-()«»"“”„]/gu;

const WHITESPACE_RUN = /\s+/g;

/**
 * Strips disallowed characters, collapses whitespace runs to a single space
 * and trims. Never throws; empty input yields an empty string.
 */
export function normalizeText(text: string): string {
  if (!text) {
    return '';
  }
  return text.replace(DISALLOWED_CHARS, '').replace(WHITESPACE_RUN, ' ').trim();
}

// ============================================================================
// Keywords
// ============================================================================

/**
 * Whole words of at least three Cyrillic letters. A match touching any other
 * letter, digit or underscore is not a whole word.
 */
export const CYRILLIC_WORD = /(?<![\p{L}\p{N}_])[а-яё]{3,}(?![\p{L}\p{N}_])/gu;

export const RUSSIAN_STOP_WORDS: ReadonlySet<string> = new Set([
  'это', 'что', 'как', 'для', 'или', 'при', 'все', 'еще', 'уже',
  'где', 'кто', 'чем', 'том', 'тем', 'так', 'был', 'была', 'было',
  'есть', 'быть', 'мне', 'нас', 'вас', 'них', 'его', 'её', 'их',
  'могу', 'можем', 'можете', 'могут', 'хочу', 'хотим', 'хотите', 'хотят',
]);

export const DEFAULT_MAX_KEYWORDS = 10;

export interface KeywordOptions {
  /** Token pattern, applied to the lower-cased text */
  pattern?: RegExp;
  stopWords?: ReadonlySet<string>;
  limit?: number;
}

function globalPattern(pattern: RegExp): RegExp {
  return pattern.global ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
}

/**
 * Most frequent distinct tokens of `text`, ties broken by first occurrence.
 */
export function extractKeywords(text: string, options: KeywordOptions = {}): string[] {
  const limit = options.limit ?? DEFAULT_MAX_KEYWORDS;
  if (!text || limit <= 0) {
    return [];
  }

  const stopWords = options.stopWords ?? RUSSIAN_STOP_WORDS;
  const pattern = globalPattern(options.pattern ?? CYRILLIC_WORD);

  const counts = new Map<string, number>();
  for (const match of text.toLowerCase().matchAll(pattern)) {
    const token = match[0];
    if (stopWords.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  // Map keeps insertion order and sort is stable, so equal counts stay in
  // first-seen order.
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([token]) => token);
}
