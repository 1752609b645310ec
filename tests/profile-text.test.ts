import { describe, it, expect } from 'vitest';
import {
  buildSearchQuery,
  buildStructuredText,
  normalizeAnswers,
  prepareProfile,
} from '../src/text/profile-text.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { answers } from './helpers.js';

describe('prepareProfile', () => {
  it('should keep a short profile in one chunk', () => {
    const prepared = prepareProfile('Backend developer', 'co-founder', 'mentoring');
    const structured = 'field: Backend developer\nseeking: co-founder\noffering: mentoring';

    expect(prepared.answers).toEqual(answers('Backend developer', 'co-founder', 'mentoring'));
    expect(prepared.structuredText).toBe(structured);
    expect(prepared.chunks).toEqual([structured]);
    expect(prepared.totalLength).toBe(64);
    expect(prepared.keywords.length).toBeLessThanOrEqual(10);
  });

  it('should normalize each answer before labelling', () => {
    const prepared = prepareProfile('  Дизайн 🎨 ', 'Ищу\nпартнёра', 'Помогу с UX!');
    expect(prepared.answers).toEqual(answers('Дизайн', 'Ищу партнёра', 'Помогу с UX!'));
    expect(prepared.structuredText).toBe('field: Дизайн\nseeking: Ищу партнёра\noffering: Помогу с UX!');
  });

  it('should take keywords from the answers, not the labels', () => {
    const prepared = prepareProfile('Маркетинг и продажи', 'Ищу партнёра для стартапа', 'Помогу с маркетингом');
    expect(prepared.keywords).toEqual(['маркетинг', 'продажи', 'ищу', 'партнёра', 'стартапа', 'помогу', 'маркетингом']);
  });

  it('should chunk text longer than the threshold', () => {
    const logger = createSilentLogger('text');
    const prepared = prepareProfile('Backend developer', 'co-founder', 'mentoring', {
      chunkThreshold: 20,
      chunkSize: 40,
      chunkOverlap: 0,
      logger,
    });

    expect(prepared.chunks).toEqual(['field: Backend developer seeking:', 'co-founder offering: mentoring']);
    const entry = logger.getAllLogs().find(log => log.message === 'Profile text chunked');
    expect(entry?.context).toEqual({ length: 64, chunks: 2 });
  });

  it('should honour the keyword limit', () => {
    const prepared = prepareProfile('альфа бета гамма', 'дельта эпсилон', 'дзета', { maxKeywords: 2 });
    expect(prepared.keywords).toEqual(['альфа', 'бета']);
  });
});

describe('structured text helpers', () => {
  it('should label the three answers in order', () => {
    expect(buildStructuredText(answers('a', 'b', 'c'))).toBe('field: a\nseeking: b\noffering: c');
  });

  it('should normalize every answer', () => {
    expect(normalizeAnswers(answers(' a  b ', '#x', 'ok!'))).toEqual(answers('a b', 'x', 'ok!'));
  });
});

describe('buildSearchQuery', () => {
  it('should list seeking keywords first', () => {
    const query = buildSearchQuery(answers('Маркетинг и продажи', 'Ищу партнёра для стартапа', 'Помогу с маркетингом'));
    expect(query).toBe('Seeking: ищу партнёра стартапа. Field: маркетинг продажи. Offering: помогу маркетингом');
  });

  it('should be empty when no answer has keywords', () => {
    expect(buildSearchQuery(answers('Backend developer', 'co-founder', 'mentoring'))).toBe('');
  });
});
