import { describe, it, expect } from 'vitest';
import { extractKeywords, normalizeText, RUSSIAN_STOP_WORDS } from '../src/text/normalizer.js';

describe('normalizeText', () => {
  it('should drop emoji and collapse the gap they leave', () => {
    expect(normalizeText('Hello 🚀 world!!')).toBe('Hello world!!');
  });

  it('should collapse whitespace runs and trim', () => {
    expect(normalizeText('  a\t\n b  ')).toBe('a b');
  });

  it('should strip symbols outside the permitted set', () => {
    expect(normalizeText('#tag @me & co')).toBe('tag me co');
  });

  it('should keep guillemets and hyphens but not dashes', () => {
    expect(normalizeText('«Привет», — мир-труд')).toBe('«Привет», мир-труд');
  });

  it('should return an empty string for empty input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('🙂🙂')).toBe('');
  });
});

describe('extractKeywords', () => {
  it('should order by frequency, ties by first occurrence', () => {
    const keywords = extractKeywords('Ищу разработчика, разработчика и дизайнера для проекта');
    expect(keywords).toEqual(['разработчика', 'ищу', 'дизайнера', 'проекта']);
  });

  it('should drop stop words and short words', () => {
    expect(RUSSIAN_STOP_WORDS.has('для')).toBe(true);
    expect(extractKeywords('для нас и он')).toEqual([]);
  });

  it('should ignore words outside the Cyrillic alphabet', () => {
    expect(extractKeywords('Golang разработчик')).toEqual(['разработчик']);
  });

  it('should only count whole words', () => {
    expect(extractKeywords('абвgде слово_подчерк')).toEqual([]);
  });

  it('should count case-insensitively', () => {
    expect(extractKeywords('ПРОЕКТ проект Ёлка')).toEqual(['проект', 'ёлка']);
  });

  it('should respect the limit', () => {
    expect(extractKeywords('один два три четыре', { limit: 2 })).toEqual(['один', 'два']);
    expect(extractKeywords('один два', { limit: 0 })).toEqual([]);
  });

  it('should return at most ten keywords by default', () => {
    const words = ['альфа', 'бета', 'гамма', 'дельта', 'эпсилон', 'дзета', 'эта', 'тета', 'йота', 'каппа', 'лямбда', 'мю'];
    expect(extractKeywords(words.join(' '))).toEqual(words.slice(0, 10));
  });

  it('should accept a custom token pattern without the global flag', () => {
    const keywords = extractKeywords('Node node rust go', { pattern: /[a-z]{3,}/, stopWords: new Set() });
    expect(keywords).toEqual(['node', 'rust']);
  });

  it('should be deterministic', () => {
    const text = 'маркетинг продажи маркетинг стартап продажи';
    expect(extractKeywords(text)).toEqual(extractKeywords(text));
    expect(extractKeywords(text)).toEqual(['маркетинг', 'продажи', 'стартап']);
  });
});
