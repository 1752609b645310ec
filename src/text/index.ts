export {
  normalizeText,
  extractKeywords,
  CYRILLIC_WORD,
  RUSSIAN_STOP_WORDS,
  DEFAULT_MAX_KEYWORDS,
} from './normalizer.js';
export type { KeywordOptions } from './normalizer.js';

export { chunkText, iterateChunks, splitSentences } from './chunker.js';
export type { ChunkOptions } from './chunker.js';

export {
  prepareProfile,
  normalizeAnswers,
  buildStructuredText,
  buildSearchQuery,
  DEFAULT_PREPARE_OPTIONS,
} from './profile-text.js';
export type { PrepareOptions, PreparedProfile } from './profile-text.js';
