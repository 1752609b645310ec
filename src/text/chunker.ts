/**
 * Sentence-aware chunking with character overlap.
 *
 * @module TextChunker
 */

export interface ChunkOptions {
  /** Upper bound for a packed buffer, in characters */
  maxSize: number;
  /** Characters of the previous chunk carried into the next one */
  overlap: number;
}

/** Sentences with their terminators; a trailing fragment counts as one. */
const SENTENCE = /[^.!?]*[.!?]+|[^.!?]+$/g;

export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const match of text.matchAll(SENTENCE)) {
    const sentence = match[0].trim();
    if (sentence) {
      sentences.push(sentence);
    }
  }
  return sentences;
}

function validate({ maxSize, overlap }: ChunkOptions): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
    throw new RangeError(`overlap must be an integer in [0, maxSize), got ${overlap}`);
  }
}

/**
 * Greedy word packing for a sentence that does not fit on its own. Words
 * longer than `maxSize` are cut into `maxSize` pieces.
 */
function splitOversized(sentence: string, maxSize: number): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const word of sentence.split(/\s+/)) {
    for (let start = 0; start < word.length; start += maxSize) {
      const part = word.slice(start, start + maxSize);
      if (!current) {
        current = part;
      } else if (current.length + 1 + part.length > maxSize) {
        pieces.push(current);
        current = part;
      } else {
        current = `${current} ${part}`;
      }
    }
  }

  if (current) {
    pieces.push(current);
  }
  return pieces;
}

function overlapTail(buffer: string, overlap: number): string {
  if (overlap === 0) return '';
  return buffer.slice(-overlap).trimStart();
}

/**
 * Yields chunks of `text` lazily, in order. Input that already fits yields
 * the trimmed text as its only chunk.
 *
 * On overflow the current buffer is emitted and the next one starts with its
 * trailing `overlap` characters followed by the sentence that did not fit.
 * That carried tail is not counted when the sentence is admitted. Oversized
 * sentences are split on words with no overlap between their pieces; the
 * last piece stays open as the buffer.
 */
export function* iterateChunks(text: string, options: ChunkOptions): Generator<string, void, undefined> {
  validate(options);
  const { maxSize, overlap } = options;

  const trimmed = text.trim();
  if (!trimmed) return;

  if (trimmed.length <= maxSize) {
    yield trimmed;
    return;
  }

  let buffer = '';

  for (const sentence of splitSentences(trimmed)) {
    if (sentence.length > maxSize) {
      if (buffer) {
        yield buffer;
      }
      const pieces = splitOversized(sentence, maxSize);
      for (let i = 0; i < pieces.length - 1; i++) {
        yield pieces[i];
      }
      buffer = pieces[pieces.length - 1] ?? '';
      continue;
    }

    if (!buffer) {
      buffer = sentence;
    } else if (buffer.length + 1 + sentence.length <= maxSize) {
      buffer = `${buffer} ${sentence}`;
    } else {
      yield buffer;
      const tail = overlapTail(buffer, overlap);
      buffer = tail ? `${tail} ${sentence}` : sentence;
    }
  }

  if (buffer.trim()) {
    yield buffer.trim();
  }
}

export function chunkText(text: string, options: ChunkOptions): string[] {
  return [...iterateChunks(text, options)];
}
