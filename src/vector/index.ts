export { MemoryVectorIndex } from './memory-vector-index.js';
export type { MemoryVectorIndexOptions } from './memory-vector-index.js';
export type { VectorIndex, VectorRecord, VectorSearchQuery, VectorSearchHit } from './vector-index.js';
