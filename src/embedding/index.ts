export { EmbeddingGenerator } from './embedding-generator.js';
export type { EmbeddingGeneratorOptions } from './embedding-generator.js';

export { OpenAICompatibleEmbeddingModel, HashingEmbeddingModel } from './provider.js';
export type { EmbeddingModel, OpenAICompatibleEmbeddingOptions } from './provider.js';
