export { CandidateRetriever, mergeCandidates, DEFAULT_RETRIEVAL_SETTINGS } from './candidate-retriever.js';
export type { CandidateRetrieverDeps, RetrievalSettings } from './candidate-retriever.js';
