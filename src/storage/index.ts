export { SqliteProfileStore } from './sqlite-profile-store.js';
export type { SqliteProfileStoreOptions } from './sqlite-profile-store.js';
export type {
  ProfileStore,
  SaveProfileInput,
  KeywordQuery,
  ListActiveOptions,
} from './profile-store.js';
