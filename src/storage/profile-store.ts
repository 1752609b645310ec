/**
 * Lexical profile store contract
 *
 * @module ProfileStore
 */

import type { MemberInfo, Profile, ProfileAnswers, ProfileHistoryEntry } from '../types/index.js';

export interface SaveProfileInput {
  userId: number;
  /** Normalized answers */
  answers: ProfileAnswers;
  keywords: string[];
  /** Fields left undefined keep their stored value */
  member?: MemberInfo;
}

export interface KeywordQuery {
  keywords: string[];
  excludeUserId: number;
  limit: number;
}

export interface ListActiveOptions {
  excludeUserId?: number;
  limit?: number;
}

/**
 * Every method rejects with `StoreFailure` when the backing store fails.
 */
export interface ProfileStore {
  initialize(): Promise<void>;
  close(): Promise<void>;

  /**
   * Inserts or replaces the profile of `input.userId`. The answers being
   * replaced are archived to history in the same transaction. The active
   * flag and creation time of an existing profile are kept.
   */
  saveProfile(input: SaveProfileInput): Promise<Profile>;
  getProfile(userId: number): Promise<Profile | null>;

  /**
   * Active profiles whose answers contain any of `keywords`, most recently
   * updated first.
   */
  findByKeywords(query: KeywordQuery): Promise<Profile[]>;
  listActive(options?: ListActiveOptions): Promise<Profile[]>;
  /** Active profiles last updated before `olderThan` (epoch ms), oldest first */
  listDueForUpdate(olderThan: number): Promise<Profile[]>;

  getHistory(userId: number): Promise<ProfileHistoryEntry[]>;
  /** Resolves to false when there is no such profile */
  setActive(userId: number, active: boolean): Promise<boolean>;
  /** Removes the profile and its history; false when there was none */
  deleteProfile(userId: number): Promise<boolean>;
  count(options?: { activeOnly?: boolean }): Promise<number>;
}
