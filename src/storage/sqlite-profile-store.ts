/**
 * SQLite-backed profile store on better-sqlite3.
 *
 * Answers are kept as written plus a lower-cased `search_text` column, so a
 * keyword lookup is a plain `instr()` over one column. better-sqlite3 is
 * synchronous; the async surface matches the `ProfileStore` contract.
 *
 * @module SqliteProfileStore
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { MemberInfo, Profile, ProfileHistoryEntry } from '../types/index.js';
import { StoreFailure, isMatchError, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type {
  KeywordQuery,
  ListActiveOptions,
  ProfileStore,
  SaveProfileInput,
} from './profile-store.js';

// ============================================================================
// Row types
// ============================================================================

interface ProfileRow {
  user_id: number;
  field: string;
  seeking: string;
  offering: string;
  keywords: string;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  is_active: number;
  created_at: number;
  updated_at: number;
}

interface HistoryRow {
  user_id: number;
  field: string;
  seeking: string;
  offering: string;
  keywords: string;
  archived_at: number;
}

interface CountRow {
  total: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS profiles (
    user_id     INTEGER PRIMARY KEY,
    field       TEXT NOT NULL,
    seeking     TEXT NOT NULL,
    offering    TEXT NOT NULL,
    search_text TEXT NOT NULL,
    keywords    TEXT NOT NULL DEFAULT '[]',
    username    TEXT,
    first_name  TEXT,
    last_name   TEXT,
    is_active   INTEGER NOT NULL DEFAULT 1,
    created_at  INTEGER NOT NULL,
    updated_at  INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_profiles_active_updated
    ON profiles (is_active, updated_at);

  CREATE TABLE IF NOT EXISTS profile_history (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id     INTEGER NOT NULL REFERENCES profiles (user_id) ON DELETE CASCADE,
    field       TEXT NOT NULL,
    seeking     TEXT NOT NULL,
    offering    TEXT NOT NULL,
    keywords    TEXT NOT NULL DEFAULT '[]',
    archived_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_history_user_id ON profile_history (user_id);
`;

const PROFILE_COLUMNS = `
  user_id, field, seeking, offering, keywords,
  username, first_name, last_name, is_active, created_at, updated_at
`;

const keywordsSchema = z.array(z.string());

// ============================================================================
// Store
// ============================================================================

export interface SqliteProfileStoreOptions {
  /** File path, or `:memory:` */
  path: string;
  /** Epoch-ms clock; injectable for tests */
  clock?: () => number;
  logger?: Logger;
}

export class SqliteProfileStore implements ProfileStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(options: SqliteProfileStoreOptions) {
    this.dbPath = options.path;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? getLogger('store');
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    this.run('initialize', () => {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
      }
      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.exec(SCHEMA);
      this.db = db;
    });

    this.logger.info('Profile store ready', { path: this.dbPath });
  }

  async close(): Promise<void> {
    if (!this.db) return;
    const db = this.db;
    this.db = null;
    this.run('close', () => db.close());
  }

  async saveProfile(input: SaveProfileInput): Promise<Profile> {
    return this.run('saveProfile', () => {
      const db = this.connection();
      const now = this.clock();
      const { answers } = input;
      const searchText = [answers.field, answers.seeking, answers.offering].join('\n').toLowerCase();
      const member = input.member ?? {};

      const save = db.transaction(() => {
        const existing = db
          .prepare<[number], ProfileRow>(`SELECT ${PROFILE_COLUMNS} FROM profiles WHERE user_id = ?`)
          .get(input.userId);

        if (existing) {
          db.prepare(
            `INSERT INTO profile_history (user_id, field, seeking, offering, keywords, archived_at)
             VALUES (?, ?, ?, ?, ?, ?)`
          ).run(existing.user_id, existing.field, existing.seeking, existing.offering, existing.keywords, now);

          db.prepare(
            `UPDATE profiles
                SET field = ?, seeking = ?, offering = ?, search_text = ?, keywords = ?,
                    username = coalesce(?, username),
                    first_name = coalesce(?, first_name),
                    last_name = coalesce(?, last_name),
                    updated_at = ?
              WHERE user_id = ?`
          ).run(
            answers.field,
            answers.seeking,
            answers.offering,
            searchText,
            JSON.stringify(input.keywords),
            member.username ?? null,
            member.firstName ?? null,
            member.lastName ?? null,
            now,
            input.userId
          );
        } else {
          db.prepare(
            `INSERT INTO profiles (
               user_id, field, seeking, offering, search_text, keywords,
               username, first_name, last_name, is_active, created_at, updated_at
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`
          ).run(
            input.userId,
            answers.field,
            answers.seeking,
            answers.offering,
            searchText,
            JSON.stringify(input.keywords),
            member.username ?? null,
            member.firstName ?? null,
            member.lastName ?? null,
            now,
            now
          );
        }

        const saved = db
          .prepare<[number], ProfileRow>(`SELECT ${PROFILE_COLUMNS} FROM profiles WHERE user_id = ?`)
          .get(input.userId);
        if (!saved) {
          throw new StoreFailure('saveProfile', `Profile ${input.userId} missing after write`);
        }
        return { row: saved, updated: existing !== undefined };
      });

      const { row, updated } = save();
      this.logger.debug(updated ? 'Profile updated' : 'Profile created', { userId: input.userId });
      return toProfile(row);
    });
  }

  async getProfile(userId: number): Promise<Profile | null> {
    return this.run('getProfile', () => {
      const row = this.connection()
        .prepare<[number], ProfileRow>(`SELECT ${PROFILE_COLUMNS} FROM profiles WHERE user_id = ?`)
        .get(userId);
      return row ? toProfile(row) : null;
    });
  }

  async findByKeywords(query: KeywordQuery): Promise<Profile[]> {
    const keywords = query.keywords.filter(keyword => keyword.length > 0);
    if (keywords.length === 0 || query.limit <= 0) {
      return [];
    }

    return this.run('findByKeywords', () => {
      const matchAny = keywords.map(() => 'instr(search_text, ?) > 0').join(' OR ');
      const rows = this.connection()
        .prepare<unknown[], ProfileRow>(
          `SELECT ${PROFILE_COLUMNS} FROM profiles
            WHERE is_active = 1 AND user_id != ? AND (${matchAny})
            ORDER BY updated_at DESC, user_id DESC
            LIMIT ?`
        )
        .all(query.excludeUserId, ...keywords, query.limit);
      return rows.map(toProfile);
    });
  }

  async listActive(options: ListActiveOptions = {}): Promise<Profile[]> {
    return this.run('listActive', () => {
      const params: number[] = [];
      let where = 'is_active = 1';
      if (options.excludeUserId !== undefined) {
        where += ' AND user_id != ?';
        params.push(options.excludeUserId);
      }
      // -1 disables the limit in SQLite
      params.push(options.limit ?? -1);

      const rows = this.connection()
        .prepare<number[], ProfileRow>(
          `SELECT ${PROFILE_COLUMNS} FROM profiles
            WHERE ${where}
            ORDER BY updated_at DESC, user_id DESC
            LIMIT ?`
        )
        .all(...params);
      return rows.map(toProfile);
    });
  }

  async listDueForUpdate(olderThan: number): Promise<Profile[]> {
    return this.run('listDueForUpdate', () => {
      const rows = this.connection()
        .prepare<[number], ProfileRow>(
          `SELECT ${PROFILE_COLUMNS} FROM profiles
            WHERE is_active = 1 AND updated_at < ?
            ORDER BY updated_at ASC, user_id ASC`
        )
        .all(olderThan);
      return rows.map(toProfile);
    });
  }

  async getHistory(userId: number): Promise<ProfileHistoryEntry[]> {
    return this.run('getHistory', () => {
      const rows = this.connection()
        .prepare<[number], HistoryRow>(
          `SELECT user_id, field, seeking, offering, keywords, archived_at
             FROM profile_history
            WHERE user_id = ?
            ORDER BY archived_at DESC, id DESC`
        )
        .all(userId);
      return rows.map(row => ({
        userId: row.user_id,
        answers: { field: row.field, seeking: row.seeking, offering: row.offering },
        keywords: parseKeywords(row.keywords),
        archivedAt: row.archived_at,
      }));
    });
  }

  async setActive(userId: number, active: boolean): Promise<boolean> {
    return this.run('setActive', () => {
      const result = this.connection()
        .prepare('UPDATE profiles SET is_active = ? WHERE user_id = ?')
        .run(active ? 1 : 0, userId);
      return result.changes > 0;
    });
  }

  async deleteProfile(userId: number): Promise<boolean> {
    return this.run('deleteProfile', () => {
      const result = this.connection().prepare('DELETE FROM profiles WHERE user_id = ?').run(userId);
      if (result.changes > 0) {
        this.logger.info('Profile deleted', { userId });
      }
      return result.changes > 0;
    });
  }

  async count(options: { activeOnly?: boolean } = {}): Promise<number> {
    return this.run('count', () => {
      const sql = options.activeOnly
        ? 'SELECT count(*) AS total FROM profiles WHERE is_active = 1'
        : 'SELECT count(*) AS total FROM profiles';
      const row = this.connection().prepare<[], CountRow>(sql).get();
      return row?.total ?? 0;
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private connection(): Database.Database {
    if (!this.db) {
      throw new StoreFailure('connection', 'Profile store is not initialized');
    }
    return this.db;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isMatchError(error)) {
        throw error;
      }
      this.logger.error(`Store operation ${operation} failed`, { error: errorMessage(error) });
      throw new StoreFailure(operation, errorMessage(error), { cause: error });
    }
  }
}

function parseKeywords(raw: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new StoreFailure('parseKeywords', 'Stored keywords are not valid JSON', { cause: error });
  }
  const parsed = keywordsSchema.safeParse(value);
  if (!parsed.success) {
    throw new StoreFailure('parseKeywords', 'Stored keywords are not a string list');
  }
  return parsed.data;
}

function toMember(row: ProfileRow): MemberInfo {
  const member: MemberInfo = {};
  if (row.username !== null) member.username = row.username;
  if (row.first_name !== null) member.firstName = row.first_name;
  if (row.last_name !== null) member.lastName = row.last_name;
  return member;
}

function toProfile(row: ProfileRow): Profile {
  return {
    userId: row.user_id,
    answers: { field: row.field, seeking: row.seeking, offering: row.offering },
    keywords: parseKeywords(row.keywords),
    member: toMember(row),
    active: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
