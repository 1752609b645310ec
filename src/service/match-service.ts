/**
 * Match Service
 *
 * Orchestrates the profile lifecycle and match requests on top of the store,
 * the vector index, the retriever and the ranker.
 *
 * Work for one user is serialized by an in-process guard: a second member
 * request for a user already in flight is answered with `busy` and not
 * queued, while admin operations wait for the user's slot.
 *
 * @module MatchService
 */

import { v4 as uuidv4 } from 'uuid';
import type { EmbeddingGenerator } from '../embedding/embedding-generator.js';
import type { RelevanceRanker } from '../ranking/relevance-ranker.js';
import type { CandidateRetriever } from '../retrieval/candidate-retriever.js';
import type { ProfileStore } from '../storage/profile-store.js';
import { buildSearchQuery } from '../text/profile-text.js';
import {
  toSnapshot,
  type Match,
  type MemberInfo,
  type Profile,
  type ProfileAnswers,
  type ProfileSnapshot,
} from '../types/index.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { UserGuard } from '../utils/user-guard.js';
import type { Vector } from '../utils/vector-math.js';
import type { VectorIndex } from '../vector/vector-index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Types
// ============================================================================

export interface MatchServiceSettings {
  minAnswerLength: number;
  maxAnswerLength: number;
  updateIntervalDays: number;
}

export const DEFAULT_SERVICE_SETTINGS: MatchServiceSettings = {
  minAnswerLength: 10,
  maxAnswerLength: 2000,
  updateIntervalDays: 30,
};

export interface MatchServiceDeps {
  store: ProfileStore;
  index: VectorIndex<ProfileSnapshot>;
  embeddings: EmbeddingGenerator;
  retriever: CandidateRetriever;
  ranker: RelevanceRanker;
  settings?: Partial<MatchServiceSettings>;
  guard?: UserGuard;
  clock?: () => number;
  logger?: Logger;
}

export type SubmitProfileResult =
  | { status: 'saved'; profile: Profile; created: boolean; vectorIndexed: boolean }
  | { status: 'busy' };

export type FindMatchesResult =
  | { status: 'matched'; requestId: string; matches: Match[]; summary: string }
  | { status: 'no_matches'; requestId: string }
  | { status: 'no_profile'; requestId: string }
  | { status: 'busy'; requestId: string };

export interface DeleteProfileResult {
  profileRemoved: boolean;
  vectorRemoved: boolean;
}

export interface RebuildReport {
  total: number;
  rebuilt: number;
  skipped: number;
  failed: number;
}

export interface TextSearchHit {
  userId: number;
  score: number;
  profile: ProfileSnapshot;
}

export interface ServiceStats {
  profiles: number;
  activeProfiles: number;
  vectors: number;
}

const ANSWER_FIELDS: ReadonlyArray<keyof ProfileAnswers> = ['field', 'seeking', 'offering'];

// ============================================================================
// Service
// ============================================================================

export class MatchService {
  private readonly store: ProfileStore;
  private readonly index: VectorIndex<ProfileSnapshot>;
  private readonly embeddings: EmbeddingGenerator;
  private readonly retriever: CandidateRetriever;
  private readonly ranker: RelevanceRanker;
  private readonly settings: MatchServiceSettings;
  private readonly guard: UserGuard;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(deps: MatchServiceDeps) {
    this.store = deps.store;
    this.index = deps.index;
    this.embeddings = deps.embeddings;
    this.retriever = deps.retriever;
    this.ranker = deps.ranker;
    this.settings = { ...DEFAULT_SERVICE_SETTINGS, ...deps.settings };
    this.guard = deps.guard ?? new UserGuard();
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? getLogger('service');
  }

  /**
   * Creates or replaces a profile. The vector is computed before anything is
   * written, so `EmbeddingUnavailable` leaves the previous state untouched.
   *
   * @throws ValidationError when an answer is too short or too long
   * @throws EmbeddingUnavailable when the model cannot be reached
   * @throws StoreFailure when the profile cannot be saved
   */
  async submitProfile(userId: number, answers: ProfileAnswers, member?: MemberInfo): Promise<SubmitProfileResult> {
    const run = await this.guard.run(userId, async (): Promise<SubmitProfileResult> => {
      const prepared = this.embeddings.prepare(answers.field, answers.seeking, answers.offering);
      this.validateAnswers(prepared.answers);

      const vector = await this.embeddings.embedPrepared(prepared);

      const previous = await this.store.getProfile(userId);
      const profile = await this.store.saveProfile({
        userId,
        answers: prepared.answers,
        keywords: prepared.keywords,
        member,
      });

      const vectorIndexed = profile.active ? await this.indexProfile(profile, vector) : false;

      this.logger.info(previous ? 'Profile updated' : 'Profile created', {
        userId,
        keywords: profile.keywords.length,
        chunks: prepared.chunks.length,
        vectorIndexed,
      });
      return { status: 'saved', profile, created: previous === null, vectorIndexed };
    });

    if (!run.acquired) {
      this.logger.debug('Profile submission dropped, user busy', { userId });
      return { status: 'busy' };
    }
    return run.value;
  }

  /**
   * Retrieves, ranks and summarizes matches. Internal failures end in
   * `no_matches`; their details only go to the log.
   */
  async findMatches(userId: number, options: { topK?: number } = {}): Promise<FindMatchesResult> {
    const requestId = uuidv4();
    const log = this.logger.child({ requestId, userId });

    const run = await this.guard.run(userId, async (): Promise<FindMatchesResult> => {
      try {
        const profile = await this.store.getProfile(userId);
        if (!profile) {
          log.info('Match request without profile');
          return { status: 'no_profile', requestId };
        }
        if (!profile.active) {
          log.info('Match request from inactive profile');
          return { status: 'no_matches', requestId };
        }

        const candidates = await this.retriever.retrieve(userId, profile);
        if (candidates.length === 0) {
          log.info('No candidates found');
          return { status: 'no_matches', requestId };
        }

        const snapshot = toSnapshot(profile);
        const matches = await this.ranker.rank(snapshot, candidates, options.topK);
        if (matches.length === 0) {
          return { status: 'no_matches', requestId };
        }

        const summary = await this.ranker.summarize(snapshot, matches);
        log.info('Matches ready', { candidates: candidates.length, matches: matches.length });
        return { status: 'matched', requestId, matches, summary };
      } catch (error) {
        log.error('Match request failed', { error: errorMessage(error) }, error instanceof Error ? error : undefined);
        return { status: 'no_matches', requestId };
      }
    });

    if (!run.acquired) {
      log.debug('Match request dropped, user busy');
      return { status: 'busy', requestId };
    }
    return run.value;
  }

  /**
   * Hard delete: the vector goes first, then the store row and its history.
   *
   * @throws IndexUnavailable when the vector cannot be removed; the store is
   * left untouched in that case
   */
  async deleteProfile(userId: number): Promise<DeleteProfileResult> {
    return this.guard.runExclusive(userId, async () => {
      const vectorRemoved = await this.index.delete(userId);
      const profileRemoved = await this.store.deleteProfile(userId);
      this.logger.info('Profile deleted', { userId, vectorRemoved, profileRemoved });
      return { profileRemoved, vectorRemoved };
    });
  }

  /**
   * Deactivation removes the vector, then clears the flag; reactivation sets
   * the flag, then re-embeds the current answers. Resolves to false for an
   * unknown user.
   */
  async setActive(userId: number, active: boolean): Promise<boolean> {
    return this.guard.runExclusive(userId, async () => {
      const profile = await this.store.getProfile(userId);
      if (!profile) {
        return false;
      }

      if (!active) {
        await this.index.delete(userId);
        await this.store.setActive(userId, false);
        this.logger.info('Profile deactivated', { userId });
        return true;
      }

      await this.store.setActive(userId, true);
      const { field, seeking, offering } = profile.answers;
      try {
        const vector = await this.embeddings.embedProfile(field, seeking, offering);
        await this.indexProfile({ ...profile, active: true }, vector);
      } catch (error) {
        this.logger.warn('Reactivated profile left without vector', { userId, error: errorMessage(error) });
      }
      this.logger.info('Profile reactivated', { userId });
      return true;
    });
  }

  /**
   * Recomputes vectors of active profiles: only missing ones, or all of them
   * with `force`. Each profile is read again under its user's slot, so answers
   * saved or deactivations made since the listing win.
   */
  async rebuildEmbeddings(options: { force?: boolean } = {}): Promise<RebuildReport> {
    const listed = await this.store.listActive();
    const report: RebuildReport = { total: listed.length, rebuilt: 0, skipped: 0, failed: 0 };

    for (const { userId } of listed) {
      try {
        const outcome = await this.guard.runExclusive(userId, () => this.rebuildOne(userId, options.force ?? false));
        report[outcome]++;
      } catch (error) {
        report.failed++;
        this.logger.warn('Embedding rebuild failed', { userId, error: errorMessage(error) });
      }
    }

    this.logger.info('Embedding rebuild finished', { ...report, force: options.force ?? false });
    return report;
  }

  /**
   * Free-text semantic search over indexed profiles.
   */
  async searchByText(text: string, limit = 5): Promise<TextSearchHit[]> {
    const vector = await this.embeddings.embedText(text);
    const hits = await this.index.search({ vector, limit });
    return hits.map(hit => ({ userId: hit.id, score: hit.score, profile: hit.payload }));
  }

  /**
   * Profiles close to what a member is looking for. The query is built from
   * the member's keywords, so it leans on the `seeking` answer rather than on
   * the member's own vector. The member never appears in the result.
   *
   * @throws ValidationError when the member has no profile
   */
  async searchForMember(userId: number, limit = 5): Promise<TextSearchHit[]> {
    const profile = await this.store.getProfile(userId);
    if (!profile) {
      throw new ValidationError(`No profile ${userId}`, { field: 'userId', value: userId });
    }

    const query = buildSearchQuery(profile.answers);
    if (!query) {
      return [];
    }
    const vector = await this.embeddings.embedText(query);
    const hits = await this.index.search({ vector, excludeId: userId, limit });
    return hits.map(hit => ({ userId: hit.id, score: hit.score, profile: hit.payload }));
  }

  /**
   * Active profiles not updated within `days`, oldest first.
   */
  async listDueForUpdate(days: number = this.settings.updateIntervalDays): Promise<Profile[]> {
    return this.store.listDueForUpdate(this.clock() - days * DAY_MS);
  }

  async stats(): Promise<ServiceStats> {
    const [profiles, activeProfiles, vectors] = await Promise.all([
      this.store.count(),
      this.store.count({ activeOnly: true }),
      this.index.count(),
    ]);
    return { profiles, activeProfiles, vectors };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private validateAnswers(answers: ProfileAnswers): void {
    const { minAnswerLength, maxAnswerLength } = this.settings;

    for (const field of ANSWER_FIELDS) {
      const length = answers[field].length;
      if (length < minAnswerLength) {
        throw new ValidationError(`Answer "${field}" must be at least ${minAnswerLength} characters`, {
          field,
          value: length,
        });
      }
      if (length > maxAnswerLength) {
        throw new ValidationError(`Answer "${field}" must be at most ${maxAnswerLength} characters`, {
          field,
          value: length,
        });
      }
    }
  }

  private async rebuildOne(userId: number, force: boolean): Promise<'rebuilt' | 'skipped'> {
    const profile = await this.store.getProfile(userId);
    if (!profile || !profile.active) {
      return 'skipped';
    }
    if (!force && (await this.index.retrieve(userId))) {
      return 'skipped';
    }

    const { field, seeking, offering } = profile.answers;
    const vector = await this.embeddings.embedProfile(field, seeking, offering);
    await this.index.upsert(userId, vector, toSnapshot(profile));
    return 'rebuilt';
  }

  /**
   * Upserts the vector. On failure the possibly stale entry is removed so the
   * next match request backfills it from the saved answers.
   */
  private async indexProfile(profile: Profile, vector: Vector): Promise<boolean> {
    try {
      await this.index.upsert(profile.userId, vector, toSnapshot(profile));
      return true;
    } catch (upsertError) {
      this.logger.error('Vector upsert failed', { userId: profile.userId, error: errorMessage(upsertError) });
      try {
        await this.index.delete(profile.userId);
      } catch (deleteError) {
        this.logger.warn('Stale vector could not be removed', {
          userId: profile.userId,
          error: errorMessage(deleteError),
        });
      }
      return false;
    }
  }
}
