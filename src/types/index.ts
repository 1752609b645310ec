/**
 * Domain types shared by the text, storage, retrieval and ranking layers.
 *
 * @module Types
 */

// ============================================================================
// Profile
// ============================================================================

/**
 * The three free-text answers a member gives about themselves.
 */
export interface ProfileAnswers {
  /** Field of activity */
  field: string;
  /** What the member is looking for in the community */
  seeking: string;
  /** What the member can offer others */
  offering: string;
}

/**
 * Display details supplied by the front-end. Opaque to the matching core.
 */
export interface MemberInfo {
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface Profile {
  userId: number;
  answers: ProfileAnswers;
  /** Up to 10 tokens, most frequent first */
  keywords: string[];
  member: MemberInfo;
  active: boolean;
  createdAt: number;
  updatedAt: number;
}

/**
 * The part of a profile that travels with a vector as its payload and with a
 * candidate into the ranker.
 */
export interface ProfileSnapshot {
  userId: number;
  answers: ProfileAnswers;
  keywords: string[];
  member: MemberInfo;
  updatedAt: number;
}

export interface ProfileHistoryEntry {
  userId: number;
  answers: ProfileAnswers;
  keywords: string[];
  archivedAt: number;
}

export function toSnapshot(profile: Profile): ProfileSnapshot {
  return {
    userId: profile.userId,
    answers: { ...profile.answers },
    keywords: [...profile.keywords],
    member: { ...profile.member },
    updatedAt: profile.updatedAt,
  };
}

/**
 * Human-readable label for logs and CLI output.
 */
export function displayName(member: MemberInfo, userId: number): string {
  const name = [member.firstName, member.lastName].filter(Boolean).join(' ');
  const handle = member.username ? `@${member.username}` : '';
  const label = [name, handle].filter(Boolean).join(' ');
  return label ? `${label} (#${userId})` : `#${userId}`;
}

// ============================================================================
// Retrieval
// ============================================================================

export type CandidateSource = 'keyword' | 'vector' | 'fallback';

export interface Candidate {
  profile: ProfileSnapshot;
  source: CandidateSource;
  /** Cosine similarity for vector hits */
  similarity?: number;
}

// ============================================================================
// Ranking
// ============================================================================

export interface Match {
  candidate: Candidate;
  /** 1-based position of the candidate in the ranker's input */
  candidateIndex: number;
  /** 1..10, higher is more relevant */
  score: number;
  reason: string;
}
