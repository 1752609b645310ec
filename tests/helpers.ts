import type { EmbeddingModel } from '../src/embedding/provider.js';
import type { OracleRequest, ReasoningOracle } from '../src/ranking/oracle.js';
import type { Candidate, CandidateSource, MemberInfo, ProfileAnswers, ProfileSnapshot } from '../src/types/index.js';
import { OracleFailure } from '../src/utils/errors.js';
import type { Vector } from '../src/utils/vector-math.js';

export function answers(field: string, seeking: string, offering: string): ProfileAnswers {
  return { field, seeking, offering };
}

export function snapshot(userId: number, overrides: Partial<ProfileSnapshot> = {}): ProfileSnapshot {
  return {
    userId,
    answers: answers(`Field of ${userId}`, `Seeking of ${userId}`, `Offering of ${userId}`),
    keywords: [],
    member: {},
    updatedAt: 1000,
    ...overrides,
  };
}

export function candidate(
  userId: number,
  source: CandidateSource = 'keyword',
  member: MemberInfo = {}
): Candidate {
  return { profile: snapshot(userId, { member }), source };
}

/**
 * Model whose vectors come from a function of the text.
 */
export class StaticEmbeddingModel implements EmbeddingModel {
  readonly name = 'static';
  readonly encoded: string[] = [];

  constructor(
    readonly dimension: number,
    private readonly vectorFor: (text: string) => Vector
  ) {}

  async encode(text: string): Promise<Vector> {
    this.encoded.push(text);
    return this.vectorFor(text);
  }
}

export class FailingEmbeddingModel implements EmbeddingModel {
  readonly name = 'failing';
  calls = 0;

  constructor(
    readonly dimension: number,
    private readonly error: Error = new Error('model offline')
  ) {}

  async encode(): Promise<Vector> {
    this.calls++;
    throw this.error;
  }
}

export type ScriptedReply = string | Error | ((request: OracleRequest) => Promise<string>);

/**
 * Oracle answering from a script, one entry per call. Runs out with a
 * transport failure.
 */
export class FakeOracle implements ReasoningOracle {
  readonly requests: OracleRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async complete(request: OracleRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new OracleFailure('transport', 'No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'function') {
      return reply(request);
    }
    return reply;
  }
}

/** Never settles unless the request is aborted, then rejects. */
export function hangingReply(request: OracleRequest): Promise<string> {
  return new Promise((_, reject) => {
    request.signal?.addEventListener('abort', () => {
      reject(new OracleFailure('transport', 'aborted'));
    });
  });
}

export function matchesReply(entries: Array<Record<string, unknown>>): string {
  return JSON.stringify({ matches: entries });
}

const ANSI_ESCAPE = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}
