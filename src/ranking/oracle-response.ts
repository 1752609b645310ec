/**
 * Oracle outcomes and ranking-reply parsing
 *
 * @module OracleResponse
 */

import { z } from 'zod';

/**
 * What a single oracle consultation produced.
 */
export type OracleOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'parse_error'; reason: string; raw: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'transport_error'; reason: string };

export interface RankedEntry {
  /** 1-based, as presented in the prompt */
  candidateIndex: number;
  score: number;
  reason?: string;
}

const numeric = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(?:\.\d+)?$/).transform(Number),
]);

const entrySchema = z
  .object({
    candidate_index: numeric.pipe(z.number().int()),
    score: numeric.optional(),
    match_score: numeric.optional(),
    reason: z.string().optional(),
  })
  .transform((entry, ctx) => {
    const score = entry.score ?? entry.match_score;
    if (score === undefined || !Number.isFinite(score)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing score' });
      return z.NEVER;
    }
    const ranked: RankedEntry = { candidateIndex: entry.candidate_index, score };
    const reason = entry.reason?.trim();
    if (reason) {
      ranked.reason = reason;
    }
    return ranked;
  });

const replySchema = z.object({
  matches: z.array(z.unknown()),
});

const FENCE = /^```[\w-]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * Removes a surrounding Markdown code fence, with or without a language tag.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = FENCE.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * Reads `{"matches": [...]}`. Entries of the wrong shape are dropped one by
 * one; a reply that is not that object at all is a parse error.
 */
export function parseRankingReply(text: string): OracleOutcome<RankedEntry[]> {
  const body = stripCodeFences(text);

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return {
      kind: 'parse_error',
      reason: error instanceof Error ? error.message : String(error),
      raw: text,
    };
  }

  const reply = replySchema.safeParse(json);
  if (!reply.success) {
    return { kind: 'parse_error', reason: 'reply has no "matches" list', raw: text };
  }

  const entries: RankedEntry[] = [];
  for (const item of reply.data.matches) {
    const entry = entrySchema.safeParse(item);
    if (entry.success) {
      entries.push(entry.data);
    }
  }
  return { kind: 'ok', value: entries };
}
