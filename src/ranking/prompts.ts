/**
 * Prompt builders for ranking and summaries.
 *
 * @module RankingPrompts
 */

import type { Candidate, Match, MemberInfo, ProfileAnswers } from '../types/index.js';

export function systemPrompt(language: string): string {
  return [
    'You are a networking assistant for a professional community.',
    'You introduce members whose needs and skills complement each other.',
    `Write every human-readable text in ${language}.`,
  ].join(' ');
}

function memberLabel(member: MemberInfo, position: number): string {
  return member.firstName || member.username || `Member ${position}`;
}

function describeAnswers(answers: ProfileAnswers, indent: string): string {
  return [
    `${indent}- Field: ${answers.field}`,
    `${indent}- Seeking: ${answers.seeking}`,
    `${indent}- Offering: ${answers.offering}`,
  ].join('\n');
}

export function rankingPrompt(
  requester: ProfileAnswers,
  candidates: Candidate[],
  count: number,
  language: string
): string {
  const listed = candidates
    .map((candidate, i) => {
      const position = i + 1;
      return `${position}. ${memberLabel(candidate.profile.member, position)}:\n${describeAnswers(candidate.profile.answers, '   ')}`;
    })
    .join('\n');

  return `Member looking for contacts:
${describeAnswers(requester, '')}

Candidates:
${listed}

Pick the ${count} candidates who fit this member best. Prefer mutual benefit: what the member seeks should match what the candidate offers, and the other way round.

Reply with JSON only, no commentary:
{"matches": [{"candidate_index": <number from the list>, "score": <1-10>, "reason": "<one sentence in ${language}>"}]}

List the matches from best to worst.`;
}

export function summaryPrompt(requester: ProfileAnswers, matches: Match[], language: string): string {
  const listed = matches
    .map((match, i) => {
      const position = i + 1;
      const { answers, member } = match.candidate.profile;
      return `${position}. ${memberLabel(member, position)}: ${answers.field}. Seeking: ${answers.seeking}. Offering: ${answers.offering}. Why: ${match.reason}`;
    })
    .join('\n');

  return `Member:
${describeAnswers(requester, '')}

Contacts found:
${listed}

Write a short friendly message (2-3 sentences, in ${language}) that presents these contacts to the member and encourages them to reach out. Plain text, no markdown.`;
}
