/**
 * Admin commands
 *
 * One commander `Command` per admin operation. Actions hand their work to
 * `CommandContext.execute`, which opens the engine and records the exit code.
 * Output goes through `CliIO` so tests can capture it.
 *
 * @module CliCommands
 */

import chalk from 'chalk';
import { Command } from 'commander';
import type { MatchingEngine } from '../engine.js';
import type { TextSearchHit } from '../service/match-service.js';
import { displayName, type Match, type Profile } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CommandContext {
  io: CliIO;
  /** Runs `task` against an open engine; its result becomes the exit code */
  execute(task: (engine: MatchingEngine) => Promise<number>): Promise<void>;
}

// ============================================
// Argument helpers
// ============================================

export function parsePositiveInt(value: string | undefined, name: string): number {
  const parsed = value !== undefined && /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${value ?? ''}"`, { field: name, value });
  }
  return parsed;
}

function optionalPositiveInt(value: string | undefined, name: string): number | undefined {
  return value === undefined ? undefined : parsePositiveInt(value, name);
}

function formatDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

function formatMatch(match: Match, position: number): string[] {
  const { profile } = match.candidate;
  return [
    `${chalk.bold(`${position}.`)} ${chalk.cyan(displayName(profile.member, profile.userId))} ${chalk.yellow(`${match.score}/10`)} ${chalk.dim(`[${match.candidate.source}]`)}`,
    `   ${profile.answers.field}`,
    `   ${chalk.dim('Reason:')} ${match.reason}`,
  ];
}

function formatHit(hit: TextSearchHit): string {
  return `${chalk.yellow(hit.score.toFixed(3))} ${chalk.cyan(displayName(hit.profile.member, hit.userId))} ${hit.profile.answers.field}`;
}

function formatDue(profile: Profile): string {
  return `${chalk.cyan(displayName(profile.member, profile.userId))} ${chalk.dim(`last updated ${formatDate(profile.updatedAt)}`)}`;
}

// ============================================
// Commands
// ============================================

export function createStatsCommand(context: CommandContext): Command {
  const { io } = context;
  return new Command('stats').description('Count stored profiles and indexed vectors').action(() =>
    context.execute(async engine => {
      const result = await engine.service.stats();
      io.out(`${chalk.bold('Profiles:')} ${result.profiles} (${result.activeProfiles} active)`);
      io.out(`${chalk.bold('Vectors:')}  ${result.vectors}`);
      return 0;
    })
  );
}

export function createRebuildCommand(context: CommandContext): Command {
  const { io } = context;
  return new Command('rebuild')
    .description('Embed active profiles that have no vector')
    .option('--force', 'Re-embed every active profile')
    .action((options: { force?: boolean }) =>
      context.execute(async engine => {
        const report = await engine.service.rebuildEmbeddings({ force: options.force === true });
        const line = `Rebuilt ${report.rebuilt} of ${report.total} (skipped ${report.skipped}, failed ${report.failed})`;
        io.out(report.failed > 0 ? chalk.yellow(line) : chalk.green(line));
        return report.failed > 0 ? 1 : 0;
      })
    );
}

export function createDeleteCommand(context: CommandContext): Command {
  const { io } = context;
  return new Command('delete')
    .description('Permanently remove a profile, its history and its vector')
    .argument('<userId>', 'Member id')
    .option('-y, --yes', 'Confirm the deletion')
    .action((userIdArg: string, options: { yes?: boolean }) =>
      context.execute(async engine => {
        const userId = parsePositiveInt(userIdArg, 'userId');
        if (options.yes !== true) {
          io.err(chalk.red(`Refusing to delete profile ${userId} without --yes`));
          return 1;
        }

        const result = await engine.service.deleteProfile(userId);
        if (!result.profileRemoved && !result.vectorRemoved) {
          io.out(chalk.yellow(`No profile ${userId}`));
          return 1;
        }
        io.out(chalk.green(`Deleted profile ${userId}`));
        return 0;
      })
    );
}

export function createMatchCommand(context: CommandContext): Command {
  const { io } = context;
  return new Command('match')
    .description('Run a match request for a member')
    .argument('<userId>', 'Member id')
    .option('--top <n>', 'Number of matches to keep')
    .action((userIdArg: string, options: { top?: string }) =>
      context.execute(async engine => {
        const userId = parsePositiveInt(userIdArg, 'userId');
        const topK = optionalPositiveInt(options.top, 'top');
        const result = await engine.service.findMatches(userId, { topK });

        if (result.status === 'busy') {
          io.err(chalk.yellow(`Profile ${userId} is already being processed`));
          return 1;
        }
        if (result.status === 'no_profile') {
          io.err(chalk.yellow(`No profile ${userId}`));
          return 1;
        }
        if (result.status === 'no_matches') {
          io.out(chalk.yellow(`No matches for ${userId}`));
          return 0;
        }

        result.matches.forEach((found, i) => {
          for (const line of formatMatch(found, i + 1)) {
            io.out(line);
          }
        });
        io.out('');
        io.out(result.summary);
        return 0;
      })
    );
}

export function createSearchCommand(context: CommandContext): Command {
  const { io } = context;
  return new Command('search')
    .description('Semantic search over indexed profiles')
    .argument('[text...]', 'Free text to search for')
    .option('--user <userId>', "Search with a query built from the member's answers")
    .option('--limit <n>', 'Number of hits to show')
    .action((words: string[], options: { user?: string; limit?: string }) =>
      context.execute(async engine => {
        const limit = optionalPositiveInt(options.limit, 'limit');
        let hits: TextSearchHit[];
        if (options.user !== undefined) {
          hits = await engine.service.searchForMember(parsePositiveInt(options.user, 'user'), limit);
        } else if (words.length > 0) {
          hits = await engine.service.searchByText(words.join(' '), limit);
        } else {
          throw new ValidationError('Give search text or --user', { field: 'text' });
        }

        if (hits.length === 0) {
          io.out(chalk.yellow('Nothing found'));
          return 0;
        }
        for (const hit of hits) {
          io.out(formatHit(hit));
        }
        return 0;
      })
    );
}

export function createDueCommand(context: CommandContext): Command {
  const { io } = context;
  return new Command('due')
    .description('List active profiles not updated recently')
    .option('--days <n>', 'Age in days that makes a profile due')
    .action((options: { days?: string }) =>
      context.execute(async engine => {
        const days = optionalPositiveInt(options.days, 'days');
        const profiles = await engine.service.listDueForUpdate(days);

        if (profiles.length === 0) {
          io.out(chalk.green('Every profile is up to date'));
          return 0;
        }
        for (const profile of profiles) {
          io.out(formatDue(profile));
        }
        return 0;
      })
    );
}

export function createCommands(context: CommandContext): Command[] {
  return [
    createStatsCommand(context),
    createRebuildCommand(context),
    createDeleteCommand(context),
    createMatchCommand(context),
    createSearchCommand(context),
    createDueCommand(context),
  ];
}
