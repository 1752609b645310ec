/**
 * CLI - admin command line
 *
 * profile-matcher <command> [options]
 *
 * @module CLI
 */

import chalk from 'chalk';
import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { loadMatchingConfig, type MatchingConfig } from '../config/matching-config.js';
import { withMatchingEngine, type EngineOverrides } from '../engine.js';
import { isMatchError, errorMessage } from '../utils/errors.js';
import { createCommands, type CliIO, type CommandContext } from './commands.js';

export type { CliIO, CommandContext } from './commands.js';
export { createCommands, parsePositiveInt } from './commands.js';

export interface CliOptions {
  io?: CliIO;
  /** Replaces the layered config loading; `verbose` comes from `--verbose` */
  loadConfig?: (verbose: boolean) => Promise<MatchingConfig>;
  overrides?: EngineOverrides;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function defaultLoadConfig(verbose: boolean): Promise<MatchingConfig> {
  // Logs go to the console alongside command output; keep them to warnings
  // unless asked.
  return loadMatchingConfig({ overrides: { logging: { level: verbose ? 'debug' : 'warn' } } });
}

function lines(write: (line: string) => void): (text: string) => void {
  return text => {
    for (const line of text.replace(/\n$/, '').split('\n')) {
      write(line);
    }
  };
}

/**
 * Builds the program. Commander never exits the process: help, usage errors
 * and the command's own result all come back through `parseAsync`.
 */
export function createProgram(context: CommandContext): Command {
  const output: OutputConfiguration = {
    writeOut: lines(line => context.io.out(line)),
    writeErr: lines(line => context.io.err(line)),
    outputError: (message, write) => write(chalk.red(message.trimEnd())),
  };

  const program = new Command('profile-matcher')
    .description('Admin tools for profile matching')
    .usage('<command> [options]')
    .option('-v, --verbose', 'Log at debug level')
    .exitOverride()
    .configureOutput(output);

  for (const command of createCommands(context)) {
    program.addCommand(command.exitOverride().configureOutput(output));
  }
  return program;
}

/**
 * Runs one command and resolves to the process exit code: 0 on success, 1
 * when the command fails or refuses, 2 on a usage error. Never rejects.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const loadConfig = options.loadConfig ?? defaultLoadConfig;
  let exitCode = 0;

  const program: Command = createProgram({
    io,
    async execute(task) {
      const config = await loadConfig(program.opts<{ verbose?: boolean }>().verbose === true);
      exitCode = await withMatchingEngine(config, task, options.overrides);
    },
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Already printed by commander
      return error.exitCode === 0 ? 0 : 2;
    }
    const label = isMatchError(error) ? `${error.code}: ` : '';
    io.err(chalk.red(`${label}${errorMessage(error)}`));
    return 1;
  }
}
