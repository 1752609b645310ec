/**
 * Structured logging
 *
 * Every entry goes to a bounded in-memory buffer; console and file transports
 * are added from the config. Module loggers and child loggers share the
 * transports of the logger they were made from.
 *
 * @module Logger
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk, { type ChalkInstance } from 'chalk';

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogModule =
  | 'text'
  | 'embedding'
  | 'store'
  | 'vector'
  | 'retrieval'
  | 'ranking'
  | 'oracle'
  | 'service'
  | 'config'
  | 'cli'
  | 'system';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  module?: LogModule;
  context?: LogContext;
  error?: Error;
  source?: string;
  /** Set by `Logger.time` */
  duration?: number;
}

export type LogFormat = 'json' | 'pretty' | 'compact';

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  filePath?: string;
  format: LogFormat;
  colorize: boolean;
  /** Rotate the log file once it grows past this many bytes */
  maxFileSize: number;
  /** Rotated files kept next to the active one */
  maxFiles: number;
  /** Print stacks of logged errors in the pretty format */
  showStackTrace: boolean;
}

export interface LogTransport {
  name: string;
  log(entry: LogEntry): void | Promise<void>;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  enableConsole: true,
  enableFile: false,
  format: 'pretty',
  colorize: true,
  maxFileSize: 10 * 1024 * 1024,
  maxFiles: 5,
  showStackTrace: true,
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

// ============================================
// Formatting
// ============================================

const LEVEL_STYLE: Record<LogLevel, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white.bold,
};

function levelTag(level: LogLevel): string {
  return `[${level.toUpperCase().padEnd(5)}]`;
}

function toRecord(entry: LogEntry): Record<string, unknown> {
  return {
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    module: entry.module,
    source: entry.source,
    message: entry.message,
    context: entry.context,
    duration: entry.duration,
    error: entry.error && { name: entry.error.name, message: entry.error.message, stack: entry.error.stack },
  };
}

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function formatCompact(entry: LogEntry): string {
  const parts = [levelTag(entry.level)];
  if (entry.module) parts.push(`[${entry.module}]`);
  parts.push(entry.message);
  if (entry.duration !== undefined) parts.push(`(${entry.duration}ms)`);
  return parts.join(' ');
}

function formatPretty(entry: LogEntry, colorize: boolean): string {
  const paint = (style: ChalkInstance, text: string) => (colorize ? style(text) : text);

  const head = [
    paint(chalk.dim, entry.timestamp.toISOString().slice(11, 23)),
    paint(LEVEL_STYLE[entry.level], levelTag(entry.level)),
  ];
  if (entry.module) head.push(paint(chalk.cyan, `[${entry.module}]`));
  if (entry.source) head.push(paint(chalk.dim, `(${entry.source})`));
  head.push(entry.message);
  if (entry.duration !== undefined) head.push(paint(chalk.magenta, `${entry.duration}ms`));

  const lines = [head.join(' ')];
  for (const [key, value] of Object.entries(entry.context ?? {})) {
    lines.push(`  ${paint(chalk.dim, `${key}:`)} ${formatValue(value)}`);
  }
  return lines.join('\n');
}

// ============================================
// Transports
// ============================================

class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(private readonly config: LoggerConfig) {}

  log(entry: LogEntry): void {
    const line = this.config.format === 'json'
      ? JSON.stringify(toRecord(entry))
      : this.config.format === 'compact'
        ? formatCompact(entry)
        : formatPretty(entry, this.config.colorize);

    if (entry.level === 'error' || entry.level === 'fatal') {
      console.error(line);
      if (entry.error?.stack && this.config.showStackTrace && this.config.format === 'pretty') {
        console.error(chalk.dim(entry.error.stack));
      }
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else if (entry.level === 'info') {
      console.info(line);
    } else {
      console.debug(line);
    }
  }
}

/**
 * JSON lines, appended. The active file is renamed to `<file>.1` when it
 * reaches `maxFileSize`; older generations shift up and the last one is
 * dropped.
 */
class FileTransport implements LogTransport {
  name = 'file';
  private stream: fs.WriteStream | null;
  private written: number;

  constructor(
    private readonly filePath: string,
    private readonly maxFileSize: number,
    private readonly maxFiles: number
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.written = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
    this.stream = fs.createWriteStream(filePath, { flags: 'a' });
  }

  log(entry: LogEntry): void {
    if (!this.stream) return;

    const line = `${JSON.stringify(toRecord(entry))}\n`;
    this.stream.write(line);
    this.written += Buffer.byteLength(line);
    if (this.written >= this.maxFileSize) {
      this.rotate();
    }
  }

  private rotate(): void {
    this.stream?.end();

    for (let generation = this.maxFiles; generation >= 1; generation--) {
      const from = generation === 1 ? this.filePath : `${this.filePath}.${generation - 1}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.filePath}.${generation}`);
      }
    }

    this.written = 0;
    this.stream = fs.createWriteStream(this.filePath, { flags: 'a' });
  }

  async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    await new Promise<void>(resolve => stream.write('', () => resolve()));
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}

export class MemoryTransport implements LogTransport {
  name = 'memory';
  private entries: LogEntry[] = [];

  constructor(private readonly capacity = 1000) {}

  log(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  getLogs(level?: LogLevel, module?: LogModule): LogEntry[] {
    return this.entries.filter(
      entry => (!level || entry.level === level) && (!module || entry.module === module)
    );
  }

  getRecent(count = 10): LogEntry[] {
    return this.entries.slice(-count);
  }

  getErrors(): LogEntry[] {
    return this.entries.filter(entry => isLevelEnabled('error', entry.level));
  }

  clear(): void {
    this.entries = [];
  }
}

// ============================================
// Logger
// ============================================

interface SharedSinks {
  transports: LogTransport[];
  memory: MemoryTransport;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly sinks: SharedSinks;
  private readonly context: LogContext;

  constructor(
    config: Partial<LoggerConfig> = {},
    private readonly source?: string,
    private readonly module?: LogModule,
    inherited?: { sinks: SharedSinks; context: LogContext }
  ) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };

    if (inherited) {
      this.sinks = inherited.sinks;
      this.context = inherited.context;
      return;
    }

    const memory = new MemoryTransport();
    const transports: LogTransport[] = [memory];
    if (this.config.enableConsole) {
      transports.push(new ConsoleTransport(this.config));
    }
    if (this.config.enableFile && this.config.filePath) {
      transports.push(new FileTransport(this.config.filePath, this.config.maxFileSize, this.config.maxFiles));
    }
    this.sinks = { transports, memory };
    this.context = {};
  }

  forModule(module: LogModule): Logger {
    return new Logger(this.config, this.source, module, { sinks: this.sinks, context: this.context });
  }

  /** Same module; every entry also carries `context`. */
  child(context: LogContext): Logger {
    return new Logger(this.config, this.source, this.module, {
      sinks: this.sinks,
      context: { ...this.context, ...context },
    });
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: Error, duration?: number): void {
    if (!isLevelEnabled(this.config.level, level)) {
      return;
    }

    const merged = { ...this.context, ...context };
    this.dispatch({
      level,
      message,
      timestamp: new Date(),
      module: this.module,
      source: this.source,
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error,
      duration,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log('warn', message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log('error', message, context, error);
  }

  fatal(message: string, context?: LogContext, error?: Error): void {
    this.log('fatal', message, context, error);
  }

  /**
   * Runs `operation` and logs `[END] name` with its duration, or
   * `[FAILED] name` at warn before rethrowing.
   */
  async time<T>(operationName: string, operation: () => Promise<T>, level: LogLevel = 'debug'): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await operation();
      this.log(level, `[END] ${operationName}`, undefined, undefined, Date.now() - startedAt);
      return result;
    } catch (error) {
      this.log(
        'warn',
        `[FAILED] ${operationName}`,
        { duration: `${Date.now() - startedAt}ms` },
        error instanceof Error ? error : undefined
      );
      throw error;
    }
  }

  getRecentLogs(count?: number): LogEntry[] {
    return this.sinks.memory.getRecent(count);
  }

  getAllLogs(): LogEntry[] {
    return this.sinks.memory.getLogs();
  }

  getErrorLogs(): LogEntry[] {
    return this.sinks.memory.getErrors();
  }

  clearLogs(): void {
    this.sinks.memory.clear();
  }

  async flush(): Promise<void> {
    for (const transport of this.sinks.transports) {
      await transport.flush?.();
    }
  }

  async close(): Promise<void> {
    for (const transport of this.sinks.transports) {
      await transport.close?.();
    }
  }

  private dispatch(entry: LogEntry): void {
    for (const transport of this.sinks.transports) {
      try {
        const pending = transport.log(entry);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => console.error(`[Logger] ${transport.name} transport failed:`, err));
        }
      } catch (err) {
        console.error(`[Logger] ${transport.name} transport failed:`, err);
      }
    }
  }
}

// ============================================
// Global and module loggers
// ============================================

let globalLogger: Logger | null = null;
const moduleLoggers = new Map<LogModule, Logger>();

export function getGlobalLogger(): Logger {
  globalLogger ??= new Logger();
  return globalLogger;
}

/** Replaces the process-wide logger; module loggers are recreated from it. */
export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
  moduleLoggers.clear();
}

/**
 * Module logger derived from the global one. Components fall back to this
 * when no logger is injected.
 */
export function getLogger(module: LogModule): Logger {
  let logger = moduleLoggers.get(module);
  if (!logger) {
    logger = getGlobalLogger().forModule(module);
    moduleLoggers.set(module, logger);
  }
  return logger;
}

export function createLogger(config: Partial<LoggerConfig> & { name?: string; module?: LogModule } = {}): Logger {
  const { name, module, ...rest } = config;
  return new Logger(rest, name, module);
}

/**
 * Memory-only logger at debug level, for tests and for callers that inspect
 * the log of a single run.
 */
export function createSilentLogger(module?: LogModule): Logger {
  return new Logger({ enableConsole: false, level: 'debug' }, undefined, module);
}

export default Logger;
