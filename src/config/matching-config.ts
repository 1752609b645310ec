/**
 * Matching configuration
 *
 * Layers, lowest priority first:
 * 1. built-in defaults
 * 2. global file: ~/.profile-matcher/config.json
 * 3. project file: <cwd>/.profile-matcher/config.json
 * 4. environment: PROFILE_MATCHER_*
 * 5. explicit overrides
 *
 * The merged object is validated once, at the end.
 *
 * @module MatchingConfig
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errors.js';

// ============================================================================
// Schema
// ============================================================================

const positiveInt = z.number().int().positive();

const textSchema = z.object({
  chunkSize: positiveInt,
  chunkOverlap: z.number().int().nonnegative(),
  chunkThreshold: positiveInt,
  maxKeywords: positiveInt,
});

const answersSchema = z.object({
  minLength: z.number().int().nonnegative(),
  maxLength: positiveInt,
});

const retrievalSchema = z.object({
  keywordLimit: z.number().int().nonnegative(),
  vectorLimit: z.number().int().nonnegative(),
  candidateCeiling: positiveInt,
  keywordQueryCount: positiveInt,
});

const rankingSchema = z.object({
  topK: positiveInt,
  temperature: z.number().min(0).max(2),
  maxTokens: positiveInt,
  summaryMaxTokens: positiveInt,
  timeoutMs: positiveInt,
  fallbackScore: z.number().min(1).max(10),
  fallbackReason: z.string().min(1),
  fallbackSummary: z.string().min(1),
  responseLanguage: z.string().min(1),
});

const embeddingSchema = z.object({
  provider: z.enum(['openai', 'hashing']),
  model: z.string().min(1),
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  dimension: positiveInt,
  timeoutMs: positiveInt,
});

const oracleSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  apiKey: z.string().optional(),
});

const storageSchema = z.object({
  databasePath: z.string().min(1),
  vectorIndexPath: z.string().min(1).optional(),
  autoSaveIntervalMs: z.number().int().nonnegative(),
});

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
  format: z.enum(['pretty', 'json', 'compact']),
  file: z.string().min(1).optional(),
});

export const matchingConfigSchema = z
  .object({
    text: textSchema,
    answers: answersSchema,
    retrieval: retrievalSchema,
    ranking: rankingSchema,
    embedding: embeddingSchema,
    oracle: oracleSchema,
    storage: storageSchema,
    logging: loggingSchema,
    updateIntervalDays: positiveInt,
  })
  .superRefine((config, ctx) => {
    if (config.text.chunkOverlap >= config.text.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['text', 'chunkOverlap'],
        message: 'chunkOverlap must be smaller than chunkSize',
      });
    }
    if (config.answers.minLength > config.answers.maxLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['answers', 'minLength'],
        message: 'minLength must not exceed maxLength',
      });
    }
  });

export type MatchingConfig = z.infer<typeof matchingConfigSchema>;
export type TextConfig = MatchingConfig['text'];
export type RetrievalConfig = MatchingConfig['retrieval'];
export type RankingConfig = MatchingConfig['ranking'];
export type EmbeddingConfig = MatchingConfig['embedding'];
export type OracleConfig = MatchingConfig['oracle'];
export type StorageConfig = MatchingConfig['storage'];
export type LoggingSettings = MatchingConfig['logging'];

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = {
  text: {
    chunkSize: 1200,
    chunkOverlap: 150,
    chunkThreshold: 400,
    maxKeywords: 10,
  },
  answers: {
    minLength: 10,
    maxLength: 2000,
  },
  retrieval: {
    keywordLimit: 15,
    vectorLimit: 15,
    candidateCeiling: 20,
    keywordQueryCount: 5,
  },
  ranking: {
    topK: 5,
    temperature: 0.7,
    maxTokens: 700,
    summaryMaxTokens: 300,
    timeoutMs: 30000,
    fallbackScore: 5,
    fallbackReason: 'Подходящий кандидат',
    fallbackSummary: 'Вот подходящие контакты для знакомства! 🤝',
    responseLanguage: 'Russian',
  },
  embedding: {
    provider: 'hashing',
    model: 'text-embedding-3-small',
    baseUrl: 'https://api.openai.com/v1',
    dimension: 384,
    timeoutMs: 15000,
  },
  oracle: {
    baseUrl: 'https://api.deepseek.com',
    model: 'deepseek-chat',
  },
  storage: {
    databasePath: 'data/profiles.db',
    vectorIndexPath: 'data/vectors.json',
    autoSaveIntervalMs: 60000,
  },
  logging: {
    level: 'info',
    format: 'pretty',
  },
  updateIntervalDays: 30,
};

// ============================================================================
// Merging
// ============================================================================

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge of plain objects. Arrays and scalars in `override` replace
 * the base value; `undefined` leaves it untouched.
 */
export function mergeLayers(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value)
      ? mergeLayers(current, value)
      : value;
  }

  return result;
}

/**
 * Validates a fully merged configuration object.
 */
export function parseMatchingConfig(raw: unknown): MatchingConfig {
  const parsed = matchingConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, {
      details: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Defaults plus `overrides`, validated. No files or environment.
 */
export function resolveMatchingConfig(overrides: DeepPartial<MatchingConfig> = {}): MatchingConfig {
  return parseMatchingConfig(mergeLayers(DEFAULT_MATCHING_CONFIG, overrides));
}

// ============================================================================
// Sources
// ============================================================================

const CONFIG_DIR_NAME = '.profile-matcher';
const CONFIG_FILE_NAME = 'config.json';
const ENV_PREFIX = 'PROFILE_MATCHER_';

export interface LoadConfigOptions {
  /** Project root; defaults to `process.cwd()` */
  cwd?: string;
  /** Home directory holding the global config; defaults to `os.homedir()` */
  homeDir?: string;
  /** Environment to read; defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
  overrides?: DeepPartial<MatchingConfig>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(filePath: string): Promise<PlainObject> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is left for the schema to reject
  return Number(value);
}

/**
 * Maps `PROFILE_MATCHER_*` variables onto config paths.
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv): PlainObject {
  const read = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  return mergeLayers({}, {
    logging: {
      level: read('LOG_LEVEL'),
      format: read('LOG_FORMAT'),
      file: read('LOG_FILE'),
    },
    storage: {
      databasePath: read('DB_PATH'),
      vectorIndexPath: read('VECTOR_INDEX_PATH'),
    },
    embedding: {
      provider: read('EMBEDDING_PROVIDER'),
      model: read('EMBEDDING_MODEL'),
      baseUrl: read('EMBEDDING_BASE_URL'),
      apiKey: read('EMBEDDING_API_KEY'),
      dimension: numberFromEnv(read('EMBEDDING_DIMENSION')),
    },
    oracle: {
      baseUrl: read('ORACLE_BASE_URL'),
      model: read('ORACLE_MODEL'),
      apiKey: read('ORACLE_API_KEY'),
    },
    ranking: {
      topK: numberFromEnv(read('TOP_K')),
      timeoutMs: numberFromEnv(read('ORACLE_TIMEOUT_MS')),
    },
    updateIntervalDays: numberFromEnv(read('UPDATE_INTERVAL_DAYS')),
  });
}

/**
 * Loads every layer and returns the validated result.
 */
export async function loadMatchingConfig(options: LoadConfigOptions = {}): Promise<MatchingConfig> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  const globalFile = await readConfigFile(path.join(homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME));
  const projectFile = await readConfigFile(path.join(cwd, CONFIG_DIR_NAME, CONFIG_FILE_NAME));

  let merged: PlainObject = { ...DEFAULT_MATCHING_CONFIG };
  merged = mergeLayers(merged, globalFile);
  merged = mergeLayers(merged, projectFile);
  merged = mergeLayers(merged, configFromEnvironment(options.env ?? process.env));
  merged = mergeLayers(merged, options.overrides ?? {});

  return parseMatchingConfig(merged);
}
