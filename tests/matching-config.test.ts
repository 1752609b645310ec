import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  configFromEnvironment,
  DEFAULT_MATCHING_CONFIG,
  loadMatchingConfig,
  mergeLayers,
  parseMatchingConfig,
  resolveMatchingConfig,
} from '../src/config/matching-config.js';
import { ConfigError } from '../src/utils/errors.js';

describe('mergeLayers', () => {
  it('should merge nested objects and skip undefined values', () => {
    const merged = mergeLayers(
      { a: { b: 1, c: 2 }, list: [1, 2], keep: 'x' },
      { a: { c: 3 }, list: [9], keep: undefined }
    );
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9], keep: 'x' });
  });
});

describe('resolveMatchingConfig', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveMatchingConfig()).toEqual(DEFAULT_MATCHING_CONFIG);
  });

  it('should apply nested overrides', () => {
    const config = resolveMatchingConfig({ ranking: { topK: 3 }, storage: { databasePath: ':memory:' } });

    expect(config.ranking.topK).toBe(3);
    expect(config.ranking.temperature).toBe(0.7);
    expect(config.storage).toEqual({
      databasePath: ':memory:',
      vectorIndexPath: 'data/vectors.json',
      autoSaveIntervalMs: 60000,
    });
  });

  it('should reject an overlap that is not smaller than the chunk size', () => {
    expect(() => resolveMatchingConfig({ text: { chunkSize: 100, chunkOverlap: 100 } })).toThrow(
      'Invalid configuration: text.chunkOverlap: chunkOverlap must be smaller than chunkSize'
    );
  });

  it('should reject a minimum answer length above the maximum', () => {
    const error = (() => {
      try {
        resolveMatchingConfig({ answers: { minLength: 50, maxLength: 20 } });
        return undefined;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: 'CONFIG_ERROR',
      message: 'Invalid configuration: answers.minLength: minLength must not exceed maxLength',
    });
  });
});

describe('parseMatchingConfig', () => {
  it('should list every issue in the message', () => {
    const raw = mergeLayers(DEFAULT_MATCHING_CONFIG, { ranking: { topK: 0 }, logging: { level: 'loud' } });
    expect(() => parseMatchingConfig(raw)).toThrow(/ranking\.topK: .*; logging\.level: /);
  });
});

describe('configFromEnvironment', () => {
  it('should map prefixed variables onto config paths', () => {
    expect(
      configFromEnvironment({
        PROFILE_MATCHER_LOG_LEVEL: 'debug',
        PROFILE_MATCHER_TOP_K: '7',
        PROFILE_MATCHER_ORACLE_API_KEY: 'test-secret',
        UNRELATED: 'ignored',
      })
    ).toEqual({
      logging: { level: 'debug' },
      storage: {},
      embedding: {},
      oracle: { apiKey: 'test-secret' },
      ranking: { topK: 7 },
    });
  });

  it('should ignore blank numbers', () => {
    expect(configFromEnvironment({ PROFILE_MATCHER_TOP_K: '  ' })).toMatchObject({ ranking: {} });
  });
});

describe('loadMatchingConfig', () => {
  let root: string;
  let home: string;
  let project: string;

  function writeConfig(dir: string, content: string): void {
    fs.mkdirSync(path.join(dir, '.profile-matcher'), { recursive: true });
    fs.writeFileSync(path.join(dir, '.profile-matcher', 'config.json'), content);
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'matching-config-'));
    home = path.join(root, 'home');
    project = path.join(root, 'project');
    fs.mkdirSync(home);
    fs.mkdirSync(project);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should use the defaults when no file exists', async () => {
    expect(await loadMatchingConfig({ cwd: project, homeDir: home, env: {} })).toEqual(DEFAULT_MATCHING_CONFIG);
  });

  it('should layer global file, project file, environment and overrides', async () => {
    writeConfig(home, JSON.stringify({ ranking: { topK: 2, maxTokens: 500 }, updateIntervalDays: 14 }));
    writeConfig(project, JSON.stringify({ ranking: { topK: 3 }, logging: { format: 'json' } }));

    const config = await loadMatchingConfig({
      cwd: project,
      homeDir: home,
      env: { PROFILE_MATCHER_TOP_K: '4', PROFILE_MATCHER_LOG_LEVEL: 'error' },
      overrides: { logging: { level: 'warn' } },
    });

    expect(config.ranking.topK).toBe(4);
    expect(config.ranking.maxTokens).toBe(500);
    expect(config.updateIntervalDays).toBe(14);
    expect(config.logging).toEqual({ level: 'warn', format: 'json' });
  });

  it('should reject a file that is not JSON', async () => {
    writeConfig(project, '{ ranking: ');
    const file = path.join(project, '.profile-matcher', 'config.json');

    await expect(loadMatchingConfig({ cwd: project, homeDir: home, env: {} })).rejects.toThrow(
      `Config file ${file} is not valid JSON`
    );
  });

  it('should reject a file that holds no object', async () => {
    writeConfig(home, '[1, 2]');
    const file = path.join(home, '.profile-matcher', 'config.json');

    await expect(loadMatchingConfig({ cwd: project, homeDir: home, env: {} })).rejects.toThrow(
      `Config file ${file} must contain a JSON object`
    );
  });

  it('should reject a number variable that is not a number', async () => {
    await expect(
      loadMatchingConfig({ cwd: project, homeDir: home, env: { PROFILE_MATCHER_TOP_K: 'five' } })
    ).rejects.toThrow(/^Invalid configuration: ranking\.topK: /);
  });
});
