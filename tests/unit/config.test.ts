import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AlreadyExistsError } from '../../src/errors.js';
import {
  ConfigSchema,
  LOCI_DIR,
  applyEnvOverrides,
  defaultConfig,
  findProjectRoot,
  getConfigPath,
  initProject,
  loadConfig,
  saveConfig,
} from '../../src/config/index.js';
import { captureLogger, events } from '../helpers/logger.js';
import type { LogEntry } from '../helpers/logger.js';

function tmpDir(): string {
  const dir = path.join(os.tmpdir(), `loci-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = ConfigSchema.parse({});
    expect(config.version).toBe(1);
    expect(config.storage.backend).toBe('memory');
    expect(config.storage.scrollLimit).toBe(10000);
    expect(config.embeddings.semantic.provider).toBe('simple');
    expect(config.context.sourceWeights).toEqual({ memory: 1, code: 2, experience: 3, value: 1, commit: 2 });
    expect(config.context.similarityThreshold).toBe(0.9);
    expect(config.context.maxFuzzyContentLength).toBe(1000);
    expect(config.context.maxItemFraction).toBe(0.25);
    expect(config.clustering.minClusterSize).toBe(5);
    expect(config.clustering.minSamples).toBe(3);
    expect(config.clustering.tierWeights).toEqual({ gold: 1, silver: 0.8, bronze: 0.3, abandoned: 0.1, unknown: 0.5 });
    expect(config.values.minExperiences).toBe(20);
    expect(config.logging.level).toBe('info');
  });

  it.each([
    ['a zero source weight', { context: { sourceWeights: { code: 0 } } }],
    ['a fractional source weight', { context: { sourceWeights: { code: 1.5 } } }],
    ['maxItemFraction above 1', { context: { maxItemFraction: 1.5 } }],
    ['maxTokens above the limit', { context: { maxTokens: 100001 } }],
    ['minClusterSize below 2', { clustering: { minClusterSize: 1 } }],
    ['an unknown backend', { storage: { backend: 'redis' } }],
  ])('rejects %s', (_label, raw) => {
    expect(ConfigSchema.safeParse(raw).success).toBe(false);
  });
});

describe('applyEnvOverrides', () => {
  it('overrides storage and logging settings from LOCI_ variables', () => {
    const raw = applyEnvOverrides(
      { storage: { backend: 'sqlite', sqlitePath: 'a.db' } },
      { LOCI_STORAGE_BACKEND: 'qdrant', LOCI_QDRANT_URL: 'http://qdrant.test:6333', LOCI_SCROLL_LIMIT: '500', LOCI_LOG_LEVEL: 'debug' }
    );
    const config = ConfigSchema.parse(raw);

    expect(config.storage.backend).toBe('qdrant');
    expect(config.storage.sqlitePath).toBe('a.db');
    expect(config.storage.qdrantUrl).toBe('http://qdrant.test:6333');
    expect(config.storage.scrollLimit).toBe(500);
    expect(config.logging.level).toBe('debug');
  });

  it('leaves the input untouched', () => {
    const input = { storage: { backend: 'sqlite' } };
    applyEnvOverrides(input, { LOCI_STORAGE_BACKEND: 'memory' });
    expect(input.storage.backend).toBe('sqlite');
  });
});

describe('project files', () => {
  let dir: string;
  let entries: LogEntry[];

  beforeEach(() => {
    dir = tmpDir();
    entries = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('initializes a project directory with defaults', () => {
    const lociPath = initProject(dir);

    expect(lociPath).toBe(path.join(dir, LOCI_DIR));
    expect(JSON.parse(fs.readFileSync(getConfigPath(dir), 'utf-8'))).toEqual(defaultConfig());
    expect(fs.readFileSync(path.join(lociPath, '.gitignore'), 'utf-8')).toContain('vectors.db');
  });

  it('refuses to initialize twice without force', () => {
    initProject(dir);
    expect(() => initProject(dir)).toThrow(AlreadyExistsError);
    expect(() => initProject(dir, true)).not.toThrow();
  });

  it('finds the project root from a nested directory', () => {
    initProject(dir);
    const nested = path.join(dir, 'src', 'deep');
    fs.mkdirSync(nested, { recursive: true });

    expect(findProjectRoot(nested)).toBe(dir);
  });

  it('round-trips a saved config', () => {
    initProject(dir);
    const config = defaultConfig();
    config.context.maxTokens = 4000;
    config.storage.backend = 'sqlite';
    saveConfig(config, dir);

    const loaded = loadConfig({ projectRoot: dir, env: {} });
    expect(loaded.context.maxTokens).toBe(4000);
    expect(loaded.storage.backend).toBe('sqlite');
  });

  it('lets the environment win over the file', () => {
    initProject(dir);
    const loaded = loadConfig({ projectRoot: dir, env: { LOCI_STORAGE_BACKEND: 'sqlite' } });
    expect(loaded.storage.backend).toBe('sqlite');
  });

  it('falls back to defaults for an unreadable file', () => {
    initProject(dir);
    fs.writeFileSync(getConfigPath(dir), 'not json{{{');

    const loaded = loadConfig({ projectRoot: dir, env: {}, logger: captureLogger(entries) });

    expect(loaded).toEqual(defaultConfig());
    expect(events(entries, 'warn')).toEqual(['config.unreadable']);
  });

  it('falls back to defaults for an invalid file', () => {
    initProject(dir);
    fs.writeFileSync(getConfigPath(dir), JSON.stringify({ context: { maxItemFraction: 2 } }));

    const loaded = loadConfig({ projectRoot: dir, env: {}, logger: captureLogger(entries) });

    expect(loaded.context.maxItemFraction).toBe(0.25);
    expect(events(entries, 'warn')).toEqual(['config.invalid']);
  });
});
