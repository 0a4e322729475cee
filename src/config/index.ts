import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { AlreadyExistsError, errorMessage } from '../errors.js';
import type { Logger } from '../telemetry/logger.js';

export const CONTEXT_SOURCES = ['memory', 'code', 'experience', 'value', 'commit'] as const;

const positiveWeight = z.number().int().positive();

export const StorageConfigSchema = z.object({
  backend: z.enum(['memory', 'sqlite', 'qdrant']).default('memory'),
  sqlitePath: z.string().default('vectors.db'),
  qdrantUrl: z.string().url().default('http://localhost:6333'),
  qdrantApiKey: z.string().optional(),
  // Hard ceiling for a single scroll; clustering input is truncated beyond it
  scrollLimit: z.number().int().positive().default(10000),
});

export const EmbedderProviderSchema = z.object({
  provider: z.enum(['simple', 'ollama', 'openai']).default('simple'),
  model: z.string().optional(),
  url: z.string().optional(),
  apiKey: z.string().optional(),
  dimension: z.number().int().positive().optional(),
});

export const EmbeddingsConfigSchema = z.object({
  code: EmbedderProviderSchema.default({}),
  semantic: EmbedderProviderSchema.default({}),
});

export const ContextConfigSchema = z.object({
  sourceWeights: z.object({
    memory: positiveWeight.default(1),
    code: positiveWeight.default(2),
    experience: positiveWeight.default(3),
    value: positiveWeight.default(1),
    commit: positiveWeight.default(2),
  }).default({}),
  // 0.90 and 1000 have no empirical backing; tune per deployment
  similarityThreshold: z.number().min(0).max(1).default(0.9),
  maxFuzzyContentLength: z.number().int().nonnegative().default(1000),
  maxItemFraction: z.number().gt(0).max(1).default(0.25),
  maxTokens: z.number().int().min(1).max(100000).default(2000),
  tokenEstimator: z.enum(['chars', 'words']).default('chars'),
});

const tierWeight = z.number().gt(0).max(1);

export const ClusteringConfigSchema = z.object({
  minClusterSize: z.number().int().min(2).default(5),
  minSamples: z.number().int().min(1).default(3),
  selectionMethod: z.enum(['eom', 'leaf']).default('eom'),
  tierWeights: z.object({
    gold: tierWeight.default(1.0),
    silver: tierWeight.default(0.8),
    bronze: tierWeight.default(0.3),
    abandoned: tierWeight.default(0.1),
    unknown: tierWeight.default(0.5),
  }).default({}),
  timeoutMs: z.number().int().positive().default(120000),
  concurrency: z.number().int().positive().default(1),
});

export const ValuesConfigSchema = z.object({
  minExperiences: z.number().int().nonnegative().default(20),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  storage: StorageConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  context: ContextConfigSchema.default({}),
  clustering: ClusteringConfigSchema.default({}),
  values: ValuesConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type EmbedderProviderConfig = z.infer<typeof EmbedderProviderSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type ContextConfig = z.infer<typeof ContextConfigSchema>;
export type ClusteringConfig = z.infer<typeof ClusteringConfigSchema>;
export type ValuesConfig = z.infer<typeof ValuesConfigSchema>;
export type TierWeights = ClusteringConfig['tierWeights'];

export const LOCI_DIR = '.loci';
export const CONFIG_FILE = 'config.json';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const lociPath = path.join(currentDir, LOCI_DIR);
    if (fs.existsSync(lociPath) && fs.statSync(lociPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getConfigPath(projectRoot: string): string {
  return path.join(projectRoot, LOCI_DIR, CONFIG_FILE);
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// LOCI_* variables win over the file
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env = process.env): Record<string, unknown> {
  const section = (key: string): Record<string, unknown> => {
    const current = raw[key];
    return isRecord(current) ? { ...current } : {};
  };

  const storage = section('storage');
  const logging = section('logging');

  if (env.LOCI_STORAGE_BACKEND) storage.backend = env.LOCI_STORAGE_BACKEND;
  if (env.LOCI_SQLITE_PATH) storage.sqlitePath = env.LOCI_SQLITE_PATH;
  if (env.LOCI_QDRANT_URL) storage.qdrantUrl = env.LOCI_QDRANT_URL;
  if (env.LOCI_QDRANT_API_KEY) storage.qdrantApiKey = env.LOCI_QDRANT_API_KEY;
  if (env.LOCI_SCROLL_LIMIT) storage.scrollLimit = Number.parseInt(env.LOCI_SCROLL_LIMIT, 10);
  if (env.LOCI_LOG_LEVEL) logging.level = env.LOCI_LOG_LEVEL;

  return { ...raw, storage, logging };
}

export function loadConfig(options: { projectRoot?: string; env?: Env; logger?: Logger } = {}): Config {
  const root = options.projectRoot ?? findProjectRoot();
  const env = options.env ?? process.env;
  let raw: Record<string, unknown> = {};

  if (root) {
    const configPath = getConfigPath(root);
    if (fs.existsSync(configPath)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
        if (isRecord(parsed)) {
          raw = parsed;
        }
      } catch (error) {
        options.logger?.warn('config.unreadable', { path: configPath, error: errorMessage(error) });
      }
    }
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (result.success) {
    return result.data;
  }

  options.logger?.warn('config.invalid', { issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) });
  return defaultConfig();
}

export function saveConfig(config: Config, projectRoot: string): void {
  fs.writeFileSync(getConfigPath(projectRoot), JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): string {
  const lociPath = path.join(targetDir, LOCI_DIR);

  if (fs.existsSync(lociPath) && !force) {
    throw new AlreadyExistsError(`${LOCI_DIR} already exists in ${targetDir}`);
  }

  fs.mkdirSync(lociPath, { recursive: true, mode: 0o700 });
  saveConfig(defaultConfig(), targetDir);

  fs.writeFileSync(path.join(lociPath, '.gitignore'), `# loci local files
vectors.db
vectors.db-wal
vectors.db-shm
`);

  return lociPath;
}
