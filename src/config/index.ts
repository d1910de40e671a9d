// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for Saved Items & Export
// ═══════════════════════════════════════════════════════════════════════════════

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function envBool(env: Env, key: string, defaultValue: boolean = false): boolean {
  const value = env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const StorageEraSchema = z.enum(['modern', 'legacy']);

export type StorageEra = z.infer<typeof StorageEraSchema>;

export const FavoritesConfigSchema = z.object({
  /** Root of app-private data; ephemeral exports live below it */
  dataDir: z.string().min(1),
  exportDirName: z.string().min(1).regex(/^[^/\\]+$/, 'Must be a single path segment'),
  exportFileBase: z.string().min(1).regex(/^[\w.-]+$/, 'Must be a plain file name'),

  /** Public downloads directory (legacy era) */
  downloadsDir: z.string().min(1),
  /** Root under which the shared downloads index registers entries (modern era) */
  sharedStorageRoot: z.string().min(1),
  storageEra: StorageEraSchema,

  shareDelayMs: z.number().int().min(0).max(60_000),
  discussionUrlTemplate: z.string().includes('%s', { message: 'Template must contain %s' }),
  documentTitle: z.string().min(1),

  ioConcurrency: z.number().int().min(1).max(64),
  redisUrl: z.string().url().optional(),

  debugMode: z.boolean(),
  logFormat: z.enum(['pretty', 'json']),
});

export type FavoritesConfig = z.infer<typeof FavoritesConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

export function getDefaultConfig(): FavoritesConfig {
  return {
    dataDir: './data',
    exportDirName: 'saved',
    exportFileBase: 'saved-stories-export',
    downloadsDir: join(homedir(), 'Downloads'),
    sharedStorageRoot: homedir(),
    storageEra: 'modern',
    shareDelayMs: 1500,
    discussionUrlTemplate: 'https://news.ycombinator.com/item?id=%s',
    documentTitle: 'Saved Stories',
    ioConcurrency: 4,
    redisUrl: undefined,
    debugMode: false,
    logFormat: 'pretty',
  };
}

export function validateConfig(input: unknown): FavoritesConfig {
  const parsed = FavoritesConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function buildConfig(env: Env = process.env): FavoritesConfig {
  const defaults = getDefaultConfig();

  return validateConfig({
    dataDir: envString(env, 'DATA_DIR', defaults.dataDir),
    exportDirName: envString(env, 'EXPORT_DIR_NAME', defaults.exportDirName),
    exportFileBase: envString(env, 'EXPORT_FILE_BASE', defaults.exportFileBase),
    downloadsDir: envString(env, 'DOWNLOADS_DIR', defaults.downloadsDir),
    sharedStorageRoot: envString(env, 'SHARED_STORAGE_ROOT', defaults.sharedStorageRoot),
    storageEra: envString(env, 'STORAGE_ERA', defaults.storageEra),
    shareDelayMs: envNumber(env, 'SHARE_DELAY_MS', defaults.shareDelayMs),
    discussionUrlTemplate: envString(env, 'DISCUSSION_URL_TEMPLATE', defaults.discussionUrlTemplate),
    documentTitle: envString(env, 'EXPORT_DOCUMENT_TITLE', defaults.documentTitle),
    ioConcurrency: envNumber(env, 'IO_CONCURRENCY', defaults.ioConcurrency),
    redisUrl: env.REDIS_URL || undefined,
    debugMode: envBool(env, 'DEBUG', defaults.debugMode),
    logFormat: envString(env, 'LOG_FORMAT', defaults.logFormat),
  });
}

let cachedConfig: FavoritesConfig | null = null;

export function loadConfig(env?: Env): FavoritesConfig {
  if (!cachedConfig) {
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Replace the cached config with defaults plus overrides. Tests only.
 */
export function loadTestConfig(overrides: Partial<FavoritesConfig> = {}): FavoritesConfig {
  cachedConfig = validateConfig({ ...getDefaultConfig(), ...overrides });
  return cachedConfig;
}
