/**
 * Recipe sync config – loaded from config file and env.
 * Edit config/recipe-sync.json or set env vars; env wins over the file.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';

export type RecipeSyncConfig = {
  /** Directory holding recipe-state.json */
  dataDir: string;
  /** Upper bound for every remote call */
  requestTimeoutMs: number;
  pushMaxAttempts: number;
  /** First retry delay; doubles per attempt */
  pushBaseDelayMs: number;
  /** Non-manual refreshes within this window reuse the current snapshot */
  refreshCooldownMs: number;
  recentSearchLimit: number;
  catalogPageSize: number;
};

export type SupabaseCredentials = {
  url: string;
  anonKey: string;
  userId: string;
};

const DEFAULTS: RecipeSyncConfig = {
  dataDir: '.recipe-sync',
  requestTimeoutMs: 10_000,
  pushMaxAttempts: 3,
  pushBaseDelayMs: 500,
  refreshCooldownMs: 30_000,
  recentSearchLimit: 10,
  catalogPageSize: 1000,
};

const recipeSyncConfigSchema = z.object({
  dataDir: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  pushMaxAttempts: z.number().int().min(1),
  pushBaseDelayMs: z.number().int().min(0),
  refreshCooldownMs: z.number().int().min(0),
  recentSearchLimit: z.number().int().min(0),
  catalogPageSize: z.number().int().positive(),
});

const configFileSchema = recipeSyncConfigSchema.partial();

type NumericConfigKey = Exclude<keyof RecipeSyncConfig, 'dataDir'>;

const ENV_KEYS: ReadonlyArray<[NumericConfigKey, string]> = [
  ['requestTimeoutMs', 'RECIPE_SYNC_REQUEST_TIMEOUT_MS'],
  ['pushMaxAttempts', 'RECIPE_SYNC_PUSH_MAX_ATTEMPTS'],
  ['pushBaseDelayMs', 'RECIPE_SYNC_PUSH_BASE_DELAY_MS'],
  ['refreshCooldownMs', 'RECIPE_SYNC_REFRESH_COOLDOWN_MS'],
  ['recentSearchLimit', 'RECIPE_SYNC_RECENT_SEARCH_LIMIT'],
  ['catalogPageSize', 'RECIPE_SYNC_CATALOG_PAGE_SIZE'],
];

let cached: RecipeSyncConfig | null = null;

function readConfigFile(): Partial<RecipeSyncConfig> {
  const configPath =
    process.env.RECIPE_SYNC_CONFIG_PATH ??
    join(process.cwd(), 'config', 'recipe-sync.json');
  if (!existsSync(configPath)) return {};
  try {
    const parsed = configFileSchema.safeParse(
      JSON.parse(readFileSync(configPath, 'utf-8')),
    );
    if (parsed.success) return parsed.data;
    console.warn(
      '[RecipeSyncConfig] Invalid config file, using defaults:',
      parsed.error.issues.map((i) => i.path.join('.')).join(', '),
    );
  } catch (err) {
    console.warn('[RecipeSyncConfig] Unreadable config file, using defaults:', err);
  }
  return {};
}

function readEnvNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function readEnvOverrides(): Partial<RecipeSyncConfig> {
  const overrides: Partial<RecipeSyncConfig> = {};
  const dataDir = process.env.RECIPE_SYNC_DATA_DIR?.trim();
  if (dataDir) overrides.dataDir = dataDir;
  for (const [key, envName] of ENV_KEYS) {
    const value = readEnvNumber(envName);
    if (value !== undefined) overrides[key] = value;
  }
  return overrides;
}

function loadConfig(): RecipeSyncConfig {
  if (cached) return cached;
  const fromFile: RecipeSyncConfig = { ...DEFAULTS, ...readConfigFile() };

  // Env values get the same constraints as the file
  const parsed = recipeSyncConfigSchema.safeParse({
    ...fromFile,
    ...readEnvOverrides(),
  });
  if (parsed.success) {
    cached = parsed.data;
  } else {
    console.warn(
      '[RecipeSyncConfig] Invalid env overrides, ignoring them:',
      parsed.error.issues.map((i) => i.path.join('.')).join(', '),
    );
    cached = fromFile;
  }
  return cached;
}

/** Get recipe sync config (file + env). Reset cache for tests with resetRecipeSyncConfigCache(). */
export function getRecipeSyncConfig(): RecipeSyncConfig {
  return loadConfig();
}

/** Only for tests – reset in-memory cache so config is re-read. */
export function resetRecipeSyncConfigCache(): void {
  cached = null;
}

/**
 * Supabase project + user the favorites belong to. Throws CONFIG_ERROR when unset.
 */
export function getSupabaseCredentials(): SupabaseCredentials {
  const url = process.env.SUPABASE_URL;
  const anonKey = process.env.SUPABASE_ANON_KEY;
  const userId = process.env.RECIPE_SYNC_USER_ID;

  if (!url || !anonKey || !userId) {
    throw new AppError(
      'CONFIG_ERROR',
      'SUPABASE_URL, SUPABASE_ANON_KEY and RECIPE_SYNC_USER_ID must be set',
    );
  }
  return { url, anonKey, userId };
}
