import { resolve } from 'node:path';
import { createSupabaseClient } from '@/src/lib/supabase/client';
import { FileLocalStore, type LocalStore } from './localStore.service';
import {
  SupabaseRemoteGateway,
  type RemoteGateway,
} from './remoteGateway.service';
import {
  getRecipeSyncConfig,
  getSupabaseCredentials,
  type RecipeSyncConfig,
} from './recipeSync.config';
import { RecipeSyncEngine } from './syncEngine.service';
import { createSyncLogger, type SyncLogger } from './syncLogger';

export type CreateRecipeSyncEngineOptions = {
  /** Overrides on top of config file + env */
  config?: Partial<RecipeSyncConfig>;
  localStore?: LocalStore;
  remote?: RemoteGateway;
  logger?: SyncLogger;
};

/**
 * Wire the engine from config: file store under dataDir, Supabase gateway for
 * the configured user, console/NDJSON logger. Credentials are only required
 * when no remote is passed in.
 */
export function createRecipeSyncEngine(
  options: CreateRecipeSyncEngineOptions = {},
): RecipeSyncEngine {
  const config: RecipeSyncConfig = {
    ...getRecipeSyncConfig(),
    ...options.config,
  };
  const logger = options.logger ?? createSyncLogger({ scope: 'recipe-sync' });
  const localStore =
    options.localStore ?? new FileLocalStore(resolve(config.dataDir));

  let remote = options.remote;
  if (!remote) {
    const credentials = getSupabaseCredentials();
    remote = new SupabaseRemoteGateway(createSupabaseClient(credentials), {
      userId: credentials.userId,
      requestTimeoutMs: config.requestTimeoutMs,
      pushMaxAttempts: config.pushMaxAttempts,
      pushBaseDelayMs: config.pushBaseDelayMs,
      catalogPageSize: config.catalogPageSize,
      logger,
    });
  }

  return new RecipeSyncEngine({
    localStore,
    remote,
    logger,
    config: {
      refreshCooldownMs: config.refreshCooldownMs,
      recentSearchLimit: config.recentSearchLimit,
    },
  });
}
