/**
 * Recipe Sync Module
 *
 * Local-first crafting recipe catalog with favorites synced to Supabase.
 */

export { RecipeSyncEngine } from './syncEngine.service';
export type {
  RecipeSyncEngineOptions,
  RefreshOptions,
} from './syncEngine.service';

export { createRecipeSyncEngine } from './createRecipeSyncEngine';
export type { CreateRecipeSyncEngineOptions } from './createRecipeSyncEngine';

export { FileLocalStore } from './localStore.service';
export type { LocalStore, LocalLoadResult, LocalStateMeta } from './localStore.service';

export { SupabaseRemoteGateway, mapRecipeRow } from './remoteGateway.service';
export type {
  RemoteGateway,
  SupabaseRemoteGatewayOptions,
} from './remoteGateway.service';

export { SnapshotCache } from './snapshotCache';
export type { SnapshotListener } from './snapshotCache';

export {
  getRecipeSyncConfig,
  getSupabaseCredentials,
  resetRecipeSyncConfigCache,
} from './recipeSync.config';
export type { RecipeSyncConfig, SupabaseCredentials } from './recipeSync.config';

export { createSyncLogger, silentSyncLogger } from './syncLogger';
export type { SyncLogger, SyncLogEvent, SyncLogLevel } from './syncLogger';

export { presentSyncError } from './syncErrorPresenter';
export type { SyncErrorPresentation } from './syncErrorPresenter';

export {
  filterRecipes,
  recipesByCategory,
  favoriteRecipes,
  findRecipe,
  describeSyncState,
} from '@/src/lib/recipes/catalogQueries';
export type { RecipeFilter } from '@/src/lib/recipes/catalogQueries';

export type {
  Recipe,
  RecipeAlternate,
  RecipeId,
  Snapshot,
  SyncState,
  PendingFavoriteChange,
} from '@/src/lib/recipes/recipes.types';

export { AppError, isAppError } from '@/src/lib/errors/app-error';
export type { AppErrorCode } from '@/src/lib/errors/app-error';
