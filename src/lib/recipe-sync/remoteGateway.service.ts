/**
 * Remote Gateway Service
 *
 * Thin client over the remote recipe catalog (`recipes` table) and the
 * user's synced favorites (`favorite_recipes` table, unique on
 * user_id + recipe_id). Every call is bounded by the request timeout;
 * reads and favorite pushes are retried on network failures with
 * exponential backoff.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { AppError } from '@/src/lib/errors/app-error';
import {
  RECIPE_ROW_COLUMNS,
  favoriteRowSchema,
  recipeRowSchema,
  type RecipeRow,
} from '@/src/lib/recipes/recipes.schemas';
import type {
  Recipe,
  RecipeAlternate,
  RecipeId,
} from '@/src/lib/recipes/recipes.types';
import {
  classifyRemoteFailure,
  withRetry,
  withTimeout,
  type RemoteFailure,
} from './remoteCall';
import { silentSyncLogger, type SyncLogger } from './syncLogger';

export interface RemoteGateway {
  /** Full catalog; no incremental fetch */
  fetchCatalog(): Promise<Recipe[]>;
  fetchFavoriteIds(): Promise<Set<RecipeId>>;
  /** Idempotent; throws REMOTE_ERROR once retries are exhausted */
  pushFavoriteChange(recipeId: RecipeId, isFavorite: boolean): Promise<void>;
}

export type SupabaseRemoteGatewayOptions = {
  userId: string;
  requestTimeoutMs: number;
  /** Attempts per push and per read page */
  pushMaxAttempts: number;
  pushBaseDelayMs: number;
  /** Rows per page for catalog and favorite reads */
  catalogPageSize: number;
  logger?: SyncLogger;
  sleep?: (ms: number) => Promise<void>;
};

type QueryResult = {
  data: unknown;
  error: { message: string; code?: string } | null;
  status: number;
};

/**
 * Map a validated row to a Recipe. Alternate layouts pair up
 * alternate_ingredients[_n] with alternate_output[_n] (falling back to output).
 */
export function mapRecipeRow(row: RecipeRow): Recipe {
  const pairs: [string[] | null | undefined, number | null | undefined][] = [
    [row.alternate_ingredients, row.alternate_output],
    [row.alternate_ingredients_1, row.alternate_output_1],
    [row.alternate_ingredients_2, row.alternate_output_2],
    [row.alternate_ingredients_3, row.alternate_output_3],
  ];
  const alternates: RecipeAlternate[] = [];
  for (const [ingredients, output] of pairs) {
    if (ingredients && ingredients.length > 0) {
      alternates.push({ ingredients, output: output ?? row.output });
    }
  }

  return {
    id: row.id,
    name: row.name,
    image: row.image,
    ingredients: row.ingredients,
    output: row.output,
    category: row.category,
    alternates,
    remarks: row.remarks,
    imageRemark: row.image_remark,
  };
}

/**
 * Supabase-backed RemoteGateway
 */
export class SupabaseRemoteGateway implements RemoteGateway {
  private readonly logger: SyncLogger;

  constructor(
    private readonly supabase: SupabaseClient,
    private readonly options: SupabaseRemoteGatewayOptions,
  ) {
    this.logger = options.logger ?? silentSyncLogger;
  }

  async fetchCatalog(): Promise<Recipe[]> {
    const rows = await this.fetchPages('fetchCatalog', (from, to, signal) =>
      this.supabase
        .from('recipes')
        .select(RECIPE_ROW_COLUMNS)
        .order('id', { ascending: true })
        .range(from, to)
        .abortSignal(signal),
    );

    const recipes: Recipe[] = [];
    const seenIds = new Set<RecipeId>();
    let skipped = 0;
    for (const raw of rows) {
      const parsed = recipeRowSchema.safeParse(raw);
      if (!parsed.success || seenIds.has(parsed.data.id)) {
        skipped++;
        continue;
      }
      seenIds.add(parsed.data.id);
      recipes.push(mapRecipeRow(parsed.data));
    }

    if (skipped > 0) {
      this.logger.warn('catalog_rows_skipped', { skipped });
    }
    this.logger.debug('catalog_fetched', { recipes: recipes.length });
    return recipes;
  }

  async fetchFavoriteIds(): Promise<Set<RecipeId>> {
    const rows = await this.fetchPages('fetchFavoriteIds', (from, to, signal) =>
      this.supabase
        .from('favorite_recipes')
        .select('recipe_id')
        .eq('user_id', this.options.userId)
        .order('recipe_id', { ascending: true })
        .range(from, to)
        .abortSignal(signal),
    );

    const ids = new Set<RecipeId>();
    for (const raw of rows) {
      const parsed = favoriteRowSchema.safeParse(raw);
      if (parsed.success) ids.add(parsed.data.recipe_id);
    }
    return ids;
  }

  async pushFavoriteChange(
    recipeId: RecipeId,
    isFavorite: boolean,
  ): Promise<void> {
    const { userId, pushMaxAttempts, pushBaseDelayMs, sleep } = this.options;

    try {
      await withRetry(
        () =>
          this.execute('pushFavoriteChange', (signal) =>
            isFavorite
              ? this.supabase
                  .from('favorite_recipes')
                  .upsert(
                    { user_id: userId, recipe_id: recipeId },
                    { onConflict: 'user_id,recipe_id', ignoreDuplicates: true },
                  )
                  .abortSignal(signal)
              : this.supabase
                  .from('favorite_recipes')
                  .delete()
                  .eq('user_id', userId)
                  .eq('recipe_id', recipeId)
                  .abortSignal(signal),
          ),
        {
          maxAttempts: pushMaxAttempts,
          baseDelayMs: pushBaseDelayMs,
          sleep,
          onRetry: (attempt, delayMs, error) =>
            this.logger.warn('favorite_push_retry', {
              recipeId,
              attempt,
              maxAttempts: pushMaxAttempts,
              delayMs,
              error,
            }),
        },
      );
    } catch (err) {
      this.logger.error('favorite_push_failed', {
        recipeId,
        isFavorite,
        error: err,
      });
      if (err instanceof AppError && err.code === 'REMOTE_ERROR') throw err;
      throw new AppError(
        'REMOTE_ERROR',
        'Could not sync favorite with the remote service',
        err,
      );
    }
  }

  /**
   * Read a table page by page (catalogPageSize rows each) until a short page.
   * Each page is retried on network failures like a push.
   */
  private async fetchPages(
    operation: string,
    page: (
      from: number,
      to: number,
      signal: AbortSignal,
    ) => PromiseLike<QueryResult>,
  ): Promise<unknown[]> {
    const { catalogPageSize, pushMaxAttempts, pushBaseDelayMs, sleep } =
      this.options;
    const rows: unknown[] = [];

    for (let from = 0; ; from += catalogPageSize) {
      const to = from + catalogPageSize - 1;
      const batch = await withRetry(
        () => this.query(operation, (signal) => page(from, to, signal)),
        {
          maxAttempts: pushMaxAttempts,
          baseDelayMs: pushBaseDelayMs,
          sleep,
          onRetry: (attempt, delayMs, error) =>
            this.logger.warn('remote_read_retry', {
              operation,
              attempt,
              delayMs,
              error,
            }),
        },
      );
      rows.push(...batch);
      if (batch.length < catalogPageSize) break;
    }
    return rows;
  }

  /** Run a query that returns rows; failures become AppErrors. */
  private async query(
    operation: string,
    run: (signal: AbortSignal) => PromiseLike<QueryResult>,
  ): Promise<unknown[]> {
    const result = await this.execute(operation, run);
    return Array.isArray(result.data) ? result.data : [];
  }

  private async execute(
    operation: string,
    run: (signal: AbortSignal) => PromiseLike<QueryResult>,
  ): Promise<QueryResult> {
    const result = await withTimeout(
      operation,
      this.options.requestTimeoutMs,
      run,
    );
    if (result.error) {
      const failure: RemoteFailure = {
        status: result.status,
        message: result.error.message,
        code: result.error.code,
      };
      throw classifyRemoteFailure(operation, failure);
    }
    return result;
  }
}
