/**
 * Recipe Types
 *
 * Crafting recipes (catalog), favorites and the published snapshot.
 */

import type { AppError } from '@/src/lib/errors/app-error';

/** Crafting grid size; ingredient lists never exceed this many cells. */
export const CRAFTING_GRID_CELLS = 9;

/** Alternate ingredient layout producing the same item */
export type RecipeAlternate = {
  ingredients: readonly string[];
  output: number;
};

/**
 * Catalog recipe. Created only by catalog ingestion and never mutated.
 */
export type Recipe = {
  id: number;
  name: string;
  /** Image reference (asset name or URL) */
  image: string;
  /** Grid cells in order; empty string = unused cell */
  ingredients: readonly string[];
  /** Number of items crafted (positive) */
  output: number;
  /** Category label; empty when uncategorized */
  category: string;
  alternates: readonly RecipeAlternate[];
  remarks: string | null;
  imageRemark: string | null;
};

export type RecipeId = Recipe['id'];

/** Local toggle not yet acknowledged by the remote favorites store */
export type PendingFavoriteChange = {
  recipeId: RecipeId;
  isFavorite: boolean;
};

/**
 * Published view. Replaced wholesale; never partially updated.
 */
export type Snapshot = {
  readonly recipes: readonly Recipe[];
  readonly categories: readonly string[];
  /** Sorted ascending; always a subset of recipe ids */
  readonly favorites: readonly RecipeId[];
  /** Recipe names, most recent first */
  readonly recentSearches: readonly string[];
};

export type SyncState =
  | { status: 'idle' }
  | { status: 'syncing' }
  | { status: 'failed'; error: AppError };
