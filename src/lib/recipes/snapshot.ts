/**
 * Snapshot building and favorites reconciliation.
 *
 * Pure functions only; the sync engine decides when to call them.
 */

import type {
  PendingFavoriteChange,
  Recipe,
  RecipeId,
  Snapshot,
} from './recipes.types';

export type SnapshotInput = {
  recipes: readonly Recipe[];
  favorites: Iterable<RecipeId>;
  recentSearches?: readonly string[];
};

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  recipes: Object.freeze([]),
  categories: Object.freeze([]),
  favorites: Object.freeze([]),
  recentSearches: Object.freeze([]),
});

function compareRecipes(a: Recipe, b: Recipe): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.id - b.id;
}

function freezeRecipe(recipe: Recipe): Recipe {
  if (Object.isFrozen(recipe)) return recipe;
  return Object.freeze({
    ...recipe,
    ingredients: Object.freeze([...recipe.ingredients]),
    alternates: Object.freeze(
      recipe.alternates.map((alt) =>
        Object.freeze({
          ingredients: Object.freeze([...alt.ingredients]),
          output: alt.output,
        }),
      ),
    ),
  });
}

/** Distinct non-empty category labels, sorted. */
export function collectCategories(recipes: readonly Recipe[]): string[] {
  const labels = new Set<string>();
  for (const recipe of recipes) {
    if (recipe.category !== '') labels.add(recipe.category);
  }
  return [...labels].sort();
}

/** Keep only ids present in the catalog; sorted ascending, no duplicates. */
export function pruneFavorites(
  favorites: Iterable<RecipeId>,
  recipes: readonly Recipe[],
): RecipeId[] {
  const catalogIds = new Set(recipes.map((r) => r.id));
  const kept = new Set<RecipeId>();
  for (const id of favorites) {
    if (catalogIds.has(id)) kept.add(id);
  }
  return [...kept].sort((a, b) => a - b);
}

/** Drop names no longer in the catalog and cap the list. */
export function pruneRecentSearches(
  names: readonly string[],
  recipes: readonly Recipe[],
  limit: number,
): string[] {
  const catalogNames = new Set(recipes.map((r) => r.name));
  const kept: string[] = [];
  for (const name of names) {
    if (kept.length >= limit) break;
    if (catalogNames.has(name) && !kept.includes(name)) kept.push(name);
  }
  return kept;
}

/**
 * Build an immutable snapshot. Identical inputs give structurally identical
 * snapshots regardless of input order.
 */
export function buildSnapshot(input: SnapshotInput): Snapshot {
  const recipes = [...input.recipes].sort(compareRecipes).map(freezeRecipe);
  return Object.freeze({
    recipes: Object.freeze(recipes),
    categories: Object.freeze(collectCategories(recipes)),
    favorites: Object.freeze(pruneFavorites(input.favorites, recipes)),
    recentSearches: Object.freeze(
      pruneRecentSearches(
        input.recentSearches ?? [],
        recipes,
        Number.POSITIVE_INFINITY,
      ),
    ),
  });
}

export type FavoritesMerge = {
  favorites: RecipeId[];
  /** Pending changes whose recipe still exists */
  pendingChanges: PendingFavoriteChange[];
};

/**
 * Reconcile remote favorites with local changes the remote has not seen yet.
 * Result = (remote ∪ pending adds) − pending removals, restricted to the catalog.
 */
export function mergeFavoriteIds(
  remoteIds: Iterable<RecipeId>,
  pendingChanges: readonly PendingFavoriteChange[],
  recipes: readonly Recipe[],
): FavoritesMerge {
  const merged = new Set(remoteIds);
  for (const change of pendingChanges) {
    if (change.isFavorite) merged.add(change.recipeId);
    else merged.delete(change.recipeId);
  }
  const catalogIds = new Set(recipes.map((r) => r.id));
  return {
    favorites: pruneFavorites(merged, recipes),
    pendingChanges: pendingChanges.filter((c) => catalogIds.has(c.recipeId)),
  };
}
