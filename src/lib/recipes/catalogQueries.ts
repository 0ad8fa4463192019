/**
 * Read-side helpers over a published snapshot (filtering, category index,
 * favorites list, sync status label).
 */

import type { Recipe, Snapshot, SyncState } from './recipes.types';

export type RecipeFilter = {
  /** Exact category label; null/undefined = all categories */
  category?: string | null;
  /** Case-insensitive substring of the recipe name */
  search?: string;
};

export function filterRecipes(
  snapshot: Snapshot,
  filter: RecipeFilter = {},
): Recipe[] {
  const search = (filter.search ?? '').trim().toLowerCase();
  const category = filter.category ?? null;
  return snapshot.recipes.filter((recipe) => {
    const matchesCategory = category === null || recipe.category === category;
    const matchesSearch =
      search === '' || recipe.name.toLowerCase().includes(search);
    return matchesCategory && matchesSearch;
  });
}

/**
 * Category index: label -> recipes in snapshot order. Labels follow
 * `snapshot.categories`; uncategorized recipes are not indexed.
 */
export function recipesByCategory(snapshot: Snapshot): Map<string, Recipe[]> {
  const index = new Map<string, Recipe[]>();
  for (const label of snapshot.categories) index.set(label, []);
  for (const recipe of snapshot.recipes) {
    index.get(recipe.category)?.push(recipe);
  }
  return index;
}

export function favoriteRecipes(snapshot: Snapshot): Recipe[] {
  const ids = new Set(snapshot.favorites);
  return snapshot.recipes.filter((recipe) => ids.has(recipe.id));
}

export function findRecipe(
  snapshot: Snapshot,
  recipeId: number,
): Recipe | undefined {
  return snapshot.recipes.find((recipe) => recipe.id === recipeId);
}

function formatSyncTime(date: Date): string {
  // YYYY-MM-DD HH:mm (UTC)
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/** Status line for the secondary sync indicator. */
export function describeSyncState(
  state: SyncState,
  lastSyncedAt: Date | null,
): string {
  switch (state.status) {
    case 'syncing':
      return 'Syncing recipes...';
    case 'failed':
      return `Sync failed: ${state.error.safeMessage}`;
    case 'idle':
      return lastSyncedAt
        ? `Last synced: ${formatSyncTime(lastSyncedAt)}`
        : 'Not synced';
  }
}
