/**
 * Local Store Service
 *
 * Durable on-disk copy of the recipe catalog, favorites, pending favorite
 * changes and recent searches. One JSON document, replaced atomically:
 * every write goes to a temp file in the same directory, is flushed to disk
 * and then renamed over the document, so a failed write or a power loss
 * never leaves a truncated catalog behind.
 */

import { promises as nodeFs } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { AppError } from '@/src/lib/errors/app-error';
import {
  PERSISTED_STATE_VERSION,
  persistedRecipeStateSchema,
  type PersistedRecipeState,
} from '@/src/lib/recipes/recipes.schemas';
import type {
  PendingFavoriteChange,
  Recipe,
  RecipeId,
} from '@/src/lib/recipes/recipes.types';

const STATE_FILE_NAME = 'recipe-state.json';

export type LocalStateMeta = {
  pendingChanges: readonly PendingFavoriteChange[];
  recentSearches: readonly string[];
  lastSyncedAt: string | null;
};

export const EMPTY_LOCAL_META: LocalStateMeta = {
  pendingChanges: [],
  recentSearches: [],
  lastSyncedAt: null,
};

export type LocalLoadResult =
  | { found: true; state: PersistedRecipeState }
  | { found: false };

export interface LocalStore {
  /** `found: false` only when nothing has been persisted; I/O and corruption throw STORAGE_ERROR. */
  load(): Promise<LocalLoadResult>;
  save(
    recipes: readonly Recipe[],
    favorites: readonly RecipeId[],
    meta: LocalStateMeta,
  ): Promise<void>;
  updateFavorites(
    favorites: readonly RecipeId[],
    pendingChanges: readonly PendingFavoriteChange[],
  ): Promise<void>;
  updateRecentSearches(names: readonly string[]): Promise<void>;
  clear(): Promise<void>;
}

/** Subset of fs/promises used by the store (injectable for failure tests) */
/** The part of fs.promises.FileHandle the store writes through */
export type LocalFileHandle = {
  writeFile(data: string, encoding: 'utf-8'): Promise<void>;
  datasync(): Promise<void>;
  close(): Promise<void>;
};

export type LocalStoreFs = {
  readFile(path: string, encoding: 'utf-8'): Promise<string>;
  open(path: string, flags: 'w'): Promise<LocalFileHandle>;
  rename(from: string, to: string): Promise<void>;
  rm(path: string, options: { force: boolean }): Promise<void>;
  mkdir(path: string, options: { recursive: true }): Promise<unknown>;
};

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error && 'code' in err && err.code === 'ENOENT'
  );
}

/**
 * File-backed LocalStore
 */
export class FileLocalStore implements LocalStore {
  private readonly filePath: string;

  constructor(
    private readonly dataDir: string,
    private readonly fs: LocalStoreFs = nodeFs,
  ) {
    this.filePath = join(dataDir, STATE_FILE_NAME);
  }

  async load(): Promise<LocalLoadResult> {
    let raw: string;
    try {
      raw = await this.fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return { found: false };
      throw new AppError('STORAGE_ERROR', 'Could not read local recipe cache', err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new AppError('STORAGE_ERROR', 'Local recipe cache is corrupted', err);
    }

    const parsed = persistedRecipeStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new AppError('STORAGE_ERROR', 'Local recipe cache is corrupted', {
        issues: parsed.error.issues.length,
      });
    }
    return { found: true, state: parsed.data };
  }

  async save(
    recipes: readonly Recipe[],
    favorites: readonly RecipeId[],
    meta: LocalStateMeta,
  ): Promise<void> {
    await this.writeState({
      version: PERSISTED_STATE_VERSION,
      savedAt: new Date().toISOString(),
      lastSyncedAt: meta.lastSyncedAt,
      recipes: recipes.map((recipe) => ({
        ...recipe,
        ingredients: [...recipe.ingredients],
        alternates: recipe.alternates.map((alt) => ({
          ingredients: [...alt.ingredients],
          output: alt.output,
        })),
      })),
      favorites: [...favorites],
      pendingChanges: meta.pendingChanges.map((c) => ({ ...c })),
      recentSearches: [...meta.recentSearches],
    });
  }

  async updateFavorites(
    favorites: readonly RecipeId[],
    pendingChanges: readonly PendingFavoriteChange[],
  ): Promise<void> {
    const current = await this.requireState();
    await this.writeState({
      ...current,
      savedAt: new Date().toISOString(),
      favorites: [...favorites],
      pendingChanges: pendingChanges.map((c) => ({ ...c })),
    });
  }

  async updateRecentSearches(names: readonly string[]): Promise<void> {
    const current = await this.requireState();
    await this.writeState({
      ...current,
      savedAt: new Date().toISOString(),
      recentSearches: [...names],
    });
  }

  async clear(): Promise<void> {
    try {
      await this.fs.rm(this.filePath, { force: true });
    } catch (err) {
      throw new AppError('STORAGE_ERROR', 'Could not clear local recipe cache', err);
    }
  }

  private async requireState(): Promise<PersistedRecipeState> {
    const result = await this.load();
    if (!result.found) {
      throw new AppError(
        'STORAGE_ERROR',
        'No local recipe cache to update; sync the catalog first',
      );
    }
    return result.state;
  }

  /** Write-then-swap; the previous document stays intact until rename. */
  private async writeState(state: PersistedRecipeState): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await this.fs.mkdir(this.dataDir, { recursive: true });
      const handle = await this.fs.open(tempPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(state), 'utf-8');
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await this.fs.rename(tempPath, this.filePath);
    } catch (err) {
      await this.fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.warn('[LocalStore] Could not remove temp file:', cleanupErr);
      });
      throw new AppError('STORAGE_ERROR', 'Could not write local recipe cache', err);
    }
  }
}
