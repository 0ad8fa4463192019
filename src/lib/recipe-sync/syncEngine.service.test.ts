/**
 * Recipe Sync Engine tests
 *
 * In-memory LocalStore and RemoteGateway fakes; the remote can hold fetches
 * until released and can make pushes hang or fail.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RecipeSyncEngine } from './syncEngine.service';
import type { LocalLoadResult, LocalStateMeta, LocalStore } from './localStore.service';
import type { RemoteGateway } from './remoteGateway.service';
import { AppError } from '@/src/lib/errors/app-error';
import {
  PERSISTED_STATE_VERSION,
  type PersistedRecipeState,
} from '@/src/lib/recipes/recipes.schemas';
import type {
  PendingFavoriteChange,
  Recipe,
  RecipeId,
  Snapshot,
  SyncState,
} from '@/src/lib/recipes/recipes.types';
import { chest, makeRecipe, torch } from '@/src/lib/recipes/recipes.testUtils';

// -----------------------------------------------------------------------------
// Fakes
// -----------------------------------------------------------------------------

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

async function until(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 50 && !condition(); i++) await tick();
  assert.ok(condition(), 'condition not reached');
}

function toPersistedRecipes(recipes: readonly Recipe[]): PersistedRecipeState['recipes'] {
  return recipes.map((r) => ({
    ...r,
    ingredients: [...r.ingredients],
    alternates: r.alternates.map((a) => ({
      ingredients: [...a.ingredients],
      output: a.output,
    })),
  }));
}

class MemoryLocalStore implements LocalStore {
  state: PersistedRecipeState | null = null;
  failWrites = false;
  failLoad = false;
  failClear = false;
  saves = 0;
  clearCalls = 0;

  seed(
    recipes: readonly Recipe[],
    favorites: RecipeId[],
    extra: Partial<LocalStateMeta> = {},
  ): void {
    this.state = {
      version: PERSISTED_STATE_VERSION,
      savedAt: '2026-01-01T00:00:00.000Z',
      lastSyncedAt: extra.lastSyncedAt ?? null,
      recipes: toPersistedRecipes(recipes),
      favorites,
      pendingChanges: [...(extra.pendingChanges ?? [])],
      recentSearches: [...(extra.recentSearches ?? [])],
    };
  }

  async load(): Promise<LocalLoadResult> {
    if (this.failLoad) throw new AppError('STORAGE_ERROR', 'corrupted');
    return this.state
      ? { found: true, state: structuredClone(this.state) }
      : { found: false };
  }

  async save(
    recipes: readonly Recipe[],
    favorites: readonly RecipeId[],
    meta: LocalStateMeta,
  ): Promise<void> {
    this.assertWritable();
    this.saves++;
    this.state = {
      version: PERSISTED_STATE_VERSION,
      savedAt: new Date().toISOString(),
      lastSyncedAt: meta.lastSyncedAt,
      recipes: toPersistedRecipes(recipes),
      favorites: [...favorites],
      pendingChanges: meta.pendingChanges.map((c) => ({ ...c })),
      recentSearches: [...meta.recentSearches],
    };
  }

  async updateFavorites(
    favorites: readonly RecipeId[],
    pendingChanges: readonly PendingFavoriteChange[],
  ): Promise<void> {
    this.assertWritable();
    const current = this.requireState();
    this.state = {
      ...current,
      favorites: [...favorites],
      pendingChanges: pendingChanges.map((c) => ({ ...c })),
    };
  }

  async updateRecentSearches(names: readonly string[]): Promise<void> {
    this.assertWritable();
    this.state = { ...this.requireState(), recentSearches: [...names] };
  }

  async clear(): Promise<void> {
    this.clearCalls++;
    if (this.failClear) throw new AppError('STORAGE_ERROR', 'locked');
    this.state = null;
  }

  private assertWritable(): void {
    if (this.failWrites) throw new AppError('STORAGE_ERROR', 'disk full');
  }

  private requireState(): PersistedRecipeState {
    if (!this.state) throw new AppError('STORAGE_ERROR', 'nothing persisted');
    return this.state;
  }
}

class FakeRemote implements RemoteGateway {
  catalog: Recipe[] = [torch, chest];
  favorites = new Set<RecipeId>();
  fetchError: AppError | null = null;
  pushMode: 'ok' | 'hang' | 'fail' = 'ok';
  catalogCalls = 0;
  favoriteCalls = 0;
  pushes: [RecipeId, boolean][] = [];
  private gate: { promise: Promise<void>; resolve: () => void } | null = null;
  private catalogGate: { promise: Promise<void>; resolve: () => void } | null = null;

  /** Hold only the catalog; favorites answer at once */
  holdCatalog(): void {
    this.catalogGate = deferred();
  }

  releaseCatalog(): void {
    const gate = this.catalogGate;
    this.catalogGate = null;
    gate?.resolve();
  }

  hold(): void {
    this.gate = deferred();
  }

  release(): void {
    const gate = this.gate;
    this.gate = null;
    gate?.resolve();
  }

  async fetchCatalog(): Promise<Recipe[]> {
    this.catalogCalls++;
    await this.gate?.promise;
    await this.catalogGate?.promise;
    if (this.fetchError) throw this.fetchError;
    return [...this.catalog];
  }

  async fetchFavoriteIds(): Promise<Set<RecipeId>> {
    this.favoriteCalls++;
    await this.gate?.promise;
    if (this.fetchError) throw this.fetchError;
    return new Set(this.favorites);
  }

  async pushFavoriteChange(recipeId: RecipeId, isFavorite: boolean): Promise<void> {
    this.pushes.push([recipeId, isFavorite]);
    if (this.pushMode === 'hang') return new Promise<void>(() => undefined);
    if (this.pushMode === 'fail') {
      throw new AppError('REMOTE_ERROR', 'Could not sync favorite');
    }
    if (isFavorite) this.favorites.add(recipeId);
    else this.favorites.delete(recipeId);
  }
}

function setup(options: { cooldownMs?: number; now?: () => Date } = {}) {
  const store = new MemoryLocalStore();
  const remote = new FakeRemote();
  const engine = new RecipeSyncEngine({
    localStore: store,
    remote,
    config: { refreshCooldownMs: options.cooldownMs ?? 0, recentSearchLimit: 3 },
    now: options.now,
  });
  return { store, remote, engine };
}

function assertFavoritesInCatalog(snapshot: Snapshot): void {
  const ids = new Set(snapshot.recipes.map((r) => r.id));
  for (const id of snapshot.favorites) {
    assert.ok(ids.has(id), `favorite ${id} is not in the catalog`);
  }
}

const networkDown = new AppError('NETWORK_ERROR', 'Network issue during fetchCatalog');

// -----------------------------------------------------------------------------
// Tests
// -----------------------------------------------------------------------------

describe('RecipeSyncEngine', () => {
  describe('start', () => {
    it('waits for the first refresh when nothing is persisted', async () => {
      const { engine, store, remote } = setup();
      remote.favorites = new Set([2]);

      const snapshot = await engine.start();

      assert.deepStrictEqual(
        snapshot.recipes.map((r) => r.name),
        ['Chest', 'Torch'],
      );
      assert.deepStrictEqual(snapshot.categories, ['Storage', 'Tools']);
      assert.deepStrictEqual(snapshot.favorites, [2]);
      assert.deepStrictEqual(engine.currentSyncState(), { status: 'idle' });
      assert.deepStrictEqual(store.state?.favorites, [2]);
      assert.strictEqual(remote.catalogCalls, 1);
    });

    it('publishes persisted state first and reconciles in the background', async () => {
      const { engine, store, remote } = setup();
      store.seed([torch], [1], { lastSyncedAt: '2026-02-01T08:00:00.000Z' });
      remote.favorites = new Set([1, 2]);
      remote.hold();

      const provisional = await engine.start();

      assert.deepStrictEqual(
        provisional.recipes.map((r) => r.id),
        [1],
      );
      assert.strictEqual(engine.currentSyncState().status, 'syncing');
      assert.strictEqual(
        engine.lastSyncedAt()?.toISOString(),
        '2026-02-01T08:00:00.000Z',
      );

      remote.release();
      const reconciled = await engine.refresh();

      assert.deepStrictEqual(reconciled.favorites, [1, 2]);
      assert.strictEqual(remote.catalogCalls, 1);
      assert.strictEqual(engine.currentSnapshot(), reconciled);
    });

    it('treats an unreadable local cache like a first launch', async () => {
      const { engine, store } = setup();
      store.failLoad = true;

      const snapshot = await engine.start();

      assert.strictEqual(snapshot.recipes.length, 2);
      assert.strictEqual(engine.currentSyncState().status, 'idle');
    });

    it('leaves an empty snapshot when the first refresh fails', async () => {
      const { engine, remote } = setup();
      remote.fetchError = networkDown;

      const snapshot = await engine.start();

      assert.strictEqual(snapshot.recipes.length, 0);
      const state = engine.currentSyncState();
      assert.strictEqual(state.status, 'failed');
    });
  });

  describe('refresh', () => {
    it('coalesces concurrent calls into one fetch', async () => {
      const { engine, remote } = setup();
      await engine.start();
      remote.hold();

      const calls = Array.from({ length: 5 }, () => engine.refresh());
      await tick();
      remote.release();
      const results = await Promise.all(calls);

      assert.strictEqual(remote.catalogCalls, 2);
      assert.strictEqual(remote.favoriteCalls, 2);
      for (const result of results) assert.strictEqual(result, results[0]);
    });

    it('yields identical snapshots for an unchanged remote', async () => {
      const { engine, remote } = setup();
      remote.favorites = new Set([1]);
      await engine.start();

      const first = await engine.refresh();
      const second = await engine.refresh();

      assert.notStrictEqual(first, second);
      assert.deepStrictEqual(first, second);
      assert.strictEqual(JSON.stringify(first), JSON.stringify(second));
    });

    it('keeps the previous snapshot and reports failure when the fetch fails', async () => {
      const { engine, remote } = setup();
      await engine.start();
      const before = engine.currentSnapshot();
      remote.fetchError = networkDown;

      const after = await engine.refresh();

      assert.strictEqual(after, before);
      assert.strictEqual(engine.currentSnapshot(), before);
      const state = engine.currentSyncState();
      assert.ok(state.status === 'failed');
      assert.strictEqual(state.error.code, 'NETWORK_ERROR');
    });

    it('keeps the previous snapshot when persisting the catalog fails', async () => {
      const { engine, store, remote } = setup();
      await engine.start();
      const before = engine.currentSnapshot();
      remote.catalog = [torch];
      store.failWrites = true;

      await engine.refresh();

      assert.strictEqual(engine.currentSnapshot(), before);
      const state = engine.currentSyncState();
      assert.ok(state.status === 'failed');
      assert.strictEqual(state.error.code, 'STORAGE_ERROR');
    });

    it('prunes favorites of recipes removed from the catalog', async () => {
      const { engine, store, remote } = setup();
      remote.favorites = new Set([1, 2]);
      await engine.start();
      assert.deepStrictEqual(engine.currentSnapshot().favorites, [1, 2]);

      remote.catalog = [torch];
      const snapshot = await engine.refresh();

      assert.deepStrictEqual(snapshot.favorites, [1]);
      assert.strictEqual(engine.isFavorite(2), false);
      assert.deepStrictEqual(store.state?.favorites, [1]);
      assertFavoritesInCatalog(snapshot);
    });

    it('skips a non-manual refresh during the cooldown', async () => {
      let nowMs = Date.parse('2026-06-01T12:00:00.000Z');
      const { engine, remote } = setup({
        cooldownMs: 30_000,
        now: () => new Date(nowMs),
      });
      await engine.start();
      assert.strictEqual(engine.isRefreshOnCooldown(), true);

      await engine.refresh();
      assert.strictEqual(remote.catalogCalls, 1);

      await engine.refresh({ manual: true });
      assert.strictEqual(remote.catalogCalls, 2);

      nowMs += 30_000;
      assert.strictEqual(engine.isRefreshOnCooldown(), false);
      await engine.refresh();
      assert.strictEqual(remote.catalogCalls, 3);
    });

    it('notifies subscribers of state changes and new snapshots', async () => {
      const { engine } = setup();
      const seen: string[] = [];
      engine.subscribe((snapshot: Snapshot, state: SyncState) => {
        seen.push(`${state.status}:${snapshot.recipes.length}`);
      });

      await engine.start();

      assert.deepStrictEqual(seen, ['syncing:0', 'syncing:2', 'idle:2']);
    });

    it('describes the sync status', async () => {
      const { engine } = setup({
        now: () => new Date('2026-06-01T12:00:00.000Z'),
      });
      assert.strictEqual(engine.syncStatusLabel(), 'Not synced');
      await engine.start();
      assert.strictEqual(
        engine.syncStatusLabel(),
        'Last synced: 2026-06-01 12:00',
      );
    });
  });

  describe('toggleFavorite', () => {
    it('updates locally before the network answers and merges with remote favorites', async () => {
      const { engine, remote } = setup();
      await engine.start();
      remote.pushMode = 'hang';

      const isFavorite = await engine.toggleFavorite(1);

      assert.strictEqual(isFavorite, true);
      assert.strictEqual(engine.isFavorite(1), true);
      assert.deepStrictEqual(remote.pushes, [[1, true]]);

      remote.favorites = new Set([2]);
      const snapshot = await engine.refresh();
      assert.deepStrictEqual(snapshot.favorites, [1, 2]);
    });

    it('persists the toggle and the pending change', async () => {
      const { engine, store, remote } = setup();
      await engine.start();
      remote.pushMode = 'hang';

      await engine.toggleFavorite(2);

      assert.deepStrictEqual(store.state?.favorites, [2]);
      assert.deepStrictEqual(store.state?.pendingChanges, [
        { recipeId: 2, isFavorite: true },
      ]);
      assert.deepStrictEqual(engine.pendingFavoriteChanges(), [
        { recipeId: 2, isFavorite: true },
      ]);
    });

    it('clears the pending change once the push is acknowledged', async () => {
      const { engine, store, remote } = setup();
      await engine.start();

      await engine.toggleFavorite(1);
      await engine.flushPendingWrites();

      assert.deepStrictEqual(engine.pendingFavoriteChanges(), []);
      assert.deepStrictEqual(store.state?.pendingChanges, []);
      assert.deepStrictEqual([...remote.favorites], [1]);
      assert.strictEqual(engine.lastPushError(), null);
    });

    it('toggles back off', async () => {
      const { engine, remote } = setup();
      remote.favorites = new Set([1]);
      await engine.start();

      assert.strictEqual(await engine.toggleFavorite(1), false);
      await engine.flushPendingWrites();

      assert.strictEqual(engine.isFavorite(1), false);
      assert.deepStrictEqual([...remote.favorites], []);
    });

    it('keeps a failed push local and re-sends it after the next refresh', async () => {
      const { engine, remote } = setup();
      await engine.start();
      remote.pushMode = 'fail';

      await engine.toggleFavorite(1);
      await engine.flushPendingWrites();

      assert.strictEqual(engine.isFavorite(1), true);
      assert.strictEqual(engine.lastPushError()?.code, 'REMOTE_ERROR');
      assert.deepStrictEqual(engine.pendingFavoriteChanges(), [
        { recipeId: 1, isFavorite: true },
      ]);

      remote.pushMode = 'ok';
      const snapshot = await engine.refresh();
      await engine.flushPendingWrites();

      assert.deepStrictEqual(snapshot.favorites, [1]);
      assert.deepStrictEqual(engine.pendingFavoriteChanges(), []);
      assert.deepStrictEqual([...remote.favorites], [1]);
      assert.deepStrictEqual(remote.pushes, [
        [1, true],
        [1, true],
      ]);
    });

    it('merges a toggle made while a refresh is fetching', async () => {
      const { engine, remote } = setup();
      await engine.start();
      remote.pushMode = 'hang';
      remote.hold();

      const refreshing = engine.refresh();
      await tick();
      await engine.toggleFavorite(2);
      assert.strictEqual(engine.isFavorite(2), true);
      remote.release();

      const snapshot = await refreshing;
      assert.deepStrictEqual(snapshot.favorites, [2]);
    });

    it('keeps a favorite whose push lands while the catalog is loading', async () => {
      const { engine, store, remote } = setup();
      await engine.start();
      remote.holdCatalog();

      const refreshing = engine.refresh();
      await tick();
      await engine.toggleFavorite(1);
      await until(() => engine.pendingFavoriteChanges().length === 0);
      assert.deepStrictEqual([...remote.favorites], [1]);
      remote.releaseCatalog();

      const snapshot = await refreshing;
      assert.deepStrictEqual(snapshot.favorites, [1]);
      assert.deepStrictEqual(store.state?.favorites, [1]);
      assert.deepStrictEqual(store.state?.pendingChanges, []);
    });

    it('keeps an unfavorite whose push lands while the catalog is loading', async () => {
      const { engine, store, remote } = setup();
      remote.favorites = new Set([2]);
      await engine.start();
      remote.holdCatalog();

      const refreshing = engine.refresh();
      await tick();
      await engine.toggleFavorite(2);
      await until(() => engine.pendingFavoriteChanges().length === 0);
      remote.releaseCatalog();

      const snapshot = await refreshing;
      assert.deepStrictEqual(snapshot.favorites, []);
      assert.deepStrictEqual(store.state?.favorites, []);
    });

    it('trusts the remote again once a later fetch has seen the push', async () => {
      const { engine, remote } = setup();
      await engine.start();
      remote.holdCatalog();
      const refreshing = engine.refresh();
      await tick();
      await engine.toggleFavorite(1);
      await until(() => engine.pendingFavoriteChanges().length === 0);
      remote.releaseCatalog();
      await refreshing;

      await engine.refresh();
      remote.favorites.delete(1);
      const snapshot = await engine.refresh();

      assert.deepStrictEqual(snapshot.favorites, []);
    });

    it('reports a storage failure and leaves the snapshot untouched', async () => {
      const { engine, store, remote } = setup();
      await engine.start();
      const before = engine.currentSnapshot();
      store.failWrites = true;

      await assert.rejects(
        engine.toggleFavorite(1),
        (err: unknown) => err instanceof AppError && err.code === 'STORAGE_ERROR',
      );
      assert.strictEqual(engine.currentSnapshot(), before);
      assert.strictEqual(engine.isFavorite(1), false);
      assert.deepStrictEqual(remote.pushes, []);
    });

    it('rejects recipes that are not in the catalog', async () => {
      const { engine } = setup();
      await engine.start();
      await assert.rejects(
        engine.toggleFavorite(42),
        (err: unknown) => err instanceof AppError && err.code === 'VALIDATION_ERROR',
      );
    });
  });

  describe('recent searches', () => {
    it('keeps the most recent names first, de-duplicated and capped', async () => {
      const { engine, store, remote } = setup();
      const ladder = makeRecipe({ id: 3, name: 'Ladder' });
      const bed = makeRecipe({ id: 4, name: 'Bed' });
      remote.catalog = [torch, chest, ladder, bed];
      await engine.start();

      await engine.saveRecentSearch(2);
      await engine.saveRecentSearch(1);
      await engine.saveRecentSearch(2);
      await engine.saveRecentSearch(3);
      const names = await engine.saveRecentSearch(4);

      assert.deepStrictEqual(names, ['Bed', 'Ladder', 'Chest']);
      assert.deepStrictEqual(store.state?.recentSearches, ['Bed', 'Ladder', 'Chest']);
      assert.deepStrictEqual(engine.currentSnapshot().recentSearches, [
        'Bed',
        'Ladder',
        'Chest',
      ]);
    });

    it('drops names of recipes that left the catalog on refresh', async () => {
      const { engine, store, remote } = setup();
      store.seed([torch, chest], [], { recentSearches: ['Chest', 'Torch'] });
      remote.catalog = [torch];

      await engine.start();
      const snapshot = await engine.refresh();

      assert.deepStrictEqual(snapshot.recentSearches, ['Torch']);
    });

    it('clears recent searches', async () => {
      const { engine, store } = setup();
      await engine.start();
      await engine.saveRecentSearch(1);

      assert.deepStrictEqual(await engine.clearRecentSearches(), []);
      assert.deepStrictEqual(store.state?.recentSearches, []);
    });
  });

  describe('clearCache', () => {
    it('clears and repopulates from the remote', async () => {
      const { engine, store, remote } = setup();
      await engine.start();

      const ok = await engine.clearCache();

      assert.strictEqual(ok, true);
      assert.strictEqual(store.clearCalls, 1);
      assert.strictEqual(remote.catalogCalls, 2);
      assert.strictEqual(store.state?.recipes.length, 2);
    });

    it('keeps and restores the previous snapshot when the refresh fails', async () => {
      const { engine, store, remote } = setup();
      remote.favorites = new Set([2]);
      await engine.start();
      const before = engine.currentSnapshot();
      remote.fetchError = networkDown;

      const ok = await engine.clearCache();

      assert.strictEqual(ok, false);
      assert.strictEqual(engine.currentSnapshot(), before);
      assert.strictEqual(store.clearCalls, 1);
      assert.deepStrictEqual(
        store.state?.recipes.map((r) => r.id),
        [2, 1],
      );
      assert.deepStrictEqual(store.state?.favorites, [2]);
    });

    it('reports failure without refreshing when the clear fails', async () => {
      const { engine, store, remote } = setup();
      await engine.start();
      store.failClear = true;

      assert.strictEqual(await engine.clearCache(), false);
      assert.strictEqual(remote.catalogCalls, 1);
    });

    it('waits for an in-flight refresh before clearing', async () => {
      const { engine, store, remote } = setup();
      await engine.start();
      remote.hold();

      const refreshing = engine.refresh();
      const clearing = engine.clearCache();
      await tick();
      assert.strictEqual(store.clearCalls, 0);

      remote.release();
      assert.strictEqual(await clearing, true);
      await refreshing;
      assert.strictEqual(store.clearCalls, 1);
      assert.strictEqual(remote.catalogCalls, 3);
    });

    it('lets refresh calls join the clear-then-refresh run', async () => {
      const { engine, remote } = setup();
      await engine.start();
      remote.hold();

      const clearing = engine.clearCache();
      await tick();
      const joined = engine.refresh();
      remote.release();

      assert.strictEqual(await clearing, true);
      await joined;
      assert.strictEqual(remote.catalogCalls, 2);
    });
  });

  describe('clearAllData', () => {
    it('drops favorites locally and remotely, then repopulates the catalog', async () => {
      const { engine, store, remote } = setup();
      remote.favorites = new Set([1, 2]);
      await engine.start();
      await engine.saveRecentSearch(1);

      const ok = await engine.clearAllData();
      await engine.flushPendingWrites();

      assert.strictEqual(ok, true);
      const snapshot = engine.currentSnapshot();
      assert.deepStrictEqual(snapshot.favorites, []);
      assert.deepStrictEqual(snapshot.recentSearches, []);
      assert.strictEqual(snapshot.recipes.length, 2);
      assert.deepStrictEqual([...remote.favorites], []);
      assert.deepStrictEqual(store.state?.favorites, []);
      assert.deepStrictEqual(engine.pendingFavoriteChanges(), []);
    });
  });
});
