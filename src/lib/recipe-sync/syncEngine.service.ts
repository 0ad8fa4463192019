/**
 * Recipe Sync Engine
 *
 * Owns the published snapshot. Every mutation (catalog apply, favorite
 * toggle, recent searches, cache clear) runs through one serialized write
 * queue; reads go straight to the snapshot cache and never wait.
 *
 * Refresh: fetch catalog + remote favorites concurrently, merge with local
 * changes the remote has not acknowledged, persist, then publish. Concurrent
 * refresh calls share the in-flight run.
 *
 * Favorites are local-first: a toggle is persisted and published before the
 * remote push starts; the push runs in the background and failed pushes stay
 * pending until a later refresh re-sends them.
 */

import { AppError, toAppError } from '@/src/lib/errors/app-error';
import {
  buildSnapshot,
  mergeFavoriteIds,
  pruneRecentSearches,
} from '@/src/lib/recipes/snapshot';
import { describeSyncState } from '@/src/lib/recipes/catalogQueries';
import type {
  PendingFavoriteChange,
  Recipe,
  RecipeId,
  Snapshot,
  SyncState,
} from '@/src/lib/recipes/recipes.types';
import type { PersistedRecipeState } from '@/src/lib/recipes/recipes.schemas';
import type { LocalStore } from './localStore.service';
import type { RemoteGateway } from './remoteGateway.service';
import type { RecipeSyncConfig } from './recipeSync.config';
import { SnapshotCache, type SnapshotListener } from './snapshotCache';
import { silentSyncLogger, type SyncLogger } from './syncLogger';

export type RecipeSyncEngineOptions = {
  localStore: LocalStore;
  remote: RemoteGateway;
  config?: Partial<Pick<RecipeSyncConfig, 'refreshCooldownMs' | 'recentSearchLimit'>>;
  logger?: SyncLogger;
  now?: () => Date;
};

export type RefreshOptions = {
  /** Bypass the refresh cooldown (user-initiated sync) */
  manual?: boolean;
};

type RefreshOutcome =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; snapshot: Snapshot; error: AppError };

type PendingEntry = { isFavorite: boolean; seq: number };
/** A push the remote confirmed; ackedAt orders it against refresh fetches */
type AckedEntry = { isFavorite: boolean; ackedAt: number };

const IDLE: SyncState = Object.freeze({ status: 'idle' });

export class RecipeSyncEngine {
  private readonly localStore: LocalStore;
  private readonly remote: RemoteGateway;
  private readonly logger: SyncLogger;
  private readonly cache: SnapshotCache;
  private readonly now: () => Date;
  private readonly refreshCooldownMs: number;
  private readonly recentSearchLimit: number;

  private writeQueue: Promise<void> = Promise.resolve();
  private inflightRefresh: Promise<RefreshOutcome> | null = null;
  private readonly inflightPushes = new Set<Promise<void>>();
  private readonly inflightPushSeqs = new Set<number>();

  private pendingChanges = new Map<RecipeId, PendingEntry>();
  private pushSeq = 0;
  /** Acknowledged pushes a running fetch may have missed */
  private readonly recentlyAcked = new Map<RecipeId, AckedEntry>();
  private ackCounter = 0;
  /** False after clear(); partial updates need a full save first */
  private storeHasCatalog = false;
  private lastFetchAt: number | null = null;
  private syncedAt: Date | null = null;
  private pushError: AppError | null = null;

  constructor(options: RecipeSyncEngineOptions) {
    this.localStore = options.localStore;
    this.remote = options.remote;
    this.logger = options.logger ?? silentSyncLogger;
    this.cache = new SnapshotCache(this.logger);
    this.now = options.now ?? (() => new Date());
    this.refreshCooldownMs = options.config?.refreshCooldownMs ?? 30_000;
    this.recentSearchLimit = options.config?.recentSearchLimit ?? 10;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Initial load: publish the persisted state right away and reconcile in the
   * background, or wait for the first refresh when nothing is persisted.
   */
  async start(): Promise<Snapshot> {
    let state: PersistedRecipeState | null = null;
    try {
      const result = await this.localStore.load();
      if (result.found) state = result.state;
    } catch (err) {
      this.logger.error('local_load_failed', { error: err });
    }

    if (!state) {
      this.logger.info('start_without_local_state');
      return this.refresh({ manual: true });
    }

    this.storeHasCatalog = true;
    this.syncedAt = state.lastSyncedAt ? new Date(state.lastSyncedAt) : null;
    this.pendingChanges = new Map(
      state.pendingChanges.map((c) => [
        c.recipeId,
        { isFavorite: c.isFavorite, seq: ++this.pushSeq },
      ]),
    );
    this.cache.publish(
      buildSnapshot({
        recipes: state.recipes,
        favorites: state.favorites,
        recentSearches: state.recentSearches,
      }),
    );
    this.logger.info('provisional_snapshot_published', {
      recipes: state.recipes.length,
      favorites: state.favorites.length,
      pendingChanges: state.pendingChanges.length,
    });

    void this.refresh({ manual: true });
    return this.cache.current();
  }

  /** Wait for background pushes, refreshes and queued writes to settle. */
  async flushPendingWrites(): Promise<void> {
    while (this.inflightPushes.size > 0 || this.inflightRefresh) {
      await Promise.all([...this.inflightPushes]);
      if (this.inflightRefresh) await this.inflightRefresh;
    }
    await this.writeQueue;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  currentSnapshot(): Snapshot {
    return this.cache.current();
  }

  currentSyncState(): SyncState {
    return this.cache.syncState();
  }

  isFavorite(recipeId: RecipeId): boolean {
    return this.cache.current().favorites.includes(recipeId);
  }

  subscribe(listener: SnapshotListener): () => void {
    return this.cache.subscribe(listener);
  }

  lastSyncedAt(): Date | null {
    return this.syncedAt;
  }

  lastPushError(): AppError | null {
    return this.pushError;
  }

  pendingFavoriteChanges(): PendingFavoriteChange[] {
    return this.pendingList(this.pendingChanges);
  }

  isRefreshOnCooldown(): boolean {
    return (
      this.lastFetchAt !== null &&
      this.now().getTime() - this.lastFetchAt < this.refreshCooldownMs
    );
  }

  syncStatusLabel(): string {
    return describeSyncState(this.cache.syncState(), this.syncedAt);
  }

  // ---------------------------------------------------------------------------
  // Refresh
  // ---------------------------------------------------------------------------

  /**
   * Sync catalog and favorites. Never rejects: failures keep the previous
   * snapshot and set the sync state to failed.
   */
  async refresh(options: RefreshOptions = {}): Promise<Snapshot> {
    if (!this.inflightRefresh && !options.manual && this.isRefreshOnCooldown()) {
      this.logger.debug('refresh_skipped_cooldown');
      return this.cache.current();
    }
    const outcome = await this.startRefresh(() => this.runRefresh());
    return outcome.snapshot;
  }

  private startRefresh(
    task: () => Promise<RefreshOutcome>,
  ): Promise<RefreshOutcome> {
    if (this.inflightRefresh) {
      this.logger.debug('refresh_coalesced');
      return this.inflightRefresh;
    }
    const run = task().finally(() => {
      this.inflightRefresh = null;
    });
    this.inflightRefresh = run;
    return run;
  }

  private async runRefresh(): Promise<RefreshOutcome> {
    this.cache.setSyncState({ status: 'syncing' });
    const startedAt = Date.now();
    const ackWatermark = this.ackCounter;

    let recipes: Recipe[];
    let remoteIds: Set<RecipeId>;
    try {
      [recipes, remoteIds] = await Promise.all([
        this.remote.fetchCatalog(),
        this.remote.fetchFavoriteIds(),
      ]);
    } catch (err) {
      return this.failRefresh(
        toAppError(err, 'NETWORK_ERROR', 'Could not reach the recipe service'),
      );
    }

    let snapshot: Snapshot;
    try {
      snapshot = await this.enqueue(() =>
        this.applyCatalog(recipes, remoteIds, ackWatermark),
      );
    } catch (err) {
      return this.failRefresh(
        toAppError(err, 'STORAGE_ERROR', 'Could not save the recipe catalog'),
      );
    }

    this.lastFetchAt = this.now().getTime();
    this.cache.setSyncState(IDLE);
    this.logger.info('refresh_succeeded', {
      recipes: snapshot.recipes.length,
      favorites: snapshot.favorites.length,
      pendingChanges: this.pendingChanges.size,
      durationMs: Date.now() - startedAt,
    });
    this.repushPending();
    return { ok: true, snapshot };
  }

  /**
   * Runs inside the write queue, so toggles made during the fetch are merged.
   * Pushes acknowledged after the fetch started count as local changes too:
   * the fetched favorites may predate them.
   */
  private async applyCatalog(
    recipes: Recipe[],
    remoteIds: Set<RecipeId>,
    ackWatermark: number,
  ): Promise<Snapshot> {
    const current = this.cache.current();
    const acked: PendingFavoriteChange[] = [];
    for (const [recipeId, entry] of this.recentlyAcked) {
      if (entry.ackedAt > ackWatermark && !this.pendingChanges.has(recipeId)) {
        acked.push({ recipeId, isFavorite: entry.isFavorite });
      }
    }
    const merged = mergeFavoriteIds(
      remoteIds,
      [...acked, ...this.pendingList(this.pendingChanges)],
      recipes,
    );
    const merge = {
      favorites: merged.favorites,
      pendingChanges: merged.pendingChanges.filter((c) =>
        this.pendingChanges.has(c.recipeId),
      ),
    };
    const recentSearches = pruneRecentSearches(
      current.recentSearches,
      recipes,
      this.recentSearchLimit,
    );
    const syncedAt = this.now();

    await this.localStore.save(recipes, merge.favorites, {
      pendingChanges: merge.pendingChanges,
      recentSearches,
      lastSyncedAt: syncedAt.toISOString(),
    });

    // Commit in memory only after the save went through
    this.storeHasCatalog = true;
    for (const [recipeId, entry] of [...this.recentlyAcked]) {
      if (entry.ackedAt <= ackWatermark) this.recentlyAcked.delete(recipeId);
    }
    this.syncedAt = syncedAt;
    const kept = new Set(merge.pendingChanges.map((c) => c.recipeId));
    for (const recipeId of [...this.pendingChanges.keys()]) {
      if (!kept.has(recipeId)) this.pendingChanges.delete(recipeId);
    }

    const snapshot = buildSnapshot({
      recipes,
      favorites: merge.favorites,
      recentSearches,
    });
    this.cache.publish(snapshot);
    return snapshot;
  }

  private failRefresh(error: AppError): RefreshOutcome {
    this.logger.warn('refresh_failed', { error });
    this.cache.setSyncState({ status: 'failed', error });
    return { ok: false, snapshot: this.cache.current(), error };
  }

  // ---------------------------------------------------------------------------
  // Favorites
  // ---------------------------------------------------------------------------

  /**
   * Flip a favorite locally, persist and publish it, then push it to the
   * remote in the background. Resolves with the new favorite state.
   */
  toggleFavorite(recipeId: RecipeId): Promise<boolean> {
    return this.enqueue(async () => {
      const current = this.cache.current();
      this.requireRecipe(current, recipeId);

      const isFavorite = !current.favorites.includes(recipeId);
      const favorites = isFavorite
        ? [...current.favorites, recipeId]
        : current.favorites.filter((id) => id !== recipeId);
      const seq = ++this.pushSeq;
      const pending = new Map(this.pendingChanges);
      pending.set(recipeId, { isFavorite, seq });

      const next = buildSnapshot({
        recipes: current.recipes,
        favorites,
        recentSearches: current.recentSearches,
      });
      await this.persistFavorites(next, pending);

      this.pendingChanges = pending;
      this.cache.publish(next);
      this.logger.debug('favorite_toggled', { recipeId, isFavorite });

      this.schedulePush(recipeId, isFavorite, seq);
      return isFavorite;
    });
  }

  private schedulePush(recipeId: RecipeId, isFavorite: boolean, seq: number): void {
    if (this.inflightPushSeqs.has(seq)) return;
    this.inflightPushSeqs.add(seq);
    const push = this.pushChange(recipeId, isFavorite, seq);
    this.inflightPushes.add(push);
    void push.then(() => {
      this.inflightPushes.delete(push);
      this.inflightPushSeqs.delete(seq);
    });
  }

  /** Never rejects; failures are logged and the change stays pending. */
  private async pushChange(
    recipeId: RecipeId,
    isFavorite: boolean,
    seq: number,
  ): Promise<void> {
    try {
      await this.remote.pushFavoriteChange(recipeId, isFavorite);
    } catch (err) {
      const error = toAppError(
        err,
        'REMOTE_ERROR',
        'Could not sync favorite with the remote service',
      );
      this.pushError = error;
      this.logger.warn('favorite_push_failed', { recipeId, isFavorite, error });
      return;
    }

    this.pushError = null;
    try {
      await this.enqueue(() => this.acknowledgePush(recipeId, seq));
    } catch (err) {
      this.logger.error('favorite_ack_persist_failed', { recipeId, error: err });
    }
  }

  private async acknowledgePush(recipeId: RecipeId, seq: number): Promise<void> {
    // A newer toggle supersedes this push; keep it pending
    const entry = this.pendingChanges.get(recipeId);
    if (!entry || entry.seq !== seq) return;
    this.pendingChanges.delete(recipeId);
    this.recentlyAcked.set(recipeId, {
      isFavorite: entry.isFavorite,
      ackedAt: ++this.ackCounter,
    });
    if (this.storeHasCatalog) {
      await this.localStore.updateFavorites(
        this.cache.current().favorites,
        this.pendingList(this.pendingChanges),
      );
    }
  }

  private repushPending(): void {
    for (const [recipeId, entry] of this.pendingChanges) {
      this.schedulePush(recipeId, entry.isFavorite, entry.seq);
    }
  }

  // ---------------------------------------------------------------------------
  // Recent searches
  // ---------------------------------------------------------------------------

  /** Move the recipe's name to the front of the recent searches. */
  saveRecentSearch(recipeId: RecipeId): Promise<readonly string[]> {
    return this.enqueue(async () => {
      const current = this.cache.current();
      const recipe = this.requireRecipe(current, recipeId);
      const names = [
        recipe.name,
        ...current.recentSearches.filter((name) => name !== recipe.name),
      ].slice(0, this.recentSearchLimit);
      return this.replaceRecentSearches(current, names);
    });
  }

  clearRecentSearches(): Promise<readonly string[]> {
    return this.enqueue(() =>
      this.replaceRecentSearches(this.cache.current(), []),
    );
  }

  private async replaceRecentSearches(
    current: Snapshot,
    names: string[],
  ): Promise<readonly string[]> {
    const next = buildSnapshot({
      recipes: current.recipes,
      favorites: current.favorites,
      recentSearches: names,
    });
    if (this.storeHasCatalog) {
      await this.localStore.updateRecentSearches(next.recentSearches);
    } else if (next.recipes.length > 0) {
      await this.saveFullState(next, this.pendingChanges);
    }
    this.cache.publish(next);
    return next.recentSearches;
  }

  // ---------------------------------------------------------------------------
  // Cache management
  // ---------------------------------------------------------------------------

  /**
   * Wipe the local cache and repopulate it from the remote. True only when
   * both steps succeed; on a failed refresh the previous snapshot stays
   * published and is written back to the local store.
   */
  async clearCache(): Promise<boolean> {
    while (this.inflightRefresh) {
      await this.inflightRefresh;
    }
    const outcome = await this.startRefresh(() => this.runClearThenRefresh());
    return outcome.ok;
  }

  /**
   * Drop favorites (locally and remotely) and recent searches, then clear
   * the cache as clearCache() does.
   */
  async clearAllData(): Promise<boolean> {
    while (this.inflightRefresh) {
      await this.inflightRefresh;
    }
    const removed = await this.enqueue(async () => {
      const current = this.cache.current();
      const pending = new Map(this.pendingChanges);
      const removals: [RecipeId, number][] = [];
      for (const recipeId of current.favorites) {
        const seq = ++this.pushSeq;
        pending.set(recipeId, { isFavorite: false, seq });
        removals.push([recipeId, seq]);
      }
      const next = buildSnapshot({ recipes: current.recipes, favorites: [] });
      if (next.recipes.length > 0) await this.saveFullState(next, pending);

      this.pendingChanges = pending;
      this.cache.publish(next);
      for (const [recipeId, seq] of removals) {
        this.schedulePush(recipeId, false, seq);
      }
      return removals.length;
    });
    this.logger.info('favorites_and_searches_cleared', { favorites: removed });
    return this.clearCache();
  }

  private async runClearThenRefresh(): Promise<RefreshOutcome> {
    try {
      await this.enqueue(async () => {
        await this.localStore.clear();
        this.storeHasCatalog = false;
      });
    } catch (err) {
      const error = toAppError(err, 'STORAGE_ERROR', 'Could not clear the recipe cache');
      this.logger.error('cache_clear_failed', { error });
      return { ok: false, snapshot: this.cache.current(), error };
    }
    this.logger.info('cache_cleared');

    const outcome = await this.runRefresh();
    if (!outcome.ok) {
      await this.restoreLocalCache();
    }
    return outcome;
  }

  private async restoreLocalCache(): Promise<void> {
    try {
      await this.enqueue(async () => {
        const current = this.cache.current();
        if (this.storeHasCatalog || current.recipes.length === 0) return;
        await this.saveFullState(current, this.pendingChanges);
        this.logger.info('cache_restored', { recipes: current.recipes.length });
      });
    } catch (err) {
      this.logger.error('cache_restore_failed', { error: err });
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Serialize a mutation behind every earlier one. */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private requireRecipe(snapshot: Snapshot, recipeId: RecipeId): Recipe {
    const recipe = snapshot.recipes.find((r) => r.id === recipeId);
    if (!recipe) {
      throw new AppError(
        'VALIDATION_ERROR',
        `Recipe ${recipeId} is not in the catalog`,
        { recipeId },
      );
    }
    return recipe;
  }

  private async persistFavorites(
    next: Snapshot,
    pending: Map<RecipeId, PendingEntry>,
  ): Promise<void> {
    if (this.storeHasCatalog) {
      await this.localStore.updateFavorites(
        next.favorites,
        this.pendingList(pending),
      );
      return;
    }
    await this.saveFullState(next, pending);
  }

  private async saveFullState(
    snapshot: Snapshot,
    pending: Map<RecipeId, PendingEntry>,
  ): Promise<void> {
    await this.localStore.save(snapshot.recipes, snapshot.favorites, {
      pendingChanges: this.pendingList(pending),
      recentSearches: snapshot.recentSearches,
      lastSyncedAt: this.syncedAt ? this.syncedAt.toISOString() : null,
    });
    this.storeHasCatalog = true;
  }

  private pendingList(
    pending: Map<RecipeId, PendingEntry>,
  ): PendingFavoriteChange[] {
    return [...pending.entries()]
      .map(([recipeId, entry]) => ({ recipeId, isFavorite: entry.isFavorite }))
      .sort((a, b) => a.recipeId - b.recipeId);
  }
}
