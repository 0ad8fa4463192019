/**
 * Snapshot Cache
 *
 * Holds the current Snapshot and SyncState. Both are swapped as whole
 * references, so a reader sees either the old or the new value, never a mix.
 */

import { EMPTY_SNAPSHOT } from '@/src/lib/recipes/snapshot';
import type { Snapshot, SyncState } from '@/src/lib/recipes/recipes.types';
import { silentSyncLogger, type SyncLogger } from './syncLogger';

export type SnapshotListener = (snapshot: Snapshot, syncState: SyncState) => void;

const IDLE: SyncState = Object.freeze({ status: 'idle' });

export class SnapshotCache {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private state: SyncState = IDLE;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(private readonly logger: SyncLogger = silentSyncLogger) {}

  current(): Snapshot {
    return this.snapshot;
  }

  syncState(): SyncState {
    return this.state;
  }

  publish(snapshot: Snapshot): void {
    this.snapshot = snapshot;
    this.notify();
  }

  setSyncState(state: SyncState): void {
    this.state = state;
    this.notify();
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.snapshot;
    const state = this.state;
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot, state);
      } catch (err) {
        this.logger.error('snapshot_listener_failed', { error: err });
      }
    }
  }
}
