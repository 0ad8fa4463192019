#!/usr/bin/env tsx
/**
 * Recipe Sync Script
 *
 * Loads the local recipe cache, syncs it with Supabase and prints a summary.
 *
 * Usage: npm run sync
 * Or: tsx scripts/sync-recipes.ts [--clear]
 *
 *   --clear   wipe the local cache and refetch everything
 */

import * as path from 'node:path';
import { config } from 'dotenv';
import {
  createRecipeSyncEngine,
  presentSyncError,
  recipesByCategory,
} from '@/src/lib/recipe-sync';

// Load environment variables from .env.local
config({ path: path.join(process.cwd(), '.env.local') });

async function main(): Promise<boolean> {
  const clear = process.argv.includes('--clear');
  const engine = createRecipeSyncEngine();

  await engine.start();
  if (clear) {
    console.log('🧹 Clearing local recipe cache...');
    const cleared = await engine.clearCache();
    if (!cleared) console.warn('⚠️  Clear failed; previous cache kept');
  }
  await engine.flushPendingWrites();

  const snapshot = engine.currentSnapshot();
  const state = engine.currentSyncState();

  console.log(`\n📦 Recipes: ${snapshot.recipes.length}`);
  for (const [category, recipes] of recipesByCategory(snapshot)) {
    console.log(`   ${category}: ${recipes.length}`);
  }
  console.log(`⭐ Favorites: ${snapshot.favorites.length}`);
  const pending = engine.pendingFavoriteChanges();
  if (pending.length > 0) {
    console.log(`   (${pending.length} not yet pushed)`);
  }
  console.log(`🔄 ${engine.syncStatusLabel()}`);

  if (state.status === 'failed') {
    console.error(`❌ ${presentSyncError(state.error).userMessage}`);
    return false;
  }
  return true;
}

main()
  .then((success) => {
    process.exit(success ? 0 : 1);
  })
  .catch((error) => {
    console.error('❌ Sync failed:', presentSyncError(error).userMessage);
    process.exit(1);
  });
