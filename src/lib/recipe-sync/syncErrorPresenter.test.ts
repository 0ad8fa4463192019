/**
 * Sync error presenter tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { presentSyncError } from './syncErrorPresenter';
import { AppError } from '@/src/lib/errors/app-error';
import { classifyRemoteFailure } from './remoteCall';

describe('presentSyncError', () => {
  it('presents network failures with a connectivity message', () => {
    const error = classifyRemoteFailure('fetchCatalog', {
      status: 503,
      message: 'upstream down',
      code: 'PGRST000',
    });
    const presented = presentSyncError(error);
    assert.strictEqual(presented.code, 'NETWORK_ERROR');
    assert.strictEqual(
      presented.userMessage,
      'Network issue, please check your connection and try again.',
    );
    assert.deepStrictEqual(presented.diagnostics, {
      operation: 'fetchCatalog',
      status: 503,
      remoteCode: 'PGRST000',
    });
  });

  it('presents a 403 rejection as a permission problem', () => {
    const error = classifyRemoteFailure('fetchFavoriteIds', {
      status: 403,
      message: 'permission denied for table favorite_recipes',
    });
    const presented = presentSyncError(error);
    assert.strictEqual(presented.code, 'REMOTE_ERROR');
    assert.strictEqual(
      presented.userMessage,
      'Permission denied, please check that you are signed in to the recipe service.',
    );
  });

  it('presents other rejections and storage failures as data errors', () => {
    const remote = presentSyncError(
      classifyRemoteFailure('pushFavoriteChange', { status: 409, message: 'conflict' }),
    );
    const storage = presentSyncError(
      new AppError('STORAGE_ERROR', 'Local recipe cache is corrupted', { issues: 2 }),
    );
    assert.strictEqual(remote.userMessage, 'Data error, please try refreshing.');
    assert.strictEqual(storage.userMessage, 'Data error, please try refreshing.');
    assert.deepStrictEqual(storage.diagnostics, { issues: 2 });
  });

  it('drops details outside the safe keys', () => {
    const presented = presentSyncError(
      new AppError('VALIDATION_ERROR', 'Recipe 9 is not in the catalog', {
        recipeId: 9,
        userId: 'user-1',
        nested: { status: 1 },
      }),
    );
    assert.deepStrictEqual(presented.diagnostics, { recipeId: 9 });
  });

  it('omits diagnostics when there are none', () => {
    const presented = presentSyncError(
      new AppError('CONFIG_ERROR', 'Missing SUPABASE_URL'),
    );
    assert.strictEqual(presented.userMessage, 'Recipe sync is not configured.');
    assert.strictEqual('diagnostics' in presented, false);
  });

  it('presents anything else as unknown', () => {
    const presented = presentSyncError(new Error('boom'));
    assert.deepStrictEqual(presented, {
      code: 'UNKNOWN',
      userMessage: 'An unknown error occurred.',
      userActionHints: ['Try again later.'],
    });
  });
});
