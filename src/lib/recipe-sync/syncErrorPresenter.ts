/**
 * Sync error presentation (user messages + safe diagnostics).
 * No user ids or credentials; diagnostics only operations, statuses and codes.
 */

import { AppError, type AppErrorCode } from '@/src/lib/errors/app-error';

export type SyncErrorPresentation = {
  code: AppErrorCode | 'UNKNOWN';
  userMessage: string;
  userActionHints: string[];
  diagnostics?: Record<string, string | number | boolean>;
};

const MAX_HINTS = 2;

/** Allowed keys for diagnostics (no cause, no user data) */
const SAFE_DIAGNOSTIC_KEYS = new Set([
  'operation',
  'status',
  'remoteCode',
  'timeoutMs',
  'attempt',
  'recipeId',
  'issues',
]);

const PERMISSION_STATUSES = new Set([401, 403]);

const NETWORK_MESSAGE =
  'Network issue, please check your connection and try again.';
const PERMISSION_MESSAGE =
  'Permission denied, please check that you are signed in to the recipe service.';
const DATA_MESSAGE = 'Data error, please try refreshing.';
const UNKNOWN_MESSAGE = 'An unknown error occurred.';

const SYNC_ERROR_MAP: Record<
  AppErrorCode,
  { userMessage: string; userActionHints: string[] }
> = {
  NETWORK_ERROR: {
    userMessage: NETWORK_MESSAGE,
    userActionHints: ['Pull to refresh once you are back online.'],
  },
  REMOTE_ERROR: {
    userMessage: DATA_MESSAGE,
    userActionHints: ['Refresh the catalog.', 'Clear the cache if it keeps failing.'],
  },
  STORAGE_ERROR: {
    userMessage: DATA_MESSAGE,
    userActionHints: ['Clear the cache and sync again.'],
  },
  VALIDATION_ERROR: {
    userMessage: 'That recipe is not in the catalog.',
    userActionHints: ['Refresh the catalog.'],
  },
  CONFIG_ERROR: {
    userMessage: 'Recipe sync is not configured.',
    userActionHints: ['Set SUPABASE_URL, SUPABASE_ANON_KEY and RECIPE_SYNC_USER_ID.'],
  },
};

function sanitizeDetails(
  details: Record<string, unknown> | undefined,
): Record<string, string | number | boolean> | undefined {
  if (!details) return undefined;
  const out: Record<string, string | number | boolean> = {};
  for (const [k, v] of Object.entries(details)) {
    if (!SAFE_DIAGNOSTIC_KEYS.has(k)) continue;
    if (
      typeof v === 'number' ||
      typeof v === 'string' ||
      typeof v === 'boolean'
    ) {
      out[k] = v;
    }
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/**
 * Map any error from the sync engine to a safe, user-facing presentation.
 * A remote rejection with 401/403 reads as a permission problem.
 */
export function presentSyncError(error: unknown): SyncErrorPresentation {
  if (error instanceof AppError) {
    const mapped = SYNC_ERROR_MAP[error.code];
    const status = error.details?.status;
    const userMessage =
      error.code === 'REMOTE_ERROR' &&
      typeof status === 'number' &&
      PERMISSION_STATUSES.has(status)
        ? PERMISSION_MESSAGE
        : mapped.userMessage;
    const diagnostics = sanitizeDetails(error.details);
    return {
      code: error.code,
      userMessage,
      userActionHints: mapped.userActionHints.slice(0, MAX_HINTS),
      ...(diagnostics && { diagnostics }),
    };
  }
  return {
    code: 'UNKNOWN',
    userMessage: UNKNOWN_MESSAGE,
    userActionHints: ['Try again later.'],
  };
}
