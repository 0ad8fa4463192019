/**
 * Recipe Sync Logger
 *
 * Structured logging for the sync engine. Logs via console (JSON) and
 * optionally appends NDJSON to a local logfile.
 *
 * Env flags:
 *   RECIPE_SYNC_DEBUG_LOG=true    - Emit debug events
 *   RECIPE_SYNC_LOG_TO_FILE=true  - NDJSON file output
 */

import { appendFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export type SyncLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SyncLogEvent = {
  ts: string;
  scope: string;
  level: SyncLogLevel;
  event: string;
  [key: string]: unknown;
};

export type SyncLogger = {
  debug(event: string, payload?: Record<string, unknown>): void;
  info(event: string, payload?: Record<string, unknown>): void;
  warn(event: string, payload?: Record<string, unknown>): void;
  error(event: string, payload?: Record<string, unknown>): void;
};

export type CreateSyncLoggerParams = {
  scope?: string;
  /** Defaults to RECIPE_SYNC_DEBUG_LOG */
  debug?: boolean;
  /** Defaults to RECIPE_SYNC_LOG_TO_FILE */
  logToFile?: boolean;
  logDir?: string;
  /** Replaces console output (tests, custom transports) */
  sink?: (event: SyncLogEvent) => void;
};

function envFlag(name: string): boolean {
  const value = process.env[name];
  return value === 'true' || value === '1';
}

/** Errors do not survive JSON.stringify; keep name/code/message only. */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const code = 'code' in value ? value.code : undefined;
    return {
      name: value.name,
      message: value.message,
      ...(typeof code === 'string' && { code }),
    };
  }
  return value;
}

function consoleSink(event: SyncLogEvent): void {
  const line = JSON.stringify(event);
  switch (event.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export function createSyncLogger(
  params: CreateSyncLoggerParams = {},
): SyncLogger {
  const scope = params.scope ?? 'recipe-sync';
  const debugEnabled = params.debug ?? envFlag('RECIPE_SYNC_DEBUG_LOG');
  const logToFile = params.logToFile ?? envFlag('RECIPE_SYNC_LOG_TO_FILE');
  const sink = params.sink ?? consoleSink;

  let logFilePath: string | null = null;
  if (logToFile) {
    try {
      const logDir =
        params.logDir ?? join(process.cwd(), 'logs', 'recipe-sync');
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }
      const dateStr = new Date().toISOString().slice(0, 10).replace(/-/g, '');
      logFilePath = join(logDir, `recipe-sync-${dateStr}.ndjson`);
    } catch (err) {
      console.warn('[RecipeSyncLogger] File logging disabled:', err);
    }
  }

  function maybeAppendToFile(event: SyncLogEvent): void {
    if (!logFilePath) return;
    try {
      appendFileSync(logFilePath, JSON.stringify(event) + '\n');
    } catch (err) {
      logFilePath = null;
      console.warn('[RecipeSyncLogger] File logging disabled:', err);
    }
  }

  function emit(
    level: SyncLogLevel,
    event: string,
    payload: Record<string, unknown> = {},
  ): void {
    if (level === 'debug' && !debugEnabled) return;
    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      fields[key] = serializeValue(value);
    }
    const obj: SyncLogEvent = {
      ...fields,
      ts: new Date().toISOString(),
      scope,
      level,
      event,
    };
    sink(obj);
    maybeAppendToFile(obj);
  }

  return {
    debug: (event, payload) => emit('debug', event, payload),
    info: (event, payload) => emit('info', event, payload),
    warn: (event, payload) => emit('warn', event, payload),
    error: (event, payload) => emit('error', event, payload),
  };
}

/** Drops every event. */
export const silentSyncLogger: SyncLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
