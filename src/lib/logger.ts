// Structured run logger.
// Rows mirror the execution-log schema: function_name, request_id, level,
// message, duration_ms, success, data. Sinks decide where rows go.

import { randomUUID } from 'node:crypto';

export type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogRow {
  function_name: string;
  request_id: string;
  level: Level;
  message: string;
  duration_ms: number | null;
  success: boolean | null;
  data: unknown;
}

export type LogSink = (row: LogRow) => void;

export interface Logger {
  readonly function_name: string;
  readonly request_id: string;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
  /** Same sinks and request id, different component name */
  child(function_name: string): Logger;
  /** Start a timed operation and log "start"; returns its request id */
  startTimer(data?: unknown): string;
  /** Log "completed" or "failed" with the elapsed time */
  endTimer(requestId: string, success: boolean, error?: unknown): void;
}

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Console sink: `[function_name] message` on the matching console method
 */
export const consoleSink: LogSink = (row) => {
  const prefix = `[${row.function_name}]`;
  const extras: unknown[] = [];
  if (row.duration_ms !== null) extras.push(`(${row.duration_ms}ms)`);
  if (row.data !== null && row.data !== undefined) extras.push(row.data);

  switch (row.level) {
    case 'debug':
      console.debug(prefix, row.message, ...extras);
      break;
    case 'info':
      console.log(prefix, row.message, ...extras);
      break;
    case 'warn':
      console.warn(prefix, row.message, ...extras);
      break;
    case 'error':
      console.error(prefix, row.message, ...extras);
      break;
  }
};

/** The slice of a Supabase client the log sink writes through */
export interface LogTableClient {
  from(table: string): {
    insert(row: LogRow): PromiseLike<{ error: { message: string } | null }>;
  };
}

/**
 * Supabase sink: inserts each row into a log table.
 * Never throws; insert failures are reported on the console.
 */
export function supabaseSink(client: LogTableClient, table: string): LogSink {
  return (row) => {
    void client
      .from(table)
      .insert(row)
      .then(
        ({ error }) => {
          if (error) console.warn('[logger] insert failed:', error.message);
        },
        (e: unknown) => console.warn('[logger] unexpected:', e),
      );
  };
}

export function serializeError(err: unknown): unknown {
  if (err === null || err === undefined) return null;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  try {
    return JSON.parse(JSON.stringify(err));
  } catch {
    return { error: String(err) };
  }
}

function mergeError(data: unknown, error: unknown): unknown {
  const err = serializeError(error);
  if (!err) return data ?? null;
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    return { ...data, error: err };
  }
  return data === undefined || data === null ? { error: err } : { data, error: err };
}

export interface LoggerOptions {
  function_name: string;
  level?: Level;
  sinks?: LogSink[];
  request_id?: string;
  now?: () => number;
}

export function createLogger(options: LoggerOptions): Logger {
  const {
    function_name,
    level = 'info',
    sinks = [consoleSink],
    request_id = generateRequestId(),
    now = Date.now,
  } = options;

  // In-flight timers by request
  const timers = new Map<string, { t0: number; data: unknown }>();

  function write(row: Omit<LogRow, 'function_name' | 'request_id'> & { request_id?: string }): void {
    if (LEVEL_ORDER[row.level] < LEVEL_ORDER[level]) return;
    const full: LogRow = { function_name, ...row, request_id: row.request_id ?? request_id };
    for (const sink of sinks) sink(full);
  }

  function entry(lvl: Level, message: string, data: unknown, success: boolean | null = null): void {
    write({ level: lvl, message, duration_ms: null, success, data: data ?? null });
  }

  return {
    function_name,
    request_id,
    debug: (message, data) => entry('debug', message, data),
    info: (message, data) => entry('info', message, data),
    warn: (message, data) => entry('warn', message, data),
    error: (message, error, data) => entry('error', message, mergeError(data, error), false),
    child: (name) => createLogger({ function_name: name, level, sinks, request_id, now }),

    startTimer(data) {
      const id = generateRequestId();
      timers.set(id, { t0: now(), data: data ?? null });
      write({ request_id: id, level: 'info', message: 'start', duration_ms: null, success: null, data: data ?? null });
      return id;
    },

    endTimer(requestId, success, error) {
      const timer = timers.get(requestId);
      if (!timer) {
        console.warn(`[logger] no timer for request_id=${requestId}`);
        return;
      }
      timers.delete(requestId);

      write({
        request_id: requestId,
        level: success ? 'info' : 'error',
        message: success ? 'completed' : 'failed',
        duration_ms: Math.max(0, Math.round(now() - timer.t0)),
        success,
        data: success ? timer.data : mergeError(timer.data, error),
      });
    },
  };
}
