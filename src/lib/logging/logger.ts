/**
 * Structured Logger
 *
 * Levelled logging with a fixed context and optional request IDs.
 * Outputs JSON in production, human-readable lines elsewhere.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  requestId?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export interface LogOptions {
  requestId?: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[resolveMinLevel()];
}

export function formatEntry(entry: LogEntry, json = isProduction()): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const prefix = entry.context ? `[${entry.context}]` : '';
  const reqId = entry.requestId ? ` (req:${entry.requestId.slice(0, 8)})` : '';
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const errStr = entry.error ? ` err=${entry.error.message}` : '';
  return `${entry.level.toUpperCase()} ${prefix}${reqId} ${entry.message}${dataStr}${errStr}`;
}

export function serializeError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return {
      message: error.message,
      stack: error.stack,
      code: code === undefined ? undefined : String(code),
    };
  }
  return { message: String(error) };
}

function log(level: LogLevel, message: string, context: string, opts?: LogOptions) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context,
    requestId: opts?.requestId,
    data: opts?.data,
    error: serializeError(opts?.error),
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'debug':
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }
}

/**
 * Create a logger with a fixed context prefix.
 *
 * @example
 * const log = createLogger('ClusterService');
 * log.info('Cluster deleted', { data: { cluster: 'member1' } });
 */
export function createLogger(context: string) {
  return {
    debug: (message: string, opts?: LogOptions) => log('debug', message, context, opts),
    info: (message: string, opts?: LogOptions) => log('info', message, context, opts),
    warn: (message: string, opts?: LogOptions) => log('warn', message, context, opts),
    error: (message: string, opts?: LogOptions) => log('error', message, context, opts),
  };
}

export type Logger = ReturnType<typeof createLogger>;
