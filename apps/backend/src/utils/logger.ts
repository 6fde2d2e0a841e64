import { getRequestContext } from './asyncContext.js';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type LogLevel = (typeof LEVELS)[number];

export type LogMeta = Record<string, unknown>;

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

// Read per call so tests and operators can change LOG_LEVEL at runtime.
function minLevel(): LogLevel {
  const configured = String(process.env.LOG_LEVEL ?? '').toLowerCase();
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function serialize(payload: LogMeta): string {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ ts: payload.ts, level: payload.level, event: payload.event, error: 'LOG_SERIALIZATION_FAILED' });
  }
}

export function log(level: LogLevel, event: string, meta: LogMeta = {}): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(minLevel())) return;

  const ctx = getRequestContext();
  const line = serialize({
    ts: new Date().toISOString(),
    level,
    event,
    ...(ctx ? { requestId: ctx.requestId } : {}),
    ...(ctx?.userId ? { userId: ctx.userId } : {}),
    ...meta,
  });

  // Bypass console so test spies and overrides never swallow log lines.
  const stream = level === 'error' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

/** Flattens an unknown throwable into log fields; stacks stay out of production logs. */
export function errorMeta(error: unknown): LogMeta {
  if (!(error instanceof Error)) return { errorMessage: String(error) };
  return {
    errorName: error.name,
    errorMessage: error.message,
    ...(process.env.NODE_ENV === 'production' ? {} : { stack: error.stack }),
  };
}

export const logger = {
  debug: (event: string, meta?: LogMeta) => log('debug', event, meta),
  info: (event: string, meta?: LogMeta) => log('info', event, meta),
  warn: (event: string, meta?: LogMeta) => log('warn', event, meta),
  error: (event: string, meta?: LogMeta) => log('error', event, meta),
};
