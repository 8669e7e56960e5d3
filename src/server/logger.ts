import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

let threshold = (() => {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
})();

/** Overrides LOG_LEVEL, e.g. from --verbose or a loaded config. */
export function setLogLevel(level: LogLevel) {
  threshold = LEVELS[level];
}

/** Everything goes to stderr so CLI stdout stays machine-readable. */
type Sink = (level: LogLevel, line: string) => void;

const consoleSink: Sink = (level, line) => {
  if (level === 'warn') console.warn(line);
  else console.error(line);
};

let sink: Sink = consoleSink;

export function setLogSink(next: Sink | null) {
  sink = next ?? consoleSink;
}

function asErrorPayload(error: unknown) {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
    };
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return { message: String(error) };
}

function normalizeMeta(meta?: LogMeta) {
  if (!meta) return undefined;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? asErrorPayload(value) : value;
  }
  return Object.keys(out).length ? out : undefined;
}

function baseLog(level: LogLevel, message: string, meta?: LogMeta) {
  if (LEVELS[level] > threshold) return;
  const timestamp = new Date().toISOString();
  const normalized = normalizeMeta(meta);
  const line = normalized
    ? `${timestamp} [${level.toUpperCase()}] ${message} ${JSON.stringify(normalized)}`
    : `${timestamp} [${level.toUpperCase()}] ${message}`;
  sink(level, line);
}

export const logger = {
  debug(message: string, meta?: LogMeta) {
    baseLog('debug', message, meta);
  },
  info(message: string, meta?: LogMeta) {
    baseLog('info', message, meta);
  },
  warn(message: string, meta?: LogMeta) {
    baseLog('warn', message, meta);
  },
  error(message: string, meta?: LogMeta) {
    baseLog('error', message, meta);
  },
};

export function serializeError(error: unknown) {
  return asErrorPayload(error);
}

export function getRequestId(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const requestId = req.header('x-request-id') ?? randomUUID();
  const start = process.hrtime.bigint();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  logger.debug('Incoming request', {
    requestId,
    method: req.method,
    path: req.originalUrl,
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    logger.info('Request completed', {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Math.round(durationMs * 100) / 100,
    });
  });

  next();
}
