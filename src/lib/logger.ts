/**
 * Structured Logger
 *
 * Pino-based logging for the health copilot engine.
 * - Production: JSON lines with a GCP-style `severity` field and `message` key
 * - Development: plain pino output on stdout
 * - Credentials in bound objects are redacted before they reach the sink
 */

import pino from 'pino';
import { version as APP_VERSION } from '../../package.json';

const SERVICE_NAME = 'health-copilot';

const SEVERITY: Record<string, string> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'token',
  '*.token',
  'headers.authorization',
  'headers.Authorization',
];

/** Keeps log ordering stable for entries written in the same millisecond */
let sequence = 0;

export function resolveDefaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function createLogger(): pino.Logger {
  const isDev = process.env.NODE_ENV === 'development';
  const base = { service: SERVICE_NAME, version: APP_VERSION };

  if (!isDev) {
    return pino({
      level: resolveDefaultLevel(),
      messageKey: 'message',
      base,
      redact: { paths: REDACT_PATHS, censor: '[redacted]' },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: {
        level(label: string) {
          return { severity: SEVERITY[label] ?? 'DEFAULT', level: label };
        },
        log(obj: Record<string, unknown>) {
          const result: Record<string, unknown> = { ...obj, seq: `${Date.now()}-${sequence++}` };
          const err = obj.err;
          if (err instanceof Error && err.stack) {
            result.stack_trace = err.stack;
          }
          return result;
        },
      },
    });
  }

  return pino({
    level: resolveDefaultLevel(),
    base,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void;
type LogLevelName = 'warn' | 'error' | 'info' | 'debug' | 'fatal';

export type Logger = {
  warn: LogMethod;
  error: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  level: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Accepts both pino's `(obj, msg)` and console's `(msg, extra)` call styles.
 * A trailing Error is bound as `err`; any other extra value as `extra`.
 */
function wrap(target: pino.Logger): Logger {
  const method = (name: LogLevelName): LogMethod => (msgOrObj, ...args) => {
    const [first] = args;

    if (isRecord(msgOrObj) && typeof first === 'string') {
      target[name](msgOrObj, first);
      return;
    }

    if (typeof msgOrObj === 'string') {
      if (args.length === 0) {
        target[name](msgOrObj);
      } else if (first instanceof Error) {
        target[name]({ err: first }, msgOrObj);
      } else {
        target[name]({ extra: first }, msgOrObj);
      }
      return;
    }

    if (msgOrObj instanceof Error) {
      target[name]({ err: msgOrObj }, msgOrObj.message);
      return;
    }

    target[name](isRecord(msgOrObj) ? msgOrObj : { value: msgOrObj });
  };

  return {
    warn: method('warn'),
    error: method('error'),
    info: method('info'),
    debug: method('debug'),
    fatal: method('fatal'),
    child: (bindings) => wrap(target.child(bindings)),
    get level() {
      return target.level;
    },
    set level(value: string) {
      target.level = value;
    },
  };
}

const rootLogger = createLogger();

export const logger: Logger = wrap(rootLogger);

/** Logger bound to one agent turn, so every line of the turn can be correlated */
export function createTurnLogger(sessionId: string, mode: string): Logger {
  return wrap(rootLogger.child({ sessionId, mode }));
}
