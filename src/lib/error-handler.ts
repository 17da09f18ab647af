/**
 * Hono response helpers shared by every router.
 *
 * Success: `{ ok: true, ... }`. Failure: `{ ok: false, error, code, message? }`.
 */

import type { Context } from 'hono';
import { AppError, type ErrorCode, getErrorMessage } from './errors';
import { logger } from './logger';

type ErrorStatus = AppError['status'];

interface Classified {
  code: ErrorCode;
  status: ErrorStatus;
}

const MESSAGE_RULES: Array<{ pattern: RegExp; code: ErrorCode; status: ErrorStatus }> = [
  { pattern: /rate limit|too many requests|quota/i, code: 'RATE_LIMIT', status: 429 },
  { pattern: /timed? ?out|timeout|deadline/i, code: 'TIMEOUT', status: 504 },
  { pattern: /model|provider|generat/i, code: 'MODEL_ERROR', status: 503 },
];

function classifyError(error: unknown): Classified {
  if (error instanceof AppError) {
    return { code: error.code, status: error.status };
  }

  const message = getErrorMessage(error);
  const rule = MESSAGE_RULES.find(({ pattern }) => pattern.test(message));
  return rule ? { code: rule.code, status: rule.status } : { code: 'INTERNAL_ERROR', status: 500 };
}

export function handleApiError(c: Context, error: unknown, operation = 'API') {
  const { code, status } = classifyError(error);
  const message = getErrorMessage(error);

  if (status >= 500) {
    logger.error({ err: error, code, operation }, `[${operation}] ${message}`);
  } else {
    logger.warn(`[${operation}] ${code}: ${message}`);
  }

  return c.json(
    {
      ok: false,
      error: status >= 500 && code === 'INTERNAL_ERROR' ? 'Internal Server Error' : message,
      code,
      ...(status >= 500 && code === 'INTERNAL_ERROR' ? { message } : {}),
    },
    status
  );
}

export function handleNotFoundError(c: Context, resource: string) {
  return c.json({ ok: false, error: `${resource} not found`, code: 'NOT_FOUND' }, 404);
}

export function jsonSuccess<T extends Record<string, unknown>>(c: Context, body: T) {
  return c.json({ ok: true, ...body }, 200);
}

export function jsonSuccessData<T>(c: Context, data: T) {
  return c.json({ ok: true, data }, 200);
}
