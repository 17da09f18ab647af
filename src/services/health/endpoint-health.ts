/**
 * Custom HTTP endpoint probes.
 *
 * An endpoint is UP when a GET completes with a 2xx or 3xx status inside
 * its timeout. Every configured endpoint yields exactly one result, in
 * configuration order.
 */

import type { EndpointTarget } from '../../lib/config-parser';
import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { TimeoutError, withTimeout } from '../../lib/with-timeout';
import type { CustomEndpointsSnapshot, EndpointCheckResult, HttpProbe } from './types';

export function isUpStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

export function createFetchProbe(fetchImpl: typeof fetch = fetch): HttpProbe {
  return {
    async probe(url, signal) {
      const response = await fetchImpl(url, { method: 'GET', redirect: 'follow', signal });
      // body is not needed; release the socket
      await response.body?.cancel();
      return { statusCode: response.status };
    },
  };
}

function describeFailure(error: unknown): string {
  if (error instanceof TimeoutError) return error.message;
  if (error instanceof Error && error.cause instanceof Error && error.cause.message) {
    // undici reports "fetch failed" with the socket error as the cause
    return `${error.message}: ${error.cause.message}`;
  }
  return getErrorMessage(error);
}

export async function checkEndpoint(
  target: EndpointTarget,
  probe: HttpProbe,
  defaultTimeoutMs: number
): Promise<EndpointCheckResult> {
  const timeoutMs = target.timeoutMs ?? defaultTimeoutMs;
  const controller = new AbortController();
  const startedAt = performance.now();

  try {
    const { statusCode } = await withTimeout(
      probe.probe(target.url, controller.signal),
      timeoutMs,
      `Timed out after ${timeoutMs} ms`
    );
    const latency = Math.round(performance.now() - startedAt);
    const up = isUpStatus(statusCode);

    return {
      name: target.name,
      url: target.url,
      status: up ? 'UP' : 'DOWN',
      http_status: statusCode,
      latency_ms: latency,
      error: up ? null : `Bad status ${statusCode}`,
    };
  } catch (error) {
    controller.abort();
    const latency = Math.round(performance.now() - startedAt);
    const message = describeFailure(error);
    logger.debug(`[EndpointHealth] ${target.name} DOWN: ${message}`);

    return {
      name: target.name,
      url: target.url,
      status: 'DOWN',
      http_status: null,
      latency_ms: latency,
      error: message,
    };
  }
}

export async function checkEndpoints(
  endpoints: { list: EndpointTarget[]; defaultTimeoutMs: number; warnings: string[] },
  probe: HttpProbe
): Promise<CustomEndpointsSnapshot> {
  const results = await Promise.all(
    endpoints.list.map((target) => checkEndpoint(target, probe, endpoints.defaultTimeoutMs))
  );

  const warnings = [
    ...endpoints.warnings,
    ...results
      .filter((result) => result.status === 'DOWN')
      .map((result) => `CUSTOM: ${result.name} DOWN (${result.error ?? 'unknown error'})`),
  ];

  return {
    configured: endpoints.list.length > 0,
    results,
    warnings,
  };
}
