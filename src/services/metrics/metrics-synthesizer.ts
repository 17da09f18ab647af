/**
 * Metrics Synthesizer
 *
 * Builds a plausible 24-hour trend from one live reading. The series is
 * synthetic: jitter comes from a PRNG seeded on (series, base, now), so
 * the same inputs always produce the same points.
 */

import type { LocalMetricsSource } from '../health/types';
import { clampPercent } from '../health/local-health';

export const SERIES_LENGTH = 24;
const HOUR_MS = 60 * 60 * 1000;

/** Fixed bases for the series with no live reading */
const DISK_BASE = 55;
const NETIO_BASE = 35;

export interface MetricPoint {
  t: string;
  v: number;
}

export interface MetricsSeries {
  timestamp: string;
  range: '24h';
  synthetic_trend: true;
  cpu: MetricPoint[];
  memory: MetricPoint[];
  disk: MetricPoint[];
  netio: MetricPoint[];
}

// ============================================================================
// Seeded PRNG
// ============================================================================

export function hashString(input: string): number {
  let hash = 0;
  for (let i = 0; i < input.length; i += 1) {
    hash = (hash << 5) - hash + input.charCodeAt(i);
    hash |= 0;
  }
  return Math.abs(hash);
}

/** mulberry32: 32-bit state, uniform in [0, 1) */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

// ============================================================================
// Series
// ============================================================================

/**
 * Hourly points ending at `now`. The last point is the clamped base itself;
 * earlier points wander around it by at most ±jitter/2.
 */
export function synthesizeSeries(name: string, base: number, jitter: number, now: Date): MetricPoint[] {
  const anchor = clampPercent(base);
  const random = createSeededRandom(hashString(`${name}|${anchor}|${now.toISOString()}`));
  const points: MetricPoint[] = [];

  for (let i = 0; i < SERIES_LENGTH; i++) {
    const hoursAgo = SERIES_LENGTH - 1 - i;
    const t = new Date(now.getTime() - hoursAgo * HOUR_MS).toISOString();
    const v = hoursAgo === 0 ? anchor : clampPercent(anchor + (random() - 0.5) * jitter);
    points.push({ t, v });
  }
  return points;
}

export function synthesize(baseCpu: number, baseMem: number, now: Date = new Date()): MetricsSeries {
  return {
    timestamp: now.toISOString(),
    range: '24h',
    synthetic_trend: true,
    cpu: synthesizeSeries('cpu', baseCpu, 18, now),
    memory: synthesizeSeries('memory', baseMem, 14, now),
    disk: synthesizeSeries('disk', DISK_BASE, 10, now),
    netio: synthesizeSeries('netio', NETIO_BASE, 22, now),
  };
}

/** Reads live CPU and memory, then synthesizes around them */
export async function sampleAndSynthesize(source: LocalMetricsSource, now: () => Date = () => new Date()): Promise<MetricsSeries> {
  const reading = await source.read();
  return synthesize(reading.cpuPercent, reading.memoryPercent, now());
}
