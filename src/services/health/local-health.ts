/**
 * Local machine health: CPU, memory, root disk and uptime.
 */

import { statfs } from 'node:fs/promises';
import os from 'node:os';
import type { Thresholds } from '../../lib/config-parser';
import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { LocalHealthSnapshot, LocalMetricsSource, LocalReading } from './types';

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(Math.max(0, Math.min(100, value)) * 100) / 100;
}

// ============================================================================
// OS-backed metrics source
// ============================================================================

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimes {
  return os.cpus().reduce<CpuTimes>(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      acc.idle += idle;
      acc.total += user + nice + sys + idle + irq;
      return acc;
    },
    { idle: 0, total: 0 }
  );
}

async function sampleCpuPercent(sampleMs: number): Promise<number> {
  const before = readCpuTimes();
  await new Promise((resolve) => setTimeout(resolve, sampleMs));
  const after = readCpuTimes();

  const total = after.total - before.total;
  if (total <= 0) {
    // no tick elapsed; fall back to the 1-minute load average per core
    const cores = os.cpus().length;
    return cores > 0 ? ((os.loadavg()[0] ?? 0) / cores) * 100 : 0;
  }
  return ((total - (after.idle - before.idle)) / total) * 100;
}

async function readDiskPercent(path: string): Promise<number> {
  try {
    const stat = await statfs(path);
    const total = stat.bsize * stat.blocks;
    const free = stat.bsize * stat.bfree;
    return total > 0 ? ((total - free) / total) * 100 : 0;
  } catch (error) {
    logger.warn(`[LocalHealth] statfs(${path}) failed, reporting 0% disk`, error);
    return 0;
  }
}

export function createOsMetricsSource(options: { sampleMs?: number; diskPath?: string } = {}): LocalMetricsSource {
  const sampleMs = options.sampleMs ?? 200;
  const diskPath = options.diskPath ?? (process.platform === 'win32' ? `${process.env.SYSTEMDRIVE ?? 'C:'}\\` : '/');

  return {
    async read(): Promise<LocalReading> {
      const [cpuPercent, diskPercent] = await Promise.all([
        sampleCpuPercent(sampleMs),
        readDiskPercent(diskPath),
      ]);
      const totalMem = os.totalmem();
      const memoryPercent = totalMem > 0 ? ((totalMem - os.freemem()) / totalMem) * 100 : 0;

      return {
        cpuPercent,
        memoryPercent,
        diskPercent,
        uptimeSeconds: os.uptime(),
      };
    },
  };
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * A metric warns only when it is strictly above its threshold.
 */
export function evaluateLocalReading(reading: LocalReading, thresholds: Thresholds): LocalHealthSnapshot {
  const cpu = clampPercent(reading.cpuPercent);
  const memory = clampPercent(reading.memoryPercent);
  const disk = clampPercent(reading.diskPercent);

  const warnings: string[] = [];
  if (cpu > thresholds.cpu) {
    warnings.push(`LOCAL: High CPU ${cpu.toFixed(1)}% (> ${thresholds.cpu}%)`);
  }
  if (memory > thresholds.memory) {
    warnings.push(`LOCAL: High Memory ${memory.toFixed(1)}% (> ${thresholds.memory}%)`);
  }
  if (disk > thresholds.disk) {
    warnings.push(`LOCAL: High Disk ${disk.toFixed(1)}% (> ${thresholds.disk}%)`);
  }

  return Object.freeze({
    cpu_percent: cpu,
    memory_percent: memory,
    disk_percent: disk,
    uptime_seconds: Math.max(0, Math.floor(reading.uptimeSeconds)),
    warnings: Object.freeze(warnings),
  });
}

/** Never rejects: an unreadable source yields a zeroed snapshot with one warning */
export async function checkLocalHealth(
  source: LocalMetricsSource,
  thresholds: Thresholds
): Promise<LocalHealthSnapshot> {
  try {
    return evaluateLocalReading(await source.read(), thresholds);
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error(`[LocalHealth] metrics source failed: ${message}`, error);
    return Object.freeze({
      cpu_percent: 0,
      memory_percent: 0,
      disk_percent: 0,
      uptime_seconds: 0,
      warnings: Object.freeze([`LOCAL: metrics unavailable - ${message}`]),
    });
  }
}
