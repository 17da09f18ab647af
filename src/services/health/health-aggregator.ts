/**
 * Health Aggregator
 *
 * Fans out to the local, cloud and endpoint adapters at once and merges
 * their snapshots into one UnifiedHealthReport. Every branch resolves to
 * a typed outcome, so one slow or failing source never blocks the others.
 *
 * Merge order is fixed (local, cloud, endpoints in configuration order)
 * regardless of which branch finishes first. The summary is recomputed
 * from the merged snapshots on every call.
 */

import { getEngineConfig } from '../../lib/config-parser';
import { logger } from '../../lib/logger';
import { checkAzureHealth } from './azure-health';
import { AzureResourceManagerProvider } from './azure-resource-provider';
import { checkEndpoints, createFetchProbe } from './endpoint-health';
import { checkLocalHealth, createOsMetricsSource } from './local-health';
import type {
  CloudHealthSnapshot,
  CloudResourceProvider,
  CustomEndpointsSnapshot,
  HealthCheckConfig,
  HealthSummary,
  HttpProbe,
  LocalHealthSnapshot,
  LocalMetricsSource,
  UnifiedHealthReport,
} from './types';

/**
 * One check per local snapshot, per listed cloud resource and per
 * endpoint. A check is degraded when the local snapshot carries warnings,
 * the resource is unhealthy, or the endpoint is DOWN.
 */
export function computeSummary(
  local: LocalHealthSnapshot,
  azure: CloudHealthSnapshot,
  custom: CustomEndpointsSnapshot
): HealthSummary {
  const resources = [...azure.vms, ...azure.app_services, ...azure.storage_accounts];

  const total = 1 + resources.length + custom.results.length;
  const degraded =
    (local.warnings.length > 0 ? 1 : 0) +
    resources.filter((resource) => !resource.healthy).length +
    custom.results.filter((result) => result.status === 'DOWN').length;

  return { total, healthy: total - degraded, warnings: degraded };
}

export function mergeReport(
  local: LocalHealthSnapshot,
  azure: CloudHealthSnapshot,
  custom: CustomEndpointsSnapshot,
  now: Date
): UnifiedHealthReport {
  return {
    timestamp: now.toISOString(),
    summary: computeSummary(local, azure, custom),
    warnings: [...local.warnings, ...azure.warnings, ...custom.warnings],
    local,
    azure,
    custom,
  };
}

export interface HealthAggregatorDeps {
  localSource: LocalMetricsSource;
  /** Called only when the cloud scope is configured */
  getCloudProvider: (config: HealthCheckConfig) => CloudResourceProvider;
  probe: HttpProbe;
  now?: () => Date;
}

export class HealthAggregator {
  private readonly deps: HealthAggregatorDeps;

  constructor(deps: HealthAggregatorDeps) {
    this.deps = deps;
  }

  async aggregate(config: HealthCheckConfig = getEngineConfig()): Promise<UnifiedHealthReport> {
    const startedAt = Date.now();

    const [local, azure, custom] = await Promise.all([
      checkLocalHealth(this.deps.localSource, config.thresholds),
      checkAzureHealth(config.azure, () => this.deps.getCloudProvider(config)),
      checkEndpoints(config.endpoints, this.deps.probe),
    ]);

    const report = mergeReport(local, azure, custom, this.deps.now?.() ?? new Date());

    logger.info(
      {
        total: report.summary.total,
        healthy: report.summary.healthy,
        degraded: report.summary.warnings,
        azure: azure.status,
        durationMs: Date.now() - startedAt,
      },
      '[HealthAggregator] aggregation complete'
    );

    return report;
  }
}

/**
 * Aggregator on the real sources: node:os, Azure Resource Manager and
 * global fetch. The ARM provider is built on first configured use.
 */
export function createDefaultHealthAggregator(): HealthAggregator {
  let armProvider: AzureResourceManagerProvider | null = null;

  return new HealthAggregator({
    localSource: createOsMetricsSource(),
    getCloudProvider: (config) => {
      if (!armProvider) {
        armProvider = new AzureResourceManagerProvider({ apiVersions: config.azure.apiVersions });
      }
      return armProvider;
    },
    probe: createFetchProbe(),
  });
}
