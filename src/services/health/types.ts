/**
 * Health report shapes. Field names follow the JSON wire format consumed
 * by the dashboard, so they stay snake_case.
 */

import type { AzureConfig, EndpointTarget, Thresholds } from '../../lib/config-parser';

// ============================================================================
// Local
// ============================================================================

export interface LocalReading {
  cpuPercent: number;
  memoryPercent: number;
  diskPercent: number;
  uptimeSeconds: number;
}

export interface LocalMetricsSource {
  read(): Promise<LocalReading>;
}

export interface LocalHealthSnapshot {
  readonly cpu_percent: number;
  readonly memory_percent: number;
  readonly disk_percent: number;
  readonly uptime_seconds: number;
  readonly warnings: readonly string[];
}

// ============================================================================
// Cloud
// ============================================================================

export type CloudStatus = 'ok' | 'warnings' | 'not_configured' | 'auth_failed';

export interface CloudResource {
  name: string;
  state: string;
  healthy: boolean;
}

export interface CloudHealthSnapshot {
  configured: boolean;
  status: CloudStatus;
  message: string;
  vms: CloudResource[];
  app_services: CloudResource[];
  storage_accounts: CloudResource[];
  warnings: string[];
}

export interface CloudScope {
  subscriptionId: string;
  resourceGroup: string;
}

export type ResourceKind = 'vms' | 'app_services' | 'storage_accounts';

/** One resource list; `error` is set when that list call failed */
export interface ResourceListing {
  resources: CloudResource[];
  error?: string;
}

export type ResourceInventory = Record<ResourceKind, ResourceListing>;

export class CloudAuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CloudAuthError';
  }
}

/**
 * Lists resources of each kind in a scope. Rejects with CloudAuthError
 * when credentials cannot be obtained; per-kind failures are reported
 * inside the inventory.
 */
export interface CloudResourceProvider {
  listResources(scope: CloudScope, signal: AbortSignal): Promise<ResourceInventory>;
}

// ============================================================================
// Endpoints
// ============================================================================

export type EndpointStatus = 'UP' | 'DOWN';

export interface EndpointCheckResult {
  name: string;
  url: string;
  status: EndpointStatus;
  http_status: number | null;
  /** Measured on every outcome, failures included */
  latency_ms: number;
  error: string | null;
}

export interface CustomEndpointsSnapshot {
  configured: boolean;
  results: EndpointCheckResult[];
  warnings: string[];
}

export interface ProbeResponse {
  statusCode: number;
}

/** GET `url`; rejects on connection failure or when `signal` aborts */
export interface HttpProbe {
  probe(url: string, signal: AbortSignal): Promise<ProbeResponse>;
}

// ============================================================================
// Unified report
// ============================================================================

export interface HealthSummary {
  total: number;
  healthy: number;
  warnings: number;
}

export interface UnifiedHealthReport {
  timestamp: string;
  summary: HealthSummary;
  warnings: string[];
  local: LocalHealthSnapshot;
  azure: CloudHealthSnapshot;
  custom: CustomEndpointsSnapshot;
}

/** The slice of EngineConfig one aggregation reads */
export interface HealthCheckConfig {
  thresholds: Thresholds;
  azure: AzureConfig;
  endpoints: {
    list: EndpointTarget[];
    defaultTimeoutMs: number;
    warnings: string[];
  };
}
