/**
 * Engine Configuration
 *
 * Reads process.env once into a validated, cached EngineConfig.
 * Invalid numeric values fall back to their defaults instead of failing
 * startup; a malformed endpoint list disables endpoint checks and is
 * reported through `endpoints.warnings`.
 */

import { z } from 'zod';
import { logger } from './logger';

// ============================================================================
// 1. Schemas
// ============================================================================

const PercentSchema = z.number().min(0).max(100);

export const EndpointTargetSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  timeoutMs: z.number().int().positive().optional(),
});

export const ThresholdsSchema = z.object({
  cpu: PercentSchema.default(85),
  memory: PercentSchema.default(90),
  disk: PercentSchema.default(90),
});

const AzureConfigSchema = z.object({
  subscriptionId: z.string().nullable(),
  resourceGroup: z.string().nullable(),
  apiVersions: z.object({
    vm: z.string().default('2024-03-01'),
    web: z.string().default('2024-04-01'),
    storage: z.string().default('2023-01-01'),
  }),
  timeoutMs: z.number().int().min(1_000).max(120_000).default(30_000),
});

const ProviderConfigSchema = z.object({
  apiKey: z.string().nullable(),
  model: z.string().min(1),
});

export const EngineConfigSchema = z.object({
  thresholds: ThresholdsSchema,
  azure: AzureConfigSchema,
  endpoints: z.object({
    list: z.array(EndpointTargetSchema),
    defaultTimeoutMs: z.number().int().positive(),
    warnings: z.array(z.string()),
  }),
  session: z.object({
    ttlMinutes: z.number().int().positive().default(60),
    maxTurnPairs: z.number().int().positive().default(10),
  }),
  narrative: z.object({
    gemini: ProviderConfigSchema,
    groq: ProviderConfigSchema,
  }),
  server: z.object({
    port: z.number().int().min(1).max(65_535).default(8080),
    allowedOrigins: z.array(z.string()).min(1),
  }),
});

export type EndpointTarget = z.infer<typeof EndpointTargetSchema>;
export type Thresholds = z.infer<typeof ThresholdsSchema>;
export type AzureConfig = z.infer<typeof AzureConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ============================================================================
// 2. Env helpers
// ============================================================================

function readString(key: string): string | null {
  const raw = process.env[key]?.trim();
  return raw ? raw : null;
}

function parseDecimalWithDefault(key: string, fallback: number, validate: (value: number) => boolean): number {
  const raw = readString(key);
  if (raw === null) return fallback;
  const parsed = Number.parseFloat(raw);
  if (Number.isNaN(parsed) || !validate(parsed)) {
    logger.warn(`[Config] Ignoring invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function parseIntWithDefault(key: string, fallback: number, validate: (value: number) => boolean): number {
  const parsed = parseDecimalWithDefault(key, fallback, validate);
  return Math.trunc(parsed);
}

const isPercent = (value: number) => value >= 0 && value <= 100;
const isPositive = (value: number) => value > 0;

// ============================================================================
// 3. Endpoint list
// ============================================================================

export interface ParsedEndpointList {
  list: EndpointTarget[];
  warnings: string[];
}

/**
 * Parses the CUSTOM_ENDPOINTS JSON value. Entries without a usable name
 * or URL are skipped; a value that is not a JSON list yields no endpoints
 * and one warning.
 */
export function parseEndpointList(raw: string | null): ParsedEndpointList {
  if (!raw) return { list: [], warnings: [] };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { list: [], warnings: ['CUSTOM: CUSTOM_ENDPOINTS is not valid JSON'] };
  }

  if (!Array.isArray(parsed)) {
    return { list: [], warnings: ['CUSTOM: CUSTOM_ENDPOINTS is not a JSON list'] };
  }

  const list: EndpointTarget[] = [];
  parsed.forEach((entry, index) => {
    const result = EndpointTargetSchema.safeParse(entry);
    if (result.success) {
      list.push(result.data);
    } else {
      logger.warn(`[Config] Skipping CUSTOM_ENDPOINTS[${index}]: ${result.error.issues[0]?.message ?? 'invalid entry'}`);
    }
  });

  return { list, warnings: [] };
}

function parseAllowedOrigins(raw: string | null): string[] {
  if (!raw || raw === '*') return ['*'];
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : ['*'];
}

// ============================================================================
// 4. Loader + cache
// ============================================================================

let cachedConfig: EngineConfig | null = null;

export function loadEngineConfig(): EngineConfig {
  const endpoints = parseEndpointList(readString('CUSTOM_ENDPOINTS'));

  return EngineConfigSchema.parse({
    thresholds: {
      cpu: parseDecimalWithDefault('LOCAL_CPU_WARN', 85, isPercent),
      memory: parseDecimalWithDefault('LOCAL_MEM_WARN', 90, isPercent),
      disk: parseDecimalWithDefault('LOCAL_DISK_WARN', 90, isPercent),
    },
    azure: {
      subscriptionId: readString('AZURE_SUBSCRIPTION_ID'),
      resourceGroup: readString('AZURE_RESOURCE_GROUP'),
      apiVersions: {
        vm: readString('AZURE_VM_API_VERSION') ?? undefined,
        web: readString('AZURE_WEB_API_VERSION') ?? undefined,
        storage: readString('AZURE_STORAGE_API_VERSION') ?? undefined,
      },
      timeoutMs: parseIntWithDefault('AZURE_TIMEOUT_MS', 30_000, (v) => v >= 1_000 && v <= 120_000),
    },
    endpoints: {
      list: endpoints.list,
      defaultTimeoutMs: Math.round(parseDecimalWithDefault('CUSTOM_ENDPOINT_TIMEOUT_SEC', 5, isPositive) * 1000),
      warnings: endpoints.warnings,
    },
    session: {
      ttlMinutes: parseIntWithDefault('SESSION_TTL_MIN', 60, (v) => v >= 1),
      maxTurnPairs: parseIntWithDefault('CHAT_HISTORY_TURNS', 10, (v) => v >= 1),
    },
    narrative: {
      gemini: {
        apiKey: readString('GEMINI_API_KEY'),
        model: (readString('GEMINI_MODEL') ?? 'gemini-2.5-flash').replace(/^models\//, ''),
      },
      groq: {
        apiKey: readString('GROQ_API_KEY'),
        model: readString('GROQ_MODEL') ?? 'llama-3.3-70b-versatile',
      },
    },
    server: {
      port: parseIntWithDefault('PORT', 8080, (v) => v >= 1 && v <= 65_535),
      allowedOrigins: parseAllowedOrigins(readString('ALLOWED_ORIGINS')),
    },
  });
}

export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadEngineConfig();
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function isAzureConfigured(azure: AzureConfig): boolean {
  return Boolean(azure.subscriptionId && azure.resourceGroup);
}

/**
 * Summary for the liveness endpoint; never includes secret values.
 */
export function getConfigStatus(config: EngineConfig = getEngineConfig()) {
  return {
    azureConfigured: isAzureConfigured(config.azure),
    endpointCount: config.endpoints.list.length,
    providers: {
      gemini: config.narrative.gemini.apiKey !== null,
      groq: config.narrative.groq.apiKey !== null,
    },
  };
}
