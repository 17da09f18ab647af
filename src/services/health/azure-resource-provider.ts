/**
 * Azure Resource Manager provider.
 *
 * Authenticates with DefaultAzureCredential (env vars, managed identity,
 * Azure CLI login) and lists VMs, App Services and Storage accounts of a
 * resource group through the ARM REST API.
 */

import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import { z } from 'zod';
import type { AzureConfig } from '../../lib/config-parser';
import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import {
  CloudAuthError,
  type CloudResource,
  type CloudResourceProvider,
  type CloudScope,
  type ResourceInventory,
  type ResourceListing,
} from './types';

const ARM_BASE_URL = 'https://management.azure.com';
const ARM_SCOPE = `${ARM_BASE_URL}/.default`;
const MAX_PAGES = 20;

const HEALTHY_VM_STATES = new Set(['running', 'stopped', 'deallocated']);

export function isVmHealthy(state: string): boolean {
  return HEALTHY_VM_STATES.has(state.toLowerCase());
}

export function isAppServiceHealthy(state: string): boolean {
  return state.toLowerCase() === 'running';
}

export function isStorageHealthy(provisioningState: string): boolean {
  return provisioningState.toLowerCase() === 'succeeded';
}

// ============================================================================
// ARM payloads
// ============================================================================

const ArmResourceSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  properties: z
    .object({
      state: z.string().optional(),
      provisioningState: z.string().optional(),
    })
    .optional(),
});

const ArmListSchema = z.object({
  value: z.array(ArmResourceSchema).default([]),
  nextLink: z.string().optional(),
});

const InstanceViewSchema = z.object({
  statuses: z.array(z.object({ code: z.string().optional() })).default([]),
});

type ArmResource = z.infer<typeof ArmResourceSchema>;

/** `PowerState/running` → `running` */
export function extractPowerState(instanceView: unknown): string {
  const parsed = InstanceViewSchema.safeParse(instanceView);
  if (!parsed.success) return 'unknown';
  const power = parsed.data.statuses.find((status) => status.code?.startsWith('PowerState/'));
  return power?.code?.split('/')[1] ?? 'unknown';
}

// ============================================================================
// Provider
// ============================================================================

export interface AzureResourceManagerOptions {
  apiVersions: AzureConfig['apiVersions'];
  credential?: TokenCredential;
  fetchImpl?: typeof fetch;
}

export class AzureResourceManagerProvider implements CloudResourceProvider {
  private readonly apiVersions: AzureConfig['apiVersions'];
  private readonly credential: TokenCredential;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AzureResourceManagerOptions) {
    this.apiVersions = options.apiVersions;
    this.credential = options.credential ?? new DefaultAzureCredential();
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async listResources(scope: CloudScope, signal: AbortSignal): Promise<ResourceInventory> {
    const token = await this.acquireToken(signal);
    const groupPath =
      `/subscriptions/${encodeURIComponent(scope.subscriptionId)}` +
      `/resourceGroups/${encodeURIComponent(scope.resourceGroup)}`;

    const [vms, app_services, storage_accounts] = await Promise.all([
      this.listVirtualMachines(groupPath, token, signal),
      this.listSimple(
        `${groupPath}/providers/Microsoft.Web/sites`,
        this.apiVersions.web,
        token,
        signal,
        (resource) => {
          const state = resource.properties?.state ?? 'unknown';
          return { name: resource.name, state, healthy: isAppServiceHealthy(state) };
        }
      ),
      this.listSimple(
        `${groupPath}/providers/Microsoft.Storage/storageAccounts`,
        this.apiVersions.storage,
        token,
        signal,
        (resource) => {
          const state = resource.properties?.provisioningState ?? 'unknown';
          return { name: resource.name, state, healthy: isStorageHealthy(state) };
        }
      ),
    ]);

    return { vms, app_services, storage_accounts };
  }

  private async acquireToken(signal: AbortSignal): Promise<string> {
    try {
      const accessToken = await this.credential.getToken(ARM_SCOPE, { abortSignal: signal });
      if (!accessToken) {
        throw new CloudAuthError('credential returned no token');
      }
      return accessToken.token;
    } catch (error) {
      if (error instanceof CloudAuthError) throw error;
      throw new CloudAuthError(getErrorMessage(error), { cause: error });
    }
  }

  private async getJson(url: string, token: string, signal: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: { Authorization: `Bearer ${token}` },
      signal,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return response.json();
  }

  /** Follows `nextLink` until the list is exhausted */
  private async listAll(path: string, apiVersion: string, token: string, signal: AbortSignal): Promise<ArmResource[]> {
    const items: ArmResource[] = [];
    let url: string | undefined = `${ARM_BASE_URL}${path}?api-version=${apiVersion}`;

    for (let page = 0; url && page < MAX_PAGES; page++) {
      const parsed = ArmListSchema.parse(await this.getJson(url, token, signal));
      items.push(...parsed.value);
      url = parsed.nextLink;
    }
    return items;
  }

  private async listSimple(
    path: string,
    apiVersion: string,
    token: string,
    signal: AbortSignal,
    toResource: (resource: ArmResource) => CloudResource
  ): Promise<ResourceListing> {
    try {
      const items = await this.listAll(path, apiVersion, token, signal);
      return { resources: items.map(toResource) };
    } catch (error) {
      logger.warn(`[AzureARM] list ${path} failed: ${getErrorMessage(error)}`);
      return { resources: [], error: getErrorMessage(error) };
    }
  }

  private async listVirtualMachines(groupPath: string, token: string, signal: AbortSignal): Promise<ResourceListing> {
    const apiVersion = this.apiVersions.vm;
    let items: ArmResource[];
    try {
      items = await this.listAll(`${groupPath}/providers/Microsoft.Compute/virtualMachines`, apiVersion, token, signal);
    } catch (error) {
      logger.warn(`[AzureARM] VM list failed: ${getErrorMessage(error)}`);
      return { resources: [], error: getErrorMessage(error) };
    }

    const resources = await Promise.all(
      items.map(async (vm): Promise<CloudResource> => {
        const vmPath = vm.id ?? `${groupPath}/providers/Microsoft.Compute/virtualMachines/${encodeURIComponent(vm.name)}`;
        try {
          const view = await this.getJson(
            `${ARM_BASE_URL}${vmPath}/instanceView?api-version=${apiVersion}`,
            token,
            signal
          );
          const state = extractPowerState(view);
          return { name: vm.name, state, healthy: isVmHealthy(state) };
        } catch (error) {
          logger.debug(`[AzureARM] instanceView ${vm.name} failed: ${getErrorMessage(error)}`);
          return { name: vm.name, state: 'unknown', healthy: false };
        }
      })
    );

    return { resources };
  }
}
