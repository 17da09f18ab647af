import { describe, expect, it, vi } from 'vitest';

vi.mock('../../lib/logger', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));

import type { TokenCredential } from '@azure/identity';
import {
  AzureResourceManagerProvider,
  extractPowerState,
  isAppServiceHealthy,
  isStorageHealthy,
  isVmHealthy,
} from './azure-resource-provider';
import { CloudAuthError } from './types';

const apiVersions = { vm: '2024-03-01', web: '2024-04-01', storage: '2023-01-01' };
const scope = { subscriptionId: 'sub-1', resourceGroup: 'rg-1' };
const GROUP = 'https://management.azure.com/subscriptions/sub-1/resourceGroups/rg-1';

const credential: TokenCredential = {
  getToken: async () => ({ token: 'test-token', expiresOnTimestamp: Date.now() + 60_000 }),
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function routeFetch(routes: Record<string, () => Response>): typeof fetch {
  return async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const handler = routes[url];
    return handler ? handler() : jsonResponse({ error: 'not found' }, 404);
  };
}

describe('state rules', () => {
  it('treats running, stopped and deallocated VMs as healthy', () => {
    expect(isVmHealthy('running')).toBe(true);
    expect(isVmHealthy('Stopped')).toBe(true);
    expect(isVmHealthy('deallocated')).toBe(true);
    expect(isVmHealthy('starting')).toBe(false);
  });

  it('requires Running app services and Succeeded storage', () => {
    expect(isAppServiceHealthy('Running')).toBe(true);
    expect(isAppServiceHealthy('Stopped')).toBe(false);
    expect(isStorageHealthy('Succeeded')).toBe(true);
    expect(isStorageHealthy('Creating')).toBe(false);
  });

  it('extracts the power state from an instance view', () => {
    expect(
      extractPowerState({ statuses: [{ code: 'ProvisioningState/succeeded' }, { code: 'PowerState/deallocated' }] })
    ).toBe('deallocated');
    expect(extractPowerState({ statuses: [] })).toBe('unknown');
    expect(extractPowerState('garbage')).toBe('unknown');
  });
});

describe('AzureResourceManagerProvider', () => {
  it('lists every resource kind with its state', async () => {
    const fetchImpl = routeFetch({
      [`${GROUP}/providers/Microsoft.Compute/virtualMachines?api-version=2024-03-01`]: () =>
        jsonResponse({ value: [{ id: '/subscriptions/sub-1/resourceGroups/rg-1/vm/vm-a', name: 'vm-a' }] }),
      [`https://management.azure.com/subscriptions/sub-1/resourceGroups/rg-1/vm/vm-a/instanceView?api-version=2024-03-01`]:
        () => jsonResponse({ statuses: [{ code: 'PowerState/running' }] }),
      [`${GROUP}/providers/Microsoft.Web/sites?api-version=2024-04-01`]: () =>
        jsonResponse({ value: [{ name: 'web-a', properties: { state: 'Stopped' } }] }),
      [`${GROUP}/providers/Microsoft.Storage/storageAccounts?api-version=2023-01-01`]: () =>
        jsonResponse({ value: [{ name: 'store-a', properties: { provisioningState: 'Succeeded' } }] }),
    });

    const provider = new AzureResourceManagerProvider({ apiVersions, credential, fetchImpl });
    const inventory = await provider.listResources(scope, new AbortController().signal);

    expect(inventory).toEqual({
      vms: { resources: [{ name: 'vm-a', state: 'running', healthy: true }] },
      app_services: { resources: [{ name: 'web-a', state: 'Stopped', healthy: false }] },
      storage_accounts: { resources: [{ name: 'store-a', state: 'Succeeded', healthy: true }] },
    });
  });

  it('records a failed list call without failing the others', async () => {
    const fetchImpl = routeFetch({
      [`${GROUP}/providers/Microsoft.Compute/virtualMachines?api-version=2024-03-01`]: () => jsonResponse({ value: [] }),
      [`${GROUP}/providers/Microsoft.Web/sites?api-version=2024-04-01`]: () => jsonResponse({}, 403),
      [`${GROUP}/providers/Microsoft.Storage/storageAccounts?api-version=2023-01-01`]: () => jsonResponse({ value: [] }),
    });

    const provider = new AzureResourceManagerProvider({ apiVersions, credential, fetchImpl });
    const inventory = await provider.listResources(scope, new AbortController().signal);

    expect(inventory.app_services).toEqual({ resources: [], error: 'HTTP 403' });
    expect(inventory.vms).toEqual({ resources: [] });
  });

  it('follows nextLink pages', async () => {
    const page2 = 'https://management.azure.com/page-2';
    const fetchImpl = routeFetch({
      [`${GROUP}/providers/Microsoft.Compute/virtualMachines?api-version=2024-03-01`]: () => jsonResponse({ value: [] }),
      [`${GROUP}/providers/Microsoft.Web/sites?api-version=2024-04-01`]: () => jsonResponse({ value: [] }),
      [`${GROUP}/providers/Microsoft.Storage/storageAccounts?api-version=2023-01-01`]: () =>
        jsonResponse({ value: [{ name: 'store-a', properties: { provisioningState: 'Succeeded' } }], nextLink: page2 }),
      [page2]: () => jsonResponse({ value: [{ name: 'store-b', properties: { provisioningState: 'Failed' } }] }),
    });

    const provider = new AzureResourceManagerProvider({ apiVersions, credential, fetchImpl });
    const inventory = await provider.listResources(scope, new AbortController().signal);

    expect(inventory.storage_accounts.resources.map((r) => r.name)).toEqual(['store-a', 'store-b']);
  });

  it('wraps credential failures in CloudAuthError', async () => {
    const failing: TokenCredential = {
      getToken: async () => {
        throw new Error('no login found');
      },
    };
    const fetchImpl = vi.fn<typeof fetch>();

    const provider = new AzureResourceManagerProvider({ apiVersions, credential: failing, fetchImpl });

    await expect(provider.listResources(scope, new AbortController().signal)).rejects.toBeInstanceOf(CloudAuthError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
