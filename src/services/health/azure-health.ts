/**
 * Azure health adapter.
 *
 * Outcome taxonomy:
 * - not_configured: subscription or resource group missing (checked first, no I/O)
 * - auth_failed: token acquisition failed, nothing was listed
 * - ok / warnings: listing ran; warnings name every unhealthy resource,
 *   failed list call or timeout
 */

import { type AzureConfig, isAzureConfigured } from '../../lib/config-parser';
import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { TimeoutError, withTimeout } from '../../lib/with-timeout';
import {
  CloudAuthError,
  type CloudHealthSnapshot,
  type CloudResourceProvider,
  type ResourceInventory,
  type ResourceKind,
} from './types';

const KIND_LABELS: Record<ResourceKind, { list: string; item: string; stateField: string }> = {
  vms: { list: 'VM', item: 'VM', stateField: 'state' },
  app_services: { list: 'AppService', item: 'AppService', stateField: 'state' },
  storage_accounts: { list: 'Storage', item: 'Storage', stateField: 'provisioningState' },
};

const KIND_ORDER: ResourceKind[] = ['vms', 'app_services', 'storage_accounts'];

function emptySnapshot(
  configured: boolean,
  status: CloudHealthSnapshot['status'],
  message: string,
  warnings: string[] = []
): CloudHealthSnapshot {
  return {
    configured,
    status,
    message,
    vms: [],
    app_services: [],
    storage_accounts: [],
    warnings,
  };
}

export function summarizeInventory(inventory: ResourceInventory): CloudHealthSnapshot {
  const warnings: string[] = [];

  for (const kind of KIND_ORDER) {
    const listing = inventory[kind];
    const labels = KIND_LABELS[kind];
    if (listing.error) {
      warnings.push(`AZURE: ${labels.list} list failed - ${listing.error}`);
    }
    for (const resource of listing.resources) {
      if (!resource.healthy) {
        warnings.push(`AZURE: ${labels.item} ${resource.name} ${labels.stateField}=${resource.state}`);
      }
    }
  }

  return {
    configured: true,
    status: warnings.length === 0 ? 'ok' : 'warnings',
    message: 'Azure checks executed.',
    vms: inventory.vms.resources,
    app_services: inventory.app_services.resources,
    storage_accounts: inventory.storage_accounts.resources,
    warnings,
  };
}

/**
 * Never rejects. `getProvider` is only called once the scope is known to
 * be configured, so an unconfigured check performs no I/O at all.
 */
export async function checkAzureHealth(
  config: AzureConfig,
  getProvider: () => CloudResourceProvider
): Promise<CloudHealthSnapshot> {
  if (!isAzureConfigured(config) || !config.subscriptionId || !config.resourceGroup) {
    return emptySnapshot(
      false,
      'not_configured',
      'Set AZURE_SUBSCRIPTION_ID and AZURE_RESOURCE_GROUP to enable Azure checks.'
    );
  }

  const scope = { subscriptionId: config.subscriptionId, resourceGroup: config.resourceGroup };
  const controller = new AbortController();

  try {
    const inventory = await withTimeout(
      getProvider().listResources(scope, controller.signal),
      config.timeoutMs,
      `Azure checks timed out after ${config.timeoutMs} ms`
    );
    return summarizeInventory(inventory);
  } catch (error) {
    const message = getErrorMessage(error);

    if (error instanceof CloudAuthError) {
      logger.warn(`[AzureHealth] auth failed: ${message}`);
      return emptySnapshot(true, 'auth_failed', `Azure auth failed: ${message}`, [
        `AZURE: auth_failed - ${message}`,
      ]);
    }

    if (error instanceof TimeoutError) {
      controller.abort();
      logger.warn(`[AzureHealth] ${message}`);
      return emptySnapshot(true, 'warnings', message, [`AZURE: ${message}`]);
    }

    logger.error(`[AzureHealth] unexpected failure: ${message}`, error);
    return emptySnapshot(true, 'warnings', `Azure checks failed: ${message}`, [
      `AZURE: check failed - ${message}`,
    ]);
  }
}
