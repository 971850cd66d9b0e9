import type {
  GetStorageInput,
  GetStorageUsageInput,
  ProxmoxApi,
  StoragePoolRecord,
  StorageUsageRecord,
} from '@pvelens/shared';
import { logger } from '../logger.js';
import { toArray } from '../normalize/fields.js';
import {
  normalizeStoragePool,
  normalizeStorageUsage,
  storageNameOf,
} from '../normalize/storage.js';
import { formatResponse, runOperation, type ToolResult } from './result.js';

/** Node alias PVE resolves to whichever node serves the request */
const LOCAL_NODE = 'localhost';

/**
 * Cluster-wide storage definitions with usage from the serving node.
 * A failed status query reports the storage with zero usage.
 */
export async function collectStorage(api: ProxmoxApi): Promise<StoragePoolRecord[]> {
  const pools: StoragePoolRecord[] = [];
  for (const entry of toArray(await api.getStorage())) {
    const name = storageNameOf(entry);
    try {
      pools.push(normalizeStoragePool(entry, await api.getStorageStatus(LOCAL_NODE, name)));
    } catch (err) {
      logger.warn({ storage: name, err }, 'Could not get storage status');
      pools.push(normalizeStoragePool(entry));
    }
  }
  return pools;
}

async function statusOrUndefined(
  api: ProxmoxApi,
  node: string,
  storage: string,
): Promise<unknown> {
  try {
    return await api.getStorageStatus(node, storage);
  } catch (err) {
    logger.warn({ node, storage, err }, 'Could not get storage status, reporting zero usage');
    return undefined;
  }
}

/**
 * Per-storage usage breakdown on one node. A storage whose content listing
 * fails is skipped; a failed status query only zeroes its totals.
 */
export async function collectStorageUsage(
  api: ProxmoxApi,
  node: string,
  storage?: string,
): Promise<StorageUsageRecord[]> {
  const usage: StorageUsageRecord[] = [];

  for (const entry of toArray(await api.getNodeStorage(node))) {
    const name = storageNameOf(entry);
    if (storage && name !== storage) continue;

    let content: unknown;
    try {
      content = await api.getStorageContent(node, name);
    } catch (err) {
      logger.warn({ node, storage: name, err }, 'Could not get storage content');
      continue;
    }

    usage.push(normalizeStorageUsage(entry, content, await statusOrUndefined(api, node, name)));
  }
  return usage;
}

export function getStorage(api: ProxmoxApi, args: GetStorageInput = {}): Promise<ToolResult> {
  return runOperation('get storage', async () =>
    formatResponse('storage', await collectStorage(api), args.output),
  );
}

export function getStorageUsage(api: ProxmoxApi, args: GetStorageUsageInput): Promise<ToolResult> {
  return runOperation('get storage usage', async () =>
    formatResponse(
      'storage_usage',
      await collectStorageUsage(api, args.node, args.storage),
      args.output,
    ),
  );
}
