import type {
  ClusterStatusRecord,
  ComputeInstanceRecord,
  DiskRecord,
  NodeRecord,
  OutputMode,
  ResourceKind,
  StoragePoolRecord,
  StorageUsageRecord,
  ZfsDatasetRecord,
  ZfsPoolDetailRecord,
  ZfsPoolRecord,
} from '@pvelens/shared';
import { OperationError } from '../errors.js';
import { logger } from '../logger.js';
import {
  renderCluster,
  renderContainers,
  renderDisks,
  renderNodeStatus,
  renderNodes,
  renderStorage,
  renderStorageUsage,
  renderVms,
  renderZfsDatasets,
  renderZfsPoolDetail,
  renderZfsPools,
} from '../render/templates.js';

/** Caller-visible result of an operation: one text content item */
export interface ToolResult {
  content: Array<{ type: 'text'; text: string }>;
  [key: string]: unknown;
}

/** Canonical record type produced for each resource kind */
export interface ResourceData {
  nodes: readonly NodeRecord[];
  node_status: NodeRecord;
  vms: readonly ComputeInstanceRecord[];
  containers: readonly ComputeInstanceRecord[];
  storage: readonly StoragePoolRecord[];
  storage_usage: readonly StorageUsageRecord[];
  cluster: ClusterStatusRecord;
  zfs_pools: readonly ZfsPoolRecord[];
  zfs_pool_detail: ZfsPoolDetailRecord;
  zfs_datasets: readonly ZfsDatasetRecord[];
  disks: readonly DiskRecord[];
}

type Renderers = { [K in ResourceKind]: (data: ResourceData[K]) => string };

const renderers: Renderers = {
  nodes: renderNodes,
  node_status: renderNodeStatus,
  vms: renderVms,
  containers: renderContainers,
  storage: renderStorage,
  storage_usage: renderStorageUsage,
  cluster: renderCluster,
  zfs_pools: renderZfsPools,
  zfs_pool_detail: renderZfsPoolDetail,
  zfs_datasets: renderZfsDatasets,
  disks: renderDisks,
};

export function renderResource<K extends ResourceKind>(kind: K, data: ResourceData[K]): string {
  return renderers[kind](data);
}

/** Wrap records as a report (`text`) or as pretty-printed JSON (`json`) */
export function formatResponse<K extends ResourceKind>(
  kind: K,
  data: ResourceData[K],
  mode: OutputMode = 'text',
): ToolResult {
  const text = mode === 'json' ? JSON.stringify(data, null, 2) : renderResource(kind, data);
  return { content: [{ type: 'text', text }] };
}

/**
 * Operation boundary: anything thrown inside `fn` is logged once and
 * reported as a single OperationError naming the operation. No retry.
 */
export async function runOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    logger.error({ err, operation }, `Failed to ${operation}`);
    throw new OperationError(operation, err);
  }
}
