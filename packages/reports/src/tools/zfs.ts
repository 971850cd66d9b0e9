import type {
  GetZfsPoolStatusInput,
  ListZfsDatasetsInput,
  ListZfsPoolsInput,
  ProxmoxApi,
  ZfsDatasetRecord,
  ZfsPoolDetailRecord,
  ZfsPoolRecord,
} from '@pvelens/shared';
import { logger } from '../logger.js';
import { toArray } from '../normalize/fields.js';
import { classifyPoolDetail, normalizePoolDetail } from '../normalize/pool-detail.js';
import { queryNodes } from '../normalize/sweep.js';
import { normalizeZfsDataset, normalizeZfsPool, zfsPoolNameOf } from '../normalize/zfs.js';
import { formatResponse, runOperation, type ToolResult } from './result.js';

/** Pools on one node, or on every node when none is given */
export async function collectZfsPools(api: ProxmoxApi, node?: string): Promise<ZfsPoolRecord[]> {
  return queryNodes(api, node, 'ZFS pools', async (name) =>
    toArray(await api.getZfsPools(name)).map((entry) => normalizeZfsPool(name, entry)),
  );
}

export async function collectZfsPoolStatus(
  api: ProxmoxApi,
  node: string,
  pool: string,
): Promise<ZfsPoolDetailRecord> {
  const detail = await api.getZfsPool(node, pool);
  const shape = classifyPoolDetail(detail);
  logger.debug({ node, pool, shape: shape.kind }, 'ZFS pool detail response');

  if (shape.kind === 'absent') {
    logger.warn({ node, pool }, 'ZFS pool detail returned no data');
  } else if (shape.kind === 'unrecognized') {
    logger.error(
      { node, pool, type: shape.typeName, value: shape.value },
      'Unexpected ZFS pool detail type',
    );
  }

  return normalizePoolDetail(node, pool, detail);
}

export async function collectZfsDatasets(
  api: ProxmoxApi,
  node: string,
  pool?: string,
): Promise<ZfsDatasetRecord[]> {
  return toArray(await api.getZfsPools(node))
    .filter((entry) => !pool || zfsPoolNameOf(entry) === pool)
    .map(normalizeZfsDataset);
}

export function listZfsPools(api: ProxmoxApi, args: ListZfsPoolsInput = {}): Promise<ToolResult> {
  return runOperation('list ZFS pools', async () =>
    formatResponse('zfs_pools', await collectZfsPools(api, args.node), args.output),
  );
}

export function getZfsPoolStatus(api: ProxmoxApi, args: GetZfsPoolStatusInput): Promise<ToolResult> {
  return runOperation(`get ZFS pool status for ${args.pool}`, async () =>
    formatResponse(
      'zfs_pool_detail',
      await collectZfsPoolStatus(api, args.node, args.pool),
      args.output,
    ),
  );
}

export function listZfsDatasets(api: ProxmoxApi, args: ListZfsDatasetsInput): Promise<ToolResult> {
  return runOperation('list ZFS datasets', async () =>
    formatResponse('zfs_datasets', await collectZfsDatasets(api, args.node, args.pool), args.output),
  );
}
