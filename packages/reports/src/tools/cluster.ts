import type { ClusterStatusRecord, GetClusterStatusInput, ProxmoxApi } from '@pvelens/shared';
import { logger } from '../logger.js';
import { normalizeClusterStatus } from '../normalize/cluster.js';
import { formatResponse, runOperation, type ToolResult } from './result.js';

export async function collectClusterStatus(api: ProxmoxApi): Promise<ClusterStatusRecord> {
  const status = await api.getClusterStatus();

  let resources: unknown;
  try {
    resources = await api.getClusterResources();
  } catch (err) {
    logger.warn({ err }, 'Could not list cluster resources');
  }

  return normalizeClusterStatus(status, resources);
}

export function getClusterStatus(
  api: ProxmoxApi,
  args: GetClusterStatusInput = {},
): Promise<ToolResult> {
  return runOperation('get cluster status', async () =>
    formatResponse('cluster', await collectClusterStatus(api), args.output),
  );
}
