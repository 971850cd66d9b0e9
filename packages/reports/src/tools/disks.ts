import type { DiskRecord, GetDisksInput, ProxmoxApi } from '@pvelens/shared';
import { normalizeDisk } from '../normalize/disks.js';
import { toArray } from '../normalize/fields.js';
import { queryNodes } from '../normalize/sweep.js';
import { formatResponse, runOperation, type ToolResult } from './result.js';

export async function collectDisks(
  api: ProxmoxApi,
  node?: string,
  includePartitions = false,
): Promise<DiskRecord[]> {
  return queryNodes(api, node, 'disks', async (name) =>
    toArray(await api.getDisks(name, includePartitions)).map((entry) => normalizeDisk(name, entry)),
  );
}

export function getDisks(api: ProxmoxApi, args: GetDisksInput = {}): Promise<ToolResult> {
  return runOperation('list disks', async () =>
    formatResponse(
      'disks',
      await collectDisks(api, args.node, args.includePartitions),
      args.output,
    ),
  );
}
