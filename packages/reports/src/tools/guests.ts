import type { ComputeInstanceRecord, GetGuestsInput, ProxmoxApi } from '@pvelens/shared';
import { logger } from '../logger.js';
import { toArray } from '../normalize/fields.js';
import { normalizeGuest, vmidOf } from '../normalize/guests.js';
import { queryNodes } from '../normalize/sweep.js';
import { formatResponse, runOperation, type ToolResult } from './result.js';

async function vmsOnNode(api: ProxmoxApi, node: string): Promise<ComputeInstanceRecord[]> {
  const vms: ComputeInstanceRecord[] = [];
  for (const entry of toArray(await api.getVms(node))) {
    const vmid = vmidOf(entry);
    try {
      vms.push(normalizeGuest(node, entry, await api.getVmConfig(node, vmid)));
    } catch (err) {
      logger.warn({ node, vmid, err }, 'Could not get VM config, using runtime CPU count');
      vms.push(normalizeGuest(node, entry));
    }
  }
  return vms;
}

export async function collectVms(api: ProxmoxApi, node?: string): Promise<ComputeInstanceRecord[]> {
  return queryNodes(api, node, 'VMs', (name) => vmsOnNode(api, name));
}

export async function collectContainers(
  api: ProxmoxApi,
  node?: string,
): Promise<ComputeInstanceRecord[]> {
  return queryNodes(api, node, 'containers', async (name) =>
    toArray(await api.getContainers(name)).map((entry) => normalizeGuest(name, entry)),
  );
}

export function getVms(api: ProxmoxApi, args: GetGuestsInput = {}): Promise<ToolResult> {
  return runOperation('get VMs', async () =>
    formatResponse('vms', await collectVms(api, args.node), args.output),
  );
}

export function getContainers(api: ProxmoxApi, args: GetGuestsInput = {}): Promise<ToolResult> {
  return runOperation('get containers', async () =>
    formatResponse('containers', await collectContainers(api, args.node), args.output),
  );
}
