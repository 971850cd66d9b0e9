import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProxmoxRequestError } from '../errors.js';
import { logger } from '../logger.js';
import { createFakeApi } from '../testing/fake-api.js';
import { collectNodes, getNodeStatus, getNodes } from './nodes.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('collectNodes', () => {
  it('refines each node with its status and keeps nodes whose status fails', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const api = createFakeApi({
      getNodes: async () => [
        { node: 'pve1', status: 'online', uptime: 100, maxcpu: 4, mem: 1, maxmem: 2 },
        { node: 'pve2', status: 'offline' },
      ],
      getNodeStatus: async (node) => {
        if (node === 'pve2') throw new Error('node offline');
        return { uptime: 200, cpuinfo: { cpus: 8 }, memory: { used: 10, total: 20 } };
      },
    });

    expect(await collectNodes(api)).toEqual([
      { name: 'pve1', status: 'online', uptime: 200, cpus: 8, memory: { used: 10, total: 20 } },
      { name: 'pve2', status: 'offline', uptime: 0, memory: { used: 0, total: 0 } },
    ]);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ node: 'pve2' }),
      'Could not get node status, using basic info',
    );
  });
});

describe('getNodes', () => {
  it('fails when the node list cannot be fetched', async () => {
    const api = createFakeApi({
      getNodes: () => Promise.reject(new ProxmoxRequestError('/nodes', 401, 'Unauthorized')),
    });
    await expect(getNodes(api)).rejects.toThrow('Failed to get nodes: Proxmox API returned 401: Unauthorized');
  });

  it('renders the nodes report', async () => {
    const api = createFakeApi({
      getNodes: async () => [{ node: 'pve1', status: 'online' }],
      getNodeStatus: async () => ({ uptime: 3600, cpuinfo: { cpus: 2 } }),
    });
    const result = await getNodes(api);
    expect(result.content[0]?.text.split('\n').slice(0, 5)).toEqual([
      '🖥️ Proxmox Nodes',
      '',
      '🖥️ pve1',
      '  - Status: ONLINE',
      '  - Uptime: 1h',
    ]);
  });
});

describe('getNodeStatus', () => {
  it('names the node in the failure', async () => {
    const api = createFakeApi({
      getNodeStatus: () =>
        Promise.reject(new ProxmoxRequestError('/nodes/pve9/status', 500, 'Internal Server Error')),
    });
    await expect(getNodeStatus(api, { node: 'pve9' })).rejects.toThrow(
      'Failed to get status for node pve9: Proxmox API returned 500: Internal Server Error',
    );
  });

  it('returns json when asked', async () => {
    const api = createFakeApi({
      getNodeStatus: async () => ({ uptime: 60, memory: { used: 1, total: 4 } }),
    });
    const result = await getNodeStatus(api, { node: 'pve1', output: 'json' });
    expect(JSON.parse(result.content[0]?.text ?? '')).toEqual({
      name: 'pve1',
      status: 'online',
      uptime: 60,
      memory: { used: 1, total: 4 },
    });
  });
});
