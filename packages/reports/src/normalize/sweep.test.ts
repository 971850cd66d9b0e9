import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../logger.js';
import { createFakeApi } from '../testing/fake-api.js';
import { queryNodes, sweepNodes } from './sweep.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('sweepNodes', () => {
  it('skips a failing node and keeps the others', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const failure = new Error('connection refused');

    const results = await sweepNodes(['pve1', 'pve2', 'pve3'], 'ZFS pools', async (node) => {
      if (node === 'pve2') throw failure;
      return [`${node}-tank`];
    });

    expect(results).toEqual(['pve1-tank', 'pve3-tank']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { node: 'pve2', err: failure },
      'Could not query ZFS pools on node pve2',
    );
  });

  it('returns nothing for an empty cluster', async () => {
    const query = vi.fn();
    expect(await sweepNodes([], 'disks', query)).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });
});

describe('queryNodes', () => {
  it('lets a named node fail the whole query', async () => {
    const api = createFakeApi();
    await expect(
      queryNodes(api, 'pve1', 'disks', () => Promise.reject(new Error('timeout'))),
    ).rejects.toThrow('timeout');
  });

  it('sweeps every listed node when none is named', async () => {
    const api = createFakeApi({
      getNodes: async () => [{ node: 'pve1' }, { node: 'pve2' }],
    });
    const results = await queryNodes(api, undefined, 'disks', async (node) => [node]);
    expect(results).toEqual(['pve1', 'pve2']);
  });

  it('propagates a failure to list the nodes', async () => {
    const api = createFakeApi({
      getNodes: () => Promise.reject(new Error('unauthorized')),
    });
    await expect(queryNodes(api, undefined, 'disks', async () => [])).rejects.toThrow('unauthorized');
  });
});
