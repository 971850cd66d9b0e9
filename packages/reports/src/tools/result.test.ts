import { afterEach, describe, expect, it, vi } from 'vitest';
import { OperationError } from '../errors.js';
import { logger } from '../logger.js';
import { formatResponse, runOperation } from './result.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatResponse', () => {
  const cluster = { name: 'homelab', quorum: true, nodes: 2 };

  it('renders text by default', () => {
    expect(formatResponse('cluster', cluster)).toEqual({
      content: [
        {
          type: 'text',
          text: '⚙️ Proxmox Cluster\n\n  - Name: homelab\n  - Quorum: OK\n  - Nodes: 2',
        },
      ],
    });
  });

  it('serializes the records in json mode', () => {
    const result = formatResponse('cluster', cluster, 'json');
    expect(result.content).toHaveLength(1);
    expect(result.content[0]?.text).toBe(JSON.stringify(cluster, null, 2));
  });
});

describe('runOperation', () => {
  it('returns the result of a successful operation', async () => {
    await expect(runOperation('get nodes', async () => 'ok')).resolves.toBe('ok');
  });

  it('wraps any failure in an OperationError naming the operation', async () => {
    const error = vi.spyOn(logger, 'error');
    const cause = new Error('socket hang up');

    const failure = await runOperation('list disks', () => Promise.reject(cause)).catch(
      (err: unknown) => err,
    );

    expect(failure).toBeInstanceOf(OperationError);
    expect(failure).toMatchObject({
      message: 'Failed to list disks: socket hang up',
      operation: 'list disks',
      cause,
    });
    expect(error).toHaveBeenCalledWith({ err: cause, operation: 'list disks' }, 'Failed to list disks');
  });

  it('describes non-Error throws', async () => {
    await expect(
      runOperation('get storage', () => Promise.reject('bad gateway')),
    ).rejects.toThrow('Failed to get storage: bad gateway');
  });
});
