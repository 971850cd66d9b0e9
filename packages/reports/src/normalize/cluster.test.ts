import { describe, expect, it } from 'vitest';
import { normalizeClusterStatus } from './cluster.js';

describe('normalizeClusterStatus', () => {
  const status = [
    { type: 'cluster', name: 'homelab', quorate: 1, nodes: 3 },
    { type: 'node', name: 'pve1', online: 1 },
    { type: 'node', name: 'pve2', online: 1 },
    { type: 'node', name: 'pve3', online: 0 },
  ];

  it('summarizes the cluster row and counts nodes', () => {
    expect(normalizeClusterStatus(status, [{}, {}, {}, {}, {}])).toEqual({
      name: 'homelab',
      quorum: true,
      nodes: 3,
      resources: 5,
    });
  });

  it('leaves resources unset when they could not be listed', () => {
    expect(normalizeClusterStatus(status).resources).toBeUndefined();
  });

  it('reports a standalone node without quorum', () => {
    expect(normalizeClusterStatus([{ type: 'node', name: 'pve1' }])).toEqual({
      name: undefined,
      quorum: false,
      nodes: 1,
      resources: undefined,
    });
  });

  it('reads a boolean quorate flag', () => {
    expect(normalizeClusterStatus([{ type: 'cluster', quorate: true }]).quorum).toBe(true);
  });
});
