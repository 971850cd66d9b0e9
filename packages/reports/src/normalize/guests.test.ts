import { describe, expect, it } from 'vitest';
import { normalizeGuest, vmidOf } from './guests.js';

describe('normalizeGuest', () => {
  const entry = { vmid: 100, name: 'web', status: 'running', cpus: 1, mem: 256, maxmem: 1024 };

  it('uses the runtime cpu count without a config', () => {
    expect(normalizeGuest('pve1', entry)).toEqual({
      name: 'web',
      vmid: 100,
      status: 'running',
      node: 'pve1',
      cpus: 1,
      memory: { used: 256, total: 1024 },
    });
  });

  it('prefers configured cores', () => {
    expect(normalizeGuest('pve1', entry, { cores: 4, memory: 2048 }).cpus).toBe(4);
  });

  it('falls back to the runtime count when the config has no cores', () => {
    expect(normalizeGuest('pve1', entry, {}).cpus).toBe(1);
  });

  it('defaults a bare entry', () => {
    expect(normalizeGuest('pve1', {})).toEqual({
      name: 'unknown',
      vmid: 0,
      status: 'unknown',
      node: 'pve1',
      cpus: undefined,
      memory: { used: 0, total: 0 },
    });
  });
});

describe('vmidOf', () => {
  it('reads numeric and string ids', () => {
    expect(vmidOf({ vmid: 101 })).toBe(101);
    expect(vmidOf({ vmid: '102' })).toBe(102);
  });
});
