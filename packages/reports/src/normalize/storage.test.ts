import { describe, expect, it } from 'vitest';
import { normalizeStoragePool, normalizeStorageUsage, sortVolumesBySize } from './storage.js';

describe('normalizeStoragePool', () => {
  it('combines the definition with its status', () => {
    expect(
      normalizeStoragePool(
        { storage: 'local', type: 'dir', content: 'iso, vztmpl,backup' },
        { total: 1000, used: 250, avail: 750 },
      ),
    ).toEqual({
      name: 'local',
      status: 'online',
      type: 'dir',
      content: ['iso', 'vztmpl', 'backup'],
      used: 250,
      total: 1000,
      available: 750,
    });
  });

  it('reports disabled storage as offline with zero usage when status is missing', () => {
    expect(normalizeStoragePool({ storage: 'nfs', type: 'nfs', disable: 1 })).toEqual({
      name: 'nfs',
      status: 'offline',
      type: 'nfs',
      content: [],
      used: 0,
      total: 0,
      available: 0,
    });
  });

  it('accepts content as a list', () => {
    expect(normalizeStoragePool({ storage: 'local', content: ['images', 'rootdir'] }).content).toEqual([
      'images',
      'rootdir',
    ]);
  });
});

describe('sortVolumesBySize', () => {
  it('orders largest first and keeps ties in listing order', () => {
    const volumes = [
      { volid: 'a', format: 'raw', size: 10, content: 'images' },
      { volid: 'b', format: 'raw', size: 30, content: 'images' },
      { volid: 'c', format: 'raw', size: 10, content: 'images' },
    ];
    expect(sortVolumesBySize(volumes).map((volume) => volume.volid)).toEqual(['b', 'a', 'c']);
  });
});

describe('normalizeStorageUsage', () => {
  it('lists volumes by size with a count', () => {
    const record = normalizeStorageUsage(
      { storage: 'local-lvm', type: 'lvmthin' },
      [
        { volid: 'local-lvm:vm-100-disk-0', format: 'raw', size: 100, vmid: 100, content: 'images' },
        { volid: 'local-lvm:vm-101-disk-0', format: 'raw', size: 300, vmid: '101', content: 'images' },
      ],
      { total: 1000, used: 400, avail: 600 },
    );

    expect(record).toEqual({
      storage: 'local-lvm',
      type: 'lvmthin',
      total: 1000,
      used: 400,
      available: 600,
      volumes: [
        { volid: 'local-lvm:vm-101-disk-0', format: 'raw', size: 300, vmid: 101, content: 'images' },
        { volid: 'local-lvm:vm-100-disk-0', format: 'raw', size: 100, vmid: 100, content: 'images' },
      ],
      volumeCount: 2,
    });
  });

  it('defaults volume fields and zeroes totals without a status', () => {
    const record = normalizeStorageUsage({ storage: 'local' }, [{}]);

    expect(record.total).toBe(0);
    expect(record.used).toBe(0);
    expect(record.available).toBe(0);
    expect(record.volumes).toEqual([
      { volid: 'unknown', format: 'unknown', size: 0, content: 'unknown' },
    ]);
  });
});
