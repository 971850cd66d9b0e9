import type { StoragePoolRecord, StorageUsageRecord, VolumeRecord } from '@pvelens/shared';
import { z } from 'zod';
import { listOf, numberOr, objectOf, optionalNumber, textOr } from './fields.js';

// "images,rootdir" or ["images", "rootdir"]
const ContentList = z
  .union([
    z.string().transform((value) => value.split(',')),
    z.array(z.string()),
  ])
  .transform((items) => items.map((item) => item.trim()).filter(Boolean))
  .catch([]);

/** Entry of `GET /storage` or `GET /nodes/{node}/storage` */
const StorageEntry = objectOf({
  storage: textOr('unknown'),
  type: textOr('unknown'),
  content: ContentList,
  disable: numberOr(0),
});

/** Body of `GET /nodes/{node}/storage/{storage}/status` */
const StorageStatus = objectOf({
  total: numberOr(0),
  used: numberOr(0),
  avail: numberOr(0),
});

/** Entry of `GET /nodes/{node}/storage/{storage}/content` */
const VolumeEntry = objectOf({
  volid: textOr('unknown'),
  format: textOr('unknown'),
  size: numberOr(0),
  vmid: optionalNumber(),
  content: textOr('unknown'),
  ctime: optionalNumber(),
});

export function storageNameOf(entry: unknown): string {
  return StorageEntry.parse(entry).storage;
}

/**
 * Storage pool record. Without a status body (the status query failed)
 * usage is reported as zero.
 */
export function normalizeStoragePool(entry: unknown, status?: unknown): StoragePoolRecord {
  const store = StorageEntry.parse(entry);
  const usage = StorageStatus.parse(status);

  return {
    name: store.storage,
    status: store.disable ? 'offline' : 'online',
    type: store.type,
    content: store.content,
    used: usage.used,
    total: usage.total,
    available: usage.avail,
  };
}

export function normalizeVolume(item: unknown): VolumeRecord {
  return VolumeEntry.parse(item);
}

/** Largest first; equal sizes keep their listing order */
export function sortVolumesBySize(volumes: readonly VolumeRecord[]): VolumeRecord[] {
  return [...volumes].sort((a, b) => b.size - a.size);
}

/**
 * Usage breakdown of one storage: its totals plus every volume on it.
 * A missing status body degrades the totals to zero.
 */
export function normalizeStorageUsage(
  entry: unknown,
  content: unknown,
  status?: unknown,
): StorageUsageRecord {
  const store = StorageEntry.parse(entry);
  const usage = StorageStatus.parse(status);
  const volumes = sortVolumesBySize(listOf(content, normalizeVolume));

  return {
    storage: store.storage,
    type: store.type,
    total: usage.total,
    used: usage.used,
    available: usage.avail,
    volumes,
    volumeCount: volumes.length,
  };
}
