import { z } from 'zod';

/** ZFS pool and vdev states as reported by `zpool status`, plus a catch-all. */
export const ZfsHealth = z.enum([
  'ONLINE',
  'DEGRADED',
  'FAULTED',
  'OFFLINE',
  'REMOVED',
  'UNAVAIL',
  'SUSPENDED',
  'UNKNOWN',
]);
export type ZfsHealth = z.infer<typeof ZfsHealth>;

export const DiskType = z.enum(['ssd', 'hdd', 'unknown']);
export type DiskType = z.infer<typeof DiskType>;

/** Caller-selected rendering: formatted report or canonical records as JSON */
export const OutputMode = z.enum(['text', 'json']);
export type OutputMode = z.infer<typeof OutputMode>;

export const ResourceKind = z.enum([
  'nodes',
  'node_status',
  'vms',
  'containers',
  'storage',
  'storage_usage',
  'cluster',
  'zfs_pools',
  'zfs_pool_detail',
  'zfs_datasets',
  'disks',
]);
export type ResourceKind = z.infer<typeof ResourceKind>;

/** Wear level placeholder when the disk does not report one */
export const WEAROUT_NOT_AVAILABLE = 'N/A';

/** Default error text for a pool that reports none */
export const NO_KNOWN_DATA_ERRORS = 'No known data errors';

/** Number of volumes listed per storage in a usage report */
export const TOP_VOLUME_LIMIT = 10;
