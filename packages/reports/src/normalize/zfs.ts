import { ZfsHealth, type ZfsDatasetRecord, type ZfsPoolRecord } from '@pvelens/shared';
import { numberOr, objectOf, textOr } from './fields.js';

/** Entry of `GET /nodes/{node}/disks/zfs` */
const ZfsPoolEntry = objectOf({
  name: textOr('unknown'),
  health: ZfsHealth.catch('UNKNOWN'),
  size: numberOr(0),
  alloc: numberOr(0),
  free: numberOr(0),
  frag: numberOr(0),
  dedup: numberOr(1),
});

export function normalizeZfsPool(node: string, entry: unknown): ZfsPoolRecord {
  return { ...ZfsPoolEntry.parse(entry), node };
}

export function zfsPoolNameOf(entry: unknown): string {
  return ZfsPoolEntry.parse(entry).name;
}

/**
 * The API exposes no per-dataset listing, so each pool's root dataset is
 * derived from the pool entry: mounted at `/<pool>`, referencing everything
 * allocated.
 */
export function normalizeZfsDataset(entry: unknown): ZfsDatasetRecord {
  const pool = ZfsPoolEntry.parse(entry);
  return {
    name: pool.name,
    type: 'filesystem',
    used: pool.alloc,
    avail: pool.free,
    refer: pool.alloc,
    mountpoint: `/${pool.name}`,
  };
}
