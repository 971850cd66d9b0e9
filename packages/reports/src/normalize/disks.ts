import { DiskType, WEAROUT_NOT_AVAILABLE, type DiskRecord } from '@pvelens/shared';
import { numberOr, numberOrSentinel, objectOf, textOr } from './fields.js';

/** Entry of `GET /nodes/{node}/disks/list` */
const DiskEntry = objectOf({
  devpath: textOr('unknown'),
  size: numberOr(0),
  serial: textOr('N/A'),
  type: DiskType.catch('unknown'),
  health: textOr('UNKNOWN'),
  model: textOr('N/A'),
  vendor: textOr('N/A'),
  rpm: numberOr(0),
  wearout: numberOrSentinel(WEAROUT_NOT_AVAILABLE),
  used: textOr('unused'),
});

export function normalizeDisk(node: string, entry: unknown): DiskRecord {
  return { ...DiskEntry.parse(entry), node };
}
