import type { NodeRecord, UsageRecord } from '@pvelens/shared';
import {
  listOf,
  numberOr,
  objectOf,
  optionalNumber,
  optionalObjectOf,
  optionalText,
  textOr,
} from './fields.js';

/** Entry of `GET /nodes` */
const NodeListEntry = objectOf({
  node: optionalText(),
  status: textOr('unknown'),
  uptime: numberOr(0),
  maxcpu: optionalNumber(),
  mem: numberOr(0),
  maxmem: numberOr(0),
  disk: numberOr(0),
  maxdisk: optionalNumber(),
});

const Usage = optionalObjectOf({
  used: numberOr(0),
  total: numberOr(0),
});

/** Body of `GET /nodes/{node}/status` */
const NodeStatus = objectOf({
  uptime: optionalNumber(),
  cpuinfo: optionalObjectOf({ cpus: optionalNumber() }),
  memory: Usage,
  rootfs: Usage,
});

/** Names of the nodes in a `GET /nodes` response; unnamed entries are dropped */
export function normalizeNodeNames(value: unknown): string[] {
  return listOf(value, (entry) => NodeListEntry.parse(entry).node).filter(
    (name): name is string => name !== undefined && name !== '',
  );
}

/**
 * Build a node record from its `GET /nodes` entry, refined by the detailed
 * status when that query succeeded.
 */
export function normalizeNode(entry: unknown, status?: unknown): NodeRecord {
  const basic = NodeListEntry.parse(entry);
  const detail = status === undefined ? undefined : NodeStatus.parse(status);

  const listDisk: UsageRecord | undefined =
    basic.maxdisk === undefined ? undefined : { used: basic.disk, total: basic.maxdisk };

  return {
    name: basic.node ?? 'unknown',
    // A node that answered its status query is up even if the list said otherwise.
    status: detail && basic.status === 'unknown' ? 'online' : basic.status,
    uptime: detail?.uptime ?? basic.uptime,
    cpus: detail?.cpuinfo?.cpus ?? basic.maxcpu,
    memory: detail?.memory ?? { used: basic.mem, total: basic.maxmem },
    disk: detail?.rootfs ?? listDisk,
  };
}

/** Detailed status of a single named node */
export function normalizeNodeStatus(node: string, status: unknown): NodeRecord {
  return normalizeNode({ node }, status);
}
