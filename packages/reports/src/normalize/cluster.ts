import type { ClusterStatusRecord } from '@pvelens/shared';
import { listOf, numberOr, objectOf, optionalText, textOr } from './fields.js';

/** Entry of `GET /cluster/status`: one `cluster` row plus one row per node */
const ClusterStatusEntry = objectOf({
  type: textOr('unknown'),
  name: optionalText(),
  quorate: numberOr(0),
});

/**
 * @param resources body of `GET /cluster/resources`, or undefined when that
 *   query failed
 */
export function normalizeClusterStatus(status: unknown, resources?: unknown): ClusterStatusRecord {
  const entries = listOf(status, (entry) => ClusterStatusEntry.parse(entry));
  const cluster = entries.find((entry) => entry.type === 'cluster');

  return {
    name: cluster?.name,
    quorum: (cluster?.quorate ?? 0) > 0,
    nodes: entries.filter((entry) => entry.type === 'node').length,
    resources: Array.isArray(resources) ? resources.length : undefined,
  };
}
