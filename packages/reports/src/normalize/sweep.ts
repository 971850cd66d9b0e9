import type { ProxmoxApi } from '@pvelens/shared';
import { logger } from '../logger.js';
import { normalizeNodeNames } from './nodes.js';

/**
 * Query each node in turn and concatenate the results. A node whose query
 * throws is logged and skipped; the sweep carries on with the rest.
 */
export async function sweepNodes<T>(
  nodes: readonly string[],
  label: string,
  query: (node: string) => Promise<readonly T[]>,
): Promise<T[]> {
  const results: T[] = [];
  for (const node of nodes) {
    try {
      results.push(...(await query(node)));
    } catch (err) {
      logger.warn({ node, err }, `Could not query ${label} on node ${node}`);
    }
  }
  return results;
}

/**
 * Run `query` against the named node, where a failure is the caller's
 * failure, or sweep every node in the cluster when no node is named.
 */
export async function queryNodes<T>(
  api: ProxmoxApi,
  node: string | undefined,
  label: string,
  query: (node: string) => Promise<readonly T[]>,
): Promise<T[]> {
  if (node) return [...(await query(node))];
  return sweepNodes(normalizeNodeNames(await api.getNodes()), label, query);
}
