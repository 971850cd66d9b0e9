import type {
  GetNodeStatusInput,
  GetNodesInput,
  NodeRecord,
  ProxmoxApi,
} from '@pvelens/shared';
import { logger } from '../logger.js';
import { toArray } from '../normalize/fields.js';
import { normalizeNode, normalizeNodeStatus } from '../normalize/nodes.js';
import { formatResponse, runOperation, type ToolResult } from './result.js';

/**
 * Every node with detailed status. A node whose status query fails is
 * still listed, with the fields `GET /nodes` reported for it.
 */
export async function collectNodes(api: ProxmoxApi): Promise<NodeRecord[]> {
  const nodes: NodeRecord[] = [];
  for (const entry of toArray(await api.getNodes())) {
    const basic = normalizeNode(entry);
    try {
      nodes.push(normalizeNode(entry, await api.getNodeStatus(basic.name)));
    } catch (err) {
      logger.warn({ node: basic.name, err }, 'Could not get node status, using basic info');
      nodes.push(basic);
    }
  }
  return nodes;
}

export function getNodes(api: ProxmoxApi, args: GetNodesInput = {}): Promise<ToolResult> {
  return runOperation('get nodes', async () =>
    formatResponse('nodes', await collectNodes(api), args.output),
  );
}

export function getNodeStatus(api: ProxmoxApi, args: GetNodeStatusInput): Promise<ToolResult> {
  return runOperation(`get status for node ${args.node}`, async () => {
    const status = await api.getNodeStatus(args.node);
    return formatResponse('node_status', normalizeNodeStatus(args.node, status), args.output);
  });
}
