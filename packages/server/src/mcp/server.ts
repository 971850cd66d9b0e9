import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  describeError,
  getClusterStatus,
  getContainers,
  getDisks,
  getNodeStatus,
  getNodes,
  getStorage,
  getStorageUsage,
  getVms,
  getZfsPoolStatus,
  listZfsDatasets,
  listZfsPools,
  type ToolResult,
} from '@pvelens/reports';
import {
  GetClusterStatusInput,
  GetDisksInput,
  GetGuestsInput,
  GetNodeStatusInput,
  GetNodesInput,
  GetStorageInput,
  GetStorageUsageInput,
  GetZfsPoolStatusInput,
  ListZfsDatasetsInput,
  ListZfsPoolsInput,
  type OutputMode,
  type ProxmoxApi,
} from '@pvelens/shared';

export interface McpServerOptions {
  version: string;
  /** Output mode for calls that do not pass `output` */
  defaultOutput: OutputMode;
}

/** Turn a reported operation failure into an MCP error result */
export async function toMcpResult(
  run: () => Promise<ToolResult>,
): Promise<ToolResult & { isError?: boolean }> {
  try {
    return await run();
  } catch (err) {
    return {
      content: [{ type: 'text', text: `Error: ${describeError(err)}` }],
      isError: true,
    };
  }
}

/** Registers one MCP tool per report operation. */
export function createMcpServer(api: ProxmoxApi, options: McpServerOptions): McpServer {
  const server = new McpServer(
    { name: 'pvelens', version: options.version },
    { capabilities: { tools: {} } },
  );

  const withOutput = <T extends { output?: OutputMode }>(args: T): T => ({
    ...args,
    output: args.output ?? options.defaultOutput,
  });

  server.registerTool(
    'get_nodes',
    {
      description: 'List all nodes in the Proxmox cluster with status, uptime, CPU and memory.',
      inputSchema: GetNodesInput.shape,
    },
    async (args) => toMcpResult(() => getNodes(api, withOutput(args))),
  );

  server.registerTool(
    'get_node_status',
    {
      description: 'Detailed status of a single node.',
      inputSchema: GetNodeStatusInput.shape,
    },
    async (args) => toMcpResult(() => getNodeStatus(api, withOutput(args))),
  );

  server.registerTool(
    'get_vms',
    {
      description: 'List QEMU virtual machines on one node, or across the cluster.',
      inputSchema: GetGuestsInput.shape,
    },
    async (args) => toMcpResult(() => getVms(api, withOutput(args))),
  );

  server.registerTool(
    'get_containers',
    {
      description: 'List LXC containers on one node, or across the cluster.',
      inputSchema: GetGuestsInput.shape,
    },
    async (args) => toMcpResult(() => getContainers(api, withOutput(args))),
  );

  server.registerTool(
    'get_storage',
    {
      description: 'List storage pools with type, status and usage.',
      inputSchema: GetStorageInput.shape,
    },
    async (args) => toMcpResult(() => getStorage(api, withOutput(args))),
  );

  server.registerTool(
    'get_storage_usage',
    {
      description:
        'Break down what consumes space on a node\'s storages: totals plus the largest volumes.',
      inputSchema: GetStorageUsageInput.shape,
    },
    async (args) => toMcpResult(() => getStorageUsage(api, withOutput(args))),
  );

  server.registerTool(
    'get_cluster_status',
    {
      description: 'Cluster name, quorum state, node and resource counts.',
      inputSchema: GetClusterStatusInput.shape,
    },
    async (args) => toMcpResult(() => getClusterStatus(api, withOutput(args))),
  );

  server.registerTool(
    'list_zfs_pools',
    {
      description: 'List ZFS pools with health, usage, fragmentation and dedup ratio.',
      inputSchema: ListZfsPoolsInput.shape,
    },
    async (args) => toMcpResult(() => listZfsPools(api, withOutput(args))),
  );

  server.registerTool(
    'get_zfs_pool_status',
    {
      description: 'Detailed status of one ZFS pool: health, scan, errors and disk layout.',
      inputSchema: GetZfsPoolStatusInput.shape,
    },
    async (args) => toMcpResult(() => getZfsPoolStatus(api, withOutput(args))),
  );

  server.registerTool(
    'list_zfs_datasets',
    {
      description: 'List ZFS datasets on a node with usage and mountpoint.',
      inputSchema: ListZfsDatasetsInput.shape,
    },
    async (args) => toMcpResult(() => listZfsDatasets(api, withOutput(args))),
  );

  server.registerTool(
    'get_disks',
    {
      description: 'List physical disks with size, model, SMART health and wear level.',
      inputSchema: GetDisksInput.shape,
    },
    async (args) => toMcpResult(() => getDisks(api, withOutput(args))),
  );

  return server;
}
