import { z } from 'zod';
import { OutputMode } from '../types/resources.js';

const nodeName = z.string().min(1);

/** Shared by every tool: emit the rendered report or the records as JSON */
const output = OutputMode.optional().describe('"text" for a formatted report, "json" for raw records');

export const GetNodesInput = z.object({
  output,
});
export type GetNodesInput = z.infer<typeof GetNodesInput>;

export const GetNodeStatusInput = z.object({
  node: nodeName.describe('Node name, e.g. "pve1"'),
  output,
});
export type GetNodeStatusInput = z.infer<typeof GetNodeStatusInput>;

/** VMs and containers: omit node to sweep the whole cluster */
export const GetGuestsInput = z.object({
  node: nodeName.optional().describe('Node name (all nodes when omitted)'),
  output,
});
export type GetGuestsInput = z.infer<typeof GetGuestsInput>;

export const GetStorageInput = z.object({
  output,
});
export type GetStorageInput = z.infer<typeof GetStorageInput>;

export const GetStorageUsageInput = z.object({
  node: nodeName.describe('Node name to query'),
  storage: z.string().min(1).optional().describe('Storage id (all storages when omitted)'),
  output,
});
export type GetStorageUsageInput = z.infer<typeof GetStorageUsageInput>;

export const GetClusterStatusInput = z.object({
  output,
});
export type GetClusterStatusInput = z.infer<typeof GetClusterStatusInput>;

export const ListZfsPoolsInput = z.object({
  node: nodeName.optional().describe('Node name (all nodes when omitted)'),
  output,
});
export type ListZfsPoolsInput = z.infer<typeof ListZfsPoolsInput>;

export const GetZfsPoolStatusInput = z.object({
  node: nodeName.describe('Node the pool lives on'),
  pool: z.string().min(1).describe('ZFS pool name, e.g. "rpool"'),
  output,
});
export type GetZfsPoolStatusInput = z.infer<typeof GetZfsPoolStatusInput>;

export const ListZfsDatasetsInput = z.object({
  node: nodeName.describe('Node name to query'),
  pool: z.string().min(1).optional().describe('Only list datasets of this pool'),
  output,
});
export type ListZfsDatasetsInput = z.infer<typeof ListZfsDatasetsInput>;

export const GetDisksInput = z.object({
  node: nodeName.optional().describe('Node name (all nodes when omitted)'),
  includePartitions: z.boolean().optional().describe('Also list partitions'),
  output,
});
export type GetDisksInput = z.infer<typeof GetDisksInput>;
