export { logger, createLogger } from './logger.js';
export { OperationError, ProxmoxRequestError, describeError } from './errors.js';

// Formatting primitives
export { percentOf, formatPercent } from './format/percent.js';
export { formatBytes, formatUptime } from './format/units.js';
export {
  RESOURCE_ICONS,
  STATUS_ICONS,
  healthIcon,
  diskTypeIcon,
  smartHealthIcon,
} from './format/icons.js';

// Normalization
export type { PoolDetailShape } from './normalize/pool-detail.js';
export {
  classifyPoolDetail,
  normalizePoolDetail,
  scanRawHealth,
  RAW_HEALTH_SCAN_ORDER,
} from './normalize/pool-detail.js';
export { normalizeNode, normalizeNodeStatus, normalizeNodeNames } from './normalize/nodes.js';
export { normalizeGuest } from './normalize/guests.js';
export {
  normalizeStoragePool,
  normalizeStorageUsage,
  normalizeVolume,
} from './normalize/storage.js';
export { normalizeZfsPool, normalizeZfsDataset } from './normalize/zfs.js';
export { normalizeDisk } from './normalize/disks.js';
export { normalizeClusterStatus } from './normalize/cluster.js';
export { sweepNodes, queryNodes } from './normalize/sweep.js';

// Rendering
export * from './render/templates.js';

// Operations
export type { ToolResult, ResourceData } from './tools/result.js';
export { formatResponse, renderResource, runOperation } from './tools/result.js';
export { collectNodes, getNodes, getNodeStatus } from './tools/nodes.js';
export { collectVms, collectContainers, getVms, getContainers } from './tools/guests.js';
export {
  collectStorage,
  collectStorageUsage,
  getStorage,
  getStorageUsage,
} from './tools/storage.js';
export { collectClusterStatus, getClusterStatus } from './tools/cluster.js';
export {
  collectZfsPools,
  collectZfsPoolStatus,
  collectZfsDatasets,
  listZfsPools,
  getZfsPoolStatus,
  listZfsDatasets,
} from './tools/zfs.js';
export { collectDisks, getDisks } from './tools/disks.js';

// Transport
export { ProxmoxClient, buildAuthHeaders, proxmoxGet, proxmoxUrl } from './client/proxmox.js';
export { buildTlsFetch } from './client/tls-fetch.js';
