// Types
export {
  ZfsHealth,
  DiskType,
  OutputMode,
  ResourceKind,
  WEAROUT_NOT_AVAILABLE,
  NO_KNOWN_DATA_ERRORS,
  TOP_VOLUME_LIMIT,
} from './types/resources.js';
export type {
  UsageRecord,
  NodeRecord,
  ComputeInstanceRecord,
  StoragePoolRecord,
  VolumeRecord,
  StorageUsageRecord,
  ZfsPoolRecord,
  ZfsScanRecord,
  ZfsDeviceRecord,
  ZfsPoolDetailRecord,
  ZfsDatasetRecord,
  DiskRecord,
  ClusterStatusRecord,
} from './types/records.js';
export type { FetchFn, ProxmoxApi, ProxmoxConfig, ProxmoxCredentials } from './types/api.js';

// Schemas
export {
  GetNodesInput,
  GetNodeStatusInput,
  GetGuestsInput,
  GetStorageInput,
  GetStorageUsageInput,
  GetClusterStatusInput,
  ListZfsPoolsInput,
  GetZfsPoolStatusInput,
  ListZfsDatasetsInput,
  GetDisksInput,
} from './schemas/tools.js';
