import type { DiskType, ZfsHealth } from './resources.js';

export interface UsageRecord {
  readonly used: number;
  readonly total: number;
}

export interface NodeRecord {
  readonly name: string;
  readonly status: string;
  /** Seconds since boot */
  readonly uptime: number;
  readonly cpus?: number;
  readonly memory: UsageRecord;
  readonly disk?: UsageRecord;
}

/** A QEMU virtual machine or an LXC container */
export interface ComputeInstanceRecord {
  readonly name: string;
  readonly vmid: number;
  readonly status: string;
  readonly node: string;
  readonly cpus?: number;
  readonly memory: UsageRecord;
}

export interface StoragePoolRecord {
  readonly name: string;
  readonly status: 'online' | 'offline';
  readonly type: string;
  readonly content: readonly string[];
  readonly used: number;
  readonly total: number;
  readonly available: number;
}

export interface VolumeRecord {
  readonly volid: string;
  readonly format: string;
  readonly size: number;
  readonly vmid?: number;
  readonly content: string;
  /** Creation time, epoch seconds */
  readonly ctime?: number;
}

export interface StorageUsageRecord {
  readonly storage: string;
  readonly type: string;
  readonly total: number;
  readonly used: number;
  readonly available: number;
  /** Sorted by size, largest first */
  readonly volumes: readonly VolumeRecord[];
  readonly volumeCount: number;
}

export interface ZfsPoolRecord {
  readonly name: string;
  readonly node: string;
  readonly health: ZfsHealth;
  readonly size: number;
  readonly alloc: number;
  readonly free: number;
  /** Fragmentation, percent */
  readonly frag: number;
  readonly dedup: number;
}

export interface ZfsScanRecord {
  readonly function: string;
  readonly state: string;
}

export interface ZfsDeviceRecord {
  readonly name: string;
  /** As `zpool status` prints it; spares report AVAIL or INUSE */
  readonly state: string;
  readonly children: readonly ZfsDeviceRecord[];
}

export interface ZfsPoolDetailRecord {
  readonly name: string;
  readonly node: string;
  readonly health: ZfsHealth;
  readonly state: string;
  readonly scan?: ZfsScanRecord;
  readonly action?: string;
  readonly status?: string;
  readonly errors: string;
  readonly children: readonly ZfsDeviceRecord[];
  /** Unstructured `zpool status` text kept when no structured fields exist */
  readonly rawStatus?: string;
}

export interface ZfsDatasetRecord {
  readonly name: string;
  readonly type: string;
  readonly used: number;
  readonly avail: number;
  readonly refer: number;
  readonly mountpoint: string;
}

export interface DiskRecord {
  readonly devpath: string;
  readonly node: string;
  readonly size: number;
  readonly serial: string;
  readonly type: DiskType;
  /** SMART health text, e.g. PASSED */
  readonly health: string;
  readonly model: string;
  readonly vendor: string;
  readonly rpm: number;
  readonly wearout: number | 'N/A';
  readonly used: string;
}

export interface ClusterStatusRecord {
  readonly name?: string;
  readonly quorum: boolean;
  readonly nodes: number;
  readonly resources?: number;
}
