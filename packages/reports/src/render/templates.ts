import {
  TOP_VOLUME_LIMIT,
  WEAROUT_NOT_AVAILABLE,
  type ClusterStatusRecord,
  type ComputeInstanceRecord,
  type DiskRecord,
  type NodeRecord,
  type StoragePoolRecord,
  type StorageUsageRecord,
  type UsageRecord,
  type ZfsDatasetRecord,
  type ZfsDeviceRecord,
  type ZfsPoolDetailRecord,
  type ZfsPoolRecord,
} from '@pvelens/shared';
import { RESOURCE_ICONS, diskTypeIcon, healthIcon, smartHealthIcon } from '../format/icons.js';
import { formatPercent } from '../format/percent.js';
import { formatBytes, formatUptime } from '../format/units.js';

/*
 * Text reports, one per resource kind. Records arrive fully defaulted from
 * the normalizers; optional fields render as "N/A".
 */

function usageLine(label: string, usage: UsageRecord): string {
  return `  - ${label}: ${formatBytes(usage.used)} / ${formatBytes(usage.total)} (${formatPercent(usage.used, usage.total)})`;
}

function nodeLines(node: NodeRecord): string[] {
  const lines = [
    `  - Status: ${node.status.toUpperCase()}`,
    `  - Uptime: ${formatUptime(node.uptime)}`,
    `  - CPU Cores: ${node.cpus ?? 'N/A'}`,
    usageLine('Memory', node.memory),
  ];
  if (node.disk) lines.push(usageLine('Disk', node.disk));
  return lines;
}

export function renderNodes(nodes: readonly NodeRecord[]): string {
  const result = [`${RESOURCE_ICONS.node} Proxmox Nodes`];
  for (const node of nodes) {
    result.push('', `${RESOURCE_ICONS.node} ${node.name}`, ...nodeLines(node));
  }
  return result.join('\n');
}

export function renderNodeStatus(node: NodeRecord): string {
  return [`${RESOURCE_ICONS.node} Node: ${node.name}`, ...nodeLines(node)].join('\n');
}

function guestBlock(icon: string, guest: ComputeInstanceRecord): string[] {
  return [
    '',
    `${icon} ${guest.name} (ID: ${guest.vmid})`,
    `  - Status: ${guest.status.toUpperCase()}`,
    `  - Node: ${guest.node}`,
    `  - CPU Cores: ${guest.cpus ?? 'N/A'}`,
    usageLine('Memory', guest.memory),
  ];
}

export function renderVms(vms: readonly ComputeInstanceRecord[]): string {
  const result = [`${RESOURCE_ICONS.vm} Virtual Machines`];
  for (const vm of vms) result.push(...guestBlock(RESOURCE_ICONS.vm, vm));
  return result.join('\n');
}

export function renderContainers(containers: readonly ComputeInstanceRecord[]): string {
  if (containers.length === 0) return `${RESOURCE_ICONS.container} No containers found`;

  const result = [`${RESOURCE_ICONS.container} Containers`];
  for (const container of containers) {
    result.push(...guestBlock(RESOURCE_ICONS.container, container));
  }
  return result.join('\n');
}

export function renderStorage(pools: readonly StoragePoolRecord[]): string {
  const result = [`${RESOURCE_ICONS.storage} Storage Pools`];
  for (const pool of pools) {
    result.push(
      '',
      `${RESOURCE_ICONS.storage} ${pool.name}`,
      `  - Status: ${pool.status.toUpperCase()}`,
      `  - Type: ${pool.type}`,
      usageLine('Usage', { used: pool.used, total: pool.total }),
    );
  }
  return result.join('\n');
}

/** `local:iso/debian.iso` → `debian.iso`, `local-lvm:vm-100-disk-0` → `vm-100-disk-0` */
export function volumeName(volid: string): string {
  const separator = volid.includes('/') ? '/' : ':';
  return volid.slice(volid.lastIndexOf(separator) + 1);
}

export function renderStorageUsage(storages: readonly StorageUsageRecord[]): string {
  const result = [`${RESOURCE_ICONS.storage} Storage Usage Breakdown`];

  for (const store of storages) {
    result.push(
      '',
      `${RESOURCE_ICONS.storage} ${store.storage} (${store.type})`,
      `  Total: ${formatBytes(store.total)}`,
      `  Used: ${formatBytes(store.used)} (${formatPercent(store.used, store.total)})`,
      `  Available: ${formatBytes(store.available)}`,
      `  Volumes: ${store.volumeCount}`,
    );

    if (store.volumes.length === 0) continue;

    result.push('', '  Top Space Consumers:');
    for (const volume of store.volumes.slice(0, TOP_VOLUME_LIMIT)) {
      const owner = volume.vmid ? ` (VM ${volume.vmid})` : '';
      result.push(
        `    - ${volumeName(volume.volid)}${owner}: ${formatBytes(volume.size)} [${volume.content}]`,
      );
    }
    if (store.volumes.length > TOP_VOLUME_LIMIT) {
      result.push(`    ... and ${store.volumes.length - TOP_VOLUME_LIMIT} more volumes`);
    }
  }

  return result.join('\n');
}

export function renderCluster(status: ClusterStatusRecord): string {
  const result = [
    `${RESOURCE_ICONS.cluster} Proxmox Cluster`,
    '',
    `  - Name: ${status.name ?? 'N/A'}`,
    `  - Quorum: ${status.quorum ? 'OK' : 'NOT OK'}`,
    `  - Nodes: ${status.nodes}`,
  ];
  if (status.resources) result.push(`  - Resources: ${status.resources}`);
  return result.join('\n');
}

export function renderZfsPools(pools: readonly ZfsPoolRecord[]): string {
  if (pools.length === 0) return `${RESOURCE_ICONS.zfs} No ZFS pools found`;

  const result = [`${RESOURCE_ICONS.zfs} ZFS Storage Pools`];
  for (const pool of pools) {
    result.push(
      '',
      `${RESOURCE_ICONS.zfs} ${pool.name} (${pool.node})`,
      `  - Health: ${healthIcon(pool.health)} ${pool.health}`,
      `  - Size: ${formatBytes(pool.size)}`,
      `  - Used: ${formatBytes(pool.alloc)} (${formatPercent(pool.alloc, pool.size)})`,
      `  - Free: ${formatBytes(pool.free)}`,
      `  - Fragmentation: ${pool.frag}%`,
    );
    if (pool.dedup !== 1) result.push(`  - Dedup Ratio: ${pool.dedup.toFixed(2)}x`);
  }
  return result.join('\n');
}

function deviceLine(indent: string, device: ZfsDeviceRecord): string {
  return `${indent}- ${device.name}: ${healthIcon(device.state)} ${device.state}`;
}

export function renderZfsPoolDetail(pool: ZfsPoolDetailRecord): string {
  const result = [
    `${RESOURCE_ICONS.zfs} ZFS Pool: ${pool.name}`,
    `  - Node: ${pool.node}`,
    `  - Health: ${healthIcon(pool.health)} ${pool.health}`,
    `  - State: ${pool.state}`,
  ];

  if (pool.scan) result.push(`  - Last Scan: ${pool.scan.function} - ${pool.scan.state}`);
  if (pool.status) result.push(`  - Status: ${pool.status}`);
  if (pool.action) result.push(`  - Action: ${pool.action}`);
  result.push(`  - Errors: ${pool.errors}`);

  if (pool.children.length > 0) {
    result.push('', '  Disk Layout:');
    // vdevs (mirror-0, raidz1-0, ...) and their member devices
    for (const vdev of pool.children) {
      result.push(deviceLine('    ', vdev));
      for (const member of vdev.children) result.push(deviceLine('      ', member));
    }
  }

  if (pool.rawStatus) {
    result.push('', '  Raw Pool Status:');
    for (const line of pool.rawStatus.split('\n')) {
      if (line.trim()) result.push(`    ${line}`);
    }
  }

  return result.join('\n');
}

export function renderZfsDatasets(datasets: readonly ZfsDatasetRecord[]): string {
  if (datasets.length === 0) return `${RESOURCE_ICONS.zfs} No ZFS datasets found`;

  const result = [`${RESOURCE_ICONS.zfs} ZFS Datasets`];
  for (const dataset of datasets) {
    result.push(
      '',
      `  ${RESOURCE_ICONS.storage} ${dataset.name}`,
      `     - Type: ${dataset.type}`,
      `     - Used: ${formatBytes(dataset.used)}`,
      `     - Available: ${formatBytes(dataset.avail)}`,
      `     - Mountpoint: ${dataset.mountpoint}`,
    );
  }
  return result.join('\n');
}

export function renderDisks(disks: readonly DiskRecord[]): string {
  if (disks.length === 0) return `${RESOURCE_ICONS.disk} No disks found`;

  const result = [`${RESOURCE_ICONS.disk} Disks`];
  for (const disk of disks) {
    result.push(
      '',
      `  ${diskTypeIcon(disk.type)} ${disk.devpath} (${disk.node})`,
      `     - Size: ${formatBytes(disk.size)}`,
      `     - Model: ${disk.model}`,
      `     - Serial: ${disk.serial}`,
      `     - Health: ${smartHealthIcon(disk.health)} ${disk.health}`,
      `     - Usage: ${disk.used}`,
    );
    if (disk.type === 'ssd' && disk.wearout !== WEAROUT_NOT_AVAILABLE) {
      result.push(`     - Wear Level: ${disk.wearout}%`);
    }
  }
  return result.join('\n');
}
