import type { FetchFn, ProxmoxApi, ProxmoxConfig, ProxmoxCredentials } from '@pvelens/shared';
import { ProxmoxRequestError } from '../errors.js';
import { isRecord } from '../normalize/fields.js';

// --- Auth helpers ---

/** Build Proxmox PVEAPIToken auth header */
export function buildAuthHeaders(credentials: ProxmoxCredentials): Record<string, string> {
  return { Authorization: `PVEAPIToken=${credentials.tokenId}=${credentials.tokenSecret}` };
}

// --- Proxmox REST helper ---

export function proxmoxUrl(endpoint: string, path: string, params?: Record<string, string>): string {
  const url = new URL(`${endpoint.replace(/\/$/, '')}/api2/json${path}`);
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

/** GET a Proxmox API endpoint, returns parsed JSON */
export async function proxmoxGet(
  path: string,
  config: ProxmoxConfig,
  credentials: ProxmoxCredentials,
  fetchFn: FetchFn,
  params?: Record<string, string>,
): Promise<unknown> {
  const url = proxmoxUrl(config.endpoint, path, params);
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...buildAuthHeaders(credentials),
    ...config.headers,
  };

  const res = await fetchFn(url, { headers });
  if (!res.ok) throw new ProxmoxRequestError(path, res.status, res.statusText);
  const body: unknown = await res.json();
  return body;
}

const segment = encodeURIComponent;

/**
 * ProxmoxApi over the PVE REST API. Each accessor returns the `data`
 * member of the response body untouched; shape handling is left to the
 * normalizers.
 */
export class ProxmoxClient implements ProxmoxApi {
  constructor(
    private readonly config: ProxmoxConfig,
    private readonly credentials: ProxmoxCredentials,
    private readonly fetchFn: FetchFn = globalThis.fetch.bind(globalThis),
  ) {}

  private async data(path: string, params?: Record<string, string>): Promise<unknown> {
    const body = await proxmoxGet(path, this.config, this.credentials, this.fetchFn, params);
    return isRecord(body) ? body.data : undefined;
  }

  getNodes(): Promise<unknown> {
    return this.data('/nodes');
  }

  getNodeStatus(node: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/status`);
  }

  getVms(node: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/qemu`);
  }

  getVmConfig(node: string, vmid: number): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/qemu/${vmid}/config`);
  }

  getContainers(node: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/lxc`);
  }

  getStorage(): Promise<unknown> {
    return this.data('/storage');
  }

  getNodeStorage(node: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/storage`);
  }

  getStorageStatus(node: string, storage: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/storage/${segment(storage)}/status`);
  }

  getStorageContent(node: string, storage: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/storage/${segment(storage)}/content`);
  }

  getZfsPools(node: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/disks/zfs`);
  }

  getZfsPool(node: string, pool: string): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/disks/zfs/${segment(pool)}`);
  }

  getDisks(node: string, includePartitions: boolean): Promise<unknown> {
    return this.data(`/nodes/${segment(node)}/disks/list`, {
      'include-partitions': includePartitions ? '1' : '0',
    });
  }

  getClusterStatus(): Promise<unknown> {
    return this.data('/cluster/status');
  }

  getClusterResources(): Promise<unknown> {
    return this.data('/cluster/resources');
  }

  /** GET /version; false on any failure */
  async testConnection(): Promise<boolean> {
    try {
      await proxmoxGet('/version', this.config, this.credentials, this.fetchFn);
      return true;
    } catch {
      return false;
    }
  }
}
