/** Injectable fetch function for testing */
export type FetchFn = typeof globalThis.fetch;

/** PVE API token credentials */
export interface ProxmoxCredentials {
  /** Full token id, e.g. `monitor@pve!reports` */
  tokenId: string;
  tokenSecret: string;
}

/** Connection settings for a Proxmox VE endpoint */
export interface ProxmoxConfig {
  /** Base URL, e.g. https://pve01.local:8006 */
  endpoint: string;
  /** Additional headers to include in requests */
  headers?: Record<string, string>;
  /** Set to false to accept self-signed certificates */
  tlsRejectUnauthorized?: boolean;
}

/**
 * Resource accessors the report operations depend on.
 *
 * Every accessor resolves to the deserialized `data` member of the API
 * response, whatever its shape (object, array, string or undefined), and
 * rejects on transport or authentication failure.
 */
export interface ProxmoxApi {
  getNodes(): Promise<unknown>;
  getNodeStatus(node: string): Promise<unknown>;
  getVms(node: string): Promise<unknown>;
  getVmConfig(node: string, vmid: number): Promise<unknown>;
  getContainers(node: string): Promise<unknown>;
  getStorage(): Promise<unknown>;
  getNodeStorage(node: string): Promise<unknown>;
  getStorageStatus(node: string, storage: string): Promise<unknown>;
  getStorageContent(node: string, storage: string): Promise<unknown>;
  getZfsPools(node: string): Promise<unknown>;
  getZfsPool(node: string, pool: string): Promise<unknown>;
  getDisks(node: string, includePartitions: boolean): Promise<unknown>;
  getClusterStatus(): Promise<unknown>;
  getClusterResources(): Promise<unknown>;
}
