import type { FetchFn, ProxmoxConfig } from '@pvelens/shared';
import { Agent, fetch as undiciFetch } from 'undici';

type UndiciInit = Parameters<typeof undiciFetch>[1];

/**
 * Fetch for a PVE endpoint. Each node serves `pve-ssl.pem`, signed by the
 * cluster's own CA, on port 8006 until an ACME or custom certificate is
 * installed. `PROXMOX_VERIFY_TLS=false` routes requests through an undici
 * dispatcher that accepts that certificate.
 */
export function buildTlsFetch(config: ProxmoxConfig): FetchFn {
  if (config.tlsRejectUnauthorized !== false) return globalThis.fetch.bind(globalThis);

  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
  const insecureFetch = (input: string | URL | Request, init?: RequestInit) =>
    undiciFetch(input, { ...init, dispatcher } as UndiciInit);
  return insecureFetch as FetchFn;
}
