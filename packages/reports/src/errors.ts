/** Message text of an unknown thrown value */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The single failure a public operation reports. Wraps whatever was thrown
 * by an accessor, normalizer or renderer.
 */
export class OperationError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Failed to ${operation}: ${describeError(cause)}`, { cause });
    this.name = 'OperationError';
    this.operation = operation;
  }
}

export class ProxmoxRequestError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly path: string;

  constructor(path: string, status: number, statusText: string) {
    super(`Proxmox API returned ${status}: ${statusText}`);
    this.name = 'ProxmoxRequestError';
    this.path = path;
    this.status = status;
    this.statusText = statusText;
  }
}
