import type { ComputeInstanceRecord } from '@pvelens/shared';
import { numberOr, objectOf, optionalNumber, textOr } from './fields.js';

/** Entry of `GET /nodes/{node}/qemu` or `GET /nodes/{node}/lxc` */
const GuestEntry = objectOf({
  vmid: numberOr(0),
  name: textOr('unknown'),
  status: textOr('unknown'),
  cpus: optionalNumber(),
  mem: numberOr(0),
  maxmem: numberOr(0),
});

/** The parts of `GET /nodes/{node}/qemu/{vmid}/config` we report */
const VmConfig = objectOf({
  cores: optionalNumber(),
});

export function vmidOf(entry: unknown): number {
  return GuestEntry.parse(entry).vmid;
}

/**
 * VM or container record. `config`, when given, supplies the configured
 * core count in place of the runtime `cpus` value.
 */
export function normalizeGuest(node: string, entry: unknown, config?: unknown): ComputeInstanceRecord {
  const guest = GuestEntry.parse(entry);
  const cores = config === undefined ? undefined : VmConfig.parse(config).cores;

  return {
    name: guest.name,
    vmid: guest.vmid,
    status: guest.status,
    node,
    cpus: cores ?? guest.cpus,
    memory: { used: guest.mem, total: guest.maxmem },
  };
}
