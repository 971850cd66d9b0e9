/** Title glyph per resource kind */
export const RESOURCE_ICONS = {
  node: '🖥️',
  vm: '🗃️',
  container: '📦',
  storage: '💾',
  zfs: '🗄️',
  disk: '💿',
  cluster: '⚙️',
} as const;

export const STATUS_ICONS = {
  ok: '🟢',
  warning: '🟡',
  critical: '🔴',
} as const;

// The three tables below are independent on purpose; they do not share a rule.

/** ZFS pool or vdev state */
export function healthIcon(state: string): string {
  if (state === 'ONLINE') return STATUS_ICONS.ok;
  if (state === 'DEGRADED') return STATUS_ICONS.warning;
  return STATUS_ICONS.critical;
}

export function diskTypeIcon(type: string): string {
  return type === 'ssd' ? '⚡' : '💿';
}

/** SMART health as reported by the disk list */
export function smartHealthIcon(health: string): string {
  if (health === 'PASSED' || health === 'OK') return STATUS_ICONS.ok;
  if (health === 'UNKNOWN') return STATUS_ICONS.warning;
  return STATUS_ICONS.critical;
}
