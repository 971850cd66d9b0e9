import {
  NO_KNOWN_DATA_ERRORS,
  ZfsHealth,
  type ZfsDeviceRecord,
  type ZfsPoolDetailRecord,
  type ZfsScanRecord,
} from '@pvelens/shared';
import { z } from 'zod';
import { isRecord, objectOf, optionalText, textOr } from './fields.js';

/**
 * The shapes `GET /nodes/{node}/disks/zfs/{pool}` has been seen to return,
 * depending on PVE version and pool state.
 */
export type PoolDetailShape =
  | { kind: 'absent' }
  | { kind: 'raw-text'; text: string }
  | { kind: 'structured'; fields: Record<string, unknown> }
  | { kind: 'unrecognized'; typeName: string; value: unknown };

/**
 * Tokens searched for in raw `zpool status` text, in priority order.
 * The first token found anywhere in the text wins, regardless of where it
 * appears, so a healthy vdev line can mask a degraded pool.
 */
export const RAW_HEALTH_SCAN_ORDER = ['ONLINE', 'DEGRADED', 'FAULTED'] as const;

export function classifyPoolDetail(value: unknown): PoolDetailShape {
  if (value === null || value === undefined) return { kind: 'absent' };
  if (typeof value === 'string') return { kind: 'raw-text', text: value };
  if (isRecord(value)) return { kind: 'structured', fields: value };
  return { kind: 'unrecognized', typeName: typeName(value), value };
}

function typeName(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

export function scanRawHealth(text: string): ZfsHealth {
  return RAW_HEALTH_SCAN_ORDER.find((token) => text.includes(token)) ?? 'UNKNOWN';
}

function renderRawValue(value: unknown): string {
  if (typeof value !== 'object' || value === null) return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

const health = ZfsHealth.catch('UNKNOWN');

const ZfsDevice: z.ZodType<ZfsDeviceRecord, z.ZodTypeDef, unknown> = z.lazy(() =>
  objectOf({
    name: textOr('unknown'),
    state: textOr('UNKNOWN'),
    children: z.array(ZfsDevice).catch([]),
  }),
);

const ScanFields = objectOf({
  function: textOr('none'),
  state: textOr('unknown'),
});

/**
 * Structured scan block `{ function, state }`, or the one-line summary
 * newer releases send ("scrub repaired 0B in 00:00:42 with 0 errors ...").
 */
export function normalizeScan(value: unknown): ZfsScanRecord | undefined {
  if (typeof value === 'string') {
    const text = value.trim();
    if (!text) return undefined;
    const space = text.indexOf(' ');
    return space === -1
      ? { function: text, state: 'unknown' }
      : { function: text.slice(0, space), state: text.slice(space + 1) };
  }
  if (!isRecord(value) || Object.keys(value).length === 0) return undefined;
  return ScanFields.parse(value);
}

const StructuredDetail = objectOf({
  health,
  state: textOr('UNKNOWN'),
  scan: z.unknown().transform(normalizeScan),
  action: optionalText(),
  status: optionalText(),
  errors: textOr(NO_KNOWN_DATA_ERRORS),
  children: z.array(ZfsDevice).catch([]),
});

/**
 * Resolve a pool detail response of unknown shape into a complete record.
 * Every branch fills every field, so rendering never special-cases a shape.
 */
export function normalizePoolDetail(node: string, pool: string, value: unknown): ZfsPoolDetailRecord {
  const shape = classifyPoolDetail(value);

  switch (shape.kind) {
    case 'absent':
      return {
        name: pool,
        node,
        health: 'UNKNOWN',
        state: 'API returned no data',
        errors: 'No data returned from API',
        children: [],
      };

    case 'raw-text':
      return {
        name: pool,
        node,
        health: scanRawHealth(shape.text),
        state: 'See raw output',
        errors: 'Check raw output',
        children: [],
        rawStatus: shape.text,
      };

    case 'structured': {
      const fields = StructuredDetail.parse(shape.fields);
      return {
        name: pool,
        node,
        health: fields.health,
        state: fields.state,
        scan: fields.scan,
        action: fields.action,
        status: fields.status,
        errors: fields.errors,
        children: fields.children,
      };
    }

    case 'unrecognized':
      return {
        name: pool,
        node,
        health: 'UNKNOWN',
        state: `Unexpected type: ${shape.typeName}`,
        errors: `API returned unexpected type: ${shape.typeName}`,
        children: [],
        rawStatus: renderRawValue(shape.value),
      };
  }
}
