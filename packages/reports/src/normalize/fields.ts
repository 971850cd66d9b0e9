import { z } from 'zod';

/*
 * Field schemas for upstream records. Every field carries a `.catch()`
 * default, so parsing a record never throws: a missing or malformed key
 * takes its documented default instead.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Items of a list response; anything that is not an array yields none */
export function toArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

// PVE returns some numbers as strings ("1.00") and flags as booleans or 0/1.
function numeric(value: unknown): unknown {
  if (typeof value === 'boolean') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

function textual(value: unknown): unknown {
  return typeof value === 'number' && Number.isFinite(value) ? String(value) : value;
}

const finite = z.number().finite();

export function numberOr(fallback: number) {
  return z.preprocess(numeric, finite).catch(fallback);
}

export function optionalNumber() {
  return z.preprocess(numeric, finite.optional()).catch(undefined);
}

export function textOr(fallback: string) {
  return z.preprocess(textual, z.string()).catch(fallback);
}

export function optionalText() {
  return z.preprocess(textual, z.string().optional()).catch(undefined);
}

/** Object schema that treats a non-object input as `{}` */
export function objectOf<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((value) => (isRecord(value) ? value : {}), z.object(shape));
}

/** Object schema that yields undefined for a missing or non-object input */
export function optionalObjectOf<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((value) => (isRecord(value) ? value : undefined), z.object(shape).optional());
}

/** Map each list item through `parse`; non-array input yields an empty list */
export function listOf<T>(value: unknown, parse: (item: unknown) => T): T[] {
  return toArray(value).map(parse);
}

/** A finite number, or `sentinel` when the value is missing or not numeric */
export function numberOrSentinel<S extends string>(sentinel: S) {
  return z.preprocess(numeric, z.union([finite, z.literal(sentinel)])).catch(sentinel);
}
