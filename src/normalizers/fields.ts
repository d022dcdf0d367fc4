// Null-safe field lookups shared by the alert normalizers.

import { format, isValid, parse } from 'date-fns';
import { DateParseError } from '../errors';

// Placeholder written wherever the API omitted a value
export const SENTINEL = 'N/A';

// Timestamps arrive as e.g. 2024-01-15T10:30:00Z and are reported as calendar dates
const API_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";
const REPORT_DATE_FORMAT = 'yyyy-MM-dd';

export type RawAlert = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walks `path` through nested objects. Returns undefined as soon as a level is
 * missing or is not an object.
 */
export function lookup(source: unknown, path: readonly string[]): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function renderScalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

export function scalarAt(source: unknown, path: readonly string[]): string {
  return renderScalar(lookup(source, path)) ?? SENTINEL;
}

/**
 * First path that resolves to a scalar wins.
 */
export function firstScalarAt(source: unknown, paths: ReadonlyArray<readonly string[]>): string {
  for (const path of paths) {
    const value = renderScalar(lookup(source, path));
    if (value !== undefined) return value;
  }
  return SENTINEL;
}

/**
 * Reads an API timestamp and returns it as yyyy-MM-dd.
 * @throws DateParseError when the value is missing or not in the API's format
 */
export function dateAt(source: unknown, path: readonly string[]): string {
  const value = lookup(source, path);
  const field = path.join('.');
  if (typeof value !== 'string') {
    throw new DateParseError(field, value ?? SENTINEL);
  }

  const parsed = parse(value, API_TIMESTAMP_FORMAT, new Date(0));
  if (!isValid(parsed)) {
    throw new DateParseError(field, value);
  }
  return format(parsed, REPORT_DATE_FORMAT);
}
