// ABOUTME: Narrowing helpers for untyped JSON payloads.

import type { ApiErrorEntry } from './errors.js';

export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord | undefined {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Walk nested objects; any non-object along the way yields undefined. */
export function readPath(value: unknown, ...keys: string[]): unknown {
  let current: unknown = value;
  for (const key of keys) {
    const record = asRecord(current);
    if (!record) {
      return undefined;
    }
    current = record[key];
  }
  return current;
}

export function readString(value: unknown, ...keys: string[]): string | undefined {
  const found = readPath(value, ...keys);
  return typeof found === 'string' ? found : undefined;
}

export function readNonEmptyString(value: unknown, ...keys: string[]): string | undefined {
  const found = readString(value, ...keys);
  return found && found.length > 0 ? found : undefined;
}

export function readNumber(value: unknown, ...keys: string[]): number | undefined {
  const found = readPath(value, ...keys);
  if (typeof found === 'number' && Number.isFinite(found)) {
    return found;
  }
  // Counters such as views.count arrive as numeric strings.
  if (typeof found === 'string' && /^\d+$/.test(found)) {
    return Number(found);
  }
  return undefined;
}

export function readBoolean(value: unknown, ...keys: string[]): boolean | undefined {
  const found = readPath(value, ...keys);
  return typeof found === 'boolean' ? found : undefined;
}

export function readApiErrors(body: unknown): ApiErrorEntry[] {
  return asArray(readPath(body, 'errors'))
    .map((entry): ApiErrorEntry | null => {
      const message = readString(entry, 'message');
      if (message === undefined) {
        return null;
      }
      const code = readNumber(entry, 'code');
      return code === undefined ? { message } : { message, code };
    })
    .filter((entry): entry is ApiErrorEntry => entry !== null);
}

/** True when a GraphQL body carries a non-empty `data` object next to its errors. */
export function hasData(body: unknown): boolean {
  const data = asRecord(readPath(body, 'data'));
  return data !== undefined && Object.keys(data).length > 0;
}
