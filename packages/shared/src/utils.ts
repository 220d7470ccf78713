// Shared value utilities for taxoforge packages

import { isDeepStrictEqual } from 'node:util';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep copy of a JSON-like value. */
export function deepClone<T>(value: T): T {
  return structuredClone(value);
}

export function deepEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(a, b);
}

/** Delete own keys whose value is undefined, in place. */
export function compact<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
}

/**
 * Order-preserving union of two lists. Items of `right` that already appear
 * in `left` (by deep equality) are dropped.
 */
export function unionLists<T>(left: readonly T[], right: readonly T[]): T[] {
  const out = [...left];
  for (const item of right) {
    if (!out.some((existing) => isDeepStrictEqual(existing, item))) {
      out.push(item);
    }
  }
  return out;
}

export const isValidUrl = (url: string): boolean => {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
};
