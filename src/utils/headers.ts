import type { HeaderMap } from '../types/entities.js';

/** Case-insensitive header lookup. Returns the first matching value. */
export function getHeader(headers: HeaderMap | null, name: string): string | undefined {
  if (headers === null) {
    return undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

export function hasHeader(headers: HeaderMap | null, name: string): boolean {
  return getHeader(headers, name) !== undefined;
}

/**
 * Overlay `overrides` on `base`. A base header whose name matches an
 * override case-insensitively is replaced in place; new names are appended.
 */
export function mergeHeaders(base: HeaderMap, overrides: HeaderMap): HeaderMap {
  const pending = new Map<string, [string, string]>();
  for (const [key, value] of Object.entries(overrides)) {
    pending.set(key.toLowerCase(), [key, value]);
  }
  const merged: HeaderMap = {};
  for (const [key, value] of Object.entries(base)) {
    const override = pending.get(key.toLowerCase());
    if (override) {
      merged[override[0]] = override[1];
      pending.delete(key.toLowerCase());
    } else {
      merged[key] = value;
    }
  }
  for (const [key, value] of pending.values()) {
    merged[key] = value;
  }
  return merged;
}

/** Drop headers by name, case-insensitively. */
export function omitHeaders(headers: HeaderMap, names: readonly string[]): HeaderMap {
  const drop = new Set(names.map((n) => n.toLowerCase()));
  return Object.fromEntries(Object.entries(headers).filter(([k]) => !drop.has(k.toLowerCase())));
}
