import type { HeaderOptions } from '../types/request.js';

/**
 * Header values that can't be sent as text (objects, functions, symbols) are dropped.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  if (type === 'object' || type === 'function' || type === 'symbol') {
    return null;
  }

  return String(value);
}

/**
 * Normalizes the different header container shapes into `[name, value]` pairs.
 */
function toEntries(headers?: HeaderOptions): [string, unknown][] {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (Array.isArray(headers)) {
    return headers.map((pair): [string, unknown] => [String(pair[0]), pair[1]]);
  }

  return Object.entries(headers);
}

/**
 * Merge headers left to right into a single `Headers` instance. Later sources win,
 * and a `null` or `undefined` value removes the header set by an earlier source.
 */
export function mergeHeaderOptions(...sources: (HeaderOptions | undefined)[]): Headers {
  const merged = new Headers();

  for (const [key, value] of sources.flatMap(toEntries)) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}
