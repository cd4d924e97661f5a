import type { SchemaType } from '../core/types.js';
import { ConstructURLError } from '../error/constructUrlError.js';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/**
 * Constructs a relative URL by replacing `{param}` path segments and appending query parameters.
 *
 * - Path values are URI-encoded. Only strings and numbers are substituted.
 * - `$search` is validated against the endpoint's schema when one is given. Every key the schema
 *   outputs is rendered in order, so a `false` boolean is sent as `false`. Only `undefined`
 *   and `null` are left out.
 * - The leading slash is dropped so the result joins cleanly onto the base URL.
 */
export async function constructUrl(
  path: string,
  params: unknown,
  searchSchema?: SchemaType,
): SafeWrapAsync<Error, string> {
  let result = path;
  const entries: [string, unknown][] = params && typeof params === 'object' ? Object.entries(params) : [];

  for (const [key, value] of entries) {
    if (key === '$search') {
      continue;
    }

    if (typeof value === 'string' || typeof value === 'number') {
      result = result.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
    }
  }

  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError('error constructing URL, path contains unreplaced {}', result), null];
  }

  const rawSearch = entries.find(([key]) => key === '$search')?.[1];
  if (rawSearch !== undefined) {
    let search: unknown = rawSearch;
    if (searchSchema) {
      const [errSearch, parsed] = await validator(rawSearch, searchSchema);
      if (errSearch) {
        return [new Error('error extracting search params', { cause: errSearch }), null];
      }

      search = parsed;
    }

    const query = toSearchParams(search).toString();
    if (query) {
      result += `?${query}`;
    }
  }

  return [null, result.replace(/^\//, '')];
}

/** Renders a flat record as query parameters, skipping absent values. */
function toSearchParams(search: unknown): URLSearchParams {
  const searchParams = new URLSearchParams();
  if (!search || typeof search !== 'object') {
    return searchParams;
  }

  for (const [key, value] of Object.entries(search)) {
    if (value === undefined || value === null) {
      continue;
    }

    searchParams.append(key, String(value));
  }

  return searchParams;
}
