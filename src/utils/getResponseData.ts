import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a successful response body.
 *
 * - 204 and 205 carry no body and resolve to `null`, as does an empty body.
 * - Any other body is parsed as JSON, whatever the content type says.
 * - A body that is not JSON resolves to the raw text, unless the content type claims JSON
 *   (`application/json` or any `+json` type), which is an error.
 */
export async function getResponseData(response: Response): SafeWrapAsync<Error, unknown> {
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  // Read once as text; a second read (text then json) would fail on the consumed body
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (!errJson) {
    return [null, json];
  }

  const contentType = response.headers.get('Content-Type')?.toLowerCase();
  if (contentType?.includes('application/json') || contentType?.includes('+json')) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, text];
}
