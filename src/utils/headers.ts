import type { IncomingHttpHeaders } from 'http';

/**
 * Case-insensitive helpers for plain header records
 */

/**
 * Remove every case-variant of `name`
 */
export function removeHeader(headers: Record<string, string>, name: string): void {
  const wanted = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === wanted) {
      delete headers[key];
    }
  }
}

/**
 * Set `name`, replacing any existing case-variant so only one copy is sent
 */
export function replaceHeader(headers: Record<string, string>, name: string, value: string): void {
  removeHeader(headers, name);
  headers[name] = value;
}

/**
 * Collapse Node's header shape into single string values; repeated headers are comma-joined
 */
export function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}
