/**
 * Payload Parser
 *
 * Normalizes an intercepted request into a RequestSnapshot: a flat,
 * case-insensitive view of body and query parameters, whatever encoding the
 * client used. Three body shapes arrive in practice:
 *
 * - JSON objects: `{"client_id": "abc", "client_secret": "xyz"}`
 * - key/value-pair arrays from log collectors: `[{"key": "client_id", "value": "abc"}]`
 * - form-urlencoded text: `client_id=abc&client_secret=xyz`
 */

import { PairMap } from './pair-map.js';

/**
 * Immutable view of an inbound request
 */
export class RequestSnapshot {
  readonly rawBody: string;
  readonly path: string;

  constructor(
    rawBody: string | null | undefined,
    readonly bodyPairs: PairMap,
    readonly queryPairs: PairMap,
    path: string,
    readonly query: string | undefined
  ) {
    this.rawBody = rawBody ?? '';
    this.path = isBlank(path) ? '/' : path;
  }

  /**
   * Combined lookup: body first, then query; blank values never count as present
   */
  tryGetValue(key: string): string | undefined {
    if (isBlank(key)) {
      return undefined;
    }

    const fromBody = this.bodyPairs.get(key);
    if (fromBody !== undefined && !isBlank(fromBody)) {
      return fromBody;
    }

    const fromQuery = this.queryPairs.get(key);
    if (fromQuery !== undefined && !isBlank(fromQuery)) {
      return fromQuery;
    }

    return undefined;
  }

  getValueOrDefault(key: string, fallback: string): string {
    return this.tryGetValue(key) ?? fallback;
  }
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

/**
 * Build a snapshot from the raw body and the request path (with query)
 */
export function parseRequest(rawBody: string | null | undefined, rawPath: string): RequestSnapshot {
  const { path, query } = splitPathAndQuery(rawPath);
  return new RequestSnapshot(rawBody, parseBody(rawBody), parseQuery(query), path, query);
}

export function splitPathAndQuery(rawPath: string | null | undefined): { path: string; query: string | undefined } {
  const candidate = rawPath ?? '/';
  const questionIndex = candidate.indexOf('?');
  if (questionIndex < 0) {
    return { path: candidate === '' ? '/' : candidate, query: undefined };
  }

  const basePath = candidate.slice(0, questionIndex);
  return {
    path: basePath === '' ? '/' : basePath,
    query: candidate.slice(questionIndex + 1)
  };
}

/**
 * Parse `a=1&b=2` style text. Only percent escapes are decoded; `+` stays literal.
 */
export function parseQuery(query: string | null | undefined): PairMap {
  const pairs = new PairMap();
  if (query === null || query === undefined || isBlank(query)) {
    return pairs;
  }

  for (const part of query.split('&')) {
    if (part === '') continue;

    const separator = part.indexOf('=');
    const key = unescapeDataString(separator < 0 ? part : part.slice(0, separator));
    const value = separator < 0 ? '' : unescapeDataString(part.slice(separator + 1));

    if (isBlank(key)) continue;

    pairs.add(key, value);
  }

  return pairs;
}

function parseBody(rawBody: string | null | undefined): PairMap {
  if (rawBody === null || rawBody === undefined || isBlank(rawBody)) {
    return new PairMap();
  }

  const trimmed = rawBody.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    const document = tryParseJson(trimmed);
    if (document.ok) {
      const sink = new PairMap();
      flattenJson(document.value, sink);
      return sink;
    }
  }

  return parseQuery(trimmed);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Flatten a JSON document into `sink`.
 *
 * Precedence: an object carrying a non-blank string `key` plus a `value`
 * contributes `{key: value}`; its other properties still contribute as
 * themselves, and `key`/`value` never appear as entries. Arrays recurse into
 * each element. Property values are not recursed into: nested structures are
 * kept as compact JSON text.
 */
export function flattenJson(element: unknown, sink: PairMap): void {
  if (Array.isArray(element)) {
    for (const item of element) {
      flattenJson(item, sink);
    }
    return;
  }

  if (!isJsonObject(element)) {
    return;
  }

  let pairKey: string | undefined;
  let pairValue: string | undefined;

  for (const [name, value] of Object.entries(element)) {
    if (name === 'key') {
      pairKey = typeof value === 'string' ? value : undefined;
      continue;
    }
    if (name === 'value') {
      pairValue = jsonValueToString(value);
      continue;
    }
    sink.add(name, jsonValueToString(value));
  }

  if (pairKey !== undefined && !isBlank(pairKey) && pairValue !== undefined) {
    sink.add(pairKey, pairValue);
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonValueToString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Percent-decode, keeping the input untouched when an escape is malformed
 */
export function unescapeDataString(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * RFC 3986 escaping: encodeURIComponent also leaves `!'()*` alone, escape those too
 */
export function escapeDataString(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function buildQuery(pairs: Iterable<readonly [string, string]>): string {
  const parts: string[] = [];
  for (const [key, value] of pairs) {
    parts.push(`${escapeDataString(key)}=${escapeDataString(value)}`);
  }
  return parts.join('&');
}

/**
 * Copy `pairs` without reserved keys (case-insensitive) and without blank values
 */
export function filterPairs(pairs: Iterable<readonly [string, string]>, reservedKeys: Iterable<string>): PairMap {
  const reserved = new Set<string>();
  for (const key of reservedKeys) {
    const trimmed = key.trim();
    if (trimmed) {
      reserved.add(trimmed.toLowerCase());
    }
  }

  const filtered = new PairMap();
  for (const [key, value] of pairs) {
    if (reserved.has(key.toLowerCase()) || isBlank(value)) {
      continue;
    }
    filtered.set(key, value);
  }
  return filtered;
}

/**
 * Parse a boolean control flag: true/false (any case), 1/0.
 * @returns undefined when absent or unparseable
 */
export function tryGetBoolean(snapshot: RequestSnapshot, key: string): boolean | undefined {
  const raw = snapshot.tryGetValue(key);
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

/**
 * Overlay `additions` on the snapshot's query and render `path?query`
 */
export function mergeQuery(
  snapshot: RequestSnapshot,
  additions: Iterable<readonly [string, string]>,
  baseQuery: PairMap = snapshot.queryPairs
): string {
  const merged = new PairMap(baseQuery);
  for (const [key, value] of additions) {
    merged.set(key, value);
  }

  return merged.size === 0 ? snapshot.path : `${snapshot.path}?${buildQuery(merged)}`;
}
