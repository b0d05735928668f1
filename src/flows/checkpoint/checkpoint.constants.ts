/**
 * Keys and headers shared by the Checkpoint auth, log and auto-fetch flows
 */

export const CLIENT_ID_KEY = 'client_id';
export const CLIENT_SECRET_KEY = 'client_secret';
export const ACCESS_TOKEN_KEY = 'access_token';
export const CSRF_KEY = 'csrf';
export const AUTHORIZATION_CODE_KEY = 'code';

/** Per-request opt-in, accepted in both spellings */
export const AUTO_FETCH_FLAG_KEYS = ['auto_fetch_logs', 'autoFetchLogs'] as const;

export const CSRF_HEADER = 'x-av-req-id';

/**
 * Never forwarded to any downstream API in a transformed body or query
 */
export const GLOBAL_RESERVED_KEYS: readonly string[] = [
  'client_id',
  'client_secret',
  'grant_type',
  'access_token',
  'token_type',
  'key',
  'value',
  'application',
  ...AUTO_FETCH_FLAG_KEYS
];

/** Body keys dropped before they are stored for the auto-fetch call */
export const AUTH_RESERVED_BODY_KEYS: readonly string[] = GLOBAL_RESERVED_KEYS;

/** Query keys dropped before they are stored for the auto-fetch call */
export const AUTH_RESERVED_QUERY_KEYS: readonly string[] = [AUTHORIZATION_CODE_KEY, ...GLOBAL_RESERVED_KEYS];

export const LOG_RESERVED_KEYS: readonly string[] = [...GLOBAL_RESERVED_KEYS, CSRF_KEY];
