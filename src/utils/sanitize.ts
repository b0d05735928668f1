/**
 * Log Sanitization
 *
 * Redacts credential-bearing values before they reach the console or log file.
 * The proxy handles client secrets, access keys, bearer tokens and CSRF ids,
 * so every logged object goes through here.
 */

/**
 * Patterns to identify sensitive keys in objects
 */
const SENSITIVE_KEY_PATTERNS = [
  /api[_-]?key/i,
  /access[_-]?key/i,
  /access[_-]?token/i,
  /refresh[_-]?token/i,
  /^token$/i,
  /password/i,
  /secret/i,
  /credential/i,
  /authorization/i,
  /cookie/i,
  /csrf/i,
  /x-av-req-id/i
];

/**
 * Patterns to identify sensitive values (even if key name is not sensitive)
 */
const SENSITIVE_VALUE_PATTERNS = [
  /^[A-Za-z0-9-_]{20,}\.[A-Za-z0-9-_]{20,}\.[A-Za-z0-9-_]{20,}$/, // JWT
  /^Bearer\s+[A-Za-z0-9-_.+/=]{20,}$/i
];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some(pattern => pattern.test(key));
}

function isSensitiveValue(value: string): boolean {
  if (value.length < 20) return false;
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive string, showing only first and last few characters
 */
export function maskString(value: string, showChars = 4): string {
  if (value.length <= showChars * 2) {
    return '[REDACTED]';
  }
  return `${value.slice(0, showChars)}...${value.slice(-showChars)} [REDACTED]`;
}

/**
 * Sanitize a value for logging
 */
export function sanitizeValue(value: unknown, key?: string): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (key && isSensitiveKey(key)) {
    if (typeof value === 'string') {
      return maskString(value);
    }
    if (typeof value === 'object') {
      return '[REDACTED OBJECT]';
    }
    return '[REDACTED]';
  }

  if (typeof value === 'string') {
    return isSensitiveValue(value) ? maskString(value) : value;
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeValue(item));
  }

  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [entryKey, entryValue] of Object.entries(value)) {
      sanitized[entryKey] = sanitizeValue(entryValue, entryKey);
    }
    return sanitized;
  }

  return value;
}

/**
 * Sanitize HTTP headers, keeping the auth scheme of Authorization visible
 */
export function sanitizeHeaders(headers: Record<string, string>): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === 'authorization') {
      const parts = value.split(' ');
      sanitized[key] = parts.length === 2 ? `${parts[0]} [token redacted]` : '[REDACTED]';
    } else if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Sanitize log arguments before writing to console or file
 */
export function sanitizeLogArgs(...args: unknown[]): unknown[] {
  return args.map(arg => sanitizeValue(arg));
}
