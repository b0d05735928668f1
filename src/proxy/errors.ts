/**
 * Proxy Error Hierarchy
 *
 * Host-level failures only. Transform failures never surface here: every flow
 * has its own pass-through fallback.
 */

/** Serialized into the JSON body of every error reply */
export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProxyError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      ...this.details
    };
  }
}

export class NetworkError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

/** Socket timeout or aborted upstream call */
export class TimeoutError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 504, 'TIMEOUT', details);
    this.name = 'TimeoutError';
  }
}

/** Neither an absolute URL nor a Host header to route by */
export class BadRequestError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
    this.name = 'BadRequestError';
  }
}

function errorCode(error: Error): string | undefined {
  const code: unknown = 'code' in error ? error.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN', 'EHOSTUNREACH']);

/**
 * Maps whatever reached the host's error path onto a status and code for the
 * error reply. Unclassified errors become 500.
 */
export function normalizeError(error: unknown, context?: Record<string, unknown>): ProxyError {
  if (error instanceof ProxyError) {
    return error;
  }

  if (error instanceof Error) {
    const code = errorCode(error);

    if (code && NETWORK_ERROR_CODES.has(code)) {
      return new NetworkError(`Cannot connect to upstream server: ${error.message}`, {
        originalError: error.message,
        errorCode: code,
        ...context
      });
    }

    if (code === 'ETIMEDOUT' || error.name === 'AbortError' || error.message.includes('timeout')) {
      return new TimeoutError(`Request timeout: ${error.message}`, {
        originalError: error.message,
        errorCode: code,
        ...context
      });
    }

    return new ProxyError(error.message, 500, 'INTERNAL_ERROR', {
      originalError: error.message,
      ...context
    });
  }

  return new ProxyError(String(error), 500, 'UNKNOWN_ERROR', { originalError: String(error), ...context });
}
