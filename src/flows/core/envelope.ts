/**
 * Response Envelopes
 *
 * TokenEnvelope is the canonical token shape returned to callers whatever the
 * provider answered. ResponseEnvelope is a plain HTTP response value.
 */

/**
 * Canonical token response
 */
export interface TokenEnvelope {
  access_token: string | null;
  token_type: 'Bearer';
  csrf?: string;
  expires_in?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInt32(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= -2147483648 && value <= 2147483647;
}

/**
 * Reshape a Checkpoint auth response `{data: {token, csrf?, expiresIn?|expires?}}`.
 *
 * @returns undefined when `data.token` is absent, so the caller can pass the
 * upstream body through untouched
 */
export function buildCheckpointTokenEnvelope(document: unknown): TokenEnvelope | undefined {
  if (!isRecord(document)) {
    return undefined;
  }

  const data = document.data;
  if (!isRecord(data) || !('token' in data)) {
    return undefined;
  }

  const envelope: TokenEnvelope = {
    access_token: typeof data.token === 'string' ? data.token : null,
    token_type: 'Bearer'
  };

  if (typeof data.csrf === 'string') {
    envelope.csrf = data.csrf;
  }

  if (isInt32(data.expiresIn)) {
    envelope.expires_in = data.expiresIn;
  } else if (isInt32(data.expires)) {
    envelope.expires_in = data.expires;
  }

  return envelope;
}

/**
 * HTTP response value with case-insensitive header lookup
 */
export class ResponseEnvelope {
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;

  constructor(
    readonly statusCode: number,
    body: string | null | undefined,
    headers?: Record<string, string>
  ) {
    this.body = body ?? '';
    this.headers = { ...headers };
  }

  static empty(statusCode = 200): ResponseEnvelope {
    return new ResponseEnvelope(statusCode, '');
  }

  get isSuccess(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  getHeaderValue(name: string): string | undefined {
    if (!name.trim()) {
      return undefined;
    }

    const wanted = name.toLowerCase();
    const match = Object.entries(this.headers).find(([key]) => key.toLowerCase() === wanted);
    return match?.[1];
  }
}
