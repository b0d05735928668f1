/**
 * Upstream HTTP Client
 *
 * Forwards one request upstream over pooled keep-alive agents and hands back
 * the response stream. Callers buffer it with readResponseBody when they need
 * to rewrite the body.
 */

import https from 'https';
import http from 'http';
import { TimeoutError, NetworkError } from './errors.js';

export interface HTTPClientOptions {
  /** Socket inactivity timeout in ms */
  timeout?: number;
  rejectUnauthorized?: boolean;
  /** Accept TLS 1.0+ and legacy cipher suites on upstream connections */
  compatTls?: boolean;
}

export interface ForwardRequestOptions {
  method: string;
  headers: Record<string, string>;
  body?: string | Buffer;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 30_000;

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN', 'EHOSTUNREACH']);

function errorCode(error: Error): string | undefined {
  const code: unknown = 'code' in error ? error.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

export class ProxyHTTPClient {
  private readonly httpsAgent: https.Agent;
  private readonly httpAgent: http.Agent;
  private readonly timeout: number;

  constructor(options: HTTPClientOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;

    const tlsOptions: https.AgentOptions = options.compatTls
      ? { minVersion: 'TLSv1', ciphers: 'DEFAULT:@SECLEVEL=0' }
      : {};

    this.httpsAgent = new https.Agent({
      ...tlsOptions,
      rejectUnauthorized: options.rejectUnauthorized ?? true,
      keepAlive: true,
      maxSockets: 50
    });
    this.httpAgent = new http.Agent({
      keepAlive: true,
      maxSockets: 50
    });
  }

  async forward(url: URL, options: ForwardRequestOptions): Promise<http.IncomingMessage> {
    const isHttps = url.protocol === 'https:';
    const protocol = isHttps ? https : http;
    const agent = isHttps ? this.httpsAgent : this.httpAgent;

    return new Promise((resolve, reject) => {
      if (options.signal?.aborted) {
        reject(new TimeoutError('Request aborted before it was sent', { url: url.toString() }));
        return;
      }

      const requestOptions: http.RequestOptions = {
        hostname: url.hostname.replace(/^\[|\]$/g, ''),
        port: url.port || (isHttps ? 443 : 80),
        path: url.pathname + url.search,
        method: options.method,
        headers: options.headers,
        agent,
        timeout: this.timeout
      };

      const req = protocol.request(requestOptions, res => {
        resolve(res);
      });

      // Stays attached after the response arrives so an abort also cuts the body read
      const onAbort = (): void => {
        req.destroy();
        reject(new TimeoutError('Request aborted', { url: url.toString() }));
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      req.on('error', (error: Error) => {
        options.signal?.removeEventListener('abort', onAbort);
        const code = errorCode(error);

        if ((code && NETWORK_ERROR_CODES.has(code)) || error.message.includes('socket hang up')) {
          reject(new NetworkError(`Cannot connect to upstream: ${error.message}`, {
            errorCode: code ?? 'NETWORK_ERROR',
            hostname: url.hostname
          }));
          return;
        }

        reject(error);
      });

      req.on('timeout', () => {
        req.destroy();
        reject(new TimeoutError(`Request timeout after ${this.timeout}ms`, {
          timeout: this.timeout,
          url: url.toString()
        }));
      });

      if (options.body) {
        req.write(options.body);
      }

      req.end();
    });
  }

  /**
   * Read response body into buffer
   */
  async readResponseBody(response: http.IncomingMessage): Promise<Buffer> {
    const chunks: Buffer[] = [];

    for await (const chunk of response) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    return Buffer.concat(chunks);
  }

  close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }
}
