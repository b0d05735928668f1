/**
 * Checkpoint Log Auto-Fetch
 *
 * Issues the secondary log query right after a successful auth exchange, using
 * the token the upstream just minted and the parameters captured during the
 * request phase. Bounded by the upstream timeout; every failure comes back as
 * an AutoFetchResult value, never as a rejection.
 */

import type { ProxyOptions } from '../../config/options.js';
import type { ProxyHTTPClient } from '../../proxy/http-client.js';
import { TimeoutError } from '../../proxy/errors.js';
import { logger } from '../../utils/logger.js';
import { flattenHeaders } from '../../utils/headers.js';
import { ResponseEnvelope } from '../core/envelope.js';
import type { CheckpointAuthMetadata } from '../core/flow-state.js';
import { buildQuery } from '../core/payload-parser.js';
import { CSRF_HEADER } from './checkpoint.constants.js';

export type AutoFetchResult =
  | { ok: true; response: ResponseEnvelope }
  | { ok: false; reason: 'status' | 'transport' | 'timeout'; statusCode?: number };

export interface LogFetcher {
  fetchLogs(accessToken: string, metadata: CheckpointAuthMetadata): Promise<AutoFetchResult>;
}

export interface AutoFetchRequest {
  url: URL;
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
}

/**
 * Shape the log query: stored query parameters replace the configured URL's
 * query, stored body parameters turn the call into a JSON POST
 */
export function buildAutoFetchRequest(
  logUrl: URL,
  accessToken: string,
  metadata: CheckpointAuthMetadata
): AutoFetchRequest {
  const url = new URL(logUrl.toString());
  const queryEntries = Object.entries(metadata.logQueryParameters);
  if (queryEntries.length > 0) {
    url.search = `?${buildQuery(queryEntries)}`;
  }

  const headers: Record<string, string> = {
    Authorization: `Bearer ${accessToken}`,
    Accept: 'application/json'
  };
  if (metadata.csrfToken && metadata.csrfToken.trim()) {
    headers[CSRF_HEADER] = metadata.csrfToken;
  }

  if (Object.keys(metadata.logBodyParameters).length === 0) {
    return { url, method: 'GET', headers };
  }

  const body = JSON.stringify(metadata.logBodyParameters);
  headers['Content-Type'] = 'application/json';
  headers['Content-Length'] = String(Buffer.byteLength(body));
  return { url, method: 'POST', headers, body };
}

export class CheckpointLogFetcher implements LogFetcher {
  constructor(
    private readonly options: Pick<ProxyOptions, 'checkpointLogUrl' | 'upstreamTimeoutMs'>,
    private readonly httpClient: ProxyHTTPClient
  ) {}

  async fetchLogs(accessToken: string, metadata: CheckpointAuthMetadata): Promise<AutoFetchResult> {
    const request = buildAutoFetchRequest(this.options.checkpointLogUrl, accessToken, metadata);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.upstreamTimeoutMs);

    try {
      const upstream = await this.httpClient.forward(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal
      });
      const body = (await this.httpClient.readResponseBody(upstream)).toString('utf8');
      const response = new ResponseEnvelope(upstream.statusCode ?? 0, body, flattenHeaders(upstream.headers));

      if (!response.isSuccess) {
        logger.error('checkpoint_auto_fetch_failed', new Error(`Remote status ${response.statusCode}`), {
          status: response.statusCode,
          responseBody: response.body
        });
        return { ok: false, reason: 'status', statusCode: response.statusCode };
      }

      return { ok: true, response };
    } catch (error) {
      const timedOut = controller.signal.aborted || error instanceof TimeoutError;
      logger.error('checkpoint_auto_fetch_exception', error, {
        reason: timedOut ? 'timeout' : 'transport',
        url: request.url.toString()
      });
      return { ok: false, reason: timedOut ? 'timeout' : 'transport' };
    } finally {
      clearTimeout(timer);
    }
  }
}
