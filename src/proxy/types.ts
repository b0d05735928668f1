/**
 * Proxy Types
 *
 * Type definitions for the proxy host.
 */

import type { IncomingHttpHeaders } from 'http';
import type { ExchangeView } from '../flows/core/types.js';

/**
 * Proxy context - one per exchange, shared across interceptors.
 * Flows see it through ExchangeView and rewrite it in place.
 */
export interface ProxyContext extends ExchangeView {
  /** http: or https:, used to rebuild the upstream URL */
  protocol: 'http:' | 'https:';
  requestBody: string;
  /** Set once a flow replaced requestBody; otherwise the original bytes go upstream */
  bodyRewritten: boolean;
  requestStartTime: number;
  /** Set when the host matches a configured target */
  intercepted: boolean;
  targetUrl?: string;
}

/**
 * Upstream response, body fully buffered
 */
export interface UpstreamResponse {
  statusCode: number;
  statusMessage: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}
