/**
 * Proxy Interceptors
 *
 * Hooks the proxy host runs around every forwarded exchange. The transform
 * interceptor is registered only for exchanges bound for a configured target.
 */

import type { ProxyContext, UpstreamResponse } from './types.js';
import type { RequestTransformer } from '../flows/request-transformer.js';
import type { ResponseTransformer } from '../flows/response-transformer.js';
import { logger } from '../utils/logger.js';
import { sanitizeHeaders } from '../utils/sanitize.js';

/**
 * Optional hooks for request/response/error
 */
export interface ProxyInterceptor {
  name: string;

  /** Called before forwarding request to upstream */
  onRequest?(context: ProxyContext): Promise<void>;

  /** Called after the upstream response body is buffered, before it is sent */
  onResponse?(context: ProxyContext, response: UpstreamResponse): Promise<void>;

  /** Called on any host-level error */
  onError?(context: ProxyContext, error: Error): Promise<void>;
}

/**
 * Runs the flow pipeline on intercepted exchanges
 */
export class TransformInterceptor implements ProxyInterceptor {
  name = 'transform';

  constructor(
    private readonly requestTransformer: Pick<RequestTransformer, 'transform'>,
    private readonly responseTransformer: Pick<ResponseTransformer, 'transform'>
  ) {}

  async onRequest(context: ProxyContext): Promise<void> {
    if (!context.intercepted) return;

    try {
      const body = this.requestTransformer.transform(context, context.requestBody);
      if (body !== context.requestBody) {
        context.requestBody = body;
        context.bodyRewritten = true;
      }
    } catch (error) {
      // Forward whatever state the exchange is in rather than failing it
      logger.error('request_transform_failed', error, { exchange: context.exchangeId });
    }
  }

  async onResponse(context: ProxyContext, response: UpstreamResponse): Promise<void> {
    if (!context.intercepted) return;

    let replacement: string | null;
    try {
      replacement = await this.responseTransformer.transform(context, response.body.toString('utf8'));
    } catch (error) {
      logger.error('response_transform_failed', error, { exchange: context.exchangeId });
      return;
    }

    if (replacement === null) return;

    response.body = Buffer.from(replacement, 'utf8');
    delete response.headers['content-encoding'];
    delete response.headers['transfer-encoding'];
    response.headers['content-length'] = String(response.body.length);
  }
}

/**
 * Request/response lines with redacted headers
 */
export class LoggingInterceptor implements ProxyInterceptor {
  name = 'logging';

  async onRequest(context: ProxyContext): Promise<void> {
    logger.debug(`[proxy-request] ${context.method} ${context.authority}${context.path}`, {
      exchange: context.exchangeId,
      intercepted: context.intercepted,
      bodySize: Buffer.byteLength(context.requestBody),
      headers: sanitizeHeaders(context.headers)
    });
  }

  async onResponse(context: ProxyContext, response: UpstreamResponse): Promise<void> {
    logger.debug(
      `[proxy-response] ${response.statusCode} ${context.authority}${context.path} (${Date.now() - context.requestStartTime}ms)`,
      {
        exchange: context.exchangeId,
        statusCode: response.statusCode,
        bytes: response.body.length
      }
    );
  }

  async onError(context: ProxyContext, error: Error): Promise<void> {
    logger.debug(`[proxy-error] ${error.name}: ${error.message}`, {
      exchange: context.exchangeId,
      target: context.targetUrl
    });
  }
}
