/**
 * AuthBridge Proxy Host
 *
 * Plain HTTP forward proxy. Accepts absolute-form requests
 * (`POST http://host/path`) as well as origin-form requests routed by their
 * Host header, which is what a TLS-terminating layer in front of it sends.
 *
 * Flow: build context → onRequest interceptors → forward → buffer body →
 * onResponse interceptors → send
 */

import { createServer, Server, IncomingMessage, ServerResponse } from 'http';
import type { ProxyOptions } from '../config/options.js';
import { createFlowPipeline } from '../flows/index.js';
import type { LogFetcher } from '../flows/checkpoint/checkpoint.auto-fetch.js';
import { isTargetHost } from '../flows/core/endpoint-matcher.js';
import { FlowStateStore } from '../flows/core/flow-state.js';
import { logger } from '../utils/logger.js';
import { removeHeader, replaceHeader } from '../utils/headers.js';
import { ProxyHTTPClient } from './http-client.js';
import { LoggingInterceptor, TransformInterceptor, type ProxyInterceptor } from './interceptors.js';
import type { ProxyContext, UpstreamResponse } from './types.js';
import { BadRequestError, NetworkError, TimeoutError, normalizeError } from './errors.js';

export interface AuthBridgeProxyDependencies {
  httpClient?: ProxyHTTPClient;
  flowState?: FlowStateStore;
  logFetcher?: LogFetcher;
  /** Scheme used for origin-form requests; defaults to https: */
  originProtocol?: 'http:' | 'https:';
}

export interface ListeningAddress {
  address: string;
  port: number;
  url: string;
}

/** Never forwarded hop to hop */
const HOP_BY_HOP_HEADERS = ['host', 'connection', 'proxy-connection', 'keep-alive', 'transfer-encoding', 'upgrade'];

const RESPONSE_SKIP_HEADERS = ['transfer-encoding', 'connection', 'keep-alive'];

export class AuthBridgeProxy {
  private server: Server | null = null;
  private readonly httpClient: ProxyHTTPClient;
  private readonly flowState: FlowStateStore;
  private readonly interceptors: ProxyInterceptor[];
  private readonly originProtocol: 'http:' | 'https:';
  private nextExchangeId = 1;

  constructor(
    private readonly options: ProxyOptions,
    deps: AuthBridgeProxyDependencies = {}
  ) {
    this.httpClient = deps.httpClient ?? new ProxyHTTPClient({
      timeout: options.upstreamTimeoutMs,
      compatTls: options.compatTls
    });
    this.flowState = deps.flowState ?? new FlowStateStore({ ttlMs: options.flowStateTtlMs });
    this.originProtocol = deps.originProtocol ?? 'https:';

    const pipeline = createFlowPipeline(options, {
      flowState: this.flowState,
      httpClient: this.httpClient,
      logFetcher: deps.logFetcher
    });

    // Transform first so the logging interceptor sees what actually goes upstream
    this.interceptors = [
      new TransformInterceptor(pipeline.requestTransformer, pipeline.responseTransformer),
      new LoggingInterceptor()
    ];
  }

  async start(): Promise<ListeningAddress> {
    if (this.server) {
      throw new Error('Proxy already started');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        // Top-level error handler
        if (!res.headersSent) {
          this.sendErrorResponse(res, error);
        } else {
          logger.error('proxy_response_failed', error);
          res.destroy();
        }
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.listenPort, this.options.listenAddress, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;

    server.on('error', error => logger.error('proxy_server_error', error));
    this.flowState.startSweeper();

    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : this.options.listenPort;
    const host = this.options.listenAddress === '0.0.0.0' ? 'localhost' : this.options.listenAddress;

    return {
      address: this.options.listenAddress,
      port,
      url: `http://${host.includes(':') ? `[${host}]` : host}:${port}`
    };
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
    }

    this.flowState.dispose();
    this.httpClient.close();
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const exchangeId = this.nextExchangeId++;
    let context: ProxyContext | undefined;

    try {
      const rawBody = await this.readBody(req);
      context = this.buildContext(exchangeId, req, rawBody);

      if (context.intercepted) {
        // Rewritten bodies must stay readable as text
        removeHeader(context.headers, 'accept-encoding');
      }

      for (const interceptor of this.interceptors) {
        if (interceptor.onRequest) {
          await interceptor.onRequest(context);
        }
      }

      const body = context.bodyRewritten ? Buffer.from(context.requestBody, 'utf8') : rawBody;
      this.setContentLength(context, body);

      const targetUrl = new URL(`${context.protocol}//${context.authority}${context.path}`);
      context.targetUrl = targetUrl.toString();

      const upstream = await this.httpClient.forward(targetUrl, {
        method: context.method,
        headers: context.headers,
        body: body.length > 0 ? body : undefined
      });

      const response: UpstreamResponse = {
        statusCode: upstream.statusCode ?? 502,
        statusMessage: upstream.statusMessage ?? '',
        headers: upstream.headers,
        body: await this.httpClient.readResponseBody(upstream)
      };

      for (const interceptor of this.interceptors) {
        if (interceptor.onResponse) {
          await interceptor.onResponse(context, response);
        }
      }

      this.sendResponse(res, response);
    } catch (error) {
      await this.handleError(error, exchangeId, res, context);
    }
  }

  private buildContext(exchangeId: number, req: IncomingMessage, rawBody: Buffer): ProxyContext {
    const { protocol, authority, path } = this.resolveTarget(req);

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(req.headers)) {
      if (value === undefined || HOP_BY_HOP_HEADERS.includes(key.toLowerCase())) continue;
      headers[key] = Array.isArray(value) ? value.join(', ') : value;
    }

    return {
      exchangeId,
      authority,
      protocol,
      method: req.method ?? 'GET',
      path,
      headers,
      requestBody: rawBody.toString('utf8'),
      bodyRewritten: false,
      requestStartTime: Date.now(),
      intercepted: isTargetHost(authority, this.options)
    };
  }

  private resolveTarget(req: IncomingMessage): { protocol: 'http:' | 'https:'; authority: string; path: string } {
    const rawUrl = req.url ?? '/';

    if (/^https?:\/\//i.test(rawUrl)) {
      const absolute = new URL(rawUrl);
      return {
        protocol: absolute.protocol === 'http:' ? 'http:' : 'https:',
        authority: absolute.host,
        path: `${absolute.pathname}${absolute.search}`
      };
    }

    const host = req.headers.host;
    if (!host) {
      throw new BadRequestError('Request has neither an absolute URL nor a Host header', { url: rawUrl });
    }

    return {
      protocol: this.originProtocol,
      authority: host,
      path: rawUrl.startsWith('/') ? rawUrl : `/${rawUrl}`
    };
  }

  private setContentLength(context: ProxyContext, body: Buffer): void {
    const method = context.method.toUpperCase();
    if (body.length === 0 && (method === 'GET' || method === 'HEAD')) {
      removeHeader(context.headers, 'content-length');
      return;
    }
    replaceHeader(context.headers, 'content-length', String(body.length));
  }

  private async readBody(req: IncomingMessage): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  }

  private sendResponse(res: ServerResponse, response: UpstreamResponse): void {
    res.statusCode = response.statusCode;
    if (response.statusMessage) {
      res.statusMessage = response.statusMessage;
    }

    for (const [key, value] of Object.entries(response.headers)) {
      if (!RESPONSE_SKIP_HEADERS.includes(key.toLowerCase()) && value !== undefined) {
        res.setHeader(key, value);
      }
    }

    res.end(response.body);
  }

  private async handleError(
    error: unknown,
    exchangeId: number,
    res: ServerResponse,
    context: ProxyContext | undefined
  ): Promise<void> {
    if (res.destroyed) {
      logger.debug('[proxy] Client disconnected', { exchange: exchangeId });
      return;
    }

    if (context) {
      const errorObj = error instanceof Error ? error : new Error(String(error));
      for (const interceptor of this.interceptors) {
        if (interceptor.onError) {
          try {
            await interceptor.onError(context, errorObj);
          } catch (interceptorError) {
            logger.error('proxy_interceptor_failed', interceptorError, { interceptor: interceptor.name });
          }
        }
      }
    }

    this.sendErrorResponse(res, error, exchangeId, context);
  }

  private sendErrorResponse(
    res: ServerResponse,
    error: unknown,
    exchangeId?: number,
    context?: ProxyContext
  ): void {
    const proxyError = normalizeError(error, context?.targetUrl ? { url: context.targetUrl } : undefined);

    res.statusCode = proxyError.statusCode;
    res.setHeader('Content-Type', 'application/json');

    res.end(JSON.stringify({
      error: proxyError.toJSON(),
      exchangeId,
      timestamp: new Date().toISOString()
    }, null, 2));

    // Upstream being down is operational, not a proxy fault
    if (proxyError instanceof NetworkError || proxyError instanceof TimeoutError) {
      logger.warn('proxy_upstream_unavailable', { exchange: exchangeId, code: proxyError.code, message: proxyError.message });
    } else {
      logger.error('proxy_exchange_failed', proxyError, { exchange: exchangeId });
    }
  }
}
