/**
 * Request Transformer
 *
 * Entry point for the request phase: snapshot the request, pick the flow by
 * endpoint, return the body to send upstream.
 */

import type { ProxyOptions } from '../config/options.js';
import type { CheckpointAuthFlow } from './checkpoint/checkpoint.auth.js';
import { transformLogRequest } from './checkpoint/checkpoint.logs.js';
import { matchTarget } from './core/endpoint-matcher.js';
import { parseRequest } from './core/payload-parser.js';
import type { ExchangeView } from './core/types.js';
import { transformGraphTokenRequest } from './microsoft-graph/microsoft-graph.token.js';

export class RequestTransformer {
  constructor(
    private readonly options: ProxyOptions,
    private readonly authFlow: CheckpointAuthFlow
  ) {}

  transform(exchange: ExchangeView, rawBody: string): string {
    const snapshot = parseRequest(rawBody, exchange.path);

    switch (matchTarget(exchange.authority, snapshot.path, this.options)) {
      case 'checkpoint-auth':
        return this.authFlow.transformRequest(exchange, snapshot);
      case 'checkpoint-log':
        return transformLogRequest(exchange, snapshot);
      case 'graph-token':
        return transformGraphTokenRequest(exchange, snapshot);
      case undefined:
        return snapshot.rawBody;
    }
  }
}
