/**
 * Response Transformer
 *
 * Entry point for the response phase. Only the Checkpoint auth flow rewrites
 * responses; everything else is left as the upstream sent it.
 */

import type { ProxyOptions } from '../config/options.js';
import type { CheckpointAuthFlow } from './checkpoint/checkpoint.auth.js';
import { isSameEndpoint } from './core/endpoint-matcher.js';
import { splitPathAndQuery } from './core/payload-parser.js';
import type { ExchangeView } from './core/types.js';

export class ResponseTransformer {
  constructor(
    private readonly options: ProxyOptions,
    private readonly authFlow: CheckpointAuthFlow
  ) {}

  /**
   * @returns the replacement body, or null to leave the response untouched
   */
  async transform(exchange: ExchangeView, rawBody: string): Promise<string | null> {
    const { path } = splitPathAndQuery(exchange.path);
    if (!isSameEndpoint(exchange.authority, path, this.options.checkpointAuthUrl)) {
      return null;
    }

    return this.authFlow.transformResponse(exchange, rawBody);
  }
}
