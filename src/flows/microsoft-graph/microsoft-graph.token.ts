/**
 * Microsoft Graph Token Flow
 *
 * Normalizes a client-credentials token call into the form body the Microsoft
 * identity endpoint accepts, filling in Graph defaults for anything omitted.
 */

import { logger } from '../../utils/logger.js';
import { replaceHeader } from '../../utils/headers.js';
import { buildQuery, type RequestSnapshot } from '../core/payload-parser.js';
import type { ExchangeView } from '../core/types.js';

export const GRAPH_DEFAULTS = {
  grant_type: 'client_credentials',
  scope: 'https://graph.microsoft.com/.default',
  resource: 'https://graph.microsoft.com'
} as const;

export function transformGraphTokenRequest(exchange: ExchangeView, snapshot: RequestSnapshot): string {
  const clientId = snapshot.tryGetValue('client_id');
  const clientSecret = snapshot.tryGetValue('client_secret');
  if (clientId === undefined || clientSecret === undefined) {
    return snapshot.rawBody;
  }

  const form: Array<[string, string]> = [
    ['client_id', clientId],
    ['client_secret', clientSecret],
    ['grant_type', snapshot.getValueOrDefault('grant_type', GRAPH_DEFAULTS.grant_type)],
    ['scope', snapshot.getValueOrDefault('scope', GRAPH_DEFAULTS.scope)],
    ['resource', snapshot.getValueOrDefault('resource', GRAPH_DEFAULTS.resource)]
  ];

  exchange.method = 'POST';
  replaceHeader(exchange.headers, 'Content-Type', 'application/x-www-form-urlencoded');
  replaceHeader(exchange.headers, 'Accept', 'application/json');

  logger.info('microsoft_graph_request_transformed', { exchange: exchange.exchangeId });

  return buildQuery(form);
}
