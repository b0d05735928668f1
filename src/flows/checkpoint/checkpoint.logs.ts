/**
 * Checkpoint Log Flow
 *
 * Explicit log queries: the caller passes its token (and CSRF id) as plain
 * parameters, the flow moves them into headers and forwards the rest.
 */

import { logger } from '../../utils/logger.js';
import { replaceHeader } from '../../utils/headers.js';
import { filterPairs, mergeQuery, type RequestSnapshot } from '../core/payload-parser.js';
import type { ExchangeView } from '../core/types.js';
import { ACCESS_TOKEN_KEY, CSRF_HEADER, CSRF_KEY, LOG_RESERVED_KEYS } from './checkpoint.constants.js';

export function transformLogRequest(exchange: ExchangeView, snapshot: RequestSnapshot): string {
  const accessToken = snapshot.tryGetValue(ACCESS_TOKEN_KEY);
  if (accessToken === undefined) {
    return snapshot.rawBody;
  }

  replaceHeader(exchange.headers, 'Authorization', `Bearer ${accessToken}`);

  const csrfToken = snapshot.tryGetValue(CSRF_KEY);
  if (csrfToken !== undefined) {
    replaceHeader(exchange.headers, CSRF_HEADER, csrfToken);
  }

  const sanitized = filterPairs(snapshot.bodyPairs, LOG_RESERVED_KEYS);

  if (exchange.method.toUpperCase() === 'GET') {
    // The token may have arrived in the query too
    const sanitizedQuery = filterPairs(snapshot.queryPairs, LOG_RESERVED_KEYS);
    exchange.path = mergeQuery(snapshot, sanitized, sanitizedQuery);
    logger.debug('checkpoint_log_request_rewritten', { exchange: exchange.exchangeId, method: 'GET' });
    return '';
  }

  logger.debug('checkpoint_log_request_rewritten', { exchange: exchange.exchangeId, method: exchange.method });

  if (sanitized.size === 0) {
    return '';
  }

  replaceHeader(exchange.headers, 'Content-Type', 'application/json');
  return JSON.stringify(sanitized.toRecord());
}
