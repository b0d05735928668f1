/**
 * Checkpoint Auth Flow
 *
 * Request phase: turns an OAuth-style client-credentials call into the
 * `{clientId, accessKey}` JSON the Checkpoint gateway expects, and stores the
 * sanitized leftovers for the response phase.
 *
 * Response phase: reshapes `{data: {token, ...}}` into the canonical token
 * envelope, then optionally runs the log auto-fetch and answers with its body.
 * Every failure falls back to passing something usable through.
 */

import type { ProxyOptions } from '../../config/options.js';
import { logger } from '../../utils/logger.js';
import { replaceHeader } from '../../utils/headers.js';
import { buildCheckpointTokenEnvelope } from '../core/envelope.js';
import type { FlowStateStore } from '../core/flow-state.js';
import { filterPairs, isBlank, tryGetBoolean, type RequestSnapshot } from '../core/payload-parser.js';
import type { ExchangeView } from '../core/types.js';
import type { LogFetcher } from './checkpoint.auto-fetch.js';
import {
  AUTH_RESERVED_BODY_KEYS,
  AUTH_RESERVED_QUERY_KEYS,
  AUTO_FETCH_FLAG_KEYS,
  CLIENT_ID_KEY,
  CLIENT_SECRET_KEY,
  CSRF_KEY
} from './checkpoint.constants.js';

export class CheckpointAuthFlow {
  constructor(
    private readonly options: Pick<ProxyOptions, 'autoFetchLogs'>,
    private readonly flowState: FlowStateStore,
    private readonly logFetcher: LogFetcher
  ) {}

  /**
   * @returns the replacement body, or the raw body untouched when a credential is missing
   */
  transformRequest(exchange: ExchangeView, snapshot: RequestSnapshot): string {
    const clientId = snapshot.tryGetValue(CLIENT_ID_KEY);
    const clientSecret = snapshot.tryGetValue(CLIENT_SECRET_KEY);

    if (clientId === undefined || clientSecret === undefined) {
      logger.info('checkpoint_auth_request_missing_secret', { exchange: exchange.exchangeId });
      return snapshot.rawBody;
    }

    exchange.method = 'POST';
    replaceHeader(exchange.headers, 'Content-Type', 'application/json');
    replaceHeader(exchange.headers, 'Accept', 'application/json');

    const autoFetchLogs =
      this.options.autoFetchLogs && AUTO_FETCH_FLAG_KEYS.some(key => tryGetBoolean(snapshot, key) === true);

    this.flowState.set(exchange.exchangeId, {
      kind: 'checkpoint-auth',
      autoFetchLogs,
      logQueryParameters: filterPairs(snapshot.queryPairs, AUTH_RESERVED_QUERY_KEYS).toRecord(),
      logBodyParameters: filterPairs(snapshot.bodyPairs, AUTH_RESERVED_BODY_KEYS).toRecord(),
      csrfToken: snapshot.tryGetValue(CSRF_KEY)
    });

    logger.info('checkpoint_auth_request_rewritten', { exchange: exchange.exchangeId, autoFetchLogs });

    return JSON.stringify({ clientId, accessKey: clientSecret });
  }

  /**
   * @returns the envelope, the auto-fetched log body, or the raw body when it
   * carries no token
   */
  async transformResponse(exchange: ExchangeView, rawBody: string): Promise<string> {
    // Taken up front so no path leaves the entry behind
    const metadata = this.flowState.take(exchange.exchangeId);

    if (isBlank(rawBody)) {
      return rawBody;
    }

    let document: unknown;
    try {
      document = JSON.parse(rawBody);
    } catch {
      logger.debug('checkpoint_auth_response_unparsed', { exchange: exchange.exchangeId });
      return rawBody;
    }

    const envelope = buildCheckpointTokenEnvelope(document);
    if (!envelope) {
      return rawBody;
    }

    const serialized = JSON.stringify(envelope);
    logger.debug('checkpoint_auth_response_rewritten', { exchange: exchange.exchangeId });

    const token = envelope.access_token;
    if (
      metadata?.kind !== 'checkpoint-auth' ||
      !metadata.autoFetchLogs ||
      !this.options.autoFetchLogs ||
      token === null ||
      isBlank(token)
    ) {
      return serialized;
    }

    // The session id the gateway just minted is echoed when the caller sent none
    const result = await this.logFetcher.fetchLogs(token, {
      ...metadata,
      csrfToken: metadata.csrfToken ?? envelope.csrf
    });
    if (!result.ok) {
      return serialized;
    }

    logger.info('checkpoint_auto_fetch_completed', {
      exchange: exchange.exchangeId,
      status: result.response.statusCode
    });
    return result.response.body;
  }
}
