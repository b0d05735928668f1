import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { CheckpointAuthFlow } from '../checkpoint.auth.js';
import type { AutoFetchResult } from '../checkpoint.auto-fetch.js';
import { ResponseEnvelope } from '../../core/envelope.js';
import { FlowStateStore, type CheckpointAuthMetadata } from '../../core/flow-state.js';
import { parseRequest } from '../../core/payload-parser.js';
import type { ExchangeView } from '../../core/types.js';
import { logger } from '../../../utils/logger.js';

vi.mock('../../../utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

const ENVELOPE = '{"access_token":"T1","token_type":"Bearer","csrf":"C1","expires_in":3600}';
const AUTH_RESPONSE = '{"data":{"token":"T1","csrf":"C1","expiresIn":3600}}';

function createExchange(path = '/auth/external', headers: Record<string, string> = {}): ExchangeView {
  return { exchangeId: 1, authority: 'cloudinfra-gw.portal.checkpoint.com', method: 'GET', path, headers };
}

function autoFetchMetadata(overrides: Partial<CheckpointAuthMetadata> = {}): CheckpointAuthMetadata {
  return {
    kind: 'checkpoint-auth',
    autoFetchLogs: true,
    logQueryParameters: {},
    logBodyParameters: {},
    csrfToken: 'C1',
    ...overrides
  };
}

describe('CheckpointAuthFlow', () => {
  let flowState: FlowStateStore;
  let fetchLogs: Mock<(token: string, metadata: CheckpointAuthMetadata) => Promise<AutoFetchResult>>;
  let flow: CheckpointAuthFlow;

  beforeEach(() => {
    vi.clearAllMocks();
    flowState = new FlowStateStore({ ttlMs: 60_000 });
    fetchLogs = vi.fn<(token: string, metadata: CheckpointAuthMetadata) => Promise<AutoFetchResult>>();
    flow = new CheckpointAuthFlow({ autoFetchLogs: true }, flowState, { fetchLogs });
  });

  describe('transformRequest', () => {
    it('rewrites form credentials into the gateway JSON body', () => {
      const exchange = createExchange('/auth/external', { 'content-type': 'application/x-www-form-urlencoded' });
      const body = flow.transformRequest(exchange, parseRequest('client_id=abc&client_secret=xyz', exchange.path));

      expect(body).toBe('{"clientId":"abc","accessKey":"xyz"}');
      expect(exchange.method).toBe('POST');
      expect(exchange.headers).toEqual({ 'Content-Type': 'application/json', Accept: 'application/json' });
    });

    it('stores sanitized log parameters for the response phase', () => {
      const exchange = createExchange('/auth/external?code=c0de&Auto_Fetch_Logs=1&region=eu&client_secret=q');
      flow.transformRequest(
        exchange,
        parseRequest('client_id=abc&client_secret=xyz&autoFetchLogs=true&csrf=C1&limit=10', exchange.path)
      );

      expect(flowState.take(1)).toEqual({
        kind: 'checkpoint-auth',
        autoFetchLogs: true,
        logQueryParameters: { region: 'eu' },
        logBodyParameters: { csrf: 'C1', limit: '10' },
        csrfToken: 'C1'
      });
      expect(logger.info).toHaveBeenCalledWith('checkpoint_auth_request_rewritten', { exchange: 1, autoFetchLogs: true });
    });

    it('does not request auto-fetch when the global flag is off', () => {
      const disabled = new CheckpointAuthFlow({ autoFetchLogs: false }, flowState, { fetchLogs });
      const exchange = createExchange();
      disabled.transformRequest(exchange, parseRequest('client_id=a&client_secret=b&auto_fetch_logs=true', '/auth/external'));

      expect(flowState.take(1)).toMatchObject({ kind: 'checkpoint-auth', autoFetchLogs: false });
    });

    it('passes the body through when the secret is missing', () => {
      const exchange = createExchange();
      const body = flow.transformRequest(exchange, parseRequest('client_id=abc', exchange.path));

      expect(body).toBe('client_id=abc');
      expect(exchange.method).toBe('GET');
      expect(flowState.size).toBe(0);
      expect(logger.info).toHaveBeenCalledWith('checkpoint_auth_request_missing_secret', { exchange: 1 });
    });

    it('treats a blank credential as missing', () => {
      const exchange = createExchange();
      const raw = '{"client_id":"abc","client_secret":"  "}';

      expect(flow.transformRequest(exchange, parseRequest(raw, exchange.path))).toBe(raw);
    });
  });

  describe('transformResponse', () => {
    it('builds the envelope when no state was stored', async () => {
      await expect(flow.transformResponse(createExchange(), AUTH_RESPONSE)).resolves.toBe(ENVELOPE);
      expect(fetchLogs).not.toHaveBeenCalled();
    });

    it('answers with the auto-fetched logs', async () => {
      const metadata = autoFetchMetadata();
      flowState.set(1, metadata);
      fetchLogs.mockResolvedValue({ ok: true, response: new ResponseEnvelope(200, '{"logs":[]}') });

      await expect(flow.transformResponse(createExchange(), AUTH_RESPONSE)).resolves.toBe('{"logs":[]}');
      expect(fetchLogs).toHaveBeenCalledWith('T1', metadata);
      expect(flowState.size).toBe(0);
    });

    it('echoes the csrf minted by the gateway when the request carried none', async () => {
      flowState.set(1, autoFetchMetadata({ csrfToken: undefined }));
      fetchLogs.mockResolvedValue({ ok: true, response: new ResponseEnvelope(200, '{"logs":[]}') });

      await flow.transformResponse(createExchange(), AUTH_RESPONSE);

      expect(fetchLogs).toHaveBeenCalledWith('T1', autoFetchMetadata({ csrfToken: 'C1' }));
    });

    it('keeps the csrf the caller sent over the minted one', async () => {
      flowState.set(1, autoFetchMetadata({ csrfToken: 'caller-csrf' }));
      fetchLogs.mockResolvedValue({ ok: true, response: new ResponseEnvelope(200, '{"logs":[]}') });

      await flow.transformResponse(createExchange(), AUTH_RESPONSE);

      expect(fetchLogs.mock.calls[0]?.[1].csrfToken).toBe('caller-csrf');
    });

    it('falls back to the envelope when the auto-fetch fails', async () => {
      flowState.set(1, autoFetchMetadata());
      fetchLogs.mockResolvedValue({ ok: false, reason: 'status', statusCode: 500 });

      await expect(flow.transformResponse(createExchange(), AUTH_RESPONSE)).resolves.toBe(ENVELOPE);
    });

    it('skips the auto-fetch when the request did not ask for it', async () => {
      flowState.set(1, autoFetchMetadata({ autoFetchLogs: false }));

      await expect(flow.transformResponse(createExchange(), AUTH_RESPONSE)).resolves.toBe(ENVELOPE);
      expect(fetchLogs).not.toHaveBeenCalled();
    });

    it('skips the auto-fetch when the global flag is off', async () => {
      const disabled = new CheckpointAuthFlow({ autoFetchLogs: false }, flowState, { fetchLogs });
      flowState.set(1, autoFetchMetadata());

      await expect(disabled.transformResponse(createExchange(), AUTH_RESPONSE)).resolves.toBe(ENVELOPE);
      expect(fetchLogs).not.toHaveBeenCalled();
    });

    it('skips the auto-fetch without a usable token', async () => {
      flowState.set(1, autoFetchMetadata());

      await expect(flow.transformResponse(createExchange(), '{"data":{"token":null}}')).resolves.toBe(
        '{"access_token":null,"token_type":"Bearer"}'
      );
      expect(fetchLogs).not.toHaveBeenCalled();
    });

    it.each([
      ['a blank body', '  '],
      ['malformed JSON', 'not json'],
      ['a body without data.token', '{"error":"denied"}']
    ])('passes %s through and drops the stored state', async (_label, raw) => {
      flowState.set(1, autoFetchMetadata());

      await expect(flow.transformResponse(createExchange(), raw)).resolves.toBe(raw);
      expect(flowState.size).toBe(0);
      expect(fetchLogs).not.toHaveBeenCalled();
    });
  });
});
