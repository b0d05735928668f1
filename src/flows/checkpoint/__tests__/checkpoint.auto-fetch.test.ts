import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import http from 'http';
import { buildAutoFetchRequest, CheckpointLogFetcher } from '../checkpoint.auto-fetch.js';
import type { CheckpointAuthMetadata } from '../../core/flow-state.js';
import { ProxyHTTPClient } from '../../../proxy/http-client.js';
import { logger } from '../../../utils/logger.js';

vi.mock('../../../utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

function metadata(overrides: Partial<CheckpointAuthMetadata> = {}): CheckpointAuthMetadata {
  return {
    kind: 'checkpoint-auth',
    autoFetchLogs: true,
    logQueryParameters: {},
    logBodyParameters: {},
    ...overrides
  };
}

describe('buildAutoFetchRequest', () => {
  const logUrl = new URL('https://logs.test/app/q?old=1');

  it('replaces the query and sends a GET without body parameters', () => {
    const request = buildAutoFetchRequest(
      logUrl,
      'T1',
      metadata({ logQueryParameters: { limit: '10', 'date from': 'a&b' }, csrfToken: 'C1' })
    );

    expect(request.url.toString()).toBe('https://logs.test/app/q?limit=10&date%20from=a%26b');
    expect(request.method).toBe('GET');
    expect(request.body).toBeUndefined();
    expect(request.headers).toEqual({
      Authorization: 'Bearer T1',
      Accept: 'application/json',
      'x-av-req-id': 'C1'
    });
  });

  it('keeps the configured query when nothing was stored', () => {
    expect(buildAutoFetchRequest(logUrl, 'T1', metadata()).url.toString()).toBe('https://logs.test/app/q?old=1');
  });

  it('sends body parameters as a JSON POST', () => {
    const request = buildAutoFetchRequest(logUrl, 'T1', metadata({ logBodyParameters: { scope: 'all' } }));

    expect(request.method).toBe('POST');
    expect(request.body).toBe('{"scope":"all"}');
    expect(request.headers['Content-Type']).toBe('application/json');
    expect(request.headers['Content-Length']).toBe('15');
  });

  it('omits a blank CSRF id', () => {
    const request = buildAutoFetchRequest(logUrl, 'T1', metadata({ csrfToken: '  ' }));

    expect(request.headers).not.toHaveProperty('x-av-req-id');
  });
});

describe('CheckpointLogFetcher', () => {
  interface RecordedRequest {
    method?: string;
    url?: string;
    headers: http.IncomingHttpHeaders;
    body: string;
  }

  let server: http.Server;
  let port: number;
  let client: ProxyHTTPClient;
  let recorded: RecordedRequest[];
  let respond: (res: http.ServerResponse) => void;

  beforeEach(async () => {
    vi.clearAllMocks();
    recorded = [];
    respond = res => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('{"logs":[]}');
    };

    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        recorded.push({
          method: req.method,
          url: req.url,
          headers: req.headers,
          body: Buffer.concat(chunks).toString('utf8')
        });
        respond(res);
      });
    });

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
    client = new ProxyHTTPClient({ timeout: 5000 });
  });

  afterEach(async () => {
    client.close();
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  function createFetcher(timeoutMs = 2000): CheckpointLogFetcher {
    return new CheckpointLogFetcher(
      { checkpointLogUrl: new URL(`http://127.0.0.1:${port}/app/q`), upstreamTimeoutMs: timeoutMs },
      client
    );
  }

  it('returns the log response on success', async () => {
    const result = await createFetcher().fetchLogs(
      'T1',
      metadata({ logQueryParameters: { limit: '10' }, csrfToken: 'C1' })
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.response.body).toBe('{"logs":[]}');
      expect(result.response.getHeaderValue('Content-Type')).toBe('application/json');
    }
    expect(recorded).toHaveLength(1);
    expect(recorded[0].method).toBe('GET');
    expect(recorded[0].url).toBe('/app/q?limit=10');
    expect(recorded[0].headers.authorization).toBe('Bearer T1');
    expect(recorded[0].headers['x-av-req-id']).toBe('C1');
  });

  it('posts stored body parameters', async () => {
    await createFetcher().fetchLogs('T1', metadata({ logBodyParameters: { scope: 'all' } }));

    expect(recorded[0].method).toBe('POST');
    expect(recorded[0].headers['content-type']).toBe('application/json');
    expect(recorded[0].body).toBe('{"scope":"all"}');
  });

  it('reports a non-success status', async () => {
    respond = res => {
      res.writeHead(500);
      res.end('boom');
    };

    const result = await createFetcher().fetchLogs('T1', metadata());

    expect(result).toEqual({ ok: false, reason: 'status', statusCode: 500 });
    expect(logger.error).toHaveBeenCalledWith('checkpoint_auto_fetch_failed', expect.any(Error), {
      status: 500,
      responseBody: 'boom'
    });
  });

  it('gives up after the upstream timeout', async () => {
    respond = () => {
      // Never answer
    };

    const result = await createFetcher(100).fetchLogs('T1', metadata());

    expect(result).toEqual({ ok: false, reason: 'timeout' });
    expect(logger.error).toHaveBeenCalledWith(
      'checkpoint_auto_fetch_exception',
      expect.any(Error),
      expect.objectContaining({ reason: 'timeout' })
    );
  });

  it('reports a refused connection as a transport failure', async () => {
    const closed = http.createServer();
    await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', () => resolve()));
    const address = closed.address();
    const closedPort = typeof address === 'object' && address ? address.port : 0;
    await new Promise<void>(resolve => closed.close(() => resolve()));

    const fetcher = new CheckpointLogFetcher(
      { checkpointLogUrl: new URL(`http://127.0.0.1:${closedPort}/app/q`), upstreamTimeoutMs: 2000 },
      client
    );

    await expect(fetcher.fetchLogs('T1', metadata())).resolves.toEqual({ ok: false, reason: 'transport' });
  });
});
