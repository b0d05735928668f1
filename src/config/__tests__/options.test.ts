import { describe, it, expect, vi, beforeEach } from 'vitest';
import { applyOverrides, describeOptions, loadProxyOptions } from '../options.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

vi.mock('../../utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

describe('loadProxyOptions', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('uses defaults for an empty environment', () => {
    const options = loadProxyOptions({});

    expect(options.listenAddress).toBe('0.0.0.0');
    expect(options.listenPort).toBe(44344);
    expect(options.checkpointAuthUrl.toString()).toBe('https://cloudinfra-gw.portal.checkpoint.com/auth/external');
    expect(options.graphTokenUrl.toString()).toBe('https://login.microsoftonline.com/common/oauth2/token');
    expect(options.autoFetchLogs).toBe(true);
    expect(options.verbose).toBe(false);
    expect(options.compatTls).toBe(false);
    expect(options.upstreamTimeoutMs).toBe(30_000);
    expect(options.flowStateTtlMs).toBe(300_000);
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('parses boolean spellings', () => {
    const options = loadProxyOptions({
      AUTHBRIDGE_AUTO_FETCH_LOGS: 'OFF',
      AUTHBRIDGE_VERBOSE: 'Yes',
      AUTHBRIDGE_COMPAT_TLS: '1'
    });

    expect(options.autoFetchLogs).toBe(false);
    expect(options.verbose).toBe(true);
    expect(options.compatTls).toBe(true);
  });

  it('clamps the upstream timeout to 5-240 seconds', () => {
    expect(loadProxyOptions({ AUTHBRIDGE_UPSTREAM_TIMEOUT_SECONDS: '2' }).upstreamTimeoutMs).toBe(5_000);
    expect(loadProxyOptions({ AUTHBRIDGE_UPSTREAM_TIMEOUT_SECONDS: '999' }).upstreamTimeoutMs).toBe(240_000);
  });

  it('keeps the flow-state TTL above the upstream timeout', () => {
    const options = loadProxyOptions({ AUTHBRIDGE_FLOW_STATE_TTL_SECONDS: '10' });

    expect(options.flowStateTtlMs).toBe(90_000);
  });

  it('falls back with a warning on invalid values', () => {
    const options = loadProxyOptions({
      AUTHBRIDGE_LISTEN_PORT: 'abc',
      AUTHBRIDGE_CHECKPOINT_LOG_URL: 'ftp://logs.test/query'
    });

    expect(options.listenPort).toBe(44344);
    expect(options.checkpointLogUrl.toString()).toBe(
      'https://cloudinfra-gw-us.portal.checkpoint.com/app/hec-api/v1.0/search/query'
    );
    expect(logger.warn).toHaveBeenCalledWith(
      'config_value_ignored',
      expect.objectContaining({ variable: 'AUTHBRIDGE_LISTEN_PORT' })
    );
    expect(logger.warn).toHaveBeenCalledWith(
      'config_value_ignored',
      expect.objectContaining({ variable: 'AUTHBRIDGE_CHECKPOINT_LOG_URL' })
    );
  });

  it('treats blank values as unset', () => {
    expect(loadProxyOptions({ AUTHBRIDGE_LISTEN_ADDRESS: '   ' }).listenAddress).toBe('0.0.0.0');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('accepts port 0', () => {
    expect(loadProxyOptions({ AUTHBRIDGE_LISTEN_PORT: '0' }).listenPort).toBe(0);
  });
});

describe('applyOverrides', () => {
  const base = loadProxyOptions({});

  it('layers command-line values on top', () => {
    const options = applyOverrides(base, {
      listenAddress: '127.0.0.1',
      listenPort: '8080',
      timeoutSeconds: '10',
      autoFetchLogs: false
    });

    expect(options.listenAddress).toBe('127.0.0.1');
    expect(options.listenPort).toBe(8080);
    expect(options.upstreamTimeoutMs).toBe(10_000);
    expect(options.flowStateTtlMs).toBe(300_000);
    expect(options.autoFetchLogs).toBe(false);
    expect(options.verbose).toBe(false);
  });

  it('leaves unset values alone', () => {
    expect(applyOverrides(base, {})).toEqual(base);
  });

  it('rejects a malformed port', () => {
    expect(() => applyOverrides(base, { listenPort: '70000' })).toThrow(ConfigurationError);
  });
});

describe('describeOptions', () => {
  it('renders plain values', () => {
    expect(describeOptions(loadProxyOptions({}))).toMatchObject({
      listenPort: 44344,
      checkpointAuthUrl: 'https://cloudinfra-gw.portal.checkpoint.com/auth/external',
      upstreamTimeoutSeconds: 30,
      flowStateTtlSeconds: 300
    });
  });
});
