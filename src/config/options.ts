/**
 * Proxy Options
 *
 * Immutable configuration snapshot read once from the environment at startup.
 * Invalid or blank values fall back to their defaults with a warning, so a
 * typo in one variable never keeps the proxy from starting.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';

export interface ProxyOptions {
  readonly listenAddress: string;
  readonly listenPort: number;
  readonly checkpointAuthUrl: URL;
  readonly checkpointLogUrl: URL;
  readonly graphTokenUrl: URL;
  readonly autoFetchLogs: boolean;
  readonly verbose: boolean;
  /** Use the compatibility TLS profile (TLS 1.0+, legacy ciphers) for upstream calls */
  readonly compatTls: boolean;
  readonly upstreamTimeoutMs: number;
  readonly flowStateTtlMs: number;
}

export const ENV_VARS = {
  LISTEN_ADDRESS: 'AUTHBRIDGE_LISTEN_ADDRESS',
  LISTEN_PORT: 'AUTHBRIDGE_LISTEN_PORT',
  CHECKPOINT_AUTH_URL: 'AUTHBRIDGE_CHECKPOINT_AUTH_URL',
  CHECKPOINT_LOG_URL: 'AUTHBRIDGE_CHECKPOINT_LOG_URL',
  GRAPH_TOKEN_URL: 'AUTHBRIDGE_GRAPH_TOKEN_URL',
  AUTO_FETCH_LOGS: 'AUTHBRIDGE_AUTO_FETCH_LOGS',
  VERBOSE: 'AUTHBRIDGE_VERBOSE',
  COMPAT_TLS: 'AUTHBRIDGE_COMPAT_TLS',
  UPSTREAM_TIMEOUT_SECONDS: 'AUTHBRIDGE_UPSTREAM_TIMEOUT_SECONDS',
  FLOW_STATE_TTL_SECONDS: 'AUTHBRIDGE_FLOW_STATE_TTL_SECONDS'
} as const;

export const DEFAULTS = {
  LISTEN_ADDRESS: '0.0.0.0',
  LISTEN_PORT: 44344,
  CHECKPOINT_AUTH_URL: 'https://cloudinfra-gw.portal.checkpoint.com/auth/external',
  CHECKPOINT_LOG_URL: 'https://cloudinfra-gw-us.portal.checkpoint.com/app/hec-api/v1.0/search/query',
  GRAPH_TOKEN_URL: 'https://login.microsoftonline.com/common/oauth2/token',
  AUTO_FETCH_LOGS: true,
  VERBOSE: false,
  COMPAT_TLS: false,
  UPSTREAM_TIMEOUT_SECONDS: 30,
  FLOW_STATE_TTL_SECONDS: 300
} as const;

export const MIN_UPSTREAM_TIMEOUT_SECONDS = 5;
export const MAX_UPSTREAM_TIMEOUT_SECONDS = 240;

/** An entry must outlive the slowest upstream round-trip it waits on */
const FLOW_STATE_TTL_MARGIN_SECONDS = 60;

const addressSchema = z.string().min(1);
const portSchema = z.coerce.number().int().min(0).max(65535);
const integerSchema = z.coerce.number().int();
const absoluteUrlSchema = z
  .string()
  .url()
  .transform(value => new URL(value))
  .refine(url => url.protocol === 'http:' || url.protocol === 'https:', 'must be an http(s) URL');

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

const booleanSchema = z
  .string()
  .transform(value => value.toLowerCase())
  .refine(value => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), 'must be a boolean')
  .transform(value => TRUE_VALUES.has(value));

type Env = Record<string, string | undefined>;

function readEnv<T>(env: Env, variable: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  const candidate = env[variable]?.trim();
  if (!candidate) {
    return fallback;
  }

  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    logger.warn('config_value_ignored', {
      variable,
      reason: parsed.error.issues.map(issue => issue.message).join('; ')
    });
    return fallback;
  }

  return parsed.data;
}

export function clampTimeoutSeconds(seconds: number): number {
  return Math.min(Math.max(seconds, MIN_UPSTREAM_TIMEOUT_SECONDS), MAX_UPSTREAM_TIMEOUT_SECONDS);
}

/**
 * Load options from the environment
 * @param env - Defaults to process.env; tests pass a plain record
 */
export function loadProxyOptions(env: Env = process.env): ProxyOptions {
  const timeoutSeconds = clampTimeoutSeconds(
    readEnv(env, ENV_VARS.UPSTREAM_TIMEOUT_SECONDS, integerSchema, DEFAULTS.UPSTREAM_TIMEOUT_SECONDS)
  );
  const ttlSeconds = Math.max(
    readEnv(env, ENV_VARS.FLOW_STATE_TTL_SECONDS, integerSchema, DEFAULTS.FLOW_STATE_TTL_SECONDS),
    timeoutSeconds + FLOW_STATE_TTL_MARGIN_SECONDS
  );

  return Object.freeze({
    listenAddress: readEnv(env, ENV_VARS.LISTEN_ADDRESS, addressSchema, DEFAULTS.LISTEN_ADDRESS),
    listenPort: readEnv(env, ENV_VARS.LISTEN_PORT, portSchema, DEFAULTS.LISTEN_PORT),
    checkpointAuthUrl: readEnv(env, ENV_VARS.CHECKPOINT_AUTH_URL, absoluteUrlSchema, new URL(DEFAULTS.CHECKPOINT_AUTH_URL)),
    checkpointLogUrl: readEnv(env, ENV_VARS.CHECKPOINT_LOG_URL, absoluteUrlSchema, new URL(DEFAULTS.CHECKPOINT_LOG_URL)),
    graphTokenUrl: readEnv(env, ENV_VARS.GRAPH_TOKEN_URL, absoluteUrlSchema, new URL(DEFAULTS.GRAPH_TOKEN_URL)),
    autoFetchLogs: readEnv(env, ENV_VARS.AUTO_FETCH_LOGS, booleanSchema, DEFAULTS.AUTO_FETCH_LOGS),
    verbose: readEnv(env, ENV_VARS.VERBOSE, booleanSchema, DEFAULTS.VERBOSE),
    compatTls: readEnv(env, ENV_VARS.COMPAT_TLS, booleanSchema, DEFAULTS.COMPAT_TLS),
    upstreamTimeoutMs: timeoutSeconds * 1000,
    flowStateTtlMs: ttlSeconds * 1000
  });
}

/**
 * Plain-JSON view for logging and the `config` command
 */
export function describeOptions(options: ProxyOptions): Record<string, string | number | boolean> {
  return {
    listenAddress: options.listenAddress,
    listenPort: options.listenPort,
    checkpointAuthUrl: options.checkpointAuthUrl.toString(),
    checkpointLogUrl: options.checkpointLogUrl.toString(),
    graphTokenUrl: options.graphTokenUrl.toString(),
    autoFetchLogs: options.autoFetchLogs,
    verbose: options.verbose,
    compatTls: options.compatTls,
    upstreamTimeoutSeconds: options.upstreamTimeoutMs / 1000,
    flowStateTtlSeconds: options.flowStateTtlMs / 1000
  };
}

/**
 * Command-line overrides; strings are validated like their environment counterparts
 */
export interface OptionOverrides {
  listenAddress?: string;
  listenPort?: string;
  timeoutSeconds?: string;
  autoFetchLogs?: boolean;
  verbose?: boolean;
}

function parseOverride<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: string, flag: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value for ${flag}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
      flag
    );
  }
  return parsed.data;
}

/**
 * Layer overrides on top of loaded options
 * @throws ConfigurationError on a malformed value
 */
export function applyOverrides(options: ProxyOptions, overrides: OptionOverrides): ProxyOptions {
  const timeoutSeconds = overrides.timeoutSeconds === undefined
    ? options.upstreamTimeoutMs / 1000
    : clampTimeoutSeconds(parseOverride(integerSchema, overrides.timeoutSeconds, '--timeout'));

  return Object.freeze({
    ...options,
    listenAddress: overrides.listenAddress === undefined
      ? options.listenAddress
      : parseOverride(addressSchema, overrides.listenAddress.trim(), '--host'),
    listenPort: overrides.listenPort === undefined
      ? options.listenPort
      : parseOverride(portSchema, overrides.listenPort, '--port'),
    autoFetchLogs: overrides.autoFetchLogs ?? options.autoFetchLogs,
    verbose: overrides.verbose ?? options.verbose,
    upstreamTimeoutMs: timeoutSeconds * 1000,
    flowStateTtlMs: Math.max(options.flowStateTtlMs, (timeoutSeconds + FLOW_STATE_TTL_MARGIN_SECONDS) * 1000)
  });
}
