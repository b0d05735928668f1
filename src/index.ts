// Main exports for the authbridge package

export { AuthBridgeProxy } from './proxy/server.js';
export type { AuthBridgeProxyDependencies, ListeningAddress } from './proxy/server.js';
export { ProxyHTTPClient } from './proxy/http-client.js';
export * from './proxy/errors.js';

export {
  loadProxyOptions,
  applyOverrides,
  describeOptions,
  ENV_VARS,
  DEFAULTS
} from './config/options.js';
export type { ProxyOptions, OptionOverrides } from './config/options.js';

export * from './flows/index.js';

export { logger } from './utils/logger.js';
export * from './utils/errors.js';
