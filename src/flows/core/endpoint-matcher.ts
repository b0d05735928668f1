/**
 * Endpoint Matcher
 *
 * Decides which configured target an exchange is bound for. Only host and
 * path take part: scheme and port are ignored, so the same rules apply to a
 * request seen through a TLS-terminating layer and to a plain HTTP hop.
 */

import type { ProxyOptions } from '../../config/options.js';
import { FLOW_TARGET_PRIORITY, type FlowTarget } from './types.js';

/**
 * Strip the port from an authority; bracketed IPv6 literals are kept whole
 */
export function hostFromAuthority(authority: string): string {
  const trimmed = authority.trim();
  if (trimmed.startsWith('[')) {
    const closing = trimmed.indexOf(']');
    return closing < 0 ? trimmed : trimmed.slice(0, closing + 1);
  }

  const colon = trimmed.indexOf(':');
  return colon < 0 ? trimmed : trimmed.slice(0, colon);
}

export function isSameHost(authority: string, target: URL): boolean {
  return hostFromAuthority(authority).toLowerCase() === target.hostname.toLowerCase();
}

export function isSameEndpoint(authority: string, path: string, target: URL): boolean {
  if (!isSameHost(authority, target)) {
    return false;
  }

  const targetPath = target.pathname === '' ? '/' : target.pathname;
  return path.toLowerCase().startsWith(targetPath.toLowerCase());
}

export function targetUrl(options: ProxyOptions, target: FlowTarget): URL {
  switch (target) {
    case 'checkpoint-auth':
      return options.checkpointAuthUrl;
    case 'checkpoint-log':
      return options.checkpointLogUrl;
    case 'graph-token':
      return options.graphTokenUrl;
  }
}

/**
 * First target in priority order whose host and path match
 */
export function matchTarget(authority: string, path: string, options: ProxyOptions): FlowTarget | undefined {
  return FLOW_TARGET_PRIORITY.find(target => isSameEndpoint(authority, path, targetUrl(options, target)));
}

/**
 * Whether the exchange should be handed to the pipeline at all
 */
export function isTargetHost(authority: string, options: ProxyOptions): boolean {
  return FLOW_TARGET_PRIORITY.some(target => isSameHost(authority, targetUrl(options, target)));
}
