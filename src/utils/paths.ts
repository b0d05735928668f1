/**
 * AuthBridge Home Directory Resolution
 *
 * Respects AUTHBRIDGE_HOME for custom locations (log relocation, test isolation).
 *
 * Default: ~/.authbridge
 * Override: AUTHBRIDGE_HOME=/custom/path
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Get AuthBridge home directory
 *
 * @example
 * getAuthBridgeHome() // => '/home/ops/.authbridge'
 *
 * process.env.AUTHBRIDGE_HOME = '/var/lib/authbridge';
 * getAuthBridgeHome() // => '/var/lib/authbridge'
 */
export function getAuthBridgeHome(): string {
  if (process.env.AUTHBRIDGE_HOME) {
    return process.env.AUTHBRIDGE_HOME;
  }

  return join(homedir(), '.authbridge');
}

/**
 * Get path within the AuthBridge home directory
 *
 * @example
 * getAuthBridgePath('logs') // => '/home/ops/.authbridge/logs'
 */
export function getAuthBridgePath(...paths: string[]): string {
  return join(getAuthBridgeHome(), ...paths);
}
