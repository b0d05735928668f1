/**
 * Flow Types
 *
 * Shapes shared by the payload parser, the flows and the transformers.
 */

/**
 * Mutable view of one intercepted exchange.
 * The hosting engine owns it; flows rewrite method, path and headers in place.
 */
export interface ExchangeView {
  /** Opaque per-exchange id, unique while the exchange is alive */
  readonly exchangeId: number;
  /** Host with optional `:port`, as the client addressed it */
  readonly authority: string;
  method: string;
  /** Path including the query string */
  path: string;
  headers: Record<string, string>;
}

/**
 * Flows an exchange can be routed to, in match priority order
 */
export type FlowTarget = 'checkpoint-auth' | 'checkpoint-log' | 'graph-token';

export const FLOW_TARGET_PRIORITY: readonly FlowTarget[] = ['checkpoint-auth', 'checkpoint-log', 'graph-token'];
