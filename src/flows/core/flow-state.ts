/**
 * Flow State Store
 *
 * Carries sanitized request-phase data over to the response phase of the same
 * exchange. Entries are keyed by exchange id, written once by the auth request
 * transform and taken (read + removed) once by the auth response transform.
 *
 * One instance lives as long as the proxy host and is injected into the
 * transformers. Every exchange touches only its own key, and each Map
 * operation runs to completion on the event loop, so no extra locking exists.
 *
 * Exchanges whose response phase never runs (client disconnect, upstream
 * failure) would leave their entry behind; the sweeper evicts entries older
 * than the TTL, and `take` refuses an expired entry.
 */

import { logger } from '../../utils/logger.js';

export interface CheckpointAuthMetadata {
  readonly kind: 'checkpoint-auth';
  readonly autoFetchLogs: boolean;
  readonly logQueryParameters: Readonly<Record<string, string>>;
  readonly logBodyParameters: Readonly<Record<string, string>>;
  readonly csrfToken?: string;
}

export interface UnknownFlowMetadata {
  readonly kind: 'unknown';
}

export type FlowMetadata = CheckpointAuthMetadata | UnknownFlowMetadata;

interface StoredEntry {
  readonly metadata: FlowMetadata;
  readonly storedAt: number;
}

export interface FlowStateStoreOptions {
  ttlMs: number;
  /** Clock override for tests */
  now?: () => number;
}

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export class FlowStateStore {
  private readonly entries = new Map<number, StoredEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: FlowStateStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  set(exchangeId: number, metadata: FlowMetadata): void {
    if (this.entries.has(exchangeId)) {
      logger.warn('flow_state_overwritten', { exchange: exchangeId });
    }
    this.entries.set(exchangeId, { metadata, storedAt: this.now() });
  }

  /**
   * Read and remove in one step; a second call for the same id returns undefined
   */
  take(exchangeId: number): FlowMetadata | undefined {
    const entry = this.entries.get(exchangeId);
    if (!entry) {
      return undefined;
    }

    this.entries.delete(exchangeId);

    if (this.isExpired(entry, this.now())) {
      logger.debug('flow_state_expired', { exchange: exchangeId });
      return undefined;
    }

    return entry.metadata;
  }

  /**
   * Drop entries older than the TTL
   * @returns number of evicted entries
   */
  sweep(): number {
    const now = this.now();
    let evicted = 0;

    for (const [exchangeId, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(exchangeId);
        evicted++;
      }
    }

    if (evicted > 0) {
      logger.debug('flow_state_swept', { evicted, remaining: this.entries.size });
    }

    return evicted;
  }

  startSweeper(intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    // Never keep the process alive just to sweep
    this.sweepTimer.unref();
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }

  private isExpired(entry: StoredEntry, now: number): boolean {
    return now - entry.storedAt > this.ttlMs;
  }
}
