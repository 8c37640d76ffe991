import type { SelectionTokenStore } from '../types.js';
import { DEFAULT_PURGE_GRACE_MS } from './token-store.js';

export interface TokenSweeperConfig {
  store: SelectionTokenStore;
  intervalMs?: number;
  graceMs?: number;
  onPurged?: (count: number) => void;
  onError?: (error: unknown) => void;
}

/**
 * Periodically deletes long-expired tokens so the table stays bounded.
 * Sweeps never overlap: the next one is scheduled after the previous finishes.
 */
export class TokenSweeper {
  private readonly intervalMs: number;
  private readonly graceMs: number;
  private readonly onPurged: (count: number) => void;
  private readonly onError: (error: unknown) => void;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = true;

  constructor(private readonly config: TokenSweeperConfig) {
    this.intervalMs = config.intervalMs ?? 5 * 60_000;
    this.graceMs = config.graceMs ?? DEFAULT_PURGE_GRACE_MS;
    this.onPurged = config.onPurged ?? (() => {});
    this.onError = config.onError ?? ((err) => {
      console.error('[tokens] purge of expired selection tokens failed:', err);
    });
  }

  start(): void {
    if (!this.stopped) throw new Error('TokenSweeper.start() has already been called');
    this.stopped = false;
    this.schedule();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  /** Runs one sweep immediately. Errors go to onError, never to the caller. */
  async sweepOnce(): Promise<void> {
    try {
      const count = await this.config.store.purgeExpired(this.graceMs);
      this.onPurged(count);
    } catch (err) {
      try { this.onError(err); } catch { /* swallow */ }
    }
  }

  private schedule(): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.sweepOnce().finally(() => {
        this.inFlight = null;
        this.schedule();
      });
    }, this.intervalMs);
    this.timer.unref();
  }
}
