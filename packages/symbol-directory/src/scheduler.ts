/**
 * Periodic directory refresh
 */

import { withJobRequestContext } from '@quotebook/logger';
import type { DirectoryStore } from './directory-store.js';
import type { DirectoryLogger } from './types.js';

/**
 * Three hours
 */
export const DEFAULT_REFRESH_INTERVAL_MS = 3 * 60 * 60 * 1000;

export interface RefreshSchedulerOptions {
  intervalMs?: number;
  logger?: DirectoryLogger;
}

/**
 * Runs `store.refresh()` on a fixed interval until stopped.
 *
 * A failing tick is logged and the next tick tries again; the timer never
 * holds the process open.
 *
 * @example
 * ```typescript
 * const scheduler = new RefreshScheduler(directory, { intervalMs: 60_000, logger });
 * scheduler.start();
 * process.on('SIGTERM', () => scheduler.stop());
 * ```
 */
export class RefreshScheduler {
  private readonly intervalMs: number;
  private readonly logger?: DirectoryLogger;
  private readonly runJob = withJobRequestContext('directory-refresh');
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly store: DirectoryStore,
    options: RefreshSchedulerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.logger = options.logger;

    if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
      throw new Error(`Refresh interval must be a positive number of milliseconds, got ${this.intervalMs}`);
    }
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.running = this.tick();
    }, this.intervalMs);
    this.timer.unref();

    this.logger?.info('Directory refresh scheduled', { interval_ms: this.intervalMs });
  }

  /**
   * Cancel future ticks. Resolves once a tick already running has finished.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger?.info('Directory refresh stopped');
    }
    await this.running;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One scheduled refresh. Resolves whether or not the refresh succeeded.
   */
  async tick(): Promise<void> {
    try {
      const result = await this.runJob(() => this.store.refresh());
      if (!result.ok) {
        this.logger?.warn('Scheduled directory refresh failed, retrying next interval', {
          error: result.error.message,
        });
      }
    } catch (error) {
      this.logger?.error('Scheduled directory refresh threw', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
