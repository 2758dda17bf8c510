import { Notifier } from '@leasehold/core';
import { logger, logListenerError } from '../utils/logger';

export interface HealthMonitorConfig {
  issueCountForCriticalState: number;
  /** Seconds an issue stays in the window */
  issueWindowSeconds: number;
  /** Seconds below the threshold before critical state ends */
  criticalStateWindowSeconds: number;
}

/**
 * Sliding-window counter of store failures.
 *
 * Enough issues inside the window put the monitor in critical state; it stays there
 * until the count has been below the threshold for `criticalStateWindowSeconds`.
 * Critical state is advisory: nothing is blocked, listeners decide how to degrade.
 */
export class HealthMonitor {
  /** Fired for every reported failure: (error, store, key) */
  readonly issues = new Notifier<[Error, string, string]>('issues', logListenerError);
  /** Fired when a stored value fails to decode: (store, key) */
  readonly corruption = new Notifier<[string, string]>('corruption', logListenerError);
  /** Fired with true on entering critical state and false on leaving it */
  readonly criticalState = new Notifier<[boolean]>('criticalState', logListenerError);

  // Issue timestamps, oldest first
  private window: number[] = [];
  private criticalSince: number | null = null;
  private readonly clock: () => number;

  constructor(
    private readonly config: HealthMonitorConfig,
    clock?: () => number
  ) {
    this.clock = clock ?? Date.now;
  }

  reportIssue(error: Error, store: string, key: string): void {
    const now = this.clock();
    this.window.push(now);
    this.prune(now);

    logger.warn(
      { err: error, store, key, issueCount: this.window.length },
      'Store issue reported'
    );
    this.issues.notify(error, store, key);

    if (this.window.length >= this.config.issueCountForCriticalState) {
      if (this.criticalSince === null) {
        this.criticalSince = now;
        logger.warn({ issueCount: this.window.length }, 'Entered critical state');
        this.criticalState.notify(true);
      } else {
        this.criticalSince = now;
      }
    }
  }

  reportCorruption(store: string, key: string): void {
    logger.error({ store, key }, 'Stored record is corrupted');
    this.corruption.notify(store, key);
  }

  /**
   * Prune the window and leave critical state when it has been quiet long enough.
   * Driven by the process tick.
   */
  evaluate(): void {
    const now = this.clock();
    this.prune(now);

    if (this.criticalSince === null) {
      return;
    }

    if (this.window.length >= this.config.issueCountForCriticalState) {
      this.criticalSince = now;
    } else if (now - this.criticalSince >= this.config.criticalStateWindowSeconds * 1000) {
      this.criticalSince = null;
      logger.warn('Critical state ended');
      this.criticalState.notify(false);
    }
  }

  isCritical(): boolean {
    return this.criticalSince !== null;
  }

  getIssueCount(): number {
    this.prune(this.clock());
    return this.window.length;
  }

  private prune(now: number): void {
    const cutoff = now - this.config.issueWindowSeconds * 1000;
    let drop = 0;
    while (drop < this.window.length && this.window[drop] < cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.window = this.window.slice(drop);
    }
  }
}
