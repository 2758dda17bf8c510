import type { Lease } from '../lease/Lease';
import { logger } from '../utils/logger';
import type { ActiveLeaseSet } from './ActiveLeaseSet';

export interface AutoSaveConfig {
  /** Seconds between saves of any one lease */
  autoSaveInterval: number;
  /** Seconds between calls to tick() */
  tickInterval: number;
}

/**
 * The part of the lock manager the scheduler drives.
 */
export interface LeaseSaver {
  autoSave(lease: Lease<object>): Promise<unknown>;
}

export interface AutoSaveTickResult {
  saved: number;
  repaired: number;
}

/**
 * Spreads lease saves evenly over the auto-save interval.
 *
 * Each tick saves `ceil(active * tickInterval / autoSaveInterval)` leases, walking the
 * active set round-robin. Leases loaded less than one interval ago or with a save
 * already in flight are passed over. A lease whose last successful save is more than
 * two intervals old is saved ahead of the rotation.
 */
export class AutoSaveScheduler {
  private readonly clock: () => number;

  constructor(
    private readonly leases: ActiveLeaseSet,
    private readonly saver: LeaseSaver,
    private readonly config: AutoSaveConfig,
    clock?: () => number
  ) {
    this.clock = clock ?? Date.now;
  }

  tick(): AutoSaveTickResult {
    const count = this.leases.size;
    if (count === 0) {
      return { saved: 0, repaired: 0 };
    }

    const intervalMs = this.config.autoSaveInterval * 1000;
    const now = this.clock();
    let budget = Math.ceil((count * this.config.tickInterval) / this.config.autoSaveInterval);
    let repaired = 0;
    let saved = 0;

    for (const lease of this.leases.values()) {
      if (budget <= 0) break;
      if (!lease.isSaving && now - lease.lastPersistedAt >= 2 * intervalMs) {
        logger.warn(
          { lease: lease.identify(), sinceLastSaveMs: now - lease.lastPersistedAt },
          'Lease has not been saved for two intervals, saving now'
        );
        this.dispatch(lease);
        repaired++;
        budget--;
      }
    }

    for (let inspected = 0; budget > 0 && inspected < count; inspected++) {
      const lease = this.leases.next();
      if (!lease) break;
      if (lease.isSaving || now - lease.loadedAt < intervalMs) {
        continue;
      }
      this.dispatch(lease);
      saved++;
      budget--;
    }

    return { saved, repaired };
  }

  private dispatch(lease: Lease<object>): void {
    this.saver.autoSave(lease).catch((err) => {
      logger.error({ err, lease: lease.identify() }, 'Auto-save failed');
    });
  }
}
