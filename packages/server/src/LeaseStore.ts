import type { Lease } from './lease/Lease';
import type {
  ForceLoadOptions,
  LockedRecordHandler,
  RecordSnapshot,
  SessionLockManager,
} from './lease/SessionLockManager';
import { logger } from './utils/logger';

export type ClaimStrategy = 'claim' | 'forceLoad' | 'steal';

export interface WithLeaseOptions extends ForceLoadOptions {
  /** How to take the record (default: 'claim') */
  strategy?: ClaimStrategy;
}

/**
 * Leases on the records of one named store, all reconciled against one template.
 */
export class LeaseStore<T extends object> {
  constructor(
    readonly name: string,
    private readonly template: T,
    private readonly manager: SessionLockManager
  ) {}

  claim(key: string): Promise<Lease<T>> {
    return this.manager.claim(this.name, key, this.template);
  }

  forceLoad(key: string, options?: ForceLoadOptions): Promise<Lease<T>> {
    return this.manager.forceLoad(this.name, key, this.template, options);
  }

  steal(key: string): Promise<Lease<T>> {
    return this.manager.steal(this.name, key, this.template);
  }

  load(key: string, handler: LockedRecordHandler, options?: ForceLoadOptions): Promise<Lease<T> | undefined> {
    return this.manager.load(this.name, key, this.template, handler, options);
  }

  view(key: string): Promise<RecordSnapshot<T> | undefined> {
    return this.manager.view<T>(this.name, key);
  }

  wipe(key: string): Promise<void> {
    return this.manager.wipe(this.name, key);
  }

  /**
   * Run `fn` while holding the lease. The lease is released on every exit path,
   * unless it was already lost. When `fn` throws, its error is the one rethrown and a
   * failed release is only logged.
   */
  async withLease<R>(key: string, fn: (lease: Lease<T>) => Promise<R> | R, options: WithLeaseOptions = {}): Promise<R> {
    const lease = await this.acquire(key, options);
    let result: R;
    try {
      result = await fn(lease);
    } catch (err) {
      await lease.release().catch((releaseErr: unknown) => {
        logger.error({ err: releaseErr, lease: lease.identify() }, 'Failed to release lease after handler error');
      });
      throw err;
    }
    await lease.release();
    return result;
  }

  private acquire(key: string, options: WithLeaseOptions): Promise<Lease<T>> {
    switch (options.strategy ?? 'claim') {
      case 'forceLoad':
        return this.forceLoad(key, options);
      case 'steal':
        return this.steal(key);
      case 'claim':
        return this.claim(key);
    }
  }
}
