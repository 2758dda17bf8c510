import * as crypto from 'crypto';
import * as os from 'os';
import {
  resolveConfig,
  type LeaseConfig,
  type LeaseConfigInput,
  type SessionTag,
} from '@leasehold/core';
import { SerializedWriteChannel } from './channel/SerializedWriteChannel';
import { RemoteRecordGateway } from './gateway/RemoteRecordGateway';
import { HealthMonitor } from './health/HealthMonitor';
import { SessionLockManager } from './lease/SessionLockManager';
import { LeaseStore } from './LeaseStore';
import { ActiveLeaseSet } from './scheduler/ActiveLeaseSet';
import { AutoSaveScheduler } from './scheduler/AutoSaveScheduler';
import { IntervalTickSource, type TickSource } from './scheduler/TickSource';
import type { IStoreProvider } from './storage/IKeyValueStore';
import { logger } from './utils/logger';

export interface LeaseServiceOptions {
  stores: IStoreProvider;
  config?: LeaseConfigInput;
  /** Identity written into leases (default: hostname and a random job id) */
  session?: Partial<SessionTag>;
  /** Drives auto-save and polling (default: an interval of `config.tickInterval`) */
  ticks?: TickSource;
  clock?: () => number;
  /** Jitter source for retry backoff */
  random?: () => number;
}

/**
 * Process-wide root: one write channel, gateway, health monitor, lock manager and
 * auto-save scheduler, shared by every LeaseStore handed out.
 */
export class LeaseService {
  readonly config: LeaseConfig;
  readonly session: SessionTag;
  readonly health: HealthMonitor;
  readonly channel: SerializedWriteChannel;
  readonly gateway: RemoteRecordGateway;
  readonly manager: SessionLockManager;
  readonly scheduler: AutoSaveScheduler;

  private readonly ticks: TickSource;
  private readonly leases = new ActiveLeaseSet();
  private unsubscribeTick: (() => void) | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: LeaseServiceOptions) {
    this.config = resolveConfig(options.config);
    this.session = {
      processId: options.session?.processId ?? os.hostname(),
      jobId: options.session?.jobId ?? crypto.randomUUID(),
    };
    this.ticks = options.ticks ?? new IntervalTickSource(this.config.tickInterval);

    this.health = new HealthMonitor(this.config, options.clock);
    this.channel = new SerializedWriteChannel({
      cooldownMs: this.config.remoteWriteCooldown * 1000,
      clock: options.clock,
    });
    this.gateway = new RemoteRecordGateway({
      stores: options.stores,
      channel: this.channel,
      health: this.health,
      retry: this.config.retry,
      random: options.random,
    });
    this.manager = new SessionLockManager({
      gateway: this.gateway,
      leases: this.leases,
      ticks: this.ticks,
      config: this.config,
      session: this.session,
      clock: options.clock,
    });
    this.scheduler = new AutoSaveScheduler(this.leases, this.manager, this.config, options.clock);
  }

  get issues(): HealthMonitor['issues'] {
    return this.health.issues;
  }

  get corruption(): HealthMonitor['corruption'] {
    return this.health.corruption;
  }

  get criticalState(): HealthMonitor['criticalState'] {
    return this.health.criticalState;
  }

  get leaseLost(): SessionLockManager['leaseLost'] {
    return this.manager.leaseLost;
  }

  isCritical(): boolean {
    return this.health.isCritical();
  }

  get activeLeaseCount(): number {
    return this.leases.size;
  }

  /**
   * Get a facade over the remote store `name`. Records loaded through it are
   * reconciled against `template`.
   */
  getStore<T extends object>(name: string, template: T): LeaseStore<T> {
    return new LeaseStore<T>(name, template, this.manager);
  }

  /**
   * Start ticking. Claims work before start(), but nothing is auto-saved or polled.
   */
  start(): void {
    if (this.unsubscribeTick) return;
    this.unsubscribeTick = this.ticks.onTick(() => this.onTick());
    this.ticks.start();
    logger.info({ session: this.session, config: this.config }, 'Lease service started');
  }

  /**
   * Release every lease, wait for queued writes, and stop ticking. Safe to call repeatedly.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  /**
   * Run shutdown() on SIGINT/SIGTERM.
   * @returns Function that removes the handlers
   */
  installShutdownHooks(exit: (code: number) => void = (code) => process.exit(code)): () => void {
    const handler = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Starting graceful shutdown');
      this.shutdown().then(
        () => exit(0),
        (err) => {
          logger.error({ err }, 'Error during shutdown');
          exit(1);
        }
      );
    };
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
    return () => {
      process.removeListener('SIGINT', handler);
      process.removeListener('SIGTERM', handler);
    };
  }

  private onTick(): void {
    this.scheduler.tick();
    this.health.evaluate();
    this.channel.sweep();
  }

  private async runShutdown(): Promise<void> {
    logger.info({ activeLeases: this.leases.size }, 'Shutting down lease service...');

    // Polling loops and cooldown waits must not hold the shutdown open
    const releasing = this.manager.releaseAll();
    this.channel.skipCooldowns();
    this.gateway.skipBackoff();
    await releasing;
    await this.channel.drainAll();

    this.unsubscribeTick?.();
    this.unsubscribeTick = null;
    this.ticks.stop();
    logger.info('Lease service shutdown complete');
  }
}
