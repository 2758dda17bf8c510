import {
  ForceLoadCancelledError,
  ForceLoadInterruptedError,
  LeaseBusyError,
  LeaseNotActiveError,
  LeaseStolenError,
  Notifier,
  ServiceShuttingDownError,
  SessionLockedError,
  deepCopy,
  formatSession,
  isSameSession,
  isSessionDead,
  reconcile,
  type LeaseConfig,
  type SessionTag,
  type StoredRecord,
} from '@leasehold/core';
import type { RemoteRecordGateway } from '../gateway/RemoteRecordGateway';
import type { ActiveLeaseSet } from '../scheduler/ActiveLeaseSet';
import { waitForTicks, type TickSource } from '../scheduler/TickSource';
import { logger, logListenerError } from '../utils/logger';
import { Lease, type LeaseOwner } from './Lease';
import { LeaseState, type ReleaseReason } from './LeaseState';

/**
 * How a claim attempt treats a record held by another live session.
 * - claim: leave it alone
 * - request: leave it alone but mark it with our forceLoadSession
 * - poll: take it only if it became free or dead; notice if our request was overwritten
 * - forceSteal: take it if our request is still the latest one
 * - steal: take it unconditionally
 */
type ClaimMode = 'claim' | 'request' | 'poll' | 'forceSteal' | 'steal';

type ClaimAttempt<T extends object> =
  | { kind: 'claimed'; record: StoredRecord<T> }
  | { kind: 'locked'; holder: SessionTag }
  | { kind: 'interrupted'; contender: SessionTag | undefined };

type SaveOutcome = 'saved' | 'yielded' | 'stolen' | 'skipped';

/**
 * Caller policy for a record that another session holds.
 */
export type LockedRecordAction = 'repeat' | 'cancel' | 'forceLoad' | 'steal';
export type LockedRecordHandler = (holder: SessionTag) => LockedRecordAction | Promise<LockedRecordAction>;

export interface ForceLoadOptions {
  signal?: AbortSignal;
}

/**
 * Read-only view of a stored record, detached from any lease.
 */
export interface RecordSnapshot<T extends object> {
  data: T;
  activeSession: SessionTag | undefined;
  sessionLoadCount: number;
  profileCreateTime: number;
  lastUpdate: number;
  metaTags: Record<string, unknown>;
  /** An active session exists and has not gone past the dead-lock threshold */
  locked: boolean;
}

export interface SessionLockManagerOptions {
  gateway: RemoteRecordGateway;
  leases: ActiveLeaseSet;
  ticks: TickSource;
  config: LeaseConfig;
  session: SessionTag;
  clock?: () => number;
}

function keyOf(store: string, key: string): string {
  return `${store}\u0000${key}`;
}

/**
 * Owns the lease protocol stored in record metadata: claim, force load, steal,
 * save (renew), release, and detection of stolen leases.
 *
 * Every decision about the remote lock is made inside a persist updater, so it is
 * evaluated against the value the store is about to replace.
 */
export class SessionLockManager implements LeaseOwner {
  /** Fired when a lease is lost to another process: (lease, 'stolen' | 'forceLoaded') */
  readonly leaseLost = new Notifier<[Lease<object>, ReleaseReason]>('leaseLost', logListenerError);

  private readonly gateway: RemoteRecordGateway;
  private readonly leases: ActiveLeaseSet;
  private readonly ticks: TickSource;
  private readonly config: LeaseConfig;
  private readonly session: SessionTag;
  private readonly clock: () => number;

  // Keys with a claim in flight, and leases that are not yet TERMINAL
  private readonly pending: Map<string, LeaseState> = new Map();
  private readonly held: Map<string, Lease<object>> = new Map();
  private readonly releases: Map<Lease<object>, Promise<void>> = new Map();
  // Claim calls not yet settled, including a release done by activate() during shutdown
  private readonly claims: Set<Promise<unknown>> = new Set();
  private readonly shutdownController = new AbortController();

  constructor(options: SessionLockManagerOptions) {
    this.gateway = options.gateway;
    this.leases = options.leases;
    this.ticks = options.ticks;
    this.config = options.config;
    this.session = options.session;
    this.clock = options.clock ?? Date.now;
  }

  getState(store: string, key: string): LeaseState {
    const k = keyOf(store, key);
    return this.held.get(k)?.state ?? this.pending.get(k) ?? LeaseState.UNCLAIMED;
  }

  getLease(store: string, key: string): Lease<object> | undefined {
    return this.held.get(keyOf(store, key));
  }

  get isShuttingDown(): boolean {
    return this.shutdownController.signal.aborted;
  }

  // ============================================
  // Claiming
  // ============================================

  /**
   * Take the lease if the record is missing, free, abandoned, or already ours.
   * @throws SessionLockedError when another live session holds it
   */
  claim<T extends object>(store: string, key: string, template: T): Promise<Lease<T>> {
    return this.trackClaim(this.runClaim(store, key, template));
  }

  /**
   * Ask the holder to give the record up, then poll. On step `forceLoadMaxSteps` the
   * record is taken whether or not the holder answered.
   * @throws ForceLoadInterruptedError when another process force loads the record after us
   * @throws ForceLoadCancelledError when `options.signal` aborts between steps
   */
  forceLoad<T extends object>(
    store: string,
    key: string,
    template: T,
    options: ForceLoadOptions = {}
  ): Promise<Lease<T>> {
    return this.trackClaim(this.runForceLoadClaim(store, key, template, options));
  }

  /**
   * Take the record immediately, ignoring any live holder. The holder finds out on its next save.
   */
  steal<T extends object>(store: string, key: string, template: T): Promise<Lease<T>> {
    return this.trackClaim(this.runSteal(store, key, template));
  }

  /**
   * Claim with a caller-supplied policy for locked records.
   * @returns The lease, or undefined if the handler chose 'cancel'
   */
  load<T extends object>(
    store: string,
    key: string,
    template: T,
    handler: LockedRecordHandler,
    options: ForceLoadOptions = {}
  ): Promise<Lease<T> | undefined> {
    return this.trackClaim(this.runLoad(store, key, template, handler, options));
  }

  private trackClaim<R>(promise: Promise<R>): Promise<R> {
    const tracked: Promise<R> = promise.finally(() => {
      this.claims.delete(tracked);
    });
    this.claims.add(tracked);
    return tracked;
  }

  private async runClaim<T extends object>(store: string, key: string, template: T): Promise<Lease<T>> {
    this.beginClaim(store, key, LeaseState.CLAIMING);
    try {
      const attempt = await this.attempt(store, key, template, 'claim');
      if (attempt.kind !== 'claimed') {
        throw new SessionLockedError(store, key, this.holderOf(attempt));
      }
      return await this.activate(store, key, template, attempt.record);
    } finally {
      this.pending.delete(keyOf(store, key));
    }
  }

  private async runForceLoadClaim<T extends object>(
    store: string,
    key: string,
    template: T,
    options: ForceLoadOptions = {}
  ): Promise<Lease<T>> {
    this.beginClaim(store, key, LeaseState.FORCE_LOADING);
    try {
      return await this.runForceLoad(store, key, template, options);
    } finally {
      this.pending.delete(keyOf(store, key));
    }
  }

  private async runSteal<T extends object>(store: string, key: string, template: T): Promise<Lease<T>> {
    this.beginClaim(store, key, LeaseState.CLAIMING);
    try {
      return await this.takeBySteal(store, key, template);
    } finally {
      this.pending.delete(keyOf(store, key));
    }
  }

  private async runLoad<T extends object>(
    store: string,
    key: string,
    template: T,
    handler: LockedRecordHandler,
    options: ForceLoadOptions = {}
  ): Promise<Lease<T> | undefined> {
    const k = keyOf(store, key);
    this.beginClaim(store, key, LeaseState.CLAIMING);
    try {
      for (;;) {
        const attempt = await this.attempt(store, key, template, 'claim');
        if (attempt.kind === 'claimed') {
          return await this.activate(store, key, template, attempt.record);
        }

        const holder = this.holderOf(attempt);
        const action = await handler(holder);
        logger.debug({ store, key, holder: formatSession(holder), action }, 'Record locked, handler decided');

        switch (action) {
          case 'repeat':
            await this.waitBetweenAttempts(store, key, options.signal);
            continue;
          case 'cancel':
            return undefined;
          case 'forceLoad':
            this.pending.set(k, LeaseState.FORCE_LOADING);
            return await this.runForceLoad(store, key, template, options);
          case 'steal':
            return await this.takeBySteal(store, key, template);
          default:
            throw new Error(`Unknown locked record action: ${String(action)}`);
        }
      }
    } finally {
      this.pending.delete(k);
    }
  }

  private async runForceLoad<T extends object>(
    store: string,
    key: string,
    template: T,
    options: ForceLoadOptions
  ): Promise<Lease<T>> {
    const first = await this.attempt(store, key, template, 'request');
    if (first.kind === 'claimed') {
      return this.activate(store, key, template, first.record);
    }
    logger.info({ store, key, holder: formatSession(this.holderOf(first)) }, 'Force load requested');

    const maxSteps = this.config.forceLoadMaxSteps;
    for (let step = 1; step <= maxSteps; step++) {
      try {
        await this.waitBetweenAttempts(store, key, options.signal);
      } catch (err) {
        await this.withdrawRequest(store, key);
        throw err;
      }

      const mode: ClaimMode = step >= maxSteps ? 'forceSteal' : 'poll';
      const attempt = await this.attempt(store, key, template, mode);

      if (attempt.kind === 'claimed') {
        logger.info({ store, key, step, forced: mode === 'forceSteal' }, 'Force load succeeded');
        return this.activate(store, key, template, attempt.record);
      }
      if (attempt.kind === 'interrupted') {
        logger.warn({ store, key, contender: formatSession(attempt.contender) }, 'Force load interrupted by another session');
        throw new ForceLoadInterruptedError(store, key, attempt.contender);
      }
      logger.debug({ store, key, step, maxSteps }, 'Force load step: record still held');
    }

    // forceSteal only declines when our request was overwritten, which returns above
    throw new ForceLoadInterruptedError(store, key, undefined);
  }

  /**
   * Clear our forceLoadSession marker so the holder does not yield to a request nobody
   * is waiting on. A failure here leaves the marker until the next claim or release.
   */
  private async withdrawRequest(store: string, key: string): Promise<void> {
    try {
      await this.gateway.persist<object>(store, key, (current) => {
        if (!current || !isSameSession(current.metadata.forceLoadSession, this.session)) {
          return undefined;
        }
        return { data: current.data, metadata: { ...current.metadata, forceLoadSession: undefined } };
      });
      logger.debug({ store, key }, 'Force load request withdrawn');
    } catch (err) {
      logger.warn({ err, store, key }, 'Failed to withdraw force load request');
    }
  }

  private async takeBySteal<T extends object>(store: string, key: string, template: T): Promise<Lease<T>> {
    const attempt = await this.attempt(store, key, template, 'steal');
    if (attempt.kind !== 'claimed') {
      throw new Error(`Steal of ${store}/${key} did not take the record`);
    }
    return this.activate(store, key, template, attempt.record);
  }

  private holderOf<T extends object>(attempt: Exclude<ClaimAttempt<T>, { kind: 'claimed' }>): SessionTag {
    const holder = attempt.kind === 'locked' ? attempt.holder : attempt.contender;
    return holder ?? { processId: 'unknown', jobId: 'unknown' };
  }

  private async waitBetweenAttempts(store: string, key: string, signal?: AbortSignal): Promise<void> {
    const ticks = Math.max(1, Math.ceil(this.config.loadRepeatDelay / this.config.tickInterval));
    const completed = await waitForTicks(this.ticks, ticks, [signal, this.shutdownController.signal]);
    if (!completed) {
      if (this.isShuttingDown) {
        throw new ServiceShuttingDownError();
      }
      throw new ForceLoadCancelledError(store, key);
    }
    this.assertAccepting();
  }

  private async attempt<T extends object>(
    store: string,
    key: string,
    template: T,
    mode: ClaimMode
  ): Promise<ClaimAttempt<T>> {
    // Written by the updater; the last invocation is the one the store committed
    const outcome: { decision: 'took' | 'held' | 'interrupted' } = { decision: 'held' };

    const result = await this.gateway.persist<T>(store, key, (current) => {
      const now = this.clock();

      if (!current) {
        outcome.decision = 'took';
        return {
          data: deepCopy(template),
          metadata: {
            activeSession: this.session,
            sessionLoadCount: 1,
            profileCreateTime: now,
            lastUpdate: now,
            metaTags: {},
          },
        };
      }

      const meta = current.metadata;
      const ownRequest = isSameSession(meta.forceLoadSession, this.session);
      const takeable =
        meta.activeSession === undefined ||
        isSameSession(meta.activeSession, this.session) ||
        isSessionDead(meta, now, this.config.deadLockAssumedAfter * 1000) ||
        mode === 'steal' ||
        (mode === 'forceSteal' && ownRequest);

      if (takeable) {
        outcome.decision = 'took';
        return {
          data: current.data,
          metadata: {
            ...meta,
            activeSession: this.session,
            forceLoadSession: undefined,
            sessionLoadCount: meta.sessionLoadCount + 1,
            lastUpdate: now,
          },
        };
      }

      if ((mode === 'poll' || mode === 'forceSteal') && !ownRequest) {
        outcome.decision = 'interrupted';
        return undefined;
      }

      outcome.decision = 'held';
      if (mode === 'request' && !ownRequest) {
        return { data: current.data, metadata: { ...meta, forceLoadSession: this.session } };
      }
      return undefined;
    });

    if (!result) {
      throw new Error(`Store returned no record for ${store}/${key} after a claim update`);
    }
    if (outcome.decision === 'took') {
      return { kind: 'claimed', record: result };
    }
    if (outcome.decision === 'interrupted') {
      return { kind: 'interrupted', contender: result.metadata.forceLoadSession };
    }
    const holder = result.metadata.activeSession;
    if (!holder) {
      throw new Error(`Record ${store}/${key} is free but the claim did not take it`);
    }
    return { kind: 'locked', holder };
  }

  private async activate<T extends object>(
    store: string,
    key: string,
    template: T,
    record: StoredRecord<T>
  ): Promise<Lease<T>> {
    const data = record.data;
    reconcile(data, template);

    const lease = new Lease<T>(this, {
      store,
      key,
      session: this.session,
      data,
      metadata: record.metadata,
      loadedAt: this.clock(),
    });

    this.held.set(keyOf(store, key), lease);
    this.leases.add(lease);
    logger.info({ lease: lease.identify(), sessionLoadCount: lease.sessionLoadCount }, 'Lease claimed');

    // Shutdown began while the claim was in flight: hand the record straight back
    if (this.isShuttingDown) {
      await this.release(lease, 'shutdown');
      throw new ServiceShuttingDownError();
    }
    return lease;
  }

  private beginClaim(store: string, key: string, state: LeaseState): void {
    this.assertAccepting();
    const current = this.getState(store, key);
    if (current !== LeaseState.UNCLAIMED) {
      throw new LeaseBusyError(store, key, current);
    }
    this.pending.set(keyOf(store, key), state);
  }

  private assertAccepting(): void {
    if (this.isShuttingDown) {
      throw new ServiceShuttingDownError();
    }
  }

  // ============================================
  // Saving and releasing
  // ============================================

  /**
   * Persist the lease now.
   * @throws LeaseNotActiveError if the lease is no longer active
   * @throws LeaseStolenError if the save found the record owned by another session
   */
  async save(lease: Lease<object>): Promise<void> {
    if (!lease.isActive()) {
      throw new LeaseNotActiveError(lease.store, lease.key, lease.state);
    }
    const outcome = await this.persistLease(lease);
    if (outcome === 'stolen') {
      throw new LeaseStolenError(lease.store, lease.key);
    }
  }

  /**
   * Auto-save entry point: never throws for lease-level outcomes.
   */
  async autoSave(lease: Lease<object>): Promise<SaveOutcome> {
    if (!lease.isActive()) {
      return 'skipped';
    }
    return this.persistLease(lease);
  }

  private async persistLease(lease: Lease<object>): Promise<SaveOutcome> {
    const revision = lease.beginSave();
    const result: { outcome: SaveOutcome; writtenAt: number } = { outcome: 'stolen', writtenAt: 0 };

    try {
      await this.gateway.persist<object>(lease.store, lease.key, (current) => {
        // Release may have started while this save waited in the queue
        if (!lease.isActive()) {
          result.outcome = 'skipped';
          return undefined;
        }
        if (!current || !this.ownsRecord(lease, current)) {
          result.outcome = 'stolen';
          return undefined;
        }

        const meta = current.metadata;
        const yielding = meta.forceLoadSession !== undefined && !isSameSession(meta.forceLoadSession, this.session);
        result.outcome = yielding ? 'yielded' : 'saved';
        result.writtenAt = this.clock();

        return {
          data: lease.data,
          metadata: {
            ...meta,
            activeSession: yielding ? undefined : meta.activeSession,
            metaTags: lease.getMetaTags(),
            lastUpdate: result.writtenAt,
          },
        };
      });
    } finally {
      lease.endSave();
    }

    switch (result.outcome) {
      case 'saved':
        lease.markPersisted(revision, result.writtenAt);
        break;
      case 'yielded':
        lease.markPersisted(revision, result.writtenAt);
        logger.info({ lease: lease.identify() }, 'Lease given up to a force load request');
        this.lose(lease, 'forceLoaded');
        break;
      case 'stolen':
        if (lease.isActive()) {
          logger.warn({ lease: lease.identify() }, 'Lease was stolen by another session');
          lease.transition(LeaseState.STOLEN);
          this.lose(lease, 'stolen');
        }
        break;
      case 'skipped':
        break;
    }
    return result.outcome;
  }

  /**
   * Final save that clears the session lock. Idempotent; concurrent calls share one release.
   */
  release(lease: Lease<object>, reason: ReleaseReason = 'released'): Promise<void> {
    const inFlight = this.releases.get(lease);
    if (inFlight) {
      return inFlight;
    }
    if (!lease.isActive()) {
      return Promise.resolve();
    }

    const promise = this.runRelease(lease, reason).finally(() => {
      this.releases.delete(lease);
    });
    this.releases.set(lease, promise);
    return promise;
  }

  private async runRelease(lease: Lease<object>, reason: ReleaseReason): Promise<void> {
    lease.transition(LeaseState.RELEASING);
    this.leases.remove(lease);

    const check = { stolen: false };
    try {
      await this.gateway.persist<object>(lease.store, lease.key, (current) => {
        if (!current || !this.ownsRecord(lease, current)) {
          check.stolen = true;
          return undefined;
        }
        check.stolen = false;
        return {
          data: lease.data,
          metadata: {
            ...current.metadata,
            activeSession: undefined,
            forceLoadSession: undefined,
            metaTags: lease.getMetaTags(),
            lastUpdate: this.clock(),
          },
        };
      });
    } catch (err) {
      // The remote lock stays until another process judges it dead
      logger.error({ err, lease: lease.identify() }, 'Failed to release lease');
      this.forget(lease);
      lease.finish(reason);
      throw err;
    }

    if (check.stolen) {
      logger.warn({ lease: lease.identify() }, 'Lease was stolen before it could be released');
      lease.transition(LeaseState.STOLEN);
      this.lose(lease, 'stolen');
      return;
    }

    this.forget(lease);
    lease.finish(reason);
    logger.info({ lease: lease.identify(), reason }, 'Lease released');
  }

  /**
   * Stop accepting claims and release every held lease. Claims in flight are waited
   * for; one that still takes its record hands it straight back.
   */
  async releaseAll(): Promise<void> {
    this.shutdownController.abort();
    const leases = Array.from(this.held.values());
    const claims = Array.from(this.claims);
    const results = await Promise.allSettled(leases.map((lease) => this.release(lease, 'shutdown')));
    await Promise.allSettled(claims);
    const failed = results.filter((r) => r.status === 'rejected').length;
    if (failed > 0) {
      logger.error({ failed, total: leases.length }, 'Some leases could not be released');
    }
  }

  // ============================================
  // Read-only access
  // ============================================

  async view<T extends object>(store: string, key: string): Promise<RecordSnapshot<T> | undefined> {
    const record = await this.gateway.fetch<T>(store, key);
    if (!record) {
      return undefined;
    }
    const meta = record.metadata;
    return {
      data: deepCopy(record.data),
      activeSession: meta.activeSession,
      sessionLoadCount: meta.sessionLoadCount,
      profileCreateTime: meta.profileCreateTime,
      lastUpdate: meta.lastUpdate,
      metaTags: deepCopy(meta.metaTags),
      locked:
        meta.activeSession !== undefined &&
        !isSessionDead(meta, this.clock(), this.config.deadLockAssumedAfter * 1000),
    };
  }

  /**
   * Delete the record from the store. A lease held here on the key is lost on its next save.
   */
  async wipe(store: string, key: string): Promise<void> {
    await this.gateway.remove(store, key);
    logger.info({ store, key }, 'Record wiped');
  }

  private ownsRecord(lease: Lease<object>, record: StoredRecord<object>): boolean {
    return (
      isSameSession(record.metadata.activeSession, this.session) &&
      record.metadata.sessionLoadCount === lease.sessionLoadCount
    );
  }

  private lose(lease: Lease<object>, reason: ReleaseReason): void {
    this.leases.remove(lease);
    this.forget(lease);
    lease.finish(reason);
    this.leaseLost.notify(lease, reason);
  }

  private forget(lease: Lease<object>): void {
    const k = keyOf(lease.store, lease.key);
    if (this.held.get(k) === lease) {
      this.held.delete(k);
    }
  }
}
