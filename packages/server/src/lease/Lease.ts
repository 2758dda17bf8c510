import {
  LeaseNotActiveError,
  Notifier,
  formatSession,
  type RecordMetadata,
  type SessionTag,
} from '@leasehold/core';
import { logger, logListenerError } from '../utils/logger';
import { LeaseState, isValidTransition, type ReleaseReason } from './LeaseState';

/**
 * What a lease needs from the component that created it.
 */
export interface LeaseOwner {
  save(lease: Lease<object>): Promise<void>;
  release(lease: Lease<object>): Promise<void>;
}

export interface LeaseInit<T extends object> {
  store: string;
  key: string;
  session: SessionTag;
  data: T;
  metadata: RecordMetadata;
  loadedAt: number;
}

/**
 * In-memory handle on a record this process holds.
 *
 * The application reads and mutates `data` directly while the lease is ACTIVE; the
 * auto-save scheduler persists it periodically. Once the lease leaves ACTIVE, further
 * saves are refused and `released` fires with the reason.
 */
export class Lease<T extends object> {
  readonly store: string;
  readonly key: string;
  readonly session: SessionTag;
  data: T;

  /** Fired once when the lease stops being active */
  readonly released = new Notifier<[ReleaseReason]>('leaseReleased', logListenerError);

  private _state: LeaseState = LeaseState.ACTIVE;
  private metaTags: Record<string, unknown>;
  private readonly createdAt: number;
  private _sessionLoadCount: number;
  private _lastUpdate: number;
  private revision = 0;
  private persistedRevision = 0;
  private _loadedAt: number;
  private _lastPersistedAt: number;
  private pendingSaves = 0;
  private releaseReason: ReleaseReason | null = null;

  constructor(
    private readonly owner: LeaseOwner,
    init: LeaseInit<T>
  ) {
    this.store = init.store;
    this.key = init.key;
    this.session = init.session;
    this.data = init.data;
    this.metaTags = { ...init.metadata.metaTags };
    this.createdAt = init.metadata.profileCreateTime;
    this._sessionLoadCount = init.metadata.sessionLoadCount;
    this._lastUpdate = init.metadata.lastUpdate;
    this._loadedAt = init.loadedAt;
    this._lastPersistedAt = init.loadedAt;
  }

  get state(): LeaseState {
    return this._state;
  }

  isActive(): boolean {
    return this._state === LeaseState.ACTIVE;
  }

  /** Load count this process claimed the record with */
  get sessionLoadCount(): number {
    return this._sessionLoadCount;
  }

  get profileCreateTime(): number {
    return this.createdAt;
  }

  /** `lastUpdate` as last written by this process */
  get lastUpdate(): number {
    return this._lastUpdate;
  }

  get loadedAt(): number {
    return this._loadedAt;
  }

  get lastPersistedAt(): number {
    return this._lastPersistedAt;
  }

  get isSaving(): boolean {
    return this.pendingSaves > 0;
  }

  get isDirty(): boolean {
    return this.revision !== this.persistedRevision;
  }

  get reason(): ReleaseReason | null {
    return this.releaseReason;
  }

  /**
   * Apply a change to `data` and mark the lease dirty.
   */
  update(mutator: (data: T) => void): void {
    this.assertActive();
    mutator(this.data);
    this.revision++;
  }

  markDirty(): void {
    this.revision++;
  }

  getMetaTag(name: string): unknown {
    return this.metaTags[name];
  }

  setMetaTag(name: string, value: unknown): void {
    this.assertActive();
    this.metaTags[name] = value;
    this.revision++;
  }

  getMetaTags(): Record<string, unknown> {
    return { ...this.metaTags };
  }

  save(): Promise<void> {
    return this.owner.save(this);
  }

  release(): Promise<void> {
    return this.owner.release(this);
  }

  identify(): string {
    return `[Store:"${this.store}";Key:"${this.key}";Session:"${formatSession(this.session)}"]`;
  }

  // --- Lock manager hooks ---

  /** @internal */
  beginSave(): number {
    this.pendingSaves++;
    return this.revision;
  }

  /** @internal */
  endSave(): void {
    this.pendingSaves = Math.max(0, this.pendingSaves - 1);
  }

  /** @internal */
  markPersisted(revision: number, lastUpdate: number): void {
    this._lastUpdate = lastUpdate;
    this._lastPersistedAt = lastUpdate;
    if (revision > this.persistedRevision) {
      this.persistedRevision = revision;
    }
  }

  /** @internal */
  transition(to: LeaseState): boolean {
    const from = this._state;
    if (from === to) {
      return true;
    }
    if (!isValidTransition(from, to)) {
      logger.warn({ lease: this.identify(), from, to }, `Invalid lease transition attempted: ${from} → ${to}`);
      return false;
    }
    this._state = to;
    logger.debug({ lease: this.identify(), from, to }, `Lease transition: ${from} → ${to}`);
    return true;
  }

  /**
   * Move to TERMINAL and fire `released` once.
   * @internal
   */
  finish(reason: ReleaseReason): void {
    if (this.releaseReason !== null) {
      return;
    }
    this.releaseReason = reason;
    this.transition(LeaseState.TERMINAL);
    this.released.notify(reason);
    this.released.clear();
  }

  private assertActive(): void {
    if (!this.isActive()) {
      throw new LeaseNotActiveError(this.store, this.key, this._state);
    }
  }
}
