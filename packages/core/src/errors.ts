import type { SessionTag } from './types';
import { formatSession } from './types';

/**
 * Base class for every error raised by the lease machinery.
 */
export class LeaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LeaseError';
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Another live process holds the lease. Recoverable by retrying or force loading.
 */
export class SessionLockedError extends LeaseError {
  public readonly store: string;
  public readonly key: string;
  public readonly holder: SessionTag;

  constructor(store: string, key: string, holder: SessionTag) {
    super(`Record ${store}/${key} is locked by session ${formatSession(holder)}`);
    this.name = 'SessionLockedError';
    this.store = store;
    this.key = key;
    this.holder = holder;
  }
}

/**
 * The local lease was taken over by another process. Not retryable; reload the record.
 */
export class LeaseStolenError extends LeaseError {
  public readonly store: string;
  public readonly key: string;

  constructor(store: string, key: string) {
    super(`Lease on ${store}/${key} is no longer held by this session`);
    this.name = 'LeaseStolenError';
    this.store = store;
    this.key = key;
  }
}

export type StoreErrorCode =
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'UNAVAILABLE'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL';

const TRANSIENT_CODES: ReadonlySet<StoreErrorCode> = new Set(['RATE_LIMITED', 'TIMEOUT', 'UNAVAILABLE']);

/**
 * Raised by key-value store implementations for a failed request.
 */
export class StoreRequestError extends LeaseError {
  public readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreRequestError';
    this.code = code;
  }

  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }
}

/**
 * A retryable store failure. Only seen by health listeners; callers get
 * StoreUnavailableError once retries run out.
 */
export class TransientStoreError extends LeaseError {
  public readonly attempt: number;

  constructor(attempt: number, cause: StoreRequestError) {
    super(`Transient store failure on attempt ${attempt}: ${cause.message}`, { cause });
    this.name = 'TransientStoreError';
    this.attempt = attempt;
  }
}

export class StoreUnavailableError extends LeaseError {
  public readonly store: string;
  public readonly key: string;
  public readonly attempts: number;

  constructor(store: string, key: string, attempts: number, cause: unknown) {
    super(`Store request for ${store}/${key} failed after ${attempts} attempts`, { cause });
    this.name = 'StoreUnavailableError';
    this.store = store;
    this.key = key;
    this.attempts = attempts;
  }
}

/**
 * The stored value could not be decoded. The value is left untouched in the store.
 */
export class DataCorruptionError extends LeaseError {
  public readonly store: string;
  public readonly key: string;
  public readonly reason: string;

  constructor(store: string, key: string, reason: string) {
    super(`Record ${store}/${key} is corrupted: ${reason}`);
    this.name = 'DataCorruptionError';
    this.store = store;
    this.key = key;
    this.reason = reason;
  }
}

export class InvalidConfigurationError extends LeaseError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export class ForceLoadCancelledError extends LeaseError {
  constructor(store: string, key: string) {
    super(`Force load of ${store}/${key} was cancelled`);
    this.name = 'ForceLoadCancelledError';
  }
}

/**
 * Another process requested a force load of the same record after us.
 */
export class ForceLoadInterruptedError extends LeaseError {
  public readonly contender: SessionTag | undefined;

  constructor(store: string, key: string, contender: SessionTag | undefined) {
    super(`Force load of ${store}/${key} was taken over by session ${formatSession(contender)}`);
    this.name = 'ForceLoadInterruptedError';
    this.contender = contender;
  }
}

/**
 * This process is already claiming or holding the key.
 */
export class LeaseBusyError extends LeaseError {
  constructor(store: string, key: string, state: string) {
    super(`Record ${store}/${key} is already ${state} in this process`);
    this.name = 'LeaseBusyError';
  }
}

export class LeaseNotActiveError extends LeaseError {
  constructor(store: string, key: string, state: string) {
    super(`Lease on ${store}/${key} is ${state}, not ACTIVE`);
    this.name = 'LeaseNotActiveError';
  }
}

export class ServiceShuttingDownError extends LeaseError {
  constructor() {
    super('Cannot claim records: the lease service is shutting down');
    this.name = 'ServiceShuttingDownError';
  }
}
