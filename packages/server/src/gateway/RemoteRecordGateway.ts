import {
    DataCorruptionError,
    StoreRequestError,
    StoreUnavailableError,
    TransientStoreError,
    decodeRecord,
    encodeRecord,
    type StoredRecord,
} from '@leasehold/core';
import type { SerializedWriteChannel } from '../channel/SerializedWriteChannel';
import type { HealthMonitor } from '../health/HealthMonitor';
import type { IStoreProvider } from '../storage/IKeyValueStore';
import { logger } from '../utils/logger';
import { TimerRegistry } from '../utils/TimerRegistry';
import { calculateBackoffDelay } from './backoff';

/**
 * Computes the record to store from the current one. Returning `undefined` leaves the
 * stored value as it is. Must be safe to call more than once per persist.
 */
export type RecordUpdater<T extends object> = (current: StoredRecord<T> | undefined) => StoredRecord<T> | undefined;

export interface GatewayRetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface RemoteRecordGatewayOptions {
    stores: IStoreProvider;
    channel: SerializedWriteChannel;
    health: HealthMonitor;
    retry: GatewayRetryConfig;
    random?: () => number;
}

/**
 * Carries an exception thrown by a caller's updater through the store call, so it is
 * re-thrown as-is instead of being treated as a store failure.
 */
class UpdaterFailure {
    constructor(readonly cause: unknown) {}
}

/**
 * Read and read-modify-write access to records, one queued operation per call.
 *
 * Transient store errors are retried with backoff inside the queued operation, so
 * retries keep their place in the key's order. Each failed attempt is reported to the
 * health monitor once.
 */
export class RemoteRecordGateway {
    private readonly timers = new TimerRegistry();
    private backoffSkipped = false;

    constructor(private readonly options: RemoteRecordGatewayOptions) {}

    fetch<T extends object>(store: string, key: string): Promise<StoredRecord<T> | undefined> {
        return this.schedule(store, key, async () => {
            const entry = await this.options.stores.getStore(store).get(key);
            return entry ? decodeRecord<T>(store, key, entry.value) : undefined;
        });
    }

    persist<T extends object>(
        store: string,
        key: string,
        updater: RecordUpdater<T>
    ): Promise<StoredRecord<T> | undefined> {
        return this.schedule(store, key, async () => {
            const entry = await this.options.stores.getStore(store).update(key, (current) => {
                // A corrupt value throws here, before the updater can replace it
                const decoded = current ? decodeRecord<T>(store, key, current.value) : undefined;
                let next: StoredRecord<T> | undefined;
                try {
                    next = updater(decoded);
                } catch (err) {
                    throw new UpdaterFailure(err);
                }
                return next ? encodeRecord(next) : undefined;
            });
            return entry ? decodeRecord<T>(store, key, entry.value) : undefined;
        });
    }

    remove(store: string, key: string): Promise<void> {
        return this.schedule(store, key, () => this.options.stores.getStore(store).remove(key));
    }

    /**
     * Cut short backoff waits in progress and retry without waiting from now on (used during shutdown).
     */
    skipBackoff(): void {
        this.backoffSkipped = true;
        this.timers.flushDelays();
    }

    private schedule<R>(store: string, key: string, call: () => Promise<R>): Promise<R> {
        return new Promise<R>((resolve, reject) => {
            this.options.channel.enqueue(store, key, async () => {
                try {
                    resolve(await this.withRetry(store, key, call));
                } catch (err) {
                    reject(err);
                }
            });
        });
    }

    private async withRetry<R>(store: string, key: string, call: () => Promise<R>): Promise<R> {
        const { maxAttempts } = this.options.retry;
        const { health } = this.options;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                return await call();
            } catch (err) {
                if (err instanceof UpdaterFailure) {
                    throw err.cause;
                }

                if (err instanceof DataCorruptionError) {
                    health.reportIssue(err, store, key);
                    health.reportCorruption(store, key);
                    throw err;
                }

                if (err instanceof StoreRequestError && err.transient) {
                    health.reportIssue(new TransientStoreError(attempt, err), store, key);
                    lastError = err;
                    if (attempt < maxAttempts && !this.backoffSkipped) {
                        const delay = calculateBackoffDelay(attempt - 1, this.options.retry, this.options.random);
                        logger.debug({ store, key, attempt, delay, code: err.code }, 'Retrying store request');
                        await this.timers.delay(delay);
                    }
                    continue;
                }

                health.reportIssue(err instanceof Error ? err : new Error(String(err)), store, key);
                throw err;
            }
        }

        const exhausted = new StoreUnavailableError(store, key, maxAttempts, lastError);
        logger.error({ store, key, attempts: maxAttempts }, 'Store request retries exhausted');
        throw exhausted;
    }
}
