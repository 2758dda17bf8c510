import { logger } from '../utils/logger';
import { TimerRegistry } from '../utils/TimerRegistry';

/**
 * One unit of work against the remote store. It performs a single logical store
 * call (including its own retries) and settles when that call is done.
 */
export type WriteOperation = () => Promise<void>;

export interface SerializedWriteChannelOptions {
    /** Minimum spacing between operations on the same key, in ms (0 disables throttling) */
    cooldownMs: number;
    clock?: () => number;
}

interface WriteQueueEntry {
    store: string;
    key: string;
    queue: WriteOperation[];
    running: boolean;
    /** Completion time of the last operation, 0 before the first one finishes */
    lastWrite: number;
    idleWaiters: Array<() => void>;
}

/**
 * Per (store, key) FIFO of store operations.
 *
 * Operations for the same key run one at a time, in submission order, at least
 * `cooldownMs` apart. Operations for different keys run independently.
 * Entries are deleted by sweep() once idle for the cooldown, and re-created on the
 * next enqueue.
 */
export class SerializedWriteChannel {
    private entries: Map<string, Map<string, WriteQueueEntry>> = new Map();
    private readonly timers = new TimerRegistry();
    private cooldownsSkipped = false;
    private readonly cooldownMs: number;
    private readonly clock: () => number;

    constructor(options: SerializedWriteChannelOptions) {
        this.cooldownMs = options.cooldownMs;
        this.clock = options.clock ?? Date.now;
    }

    /**
     * Queue an operation and return immediately.
     */
    enqueue(store: string, key: string, operation: WriteOperation): void {
        let storeEntries = this.entries.get(store);
        if (!storeEntries) {
            storeEntries = new Map();
            this.entries.set(store, storeEntries);
        }

        let entry = storeEntries.get(key);
        if (!entry) {
            entry = { store, key, queue: [], running: false, lastWrite: 0, idleWaiters: [] };
            storeEntries.set(key, entry);
        }

        entry.queue.push(operation);

        if (!entry.running) {
            this.process(entry).catch((err) => {
                logger.error({ err, store, key }, 'Write channel processing failed');
            });
        }
    }

    /**
     * Remove entries that are idle and whose last write is at least one cooldown old.
     * Driven by the process tick.
     * @returns Number of entries removed
     */
    sweep(): number {
        const now = this.clock();
        let removed = 0;

        for (const [store, storeEntries] of this.entries) {
            for (const [key, entry] of storeEntries) {
                if (!entry.running && entry.queue.length === 0 && now - entry.lastWrite >= this.cooldownMs) {
                    storeEntries.delete(key);
                    removed++;
                }
            }
            if (storeEntries.size === 0) {
                this.entries.delete(store);
            }
        }

        return removed;
    }

    /**
     * Resolves once every operation queued so far for the key has finished.
     */
    drain(store: string, key: string): Promise<void> {
        const entry = this.entries.get(store)?.get(key);
        if (!entry || (!entry.running && entry.queue.length === 0)) {
            return Promise.resolve();
        }
        return new Promise((resolve) => entry.idleWaiters.push(resolve));
    }

    async drainAll(): Promise<void> {
        const pending: Promise<void>[] = [];
        for (const storeEntries of this.entries.values()) {
            for (const entry of storeEntries.values()) {
                pending.push(this.drain(entry.store, entry.key));
            }
        }
        await Promise.all(pending);
    }

    /**
     * Skip cooldown waits in progress and every later one, e.g. to finish a shutdown drain quickly.
     */
    skipCooldowns(): void {
        this.cooldownsSkipped = true;
        this.timers.flushDelays();
    }

    hasEntry(store: string, key: string): boolean {
        return this.entries.get(store)?.has(key) ?? false;
    }

    /**
     * Operations waiting to start for the key (excluding one in flight).
     */
    getQueueLength(store: string, key: string): number {
        return this.entries.get(store)?.get(key)?.queue.length ?? 0;
    }

    get size(): number {
        let total = 0;
        for (const storeEntries of this.entries.values()) {
            total += storeEntries.size;
        }
        return total;
    }

    private async process(entry: WriteQueueEntry): Promise<void> {
        entry.running = true;

        try {
            while (entry.queue.length > 0) {
                const wait = entry.lastWrite + this.cooldownMs - this.clock();
                if (!this.cooldownsSkipped && entry.lastWrite > 0 && wait > 0) {
                    await this.timers.delay(wait);
                }

                const operation = entry.queue.shift();
                if (!operation) break;

                try {
                    await operation();
                } catch (err) {
                    // Failures belong to whoever queued the operation
                    logger.debug({ err, store: entry.store, key: entry.key }, 'Queued write operation failed');
                } finally {
                    entry.lastWrite = this.clock();
                }
            }
        } finally {
            entry.running = false;
            const waiters = entry.idleWaiters;
            entry.idleWaiters = [];
            for (const resolve of waiters) {
                resolve();
            }
        }
    }
}
