import { StoreRequestError, type StoreErrorCode } from '@leasehold/core';
import type { IKeyValueStore, IStoreProvider, StoreEntry, StoreTransform } from './IKeyValueStore';

export interface MemoryStoreOptions {
  /** Minimum ms between calls for one key; faster calls fail with RATE_LIMITED (default: 0, no limit) */
  rateLimitMs?: number;
  /** Values larger than this fail with PAYLOAD_TOO_LARGE (default: 4 MiB) */
  maxValueBytes?: number;
  /** Artificial latency per call in ms (default: 0, resolves on the next macrotask) */
  latencyMs?: number;
  clock?: () => number;
}

interface InjectedFault {
  code: StoreErrorCode;
  remaining: number;
  key?: string;
}

const DEFAULT_MAX_VALUE_BYTES = 4 * 1024 * 1024;

/**
 * In-memory IKeyValueStore for tests and local development.
 *
 * Note: Data is lost when the process exits. Several stores created from the same
 * MemoryStoreProvider share their data, so separate LeaseService instances can play
 * the part of separate processes.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly entries: Map<string, StoreEntry> = new Map();
  private readonly lastCallAt: Map<string, number> = new Map();
  private readonly callCounts: Map<string, number> = new Map();
  private faults: InjectedFault[] = [];
  private readonly rateLimitMs: number;
  private readonly maxValueBytes: number;
  private readonly latencyMs: number;
  private readonly clock: () => number;

  constructor(
    public readonly name: string,
    options: MemoryStoreOptions = {}
  ) {
    this.rateLimitMs = options.rateLimitMs ?? 0;
    this.maxValueBytes = options.maxValueBytes ?? DEFAULT_MAX_VALUE_BYTES;
    this.latencyMs = options.latencyMs ?? 0;
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<StoreEntry | undefined> {
    await this.beginCall(key);
    const entry = this.entries.get(key);
    return entry ? { value: entry.value, version: entry.version } : undefined;
  }

  async update(key: string, transform: StoreTransform): Promise<StoreEntry | undefined> {
    await this.beginCall(key);

    // Compare-and-swap loop; in one process nothing can interleave, but the
    // transform still sees the same contract a remote store offers.
    for (;;) {
      const current = this.entries.get(key);
      const next = transform(current ? { value: current.value, version: current.version } : undefined);
      if (next === undefined) {
        return current;
      }
      if (next.byteLength > this.maxValueBytes) {
        throw new StoreRequestError(
          'PAYLOAD_TOO_LARGE',
          `Value for ${this.name}/${key} is ${next.byteLength} bytes, limit is ${this.maxValueBytes}`
        );
      }
      if (this.entries.get(key)?.version !== current?.version) {
        continue;
      }
      const written: StoreEntry = { value: next, version: (current?.version ?? 0) + 1 };
      this.entries.set(key, written);
      return written;
    }
  }

  async remove(key: string): Promise<void> {
    await this.beginCall(key);
    this.entries.delete(key);
  }

  /**
   * Make the next `times` calls (optionally only for `key`) fail with `code`.
   */
  failNext(code: StoreErrorCode, times = 1, key?: string): void {
    this.faults.push({ code, remaining: times, key });
  }

  /**
   * Write bytes directly, bypassing rate limits and faults.
   */
  putRaw(key: string, value: Uint8Array): void {
    const version = (this.entries.get(key)?.version ?? 0) + 1;
    this.entries.set(key, { value, version });
  }

  peek(key: string): StoreEntry | undefined {
    return this.entries.get(key);
  }

  getCallCount(key: string): number {
    return this.callCounts.get(key) ?? 0;
  }

  private async beginCall(key: string): Promise<void> {
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    } else {
      await new Promise((resolve) => setImmediate(resolve));
    }

    this.callCounts.set(key, this.getCallCount(key) + 1);

    const fault = this.faults.find((f) => f.key === undefined || f.key === key);
    if (fault) {
      fault.remaining--;
      if (fault.remaining <= 0) {
        this.faults = this.faults.filter((f) => f !== fault);
      }
      throw new StoreRequestError(fault.code, `Injected ${fault.code} for ${this.name}/${key}`);
    }

    const now = this.clock();
    const last = this.lastCallAt.get(key);
    if (this.rateLimitMs > 0 && last !== undefined && now - last < this.rateLimitMs) {
      throw new StoreRequestError('RATE_LIMITED', `Too many requests for ${this.name}/${key}`);
    }
    this.lastCallAt.set(key, now);
  }
}

/**
 * Hands out one MemoryKeyValueStore per name and keeps returning the same instance.
 */
export class MemoryStoreProvider implements IStoreProvider {
  private readonly stores: Map<string, MemoryKeyValueStore> = new Map();

  constructor(private readonly options: MemoryStoreOptions = {}) {}

  getStore(name: string): MemoryKeyValueStore {
    let store = this.stores.get(name);
    if (!store) {
      store = new MemoryKeyValueStore(name, this.options);
      this.stores.set(name, store);
    }
    return store;
  }
}
