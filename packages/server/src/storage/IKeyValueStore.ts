/**
 * One stored value together with the store-assigned version tag used for
 * optimistic concurrency.
 */
export interface StoreEntry {
  value: Uint8Array;
  version: number;
}

/**
 * Computes the next value from the current one. Returning `undefined` writes nothing.
 * May be invoked more than once for a single update when the store detects a
 * concurrent write and retries.
 */
export type StoreTransform = (current: StoreEntry | undefined) => Uint8Array | undefined;

/**
 * Remote key-value store contract (one instance per named store).
 *
 * Implementations are expected to:
 * - apply `update` as an atomic read-modify-write (compare-and-swap on `version`)
 * - rate-limit calls per key, failing with a retryable `RATE_LIMITED` StoreRequestError
 * - fail every request with a StoreRequestError carrying a StoreErrorCode
 */
export interface IKeyValueStore {
  readonly name: string;

  get(key: string): Promise<StoreEntry | undefined>;

  /**
   * @returns The entry after the update, or the unchanged current entry when the
   * transform wrote nothing
   */
  update(key: string, transform: StoreTransform): Promise<StoreEntry | undefined>;

  remove(key: string): Promise<void>;
}

/**
 * Resolves named stores, e.g. one per table or DataStore name.
 */
export interface IStoreProvider {
  getStore(name: string): IKeyValueStore;
}
