/**
 * Test utilities: a controllable clock, bounded polling, and a harness that plays one
 * process (LeaseService + manual ticks) against a shared in-memory store.
 */

import { decodeRecord, type LeaseConfigInput, type StoredRecord } from '@leasehold/core';
import { LeaseService } from '../../LeaseService';
import type { LeaseStore } from '../../LeaseStore';
import { ManualTickSource } from '../../scheduler/TickSource';
import type { MemoryStoreProvider } from '../../storage/MemoryKeyValueStore';

export interface PollOptions {
  /** Max wait time in milliseconds (default: 2000) */
  timeoutMs?: number;
  /** Poll interval in milliseconds (default: 5) */
  intervalMs?: number;
  /** Description for error messages */
  description?: string;
}

/**
 * Poll until condition returns true.
 *
 * @throws Error on timeout
 */
export async function pollUntil(
  condition: () => boolean | Promise<boolean>,
  options: PollOptions = {}
): Promise<void> {
  const { timeoutMs = 2000, intervalMs = 5, description = 'condition' } = options;
  const startTime = Date.now();

  while (!(await condition())) {
    const elapsed = Date.now() - startTime;
    if (elapsed >= timeoutMs) {
      throw new Error(`pollUntil timed out after ${elapsed}ms waiting for ${description}`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * Let queued store calls and the promise chains behind them run to completion.
 * Each in-memory store call resolves on the next macrotask.
 */
export async function settle(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

/**
 * Tracks whether a promise has settled without awaiting it.
 */
export function track<T>(promise: Promise<T>): { readonly settled: boolean; promise: Promise<T> } {
  const state = { settled: false };
  promise.then(
    () => {
      state.settled = true;
    },
    () => {
      state.settled = true;
    }
  );
  return {
    get settled() {
      return state.settled;
    },
    promise,
  };
}

export class TestClock {
  now: number;

  constructor(start = 1_700_000_000_000) {
    this.now = start;
  }

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export interface PlayerData {
  coins: number;
  inventory: string[];
  settings: { music: boolean };
}

export const PLAYER_TEMPLATE: PlayerData = {
  coins: 0,
  inventory: [],
  settings: { music: true },
};

/**
 * No write cooldown, no backoff, one tick per polling step, three force-load steps.
 */
export const TEST_CONFIG: LeaseConfigInput = {
  remoteWriteCooldown: 0,
  forceLoadMaxSteps: 3,
  loadRepeatDelay: 1,
  tickInterval: 1,
  retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
};

export interface TestProcess {
  service: LeaseService;
  ticks: ManualTickSource;
  players: LeaseStore<PlayerData>;
}

export function createProcess(
  provider: MemoryStoreProvider,
  clock: TestClock,
  processId: string,
  config: LeaseConfigInput = {}
): TestProcess {
  const ticks = new ManualTickSource();
  const service = new LeaseService({
    stores: provider,
    ticks,
    clock: clock.read,
    session: { processId, jobId: 'job-1' },
    config: { ...TEST_CONFIG, ...config },
    random: () => 0.5,
  });
  service.start();
  return { service, ticks, players: service.getStore('players', PLAYER_TEMPLATE) };
}

/**
 * Decode what is stored under `key`, bypassing the write channel.
 */
export function readRecord(
  provider: MemoryStoreProvider,
  store: string,
  key: string
): StoredRecord<PlayerData> | undefined {
  const entry = provider.getStore(store).peek(key);
  return entry ? decodeRecord<PlayerData>(store, key, entry.value) : undefined;
}
