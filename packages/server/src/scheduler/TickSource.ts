import { Notifier } from '@leasehold/core';
import { logListenerError } from '../utils/logger';
import { TimerRegistry } from '../utils/TimerRegistry';

export type TickListener = () => void;

/**
 * Process-wide periodic callback driving auto-save, force-load polling,
 * write-queue sweeps and health evaluation.
 */
export interface TickSource {
  /** @returns Unsubscribe function */
  onTick(listener: TickListener): () => void;
  start(): void;
  stop(): void;
}

abstract class BaseTickSource implements TickSource {
  protected readonly listeners = new Notifier<[]>('tick', logListenerError);

  onTick(listener: TickListener): () => void {
    const subscription = this.listeners.subscribe(listener);
    return () => subscription.unsubscribe();
  }

  abstract start(): void;
  abstract stop(): void;
}

/**
 * Fires every `intervalSeconds` on a timer.
 */
export class IntervalTickSource extends BaseTickSource {
  private readonly timers = new TimerRegistry();
  private timerId: string | null = null;

  constructor(private readonly intervalSeconds: number) {
    super();
  }

  start(): void {
    if (this.timerId !== null) return;
    this.timerId = this.timers.setInterval(() => this.listeners.notify(), this.intervalSeconds * 1000, 'tick');
  }

  stop(): void {
    this.timers.clear();
    this.timerId = null;
  }
}

/**
 * Fires only when tick() is called. For tests and hosts that own their frame loop.
 */
export class ManualTickSource extends BaseTickSource {
  private running = true;
  private ticks = 0;

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  tick(count = 1): void {
    for (let i = 0; i < count && this.running; i++) {
      this.ticks++;
      this.listeners.notify();
    }
  }

  get tickCount(): number {
    return this.ticks;
  }
}

/**
 * Resolves true after `count` ticks, or false as soon as any signal aborts.
 */
export function waitForTicks(
  source: TickSource,
  count: number,
  signals: ReadonlyArray<AbortSignal | undefined> = []
): Promise<boolean> {
  const active = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (active.some((signal) => signal.aborted)) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    let remaining = count;

    const finish = (result: boolean) => {
      unsubscribe();
      for (const signal of active) {
        signal.removeEventListener('abort', onAbort);
      }
      resolve(result);
    };
    const onAbort = () => finish(false);

    const unsubscribe = source.onTick(() => {
      remaining--;
      if (remaining <= 0) {
        finish(true);
      }
    });
    for (const signal of active) {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}
