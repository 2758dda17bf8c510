export type Listener<TArgs extends unknown[]> = (...args: TArgs) => void | Promise<void>;

export interface Subscription {
  readonly id: number;
  unsubscribe(): void;
}

export type ListenerErrorHandler = (err: unknown, notifier: string) => void;

/**
 * Multi-listener notifier.
 *
 * Listeners are kept in a registry keyed by subscription id. `notify` calls a snapshot of
 * the listeners registered at the time of the call and never waits for them: a listener
 * that throws, or returns a promise that rejects, is reported to `onListenerError` and the
 * remaining listeners still run.
 */
export class Notifier<TArgs extends unknown[] = []> {
  private readonly listeners: Map<number, Listener<TArgs>> = new Map();
  private nextId = 1;

  constructor(
    private readonly name: string,
    private readonly onListenerError: ListenerErrorHandler = () => {}
  ) {}

  subscribe(listener: Listener<TArgs>): Subscription {
    const id = this.nextId++;
    this.listeners.set(id, listener);
    return {
      id,
      unsubscribe: () => {
        this.listeners.delete(id);
      },
    };
  }

  notify(...args: TArgs): void {
    for (const listener of Array.from(this.listeners.values())) {
      try {
        const result = listener(...args);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.onListenerError(err, this.name));
        }
      } catch (err) {
        this.onListenerError(err, this.name);
      }
    }
  }

  clear(): void {
    this.listeners.clear();
  }

  get size(): number {
    return this.listeners.size;
  }
}
