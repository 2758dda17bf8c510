/**
 * Tracks setTimeout/setInterval handles so a component can dispose of all of them at once.
 */
export class TimerRegistry {
    private timeouts: Map<string, NodeJS.Timeout> = new Map();
    private intervals: Map<string, NodeJS.Timeout> = new Map();
    private pendingDelays: Map<string, () => void> = new Map();
    private idCounter = 0;

    private generateId(prefix: string): string {
        return `${prefix}-${++this.idCounter}`;
    }

    /**
     * Register a timeout. A timeout registered under an existing id replaces it.
     * @returns The id used to identify this timeout
     */
    setTimeout(callback: () => void, delayMs: number, id?: string): string {
        const timerId = id ?? this.generateId('timeout');
        this.clearTimeout(timerId);

        const handle = setTimeout(() => {
            this.timeouts.delete(timerId);
            callback();
        }, delayMs);

        this.timeouts.set(timerId, handle);
        return timerId;
    }

    /**
     * Promise form of setTimeout. Resolves early if the registry is flushed.
     */
    delay(delayMs: number): Promise<void> {
        return new Promise((resolve) => {
            const id = this.setTimeout(() => {
                this.pendingDelays.delete(id);
                resolve();
            }, delayMs, this.generateId('delay'));
            this.pendingDelays.set(id, resolve);
        });
    }

    setInterval(callback: () => void, intervalMs: number, id?: string): string {
        const timerId = id ?? this.generateId('interval');
        this.clearInterval(timerId);

        const handle = setInterval(callback, intervalMs);
        this.intervals.set(timerId, handle);
        return timerId;
    }

    clearTimeout(id: string): boolean {
        const handle = this.timeouts.get(id);
        if (handle === undefined) {
            return false;
        }
        clearTimeout(handle);
        this.timeouts.delete(id);
        this.pendingDelays.delete(id);
        return true;
    }

    clearInterval(id: string): boolean {
        const handle = this.intervals.get(id);
        if (handle === undefined) {
            return false;
        }
        clearInterval(handle);
        this.intervals.delete(id);
        return true;
    }

    /**
     * Resolve every pending delay() immediately, leaving other timers alone.
     */
    flushDelays(): number {
        const pending = Array.from(this.pendingDelays.entries());
        for (const [id, resolve] of pending) {
            this.clearTimeout(id);
            resolve();
        }
        return pending.length;
    }

    /**
     * Clear all registered timers (for shutdown). Pending delays are resolved.
     */
    clear(): { timeoutsCleared: number; intervalsCleared: number } {
        this.flushDelays();
        const timeoutsCleared = this.timeouts.size;
        const intervalsCleared = this.intervals.size;

        for (const handle of this.timeouts.values()) {
            clearTimeout(handle);
        }
        this.timeouts.clear();

        for (const handle of this.intervals.values()) {
            clearInterval(handle);
        }
        this.intervals.clear();

        return { timeoutsCleared, intervalsCleared };
    }

    getActiveCount(): { timeouts: number; intervals: number } {
        return {
            timeouts: this.timeouts.size,
            intervals: this.intervals.size,
        };
    }
}
