/**
 * @module
 * Queues connecting the dispatcher, the workers and the print server.
 */

/**
 * A queue that can be consumed by waiting on it.
 */
export interface TaskQueue<T> {
    /** Removes and returns the oldest item, waiting until one is available. */
    get(): Promise<T>;
    put(item: T): void;
}

interface Waiter<T> {
    resolve(item: T): void;
}

/**
 * FIFO queue whose consumers wait for items.
 * Items go to waiting consumers in the order they started waiting.
 */
export class AsyncQueue<T> implements TaskQueue<T> {
    private readonly items: T[];
    private readonly waiters: Array<Waiter<T>>;

    constructor() {
        this.items = [];
        this.waiters = [];
    }

    /** Number of queued items. */
    get size(): number {
        return this.items.length;
    }

    put(item: T): void {
        const waiter = this.waiters.shift();
        if (waiter)
            waiter.resolve(item);
        else
            this.items.push(item);
    }

    get(): Promise<T> {
        if (this.items.length > 0)
            return Promise.resolve(this.items.splice(0, 1)[0]);
        return new Promise<T>(resolve => {
            this.waiters.push({ resolve });
        });
    }

    /**
     * Like {@link get}, but resolves to `undefined` once `signal` is aborted.
     * An aborted consumer never receives an item.
     */
    take(signal: AbortSignal): Promise<T | undefined> {
        if (signal.aborted)
            return Promise.resolve(undefined);
        if (this.items.length > 0)
            return Promise.resolve(this.items.splice(0, 1)[0]);
        return new Promise<T | undefined>(resolve => {
            const waiter: Waiter<T> = {
                resolve: item => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(item);
                },
            };
            const onAbort = (): void => {
                const index = this.waiters.indexOf(waiter);
                if (index >= 0)
                    this.waiters.splice(index, 1);
                resolve(undefined);
            };
            signal.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    /**
     * Removes and returns the oldest item without waiting, or `undefined` when empty.
     */
    tryGet(): T | undefined {
        return this.items.shift();
    }
}
