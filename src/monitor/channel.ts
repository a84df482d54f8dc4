/**
 * Bounded single-consumer queue, consumed with `for await`.
 *
 * Producers call `offer`, which never blocks: it returns false when the queue
 * is full or closed. Closing ends the iteration and discards queued items.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
    private queue: T[] = [];
    private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
    private closed = false;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.queue.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    offer(item: T): boolean {
        if (this.closed) return false;

        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ done: false, value: item });
            return true;
        }

        if (this.queue.length >= this.capacity) {
            return false;
        }

        this.queue.push(item);
        return true;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.queue = [];

        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ done: true, value: undefined });
        }
    }

    next(): Promise<IteratorResult<T, undefined>> {
        if (this.queue.length > 0) {
            const value = this.queue[0];
            this.queue.splice(0, 1);
            return Promise.resolve({ done: false, value });
        }

        if (this.closed) {
            return Promise.resolve({ done: true, value: undefined });
        }

        if (this.waiter) {
            return Promise.reject(new Error('BoundedChannel supports a single consumer'));
        }

        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return { next: () => this.next() };
    }
}
