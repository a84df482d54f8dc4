/**
 * Fixed-capacity FIFO store. Pushing past capacity evicts the oldest entry.
 *
 * Backed by a circular array so that `push` stays O(1) once the buffer is full.
 */
export class RingBuffer<T> {
    private items: T[] = [];
    private head = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
        }
    }

    get length(): number {
        return this.items.length;
    }

    /**
     * Append an item, returning the evicted one when the buffer was full.
     */
    push(item: T): T | undefined {
        if (this.items.length < this.capacity) {
            this.items.push(item);
            return undefined;
        }

        const evicted = this.items[this.head];
        this.items[this.head] = item;
        this.head = (this.head + 1) % this.capacity;
        return evicted;
    }

    /**
     * Last `n` entries, oldest first. Does not mutate the buffer.
     */
    recent(n: number): T[] {
        const count = Math.max(0, Math.min(Math.floor(n), this.items.length));
        return this.toArray().slice(this.items.length - count);
    }

    latest(): T | undefined {
        if (this.items.length === 0) return undefined;
        const index = (this.head + this.items.length - 1) % this.items.length;
        return this.items[index];
    }

    /**
     * Snapshot of every entry, oldest first.
     */
    toArray(): T[] {
        if (this.head === 0) {
            return this.items.slice();
        }
        return [...this.items.slice(this.head), ...this.items.slice(0, this.head)];
    }

    clear(): void {
        this.items = [];
        this.head = 0;
    }
}
