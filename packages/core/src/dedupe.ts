export const DEFAULT_DEDUP_CAPACITY = 4096;

/**
 * Bounded most-recently-seen set of message ids. Oldest ids are evicted
 * first once the capacity is reached.
 */
export class DedupCache {
    private seen = new Set<string>();
    private order: string[] = []; // insertion order, for eviction
    private head = 0;

    constructor(private readonly capacity: number = DEFAULT_DEDUP_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Dedup capacity must be a positive integer, got ${capacity}`);
        }
    }

    /** True if the id was seen before; otherwise records it and returns false. */
    check(id: string): boolean {
        if (this.seen.has(id)) return true;
        this.seen.add(id);
        this.order.push(id);

        while (this.seen.size > this.capacity) {
            const oldest = this.order[this.head++];
            this.seen.delete(oldest);
        }
        // Compact once the consumed prefix dominates the array
        if (this.head > this.capacity) {
            this.order = this.order.slice(this.head);
            this.head = 0;
        }
        return false;
    }

    has(id: string): boolean {
        return this.seen.has(id);
    }

    get size(): number {
        return this.seen.size;
    }
}
