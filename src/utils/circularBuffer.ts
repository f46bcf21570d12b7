/**
 * Fixed-capacity FIFO ring. When full, `add` overwrites the oldest entry.
 */
export class CircularBuffer<T> implements Iterable<T> {
    private readonly buffer: (T | undefined)[];
    private head = 0;
    private size = 0;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(
                `CircularBuffer capacity must be a positive integer, got ${capacity}`
            );
        }
        this.buffer = new Array<T | undefined>(capacity);
    }

    /**
     * Appends an item, returning the evicted one when the ring was full.
     */
    add(item: T): T | undefined {
        const tail = (this.head + this.size) % this.capacity;
        if (this.size < this.capacity) {
            this.buffer[tail] = item;
            this.size++;
            return undefined;
        }

        const evicted = this.buffer[this.head];
        this.buffer[this.head] = item;
        this.head = (this.head + 1) % this.capacity;
        return evicted;
    }

    /**
     * Random-access by relative index (0 = oldest, length-1 = newest).
     */
    at(index: number): T | undefined {
        if (index < 0 || index >= this.size) return undefined;
        return this.buffer[(this.head + index) % this.capacity];
    }

    toArray(): T[] {
        return this.filter(() => true);
    }

    filter(predicate: (item: T) => boolean): T[] {
        const result: T[] = [];
        for (let i = 0; i < this.size; i++) {
            const item = this.at(i);
            if (item !== undefined && predicate(item)) {
                result.push(item);
            }
        }
        return result;
    }

    get length(): number {
        return this.size;
    }

    get maxLength(): number {
        return this.capacity;
    }

    /**
     * Allow use in for-of and spread operator.
     */
    [Symbol.iterator](): Iterator<T> {
        return this.toArray()[Symbol.iterator]();
    }
}
