const INITIAL_CAPACITY = 1024;

/**
 * Append-only UTF-8 byte buffer. Storage is kept across `reset()` so a batch
 * reuses it between flush cycles.
 */
export class EventBuffer {
    private bytes: Buffer;
    private used = 0;

    constructor(initialCapacity: number = INITIAL_CAPACITY) {
        this.bytes = Buffer.allocUnsafe(Math.max(initialCapacity, 16));
    }

    get length(): number {
        return this.used;
    }

    write(text: string): void {
        const needed = Buffer.byteLength(text, 'utf8');
        this.ensureCapacity(this.used + needed);
        this.used += this.bytes.write(text, this.used, 'utf8');
    }

    /**
     * Drops everything written after `length` bytes.
     */
    truncate(length: number): void {
        if (length < 0 || length > this.used) {
            throw new RangeError(`Cannot truncate buffer of ${this.used} bytes to ${length}`);
        }
        this.used = length;
    }

    reset(): void {
        this.used = 0;
    }

    /**
     * Copies the written bytes out; later writes do not affect the copy.
     */
    snapshot(): Uint8Array {
        return Buffer.from(this.bytes.subarray(0, this.used));
    }

    toString(): string {
        return this.bytes.toString('utf8', 0, this.used);
    }

    private ensureCapacity(required: number): void {
        if (required <= this.bytes.length) return;

        let capacity = this.bytes.length * 2;
        while (capacity < required) capacity *= 2;

        const grown = Buffer.allocUnsafe(capacity);
        this.bytes.copy(grown, 0, 0, this.used);
        this.bytes = grown;
    }
}
