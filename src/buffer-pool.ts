/** 2-byte length + 10-byte auth tag + 4096 bytes of payload. */
export const POOL_BUFFER_SIZE = 4108;
export const POOL_CAPACITY = 2048;

/**
 * Bounded free list of equally sized buffers. `get` hands out a free buffer or
 * allocates one; `put` keeps it for reuse unless the list is already full, in which
 * case the buffer is left to the garbage collector.
 */
export class BufferPool {
    private readonly free: Buffer[] = [];

    constructor(
        readonly bufferSize = POOL_BUFFER_SIZE,
        readonly capacity = POOL_CAPACITY,
    ) { }

    get size(): number {
        return this.free.length;
    }

    get(): Buffer {
        return this.free.pop() ?? Buffer.allocUnsafe(this.bufferSize);
    }

    put(buf: Buffer): void {
        if (buf.length !== this.bufferSize) {
            throw new RangeError(`buffer of ${buf.length} bytes put into a pool of ${this.bufferSize}-byte buffers`);
        }
        if (this.free.length < this.capacity) this.free.push(buf);
    }
}

export const bufferPool = new BufferPool();
