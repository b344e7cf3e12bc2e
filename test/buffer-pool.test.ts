import { describe, expect, it } from 'vitest';
import { BufferPool, POOL_BUFFER_SIZE, bufferPool } from '../src/buffer-pool';

describe('BufferPool', () => {
    it('hands out buffers of the configured size', () => {
        const pool = new BufferPool(32, 2);
        expect(pool.get().length).toBe(32);
        expect(bufferPool.get().length).toBe(POOL_BUFFER_SIZE);
    });

    it('reuses a returned buffer', () => {
        const pool = new BufferPool(16, 2);
        const buf = pool.get();
        pool.put(buf);
        expect(pool.size).toBe(1);
        expect(pool.get()).toBe(buf);
        expect(pool.size).toBe(0);
    });

    it('keeps at most `capacity` free buffers', () => {
        const pool = new BufferPool(8, 2);
        const bufs = [pool.get(), pool.get(), pool.get()];
        bufs.forEach((b) => pool.put(b));
        expect(pool.size).toBe(2);
    });

    it('rejects buffers of the wrong size', () => {
        const pool = new BufferPool(8, 2);
        expect(() => pool.put(Buffer.alloc(4))).toThrow(RangeError);
        expect(pool.size).toBe(0);
    });
});
