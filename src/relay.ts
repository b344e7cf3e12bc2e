import type { BufferPool } from './buffer-pool';
import type { Conn } from './conn';
import type { DebugLog } from './debug';
import { TimeoutError, errorMessage } from './errors';

/** outbound: client to tunnel; inbound: tunnel to client. */
export type Direction = 'outbound' | 'inbound';

/** Called once per successful relay write; shared by every connection of a Service. */
export interface TrafficListener {
    sent(bytes: number): void;
    received(bytes: number): void;
}

export const noopTrafficListener: TrafficListener = {
    sent() { },
    received() { },
};

export class TrafficCounter implements TrafficListener {
    sentBytes = 0;
    receivedBytes = 0;

    sent(bytes: number): void {
        this.sentBytes += bytes;
    }

    received(bytes: number): void {
        this.receivedBytes += bytes;
    }
}

export interface RelayOptions {
    signal: AbortSignal;
    pool: BufferPool;
    /** Bounds each blocking read so the loop re-checks `signal`. */
    readTimeoutMs: number;
    traffic: TrafficListener;
    log: DebugLog;
}

/**
 * Copies `src` into `dst` until EOF, a read or write error, or shutdown, then closes
 * `dst`. `src` is left open: the relay running the other direction closes it.
 * Unread data is dropped when shutdown is observed.
 */
export async function relay(src: Conn, dst: Conn, direction: Direction, options: RelayOptions): Promise<void> {
    const { signal, pool, readTimeoutMs, traffic, log } = options;
    const buf = pool.get();
    try {
        for (;;) {
            if (signal.aborted) return;

            let n: number;
            try {
                n = await src.read(buf, Date.now() + readTimeoutMs);
            } catch (err) {
                if (err instanceof TimeoutError) continue;
                log(`${direction} read:`, errorMessage(err));
                return;
            }
            if (n === 0) return;

            try {
                await dst.write(buf.subarray(0, n));
            } catch (err) {
                log(`${direction} write:`, errorMessage(err));
                return;
            }

            if (direction === 'outbound') traffic.sent(n);
            else traffic.received(n);
        }
    } finally {
        pool.put(buf);
        dst.close();
    }
}
