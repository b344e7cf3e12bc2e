import { Socket } from 'net';
import type { Duplex } from 'stream';
import { ConnClosedError, UnexpectedEOFError } from './errors';
import { Notifier } from './notifier';

const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

/**
 * Pull-style view over a Node duplex stream.
 *
 * Incoming chunks are queued until `read` takes them; the stream is paused while the
 * queue holds more than the high-water mark. Only one reader per Conn is expected,
 * which is how the relay uses it (one loop per direction).
 */
export class Conn {
    private chunks: Buffer[] = [];
    private buffered = 0;
    private ended = false;
    private failure: Error | null = null;
    private closedFlag = false;
    private readonly readable = new Notifier();

    constructor(
        protected readonly stream: Duplex,
        private readonly highWaterMark = DEFAULT_HIGH_WATER_MARK,
    ) {
        stream.on('data', (chunk: Buffer | string) => {
            this.push(this.decode(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
        });
        stream.on('end', () => this.finish());
        stream.on('close', () => this.finish());
        stream.on('error', (err: Error) => {
            this.failure = err;
            this.readable.notify();
        });
    }

    get closed(): boolean {
        return this.closedFlag;
    }

    get remoteAddress(): string {
        if (!(this.stream instanceof Socket) || this.stream.remoteAddress === undefined) return 'unknown';
        return `${this.stream.remoteAddress}:${this.stream.remotePort ?? ''}`;
    }

    /**
     * Copies queued bytes into `buf`. Resolves 0 at EOF; rejects with TimeoutError
     * once `deadline` (epoch ms) passes without data.
     */
    async read(buf: Buffer, deadline?: number): Promise<number> {
        while (this.buffered === 0) {
            if (this.closedFlag) throw new ConnClosedError();
            if (this.failure) throw this.failure;
            if (this.ended) return 0;
            await this.readable.wait(deadline);
        }

        let n = 0;
        while (n < buf.length && this.chunks.length > 0) {
            const head = this.chunks[0];
            const take = Math.min(head.length, buf.length - n);
            head.copy(buf, n, 0, take);
            n += take;
            if (take === head.length) {
                this.chunks.shift();
            } else {
                this.chunks[0] = head.subarray(take);
            }
        }
        this.buffered -= n;

        if (this.buffered < this.highWaterMark && this.stream.isPaused() && !this.stream.destroyed) {
            this.stream.resume();
        }
        return n;
    }

    /** Reads until at least `min` bytes are in `buf`; may read up to `buf.length`. */
    async readAtLeast(buf: Buffer, min: number, deadline?: number): Promise<number> {
        let n = 0;
        while (n < min) {
            const got = await this.read(buf.subarray(n), deadline);
            if (got === 0) throw new UnexpectedEOFError();
            n += got;
        }
        return n;
    }

    readFull(buf: Buffer, deadline?: number): Promise<number> {
        return this.readAtLeast(buf, buf.length, deadline);
    }

    /** Resolves once the stream has taken the chunk, so `chunk` may be reused afterwards. */
    write(chunk: Buffer): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.closedFlag || this.stream.destroyed) {
                reject(new ConnClosedError());
                return;
            }
            this.stream.write(this.encode(chunk), (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    close(): void {
        if (this.closedFlag) return;
        this.closedFlag = true;
        this.stream.destroy();
        this.readable.notify();
    }

    protected encode(chunk: Buffer): Buffer {
        return chunk;
    }

    protected decode(chunk: Buffer): Buffer {
        return chunk;
    }

    private push(chunk: Buffer): void {
        if (chunk.length === 0) return;
        this.chunks.push(chunk);
        this.buffered += chunk.length;
        if (this.buffered >= this.highWaterMark) this.stream.pause();
        this.readable.notify();
    }

    private finish(): void {
        this.ended = true;
        this.readable.notify();
    }
}
