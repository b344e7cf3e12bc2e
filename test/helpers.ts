import net from 'net';
import { Duplex } from 'stream';
import { Conn } from '../src/conn';

/** One end of an in-memory socket pair. Destroying or ending one end ends the other. */
export class PipeEnd extends Duplex {
    peer: PipeEnd | null = null;
    private eof = false;

    _read(): void { }

    _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.peer?.deliver(chunk);
        callback();
    }

    _final(callback: (error?: Error | null) => void): void {
        this.peer?.finish();
        callback();
    }

    _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
        this.peer?.finish();
        callback(error);
    }

    deliver(chunk: Buffer): void {
        if (!this.eof && !this.destroyed) this.push(chunk);
    }

    finish(): void {
        if (this.eof || this.destroyed) return;
        this.eof = true;
        this.push(null);
    }
}

export function duplexPair(): [PipeEnd, PipeEnd] {
    const a = new PipeEnd();
    const b = new PipeEnd();
    a.peer = b;
    b.peer = a;
    return [a, b];
}

export function connPair(): [Conn, Conn] {
    const [a, b] = duplexPair();
    return [new Conn(a), new Conn(b)];
}

export function portBytes(port: number): Buffer {
    const buf = Buffer.alloc(2);
    buf.writeUInt16BE(port);
    return buf;
}

export function buildRequest(cmd: number, atyp: number, addr: Buffer, port: number): Buffer {
    return Buffer.concat([Buffer.from([0x05, cmd, 0x00, atyp]), addr, portBytes(port)]);
}

export function domainAddr(domain: string): Buffer {
    return Buffer.concat([Buffer.from([domain.length]), Buffer.from(domain, 'ascii')]);
}

/** Collects everything a socket or stream emits. */
export function collect(stream: Duplex): { data: () => Buffer; ended: Promise<void> } {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    const ended = new Promise<void>((resolve) => {
        stream.once('end', () => resolve());
        stream.once('close', () => resolve());
    });
    stream.resume();
    return { data: () => Buffer.concat(chunks), ended };
}

/** Resolves with the next `length` bytes the socket receives. */
export function readBytes(socket: net.Socket, length: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        let received = Buffer.alloc(0);
        const onData = (chunk: Buffer) => {
            received = Buffer.concat([received, chunk]);
            if (received.length >= length) {
                socket.off('data', onData);
                socket.off('close', onClose);
                socket.pause();
                if (received.length > length) socket.unshift(received.subarray(length));
                resolve(received.subarray(0, length));
            }
        };
        const onClose = () => reject(new Error(`socket closed after ${received.length} of ${length} bytes`));
        socket.on('data', onData);
        socket.once('close', onClose);
        socket.resume();
    });
}

export function connect(port: number): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
        const socket = net.createConnection(port, '127.0.0.1', () => {
            socket.off('error', reject);
            // A reset from the proxy side ends the socket like a close does.
            socket.on('error', () => socket.destroy());
            resolve(socket);
        });
        socket.once('error', reject);
    });
}

export function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    return new Promise((resolve, reject) => {
        const poll = () => {
            if (predicate()) resolve();
            else if (Date.now() > deadline) reject(new Error('condition not met in time'));
            else setTimeout(poll, 10);
        };
        poll();
    });
}

/** Accepts TCP connections and never answers the upgrade request. */
export function startSilentServer(): Promise<{ server: net.Server; url: string; close: () => Promise<void> }> {
    const sockets: net.Socket[] = [];
    const server = net.createServer((socket) => {
        socket.on('error', () => socket.destroy());
        sockets.push(socket);
    });
    return new Promise((resolve) => {
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            const port = address === null || typeof address === 'string' ? 0 : address.port;
            const close = () => new Promise<void>((done) => {
                sockets.forEach((socket) => socket.destroy());
                server.close(() => done());
            });
            resolve({ server, url: `ws://127.0.0.1:${port}`, close });
        });
    });
}
