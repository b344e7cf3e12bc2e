import WebSocket, { createWebSocketStream } from 'ws';
import type { Duplex } from 'stream';
import type { Cipher } from './cipher';
import { Conn } from './conn';

/**
 * Opens a tunnel connection carrying `rawAddress` to `server`. The returned Conn is
 * ready to relay: encryption is applied inside it. Aborting `signal` abandons a
 * dial still in progress.
 */
export type TunnelDialer = (rawAddress: Buffer, server: string, cipher: Cipher, signal?: AbortSignal) => Promise<Conn>;

export class CipherConn extends Conn {
    constructor(stream: Duplex, private readonly cipher: Cipher) {
        super(stream);
    }

    protected encode(chunk: Buffer): Buffer {
        return this.cipher.encrypt(chunk);
    }

    protected decode(chunk: Buffer): Buffer {
        return this.cipher.decrypt(chunk);
    }
}

export interface WebSocketDialerOptions {
    handshakeTimeoutMs?: number;
}

/** Dials the tunnel over a WebSocket; the first binary payload is the raw address. */
export function createWebSocketDialer(options: WebSocketDialerOptions = {}): TunnelDialer {
    const { handshakeTimeoutMs = 10000 } = options;

    return (rawAddress, server, cipher, signal) => new Promise<Conn>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error(`[Tunnel] Dial to ${server} aborted`));
            return;
        }

        const ws = new WebSocket(server, { handshakeTimeout: handshakeTimeoutMs });

        const onError = (err: Error) => {
            signal?.removeEventListener('abort', onAbort);
            reject(new Error(`[Tunnel] Failed to connect to ${server}: ${err.message}`));
        };
        // terminate() during the handshake still emits 'error'; onError stays attached
        // for it and the promise is already settled by then.
        const onAbort = () => {
            ws.terminate();
            reject(new Error(`[Tunnel] Dial to ${server} aborted`));
        };
        ws.once('error', onError);
        signal?.addEventListener('abort', onAbort, { once: true });

        ws.once('open', () => {
            ws.off('error', onError);
            signal?.removeEventListener('abort', onAbort);
            const conn = new CipherConn(createWebSocketStream(ws), cipher);
            conn.write(rawAddress).then(
                () => resolve(conn),
                (err: unknown) => {
                    conn.close();
                    reject(err);
                },
            );
        });
    });
}
