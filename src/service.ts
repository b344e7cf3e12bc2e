import type { Socket } from 'net';
import { bufferPool, type BufferPool } from './buffer-pool';
import type { ServerCipher } from './cipher';
import { Conn } from './conn';
import { ConnectionHandler } from './connection-handler';
import { debugLog, type DebugLog } from './debug';
import { ListenerClosedError, TimeoutError, errorMessage } from './errors';
import type { Listener } from './listener';
import { noopTrafficListener, type TrafficListener } from './relay';
import { createWebSocketDialer, type TunnelDialer } from './tunnel';
import { WaitGroup } from './wait-group';

export interface ServiceOptions {
    dial?: TunnelDialer;
    debug?: boolean;
    /** Per-read deadline inside the relay loops. */
    readTimeoutMs?: number;
    /** Accept deadline; bounds how long a listener loop takes to notice `stop()`. */
    acceptTimeoutMs?: number;
    handshakeTimeoutMs?: number;
    pool?: BufferPool;
}

/**
 * Local SOCKS5 front end. `serve` runs one accept loop per listener; `stop` signals
 * every loop and relay, then waits for all of them to finish. A stopped Service
 * cannot be started again.
 */
export class Service {
    private readonly controller = new AbortController();
    private readonly tasks = new WaitGroup();
    private readonly dial: TunnelDialer;
    private readonly debug: boolean;
    private readonly log: DebugLog;
    private readonly readTimeoutMs: number;
    private readonly acceptTimeoutMs: number;
    private readonly handshakeTimeoutMs: number;
    private readonly pool: BufferPool;
    private trafficListener: TrafficListener = noopTrafficListener;

    constructor(private readonly serverCipher: ServerCipher, options: ServiceOptions = {}) {
        this.dial = options.dial ?? createWebSocketDialer();
        this.debug = options.debug ?? false;
        this.log = debugLog(this.debug, '[Service]');
        this.readTimeoutMs = options.readTimeoutMs ?? 5000;
        this.acceptTimeoutMs = options.acceptTimeoutMs ?? 1000;
        this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 30000;
        this.pool = options.pool ?? bufferPool;
    }

    get stopping(): boolean {
        return this.controller.signal.aborted;
    }

    /** Number of accept loops, handlers and relays still running. */
    get activeTasks(): number {
        return this.tasks.size;
    }

    setTrafficListener(listener: TrafficListener | null): void {
        this.trafficListener = listener ?? noopTrafficListener;
    }

    /** Resolves once this listener's loop has closed it. */
    serve(listener: Listener): Promise<void> {
        const loop = this.acceptLoop(listener);
        this.tasks.add(loop);
        return loop;
    }

    async stop(): Promise<void> {
        this.controller.abort();
        await this.tasks.wait();
    }

    private async acceptLoop(listener: Listener): Promise<void> {
        const { signal } = this.controller;
        for (;;) {
            if (signal.aborted) {
                this.log('stopping listening on', listener.address);
                listener.close();
                return;
            }

            let socket: Socket;
            try {
                socket = await listener.accept(Date.now() + this.acceptTimeoutMs);
            } catch (err) {
                if (err instanceof TimeoutError) continue;
                if (err instanceof ListenerClosedError) {
                    this.log('listener closed:', listener.address);
                    return;
                }
                console.error('[Service] accept:', errorMessage(err));
                continue;
            }

            this.log(`socks connect from ${socket.remoteAddress}:${socket.remotePort}`);
            const handler = new ConnectionHandler(new Conn(socket), {
                serverCipher: this.serverCipher,
                dial: this.dial,
                describe: this.debug,
                handshakeTimeoutMs: this.handshakeTimeoutMs,
                signal,
                pool: this.pool,
                readTimeoutMs: this.readTimeoutMs,
                traffic: this.trafficListener,
                log: debugLog(this.debug),
                spawn: (task) => this.tasks.add(task),
            });
            this.tasks.add(handler.run());
        }
    }
}
