import net from 'net';
import { ListenerClosedError } from './errors';
import { Notifier } from './notifier';

interface Pending {
    socket: net.Socket;
    onError: () => void;
}

/** Turns a net.Server's 'connection' events into awaitable accepts with a deadline. */
export class Listener {
    private readonly backlog: Pending[] = [];
    private readonly activity = new Notifier();
    private failure: Error | null = null;
    private closedFlag = false;

    constructor(readonly server: net.Server) {
        server.on('connection', (socket) => {
            if (this.closedFlag) {
                socket.destroy();
                return;
            }
            const pending: Pending = {
                socket,
                onError: () => {
                    // Errored before it was accepted: drop it.
                    const i = this.backlog.indexOf(pending);
                    if (i >= 0) this.backlog.splice(i, 1);
                    socket.destroy();
                },
            };
            socket.once('error', pending.onError);
            this.backlog.push(pending);
            this.activity.notify();
        });
        server.on('error', (err) => {
            this.failure = err;
            this.activity.notify();
        });
    }

    static listen(port: number, host?: string): Promise<Listener> {
        const server = net.createServer();
        return new Promise((resolve, reject) => {
            server.once('error', reject);
            server.listen(port, host, () => {
                server.off('error', reject);
                resolve(new Listener(server));
            });
        });
    }

    get closed(): boolean {
        return this.closedFlag;
    }

    get port(): number {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address.port : 0;
    }

    get address(): string {
        const address = this.server.address();
        if (address === null) return 'unbound';
        if (typeof address === 'string') return address;
        const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
        return `${host}:${address.port}`;
    }

    /** Rejects with TimeoutError once `deadline` (epoch ms) passes without a connection. */
    async accept(deadline?: number): Promise<net.Socket> {
        for (;;) {
            const pending = this.backlog.shift();
            if (pending) {
                pending.socket.off('error', pending.onError);
                return pending.socket;
            }
            if (this.closedFlag) throw new ListenerClosedError();
            if (this.failure) {
                const err = this.failure;
                this.failure = null;
                throw err;
            }
            await this.activity.wait(deadline);
        }
    }

    close(): void {
        if (this.closedFlag) return;
        this.closedFlag = true;
        this.server.close();
        for (const { socket } of this.backlog.splice(0)) socket.destroy();
        this.activity.notify();
    }
}
