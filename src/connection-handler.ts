import type { ServerCipher } from './cipher';
import type { Conn } from './conn';
import type { DebugLog } from './debug';
import { errorMessage } from './errors';
import { relay, type RelayOptions } from './relay';
import { CONNECTION_ESTABLISHED, negotiate, readRequest } from './socks5';
import type { TunnelDialer } from './tunnel';

export type ConnectionState =
    | 'accepted'
    | 'handshaking'
    | 'request-parsing'
    | 'confirm-sent'
    | 'relaying'
    | 'closed'
    | 'error';

export interface HandlerContext extends RelayOptions {
    serverCipher: ServerCipher;
    dial: TunnelDialer;
    /** Decode the destination into "host:port" for diagnostics. */
    describe: boolean;
    /** Bounds the handshake and request reads together. */
    handshakeTimeoutMs: number;
    /** Registers a concurrently running task with the owning Service. */
    spawn(task: Promise<void>): void;
}

/** Drives one accepted client from SOCKS5 negotiation to the end of the relay. */
export class ConnectionHandler {
    private current: ConnectionState = 'accepted';

    constructor(private readonly client: Conn, private readonly ctx: HandlerContext) { }

    get state(): ConnectionState {
        return this.current;
    }

    /** Never rejects: failures end this connection only. */
    async run(): Promise<void> {
        const { ctx, client } = this;
        const log = ctx.log;

        // Shutdown must not wait out a handshake deadline.
        const onAbort = () => client.close();
        ctx.signal.addEventListener('abort', onAbort, { once: true });

        let remote: Conn;
        let host: string;
        try {
            if (ctx.signal.aborted) client.close();
            const deadline = Date.now() + ctx.handshakeTimeoutMs;

            this.transition('handshaking');
            await negotiate(client, deadline);

            this.transition('request-parsing');
            const request = await readRequest(client, deadline, ctx.describe);
            host = request.host ?? '';

            // Reply before dialing to save a round trip; if the dial fails the
            // client sees the connection reset instead of a SOCKS error.
            try {
                await client.write(CONNECTION_ESTABLISHED);
            } catch (err) {
                log('send connection confirmation:', errorMessage(err));
            }
            this.transition('confirm-sent');

            log(`connected to ${host} via ${ctx.serverCipher.server}`);
            remote = await ctx.dial(request.rawAddress, ctx.serverCipher.server, ctx.serverCipher.cipher.copy(), ctx.signal);
        } catch (err) {
            this.fail(err);
            return;
        } finally {
            ctx.signal.removeEventListener('abort', onAbort);
        }

        this.transition('relaying');
        const inbound = relay(remote, client, 'inbound', ctx);
        ctx.spawn(inbound);
        await relay(client, remote, 'outbound', ctx);
        await inbound;

        client.close();
        this.transition('closed');
        log('closed connection to', host);
    }

    private transition(next: ConnectionState): void {
        this.ctx.log(`${this.client.remoteAddress} ${this.current} -> ${next}`);
        this.current = next;
    }

    private fail(err: unknown): void {
        this.client.close();
        this.ctx.log(`${this.current} failed:`, errorMessage(err));
        this.current = 'error';
    }
}
