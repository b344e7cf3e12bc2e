#!/usr/bin/env node
import dotenv from 'dotenv';
import { createCipher } from './cipher';
import { loadConfig } from './config';
import { Listener } from './listener';
import { TrafficCounter } from './relay';
import { Service } from './service';
import { createWebSocketDialer } from './tunnel';

export * from './buffer-pool';
export * from './cipher';
export * from './config';
export * from './conn';
export * from './connection-handler';
export * from './debug';
export * from './errors';
export * from './listener';
export * from './relay';
export * from './service';
export * from './socks5';
export * from './tunnel';
export * from './wait-group';

async function main() {
    dotenv.config();
    const config = loadConfig();
    const service = new Service(
        { server: config.SERVER, cipher: createCipher(config.CIPHER) },
        {
            dial: createWebSocketDialer({ handshakeTimeoutMs: config.DIAL_TIMEOUT }),
            debug: config.DEBUG,
            readTimeoutMs: config.READ_TIMEOUT,
            acceptTimeoutMs: config.ACCEPT_TIMEOUT,
            handshakeTimeoutMs: config.HANDSHAKE_TIMEOUT,
        },
    );
    const traffic = new TrafficCounter();
    service.setTrafficListener(traffic);

    const listeners = await Promise.all(config.PORTS.map((port) => Listener.listen(port, config.HOST)));
    for (const listener of listeners) {
        console.log(`socks-tunnel listening on ${listener.address}, tunnel ${config.SERVER} (${config.CIPHER})`);
    }

    const shutdown = (signal: NodeJS.Signals) => {
        console.log(`${signal} received, draining connections...`);
        service.stop().then(
            () => {
                console.log(`Stopped. sent ${traffic.sentBytes} bytes, received ${traffic.receivedBytes} bytes`);
                process.exit(0);
            },
            (err: unknown) => {
                console.error('Shutdown failed:', err);
                process.exit(1);
            },
        );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await Promise.all(listeners.map((listener) => service.serve(listener)));
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error(err);
        process.exit(1);
    });
}
