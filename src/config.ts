import { ConfigError } from './errors';

export interface Config {
    HOST: string;
    PORTS: number[];
    SERVER: string;
    CIPHER: string;
    DEBUG: boolean;
    READ_TIMEOUT: number;
    ACCEPT_TIMEOUT: number;
    HANDSHAKE_TIMEOUT: number;
    DIAL_TIMEOUT: number;
}

/** Reads settings from `env`; `.env` is loaded into `process.env` by the CLI entry. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return {
        HOST: env.HOST || '127.0.0.1',
        PORTS: (env.PORT || '1080').split(',').map((p) => parsePort(p.trim())),
        SERVER: parseServer(env.SERVER || 'ws://127.0.0.1:8388'),
        CIPHER: env.CIPHER || 'plain',
        DEBUG: env.DEBUG === 'true' || env.DEBUG === '1',
        READ_TIMEOUT: parseTimeout('READ_TIMEOUT', env.READ_TIMEOUT, 5000),
        ACCEPT_TIMEOUT: parseTimeout('ACCEPT_TIMEOUT', env.ACCEPT_TIMEOUT, 1000),
        HANDSHAKE_TIMEOUT: parseTimeout('HANDSHAKE_TIMEOUT', env.HANDSHAKE_TIMEOUT, 30000),
        DIAL_TIMEOUT: parseTimeout('DIAL_TIMEOUT', env.DIAL_TIMEOUT, 10000),
    };
}

function parsePort(value: string): number {
    const port = value === '' ? NaN : Number(value);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError('PORT', `invalid port "${value}"`);
    }
    return port;
}

function parseServer(value: string): string {
    if (!/^wss?:\/\//.test(value)) {
        throw new ConfigError('SERVER', `expected a ws:// or wss:// URL, got "${value}"`);
    }
    return value;
}

function parseTimeout(name: string, value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const ms = Number(value);
    if (!Number.isInteger(ms) || ms <= 0) {
        throw new ConfigError(name, `expected a positive number of milliseconds, got "${value}"`);
    }
    return ms;
}
