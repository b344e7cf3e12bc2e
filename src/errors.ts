export type SocksErrorCode =
    | 'UnsupportedVersion'
    | 'ExtraData'
    | 'UnsupportedCommand'
    | 'UnsupportedAddressType';

export class SocksError extends Error {
    readonly code: SocksErrorCode;

    constructor(code: SocksErrorCode, message: string) {
        super(message);
        this.name = 'SocksError';
        this.code = code;
    }
}

/** A read or accept passed its deadline. Callers poll again; this is not a failure. */
export class TimeoutError extends Error {
    constructor(message = 'i/o timeout') {
        super(message);
        this.name = 'TimeoutError';
    }
}

export class ConnClosedError extends Error {
    constructor(message = 'use of closed connection') {
        super(message);
        this.name = 'ConnClosedError';
    }
}

export class UnexpectedEOFError extends Error {
    constructor(message = 'unexpected EOF') {
        super(message);
        this.name = 'UnexpectedEOFError';
    }
}

export class ListenerClosedError extends Error {
    constructor(message = 'listener closed') {
        super(message);
        this.name = 'ListenerClosedError';
    }
}

export class ConfigError extends Error {
    readonly variable: string;

    constructor(variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = 'ConfigError';
        this.variable = variable;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
