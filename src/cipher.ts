/**
 * Per-connection stream cipher. A template instance is shared by the Service and
 * never used directly: every connection works on its own `copy()`.
 */
export interface Cipher {
    readonly method: string;
    copy(): Cipher;
    encrypt(chunk: Buffer): Buffer;
    decrypt(chunk: Buffer): Buffer;
}

export interface ServerCipher {
    /** Tunnel endpoint URL. */
    readonly server: string;
    readonly cipher: Cipher;
}

/** Leaves payloads untouched; confidentiality then comes from a wss:// tunnel. */
export class PlainCipher implements Cipher {
    readonly method = 'plain';

    copy(): Cipher {
        return new PlainCipher();
    }

    encrypt(chunk: Buffer): Buffer {
        return chunk;
    }

    decrypt(chunk: Buffer): Buffer {
        return chunk;
    }
}

const ciphers = new Map<string, () => Cipher>([
    ['plain', () => new PlainCipher()],
]);

export function createCipher(method: string): Cipher {
    const factory = ciphers.get(method.toLowerCase());
    if (!factory) {
        throw new Error(`Unsupported cipher method: ${method} (available: ${[...ciphers.keys()].join(', ')})`);
    }
    return factory();
}
