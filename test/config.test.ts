import { describe, expect, it } from 'vitest';
import { createCipher, PlainCipher } from '../src/cipher';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            HOST: '127.0.0.1',
            PORTS: [1080],
            SERVER: 'ws://127.0.0.1:8388',
            CIPHER: 'plain',
            DEBUG: false,
            READ_TIMEOUT: 5000,
            ACCEPT_TIMEOUT: 1000,
            HANDSHAKE_TIMEOUT: 30000,
            DIAL_TIMEOUT: 10000,
        });
    });

    it('reads a list of ports and the debug flag', () => {
        const config = loadConfig({ PORT: '1080, 1081', DEBUG: '1', SERVER: 'wss://tunnel.example.com/ws', READ_TIMEOUT: '2500' });
        expect(config.PORTS).toEqual([1080, 1081]);
        expect(config.DEBUG).toBe(true);
        expect(config.SERVER).toBe('wss://tunnel.example.com/ws');
        expect(config.READ_TIMEOUT).toBe(2500);
    });

    it('rejects invalid values naming the variable', () => {
        expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigError);
        expect(() => loadConfig({ SERVER: 'http://tunnel.test' })).toThrow('SERVER: expected a ws:// or wss:// URL, got "http://tunnel.test"');
        expect(() => loadConfig({ ACCEPT_TIMEOUT: '-1' })).toThrow('ACCEPT_TIMEOUT');
    });

    it('rejects an empty entry in the port list', () => {
        expect(() => loadConfig({ PORT: '1080,' })).toThrow('PORT: invalid port ""');
        expect(() => loadConfig({ PORT: '1080, ,1081' })).toThrow(ConfigError);
    });
});

describe('createCipher', () => {
    it('builds the plain cipher and gives independent copies', () => {
        const cipher = createCipher('PLAIN');
        expect(cipher).toBeInstanceOf(PlainCipher);
        expect(cipher.copy()).not.toBe(cipher);
        const chunk = Buffer.from('x');
        expect(cipher.encrypt(chunk)).toBe(chunk);
    });

    it('rejects unknown methods', () => {
        expect(() => createCipher('aes-256-cfb')).toThrow('Unsupported cipher method: aes-256-cfb (available: plain)');
    });
});
