import type { Conn } from './conn';
import { SocksError } from './errors';

export const SOCKS_VERSION = 5;
export const AUTH_METHOD_NO_AUTH = 0;

export const CMD_CONNECT = 1;

export const ATYP_IPV4 = 1;
export const ATYP_DOMAINNAME = 3;
export const ATYP_IPV6 = 4;

const IPV4_LEN = 4;
const IPV6_LEN = 16;

// ver + cmd + rsv + atyp (+ domain length byte) + port
const REQUEST_LEN_IPV4 = 3 + 1 + IPV4_LEN + 2;
const REQUEST_LEN_IPV6 = 3 + 1 + IPV6_LEN + 2;
const REQUEST_LEN_DOMAIN_BASE = 3 + 1 + 1 + 2;

// Version, nmethods, then at most 255 methods; one spare byte so trailing data shows up.
const HANDSHAKE_BUF_LEN = 2 + 255 + 1;
// Longest request is a 255-byte domain name, plus the spare byte.
const REQUEST_BUF_LEN = REQUEST_LEN_DOMAIN_BASE + 255 + 1;

const IDX_VER = 0;
const IDX_NMETHODS = 1;
const IDX_CMD = 1;
const IDX_ATYP = 3;
const IDX_ADDR = 4;

/**
 * Sent before the tunnel is dialed; the bound address 0.0.0.0:2115 is a placeholder.
 * A dial failure afterwards shows up to the client as a reset connection.
 */
export const CONNECTION_ESTABLISHED = Buffer.from([0x05, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00, 0x08, 0x43]);

export interface SocksRequest {
    /** ATYP, address and port exactly as sent by the client. */
    rawAddress: Buffer;
    /** "host:port", only decoded when asked for. */
    host?: string;
}

/*
    +----+----------+----------+
    |VER | NMETHODS | METHODS  |
    +----+----------+----------+
    | 1  |    1     | 1 to 255 |
    +----+----------+----------+
*/
export async function negotiate(conn: Conn, deadline?: number): Promise<void> {
    const buf = Buffer.alloc(HANDSHAKE_BUF_LEN);

    const n = await conn.readAtLeast(buf, IDX_NMETHODS + 1, deadline);
    if (buf[IDX_VER] !== SOCKS_VERSION) {
        throw new SocksError('UnsupportedVersion', `socks version ${buf[IDX_VER]} not supported`);
    }

    const msgLen = buf[IDX_NMETHODS] + 2;
    if (n < msgLen) {
        await conn.readFull(buf.subarray(n, msgLen), deadline);
    } else if (n > msgLen) {
        throw new SocksError('ExtraData', 'socks authentication got extra data');
    }

    // Whatever the client offered, no authentication is selected.
    await conn.write(Buffer.from([SOCKS_VERSION, AUTH_METHOD_NO_AUTH]));
}

/*
    +----+-----+-------+------+----------+----------+
    |VER | CMD |  RSV  | ATYP | DST.ADDR | DST.PORT |
    +----+-----+-------+------+----------+----------+
    | 1  |  1  | X'00' |  1   | Variable |    2     |
    +----+-----+-------+------+----------+----------+
*/
export async function readRequest(conn: Conn, deadline?: number, describe = false): Promise<SocksRequest> {
    const buf = Buffer.alloc(REQUEST_BUF_LEN);

    // Enough to see ATYP and, for domain names, the length byte.
    const n = await conn.readAtLeast(buf, IDX_ADDR + 1, deadline);
    if (buf[IDX_VER] !== SOCKS_VERSION) {
        throw new SocksError('UnsupportedVersion', `socks version ${buf[IDX_VER]} not supported`);
    }
    if (buf[IDX_CMD] !== CMD_CONNECT) {
        throw new SocksError('UnsupportedCommand', `socks command ${buf[IDX_CMD]} not supported`);
    }

    const reqLen = requestLength(buf[IDX_ATYP], buf[IDX_ADDR]);
    if (n < reqLen) {
        await conn.readFull(buf.subarray(n, reqLen), deadline);
    } else if (n > reqLen) {
        throw new SocksError('ExtraData', 'socks request got extra data');
    }

    const rawAddress = buf.subarray(IDX_ATYP, reqLen);
    return describe ? { rawAddress, host: formatRawAddress(rawAddress) } : { rawAddress };
}

export function requestLength(atyp: number, lengthByte: number): number {
    switch (atyp) {
        case ATYP_IPV4:
            return REQUEST_LEN_IPV4;
        case ATYP_IPV6:
            return REQUEST_LEN_IPV6;
        case ATYP_DOMAINNAME:
            return REQUEST_LEN_DOMAIN_BASE + lengthByte;
        default:
            throw new SocksError('UnsupportedAddressType', `socks address type ${atyp} not supported`);
    }
}

/** Renders an ATYP + address + port blob as "host:port". */
export function formatRawAddress(raw: Buffer): string {
    const port = raw.readUInt16BE(raw.length - 2);
    let host: string;
    switch (raw[0]) {
        case ATYP_IPV4:
            host = formatIPv4(raw.subarray(1, 1 + IPV4_LEN));
            break;
        case ATYP_IPV6:
            host = formatIPv6(raw.subarray(1, 1 + IPV6_LEN));
            break;
        case ATYP_DOMAINNAME:
            host = raw.subarray(2, 2 + raw[1]).toString();
            break;
        default:
            throw new SocksError('UnsupportedAddressType', `socks address type ${raw[0]} not supported`);
    }
    return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

function formatIPv4(bytes: Buffer): string {
    return Array.from(bytes).join('.');
}

function formatIPv6(bytes: Buffer): string {
    // ::ffff:a.b.c.d prints as a plain IPv4 address
    if (bytes.subarray(0, 10).every((b) => b === 0) && bytes[10] === 0xff && bytes[11] === 0xff) {
        return formatIPv4(bytes.subarray(12));
    }

    const groups: number[] = [];
    for (let i = 0; i < IPV6_LEN; i += 2) groups.push(bytes.readUInt16BE(i));

    // Longest run of two or more zero groups becomes "::" (first one on a tie).
    let bestStart = -1;
    let bestLen = 0;
    for (let i = 0; i < groups.length;) {
        if (groups[i] !== 0) {
            i++;
            continue;
        }
        let j = i;
        while (j < groups.length && groups[j] === 0) j++;
        if (j - i > bestLen && j - i >= 2) {
            bestStart = i;
            bestLen = j - i;
        }
        i = j;
    }

    const hex = (g: number) => g.toString(16);
    if (bestStart < 0) return groups.map(hex).join(':');
    const head = groups.slice(0, bestStart).map(hex).join(':');
    const tail = groups.slice(bestStart + bestLen).map(hex).join(':');
    return `${head}::${tail}`;
}
