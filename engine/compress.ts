/**
 * Heat Risk Engine — Compression
 *
 * ENCODING REGISTRY:
 *   0x00000001 = GZIP + MsgPack (current default)
 *   0x00000002 = Reserved (Brotli + MsgPack)
 */

import { gzip, gunzip } from 'node:zlib';
import { promisify } from 'node:util';

export const ENCODING_GZIP_MSGPACK = 0x00000001;
export const ENCODING_BR_MSGPACK = 0x00000002; // Reserved

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export async function compress(data: Uint8Array): Promise<Uint8Array> {
    return new Uint8Array(await gzipAsync(data));
}

/**
 * Decompress data based on encoding flags.
 * Unknown encoding is a hard failure.
 */
export async function decompressWithEncoding(
    data: Uint8Array,
    encodingFlags: number
): Promise<Uint8Array> {
    switch (encodingFlags) {
        case ENCODING_GZIP_MSGPACK:
            return new Uint8Array(await gunzipAsync(data));

        case ENCODING_BR_MSGPACK:
            throw new Error('Brotli encoding not yet implemented (reserved)');

        default:
            throw new Error(`Unknown encoding flags: 0x${encodingFlags.toString(16).padStart(8, '0')}`);
    }
}
