/**
 * Heat Risk Engine — Canonical Serialization
 *
 * The artifact ID is a hash over the serialized payload, so the same logical
 * model must always produce identical bytes:
 * 1. Object keys are sorted recursively
 * 2. undefined, functions, symbols, bigints and non-finite numbers are rejected
 * 3. -0 is normalized to 0
 */

import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';

/**
 * Recursively sort object keys alphabetically. Arrays keep their order.
 *
 * Throws on values that have no stable encoding.
 */
export function sortKeys(value: unknown, path = '$'): unknown {
    if (value === undefined) throw new Error(`Artifact value at ${path} is undefined (forbidden)`);
    if (typeof value === 'function') throw new Error(`Artifact value at ${path} is a function (forbidden)`);
    if (typeof value === 'symbol') throw new Error(`Artifact value at ${path} is a symbol (forbidden)`);
    if (typeof value === 'bigint') throw new Error(`Artifact value at ${path} is a bigint (forbidden - use string)`);

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new Error(`Artifact value at ${path} is non-finite ${value} (forbidden)`);
        }
        return Object.is(value, -0) ? 0 : value;
    }

    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((item: unknown, i) => sortKeys(item, `${path}[${i}]`));
    }

    const sorted: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, item] of entries) {
        sorted[key] = sortKeys(item, `${path}.${key}`);
    }
    return sorted;
}

/**
 * Encode a value to MsgPack with sorted keys.
 */
export function canonicalMsgPack(value: unknown): Uint8Array {
    return new Uint8Array(msgpackEncode(sortKeys(value)));
}

/**
 * Decode MsgPack bytes. The result is untrusted until validated.
 */
export function decodeMsgPack(bytes: Uint8Array): unknown {
    return msgpackDecode(bytes);
}
