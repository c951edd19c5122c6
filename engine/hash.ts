/**
 * Heat Risk Engine — BLAKE3 Hashing Utilities
 *
 * Model artifacts are identified by the BLAKE3 hash of their canonical bytes.
 */

import { blake3 } from '@noble/hashes/blake3.js';

/**
 * Compute BLAKE3 hash of a Uint8Array.
 * Returns raw 32-byte hash.
 */
export function hash(data: Uint8Array): Uint8Array {
    return blake3(data);
}

export function hashHex(data: Uint8Array): string {
    return toHex(blake3(data));
}

/**
 * Convert Uint8Array to lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map((b) => b.toString(16).padStart(2, '0'))
        .join('');
}

/**
 * Compare two hashes for equality (constant-time).
 */
export function hashesEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    let result = 0;
    for (let i = 0; i < a.length; i++) {
        result |= a[i] ^ b[i];
    }
    return result === 0;
}
