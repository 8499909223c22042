/**
 * HRRR Inventory — BLAKE3 Hashing
 */

import { blake3 } from '@noble/hashes/blake3';

export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map((b) => b.toString(16).padStart(2, '0'))
        .join('');
}

/**
 * BLAKE3 digest as lowercase hex (64 chars).
 */
export function hashHex(data: Uint8Array): string {
    return toHex(blake3(data));
}

export function isValidDigest(value: string): boolean {
    return /^[a-f0-9]{64}$/.test(value);
}
