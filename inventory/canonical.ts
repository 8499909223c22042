/**
 * HRRR Inventory — Canonical Serialization
 *
 * Digests need deterministic bytes: the same logical value must always encode
 * identically, whatever order its keys were inserted in.
 */

import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';

/**
 * Recursively sort object keys. Arrays keep their order.
 * Throws on values that have no stable encoding.
 */
export function sortKeys(value: unknown): unknown {
    if (value === undefined) throw new Error('Cannot canonicalize undefined');
    if (typeof value === 'function' || typeof value === 'symbol' || typeof value === 'bigint') {
        throw new Error(`Cannot canonicalize ${typeof value}`);
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) throw new Error(`Cannot canonicalize non-finite number ${value}`);
        return Object.is(value, -0) ? 0 : value;
    }
    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        if (entry === undefined) {
            throw new Error(`Key '${key}' is undefined`);
        }
        sorted[key] = sortKeys(entry);
    }
    return sorted;
}

/**
 * MsgPack with sorted keys.
 */
export function canonicalMsgPack(value: unknown): Uint8Array {
    return new Uint8Array(msgpackEncode(sortKeys(value)));
}

export function decodeMsgPack(bytes: Uint8Array): unknown {
    return msgpackDecode(bytes);
}
