import { toU64 } from "./varuint";

export const MIN_I64 = -(1n << 63n);
export const MAX_I64 = (1n << 63n) - 1n;

export function toI64(value: number | bigint): bigint {
    if (typeof value === "number") {
        if (!Number.isSafeInteger(value)) {
            throw new RangeError("Invalid varint");
        }
        return BigInt(value);
    }
    if (value < MIN_I64 || value > MAX_I64) {
        throw new RangeError("Invalid varint");
    }
    return value;
}

/** Interleaves signed values by magnitude: 0, -1, 1, -2, 2 become 0, 1, 2, 3, 4. */
export function zigzagEncode(value: number | bigint): bigint {
    const n = toI64(value);
    // bigint shifts are arithmetic; asUintN wraps back into 64 bits
    return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

export function zigzagDecode(value: number | bigint): bigint {
    const v = toU64(value);
    return BigInt.asIntN(64, (v >> 1n) ^ -(v & 1n));
}
