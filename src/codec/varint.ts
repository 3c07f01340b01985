import { decode, decodeVaruintAt, encode, encodedLength, encodeVaruint, type DecodedAt } from "./varuint";
import { zigzagDecode, zigzagEncode } from "./zigzag";
import type { ByteSink, ByteSource, Peek } from "../io/ports";

// Signed values share the unsigned wire format through zigzag.

export function encodedLengthSigned(value: number | bigint): number {
    return encodedLength(zigzagEncode(value));
}

export function encodeVarint(value: number | bigint): Uint8Array {
    return encodeVaruint(zigzagEncode(value));
}

export function encodeSigned(value: number | bigint, sink: ByteSink): number {
    return encode(zigzagEncode(value), sink);
}

export function decodeSigned(source: ByteSource): bigint {
    return zigzagDecode(decode(source));
}

export function decodeVarintNumber(source: ByteSource): number {
    const value = decodeSigned(source);
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new RangeError("varint too large");
    }
    return Number(value);
}

export function decodeVarintAt(peek: Peek, offset: number): DecodedAt<bigint> | null {
    const raw = decodeVaruintAt(peek, offset);
    return raw && { value: zigzagDecode(raw.value), bytes: raw.bytes };
}
