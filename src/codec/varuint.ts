import { concat, readUintBE, uintBE } from "./binary";
import { IoError, TruncatedInputError, UnsupportedEncodingError } from "./errors";
import { classForHeader, classForValue, MAX_U64, type LengthClass } from "./length-table";
import { ByteReader } from "../io/byte-reader";
import type { ByteSink, ByteSource, Peek } from "../io/ports";

export type DecodedAt<T> = { value: T; bytes: number };

export function toU64(value: number | bigint): bigint {
    if (typeof value === "number") {
        if (!Number.isSafeInteger(value) || value < 0) {
            throw new RangeError("Invalid varuint");
        }
        return BigInt(value);
    }
    if (value < 0n || value > MAX_U64) {
        throw new RangeError("Invalid varuint");
    }
    return value;
}

export function encodedLength(value: number | bigint): number {
    return classForValue(toU64(value)).length;
}

/** Total length of the form a header byte starts, or null for the reserved header. */
export function encodedLengthFromHeader(header: number): number | null {
    return classForHeader(header)?.length ?? null;
}

export function encodeVaruint(value: number | bigint): Uint8Array {
    const v = toU64(value);
    const cls = classForValue(v);
    const out = new Uint8Array(cls.length);

    switch (cls.length) {
        case 1:
            out[0] = Number(v);
            break;
        case 2: {
            const d = Number(v - 240n);
            out[0] = 241 + (d >> 8);
            out[1] = d & 0xff;
            break;
        }
        case 3: {
            const d = Number(v - 2032n);
            out[0] = 248;
            out[1] = d >> 8;
            out[2] = d & 0xff;
            break;
        }
        default:
            return concat([Uint8Array.of(cls.firstHeader), uintBE(v, cls.length - 1)]);
    }
    return out;
}

/**
 * Writes the shortest form of `value` to `sink` and returns the byte count.
 * A throwing sink surfaces as {@link IoError}.
 */
export function encode(value: number | bigint, sink: ByteSink): number {
    const form = encodeVaruint(value);
    try {
        sink.write(form);
    } catch (err) {
        throw new IoError("Sink write failed", err);
    }
    return form.length;
}

function fromForm(header: number, cls: LengthClass, payload: Uint8Array): bigint {
    switch (cls.length) {
        case 1:
            return BigInt(header);
        case 2:
            return BigInt(240 + 256 * (header - 241) + (payload[0] ?? 0));
        case 3:
            return BigInt(2032 + 256 * (payload[0] ?? 0) + (payload[1] ?? 0));
        default:
            return readUintBE(payload, 0, cls.length - 1);
    }
}

function lookup(header: number): LengthClass {
    const cls = classForHeader(header);
    if (!cls) {
        throw new UnsupportedEncodingError(header);
    }
    return cls;
}

function checkByte(b: number): number {
    if (!Number.isInteger(b) || b < 0 || b > 0xff) {
        throw new IoError("Source yielded a non-byte value", b);
    }
    return b;
}

function pull(source: ByteSource, expected: number, received: number): number {
    let b: number | null;
    try {
        b = source.read();
    } catch (err) {
        throw new IoError("Source read failed", err);
    }
    if (b === null) {
        throw new TruncatedInputError(expected, received);
    }
    return checkByte(b);
}

/**
 * Reads exactly one encoded value from `source`.
 *
 * Never reads past the end of the form, so consecutive values can be pulled
 * from the same source with repeated calls.
 */
export function decode(source: ByteSource): bigint {
    const header = pull(source, 1, 0);
    const cls = lookup(header);
    const payload = new Uint8Array(cls.length - 1);
    for (let i = 0; i < payload.length; i++) {
        payload[i] = pull(source, cls.length, i + 1);
    }
    return fromForm(header, cls, payload);
}

export function decodeVaruintNumber(source: ByteSource): number {
    const value = decode(source);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new RangeError("varuint too large");
    return Number(value);
}

/**
 * Decodes the form starting at `offset` of a random-access view.
 * Returns null while the form is still incomplete.
 */
export function decodeVaruintAt(peek: Peek, offset: number): DecodedAt<bigint> | null {
    const header = peek(offset);
    if (header == null) {
        return null;
    }
    const cls = lookup(checkByte(header));
    const payload = new Uint8Array(cls.length - 1);
    for (let i = 0; i < payload.length; i++) {
        const b = peek(offset + 1 + i);
        if (b == null) {
            return null;
        }
        payload[i] = checkByte(b);
    }
    return { value: fromForm(header, cls, payload), bytes: cls.length };
}

/** Decodes one value from `buf`; an incomplete form throws {@link TruncatedInputError}. */
export function decodeVaruintFrom(buf: Uint8Array, offset = 0): DecodedAt<bigint> {
    const reader = new ByteReader(buf, offset);
    const value = decode(reader);
    return { value, bytes: reader.offset - offset };
}
