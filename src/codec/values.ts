import { decode, encode, encodedLength, encodeVaruint, toU64 } from "./varuint";
import { decodeSigned, encodedLengthSigned, encodeSigned, encodeVarint } from "./varint";
import { toI64 } from "./zigzag";
import type { ByteSink, ByteSource } from "../io/ports";

export interface Serializable {
    /** Number of bytes `serialize` will write. */
    sizeHint(): number;
    serialize(sink: ByteSink): number;
}

export class Varuint implements Serializable {
    readonly value: bigint;

    constructor(value: number | bigint = 0n) {
        this.value = toU64(value);
    }

    static from(value: number | bigint): Varuint {
        return new Varuint(value);
    }

    static deserialize(source: ByteSource): Varuint {
        return new Varuint(decode(source));
    }

    sizeHint(): number {
        return encodedLength(this.value);
    }

    serialize(sink: ByteSink): number {
        return encode(this.value, sink);
    }

    toBytes(): Uint8Array {
        return encodeVaruint(this.value);
    }

    equals(other: Varuint): boolean {
        return this.value === other.value;
    }

    valueOf(): bigint {
        return this.value;
    }

    toString(): string {
        return this.value.toString();
    }

    toJSON(): string {
        return this.toString();
    }
}

export class Varint implements Serializable {
    readonly value: bigint;

    constructor(value: number | bigint = 0n) {
        this.value = toI64(value);
    }

    static from(value: number | bigint): Varint {
        return new Varint(value);
    }

    static deserialize(source: ByteSource): Varint {
        return new Varint(decodeSigned(source));
    }

    sizeHint(): number {
        return encodedLengthSigned(this.value);
    }

    serialize(sink: ByteSink): number {
        return encodeSigned(this.value, sink);
    }

    toBytes(): Uint8Array {
        return encodeVarint(this.value);
    }

    equals(other: Varint): boolean {
        return this.value === other.value;
    }

    valueOf(): bigint {
        return this.value;
    }

    toString(): string {
        return this.value.toString();
    }

    toJSON(): string {
        return this.toString();
    }
}
