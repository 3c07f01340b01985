import { describe, expect, it } from "vitest";
import { VaruintParser, withDefaults } from "../src/codec/parser";
import { concat } from "../src/codec/binary";
import { encodeVarint } from "../src/codec/varint";
import { decode, encodeVaruint } from "../src/codec/varuint";
import { TruncatedInputError, UnsupportedEncodingError } from "../src/codec/errors";
import { ByteQueue } from "../src/util/byte-queue";

describe("ByteQueue", () => {
    it("tracks length, peek, and readSlice correctly", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([0x01, 0x02, 0x03]));
        q.push(Uint8Array.from([0x04]));

        expect(q.length).toBe(4);
        expect(q.peek(0)).toBe(0x01);
        expect(q.peek(3)).toBe(0x04);
        expect(q.peek(4)).toBeNull();

        const firstTwo = q.readSlice(2);
        expect(Array.from(firstTwo)).toEqual([0x01, 0x02]);
        expect(q.length).toBe(2);

        q.skip(1);
        expect(q.length).toBe(1);
        expect(q.peek(0)).toBe(0x04);
    });

    it("reads byte by byte across chunk boundaries", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([0x0a]));
        q.push(new Uint8Array());
        q.push(Uint8Array.from([0x0b, 0x0c]));

        expect([q.read(), q.read(), q.read(), q.read()]).toEqual([0x0a, 0x0b, 0x0c, null]);
        expect(q.length).toBe(0);
    });

    it("serves as a source for the stream decoder", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([249, 0x01]));
        q.push(Uint8Array.from([0x07, 0xf0, 0x05]));

        expect(decode(q)).toBe(67568n);
        expect(decode(q)).toBe(5n);
        expect(() => decode(q)).toThrowError(TruncatedInputError);
    });

    it("throws on underflow when reading or skipping too much", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([0xaa]));
        expect(() => q.readSlice(2)).toThrowError("ByteQueue underflow");
        expect(() => q.skip(5)).toThrowError("ByteQueue underflow");
    });

    it("drops everything on clear", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([1, 2, 3]));
        q.skip(1);
        q.clear();
        expect(q.length).toBe(0);
        expect(q.peek(0)).toBeNull();
    });
});

describe("VaruintParser", () => {
    it("waits for the full form before emitting a value", () => {
        const parser = new VaruintParser();
        const form = encodeVaruint(67568);

        expect(parser.push(form.subarray(0, 1))).toEqual([]);
        expect(parser.push(form.subarray(1, 3))).toEqual([]);
        expect(parser.buffered).toBe(3);
        expect(parser.push(form.subarray(3))).toEqual([67568n]);
        expect(parser.buffered).toBe(0);
    });

    it("parses multiple values even when forms are concatenated", () => {
        const parser = new VaruintParser();
        const buf = concat([encodeVaruint(1), encodeVaruint(2032), encodeVaruint(0), encodeVaruint(250)]);
        expect(parser.push(buf)).toEqual([1n, 2032n, 0n, 250n]);
    });

    it("carries a split form over to the next chunk", () => {
        const parser = new VaruintParser();
        expect(parser.push(Uint8Array.from([7, 241]))).toEqual([7n]);
        expect(parser.push(Uint8Array.from([1, 9]))).toEqual([241n, 9n]);
    });

    it("zigzag-decodes values in signed mode", () => {
        const parser = new VaruintParser({ signed: true });
        const buf = concat([encodeVarint(-1), encodeVarint(1), encodeVarint(-121)]);
        expect(parser.push(buf)).toEqual([-1n, 1n, -121n]);
    });

    it("holds values beyond the per-push limit until drained", () => {
        const parser = new VaruintParser({ maxValuesPerPush: 2 });
        expect(parser.push(Uint8Array.from([1, 2, 3]))).toEqual([1n, 2n]);
        expect(parser.buffered).toBe(1);
        expect(parser.drain()).toEqual([3n]);
        expect(parser.drain()).toEqual([]);
    });

    it("returns held values on end", () => {
        const parser = new VaruintParser({ maxValuesPerPush: 1 });
        expect(parser.push(Uint8Array.from([4, 5, 6]))).toEqual([4n]);
        expect(parser.end()).toEqual([5n, 6n]);
    });

    it("rejects a dangling partial form on end", () => {
        const parser = new VaruintParser();
        expect(parser.push(Uint8Array.from([250, 1]))).toEqual([]);
        expect(() => parser.end()).toThrowError("Truncated varuint: expected 5 bytes, got 2");
        expect(parser.buffered).toBe(2);
    });

    it("keeps complete values drainable when end finds a partial form", () => {
        const parser = new VaruintParser({ maxValuesPerPush: 1 });
        expect(parser.push(Uint8Array.from([1, 2, 241]))).toEqual([1n]);
        expect(() => parser.end()).toThrowError(TruncatedInputError);
        expect(parser.drain()).toEqual([2n]);
        expect(parser.buffered).toBe(1);
    });

    it("rejects the reserved header", () => {
        const parser = new VaruintParser();
        expect(() => parser.push(Uint8Array.from([255, 0]))).toThrowError(UnsupportedEncodingError);
    });

    it("returns values decoded ahead of a reserved header before failing", () => {
        const parser = new VaruintParser();
        expect(parser.push(Uint8Array.from([1, 2, 255]))).toEqual([1n, 2n]);
        expect(parser.buffered).toBe(1);
        expect(() => parser.drain()).toThrowError("Unsupported varuint header: 255");
        expect(parser.buffered).toBe(1);
    });
});

describe("parser options", () => {
    it("fills in defaults", () => {
        expect(withDefaults()).toEqual({ signed: false, maxValuesPerPush: Infinity });
        expect(withDefaults({ signed: true, maxValuesPerPush: 8 })).toEqual({ signed: true, maxValuesPerPush: 8 });
    });

    it("rejects a non-positive per-push limit", () => {
        expect(() => withDefaults({ maxValuesPerPush: 0 })).toThrowError("Invalid maxValuesPerPush: 0");
        expect(() => new VaruintParser({ maxValuesPerPush: Number.NaN })).toThrowError(RangeError);
    });
});
