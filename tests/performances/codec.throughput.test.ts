import { describe, expect, it } from "vitest";
import { performance } from "node:perf_hooks";
import { decode, encode } from "../../src/codec/varuint";
import { VaruintParser } from "../../src/codec/parser";
import { ByteReader } from "../../src/io/byte-reader";
import { ByteWriter } from "../../src/io/byte-writer";

const total = 200_000;

// Spread across every length class
const valueAt = (i: number): bigint => (BigInt(i) * 0x9e37_79b9_7f4a_7c15n) >> BigInt(i % 64);

describe("performance", () => {
    it("encodes and decodes values at high throughput", () => {
        const writer = new ByteWriter(total * 9);

        const start = performance.now();
        for (let i = 0; i < total; i++) {
            encode(BigInt.asUintN(64, valueAt(i)), writer);
        }
        const reader = new ByteReader(writer.toBytes());
        let decoded = 0;
        while (reader.remaining > 0) {
            decode(reader);
            decoded++;
        }
        const durationMs = performance.now() - start;
        const rate = (decoded / durationMs) * 1000;

        console.info(`[perf] codec: ${decoded} values (${writer.length} bytes) in ${durationMs.toFixed(1)}ms (~${Math.round(rate)} values/s)`);

        expect(decoded).toBe(total);
        expect(durationMs).toBeLessThan(10_000);
    });

    it("parses large batched chunks efficiently", () => {
        const parser = new VaruintParser();
        const buffer = new Uint8Array(total).fill(0x05);

        const start = performance.now();
        const values = parser.push(buffer);
        const durationMs = performance.now() - start;
        const rate = (values.length / durationMs) * 1000;

        console.info(`[perf] parser: ${values.length} values in ${durationMs.toFixed(1)}ms (~${Math.round(rate)} values/s)`);

        expect(values.length).toBe(total);
        expect(durationMs).toBeLessThan(10_000);
    });
});
