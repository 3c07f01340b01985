import { ByteQueue } from "../util/byte-queue";
import { TruncatedInputError } from "./errors";
import { encodedLengthFromHeader, decodeVaruintAt, type DecodedAt } from "./varuint";
import { zigzagDecode } from "./zigzag";

export type VaruintParserOptions = {
    /** Zigzag-decode every value. */
    signed?: boolean;
    maxValuesPerPush?: number;
};

export type ResolvedVaruintParserOptions = {
    signed: boolean;
    maxValuesPerPush: number;
};

export function withDefaults(opts: VaruintParserOptions = {}): ResolvedVaruintParserOptions {
    const maxValuesPerPush = opts.maxValuesPerPush ?? Infinity;
    if (!(maxValuesPerPush >= 1)) {
        throw new RangeError(`Invalid maxValuesPerPush: ${maxValuesPerPush}`);
    }
    return {
        signed: opts.signed ?? false,
        maxValuesPerPush
    };
}

/**
 * Splits a chunked byte stream into values. Forms may straddle chunk
 * boundaries; incomplete trailing bytes are held until the next push.
 */
export class VaruintParser {
    private q = new ByteQueue();
    private readonly opts: ResolvedVaruintParserOptions;

    constructor(opts?: VaruintParserOptions) {
        this.opts = withDefaults(opts);
    }

    get buffered(): number {
        return this.q.length;
    }

    push(chunk: Uint8Array): bigint[] {
        this.q.push(chunk);
        return this.drain();
    }

    drain(): bigint[] {
        return this.take(this.opts.maxValuesPerPush);
    }

    /**
     * Signals end of input and returns every complete value still held.
     * Throws, leaving the buffer as it was, if a partial form trails them.
     */
    end(): bigint[] {
        let offset = 0;
        for (; ;) {
            const next = decodeVaruintAt((i) => this.q.peek(i), offset);
            if (!next) {
                break;
            }
            offset += next.bytes;
        }

        const header = this.q.peek(offset);
        if (header != null) {
            const expected = encodedLengthFromHeader(header) ?? 1;
            throw new TruncatedInputError(expected, this.q.length - offset);
        }
        return this.take(Infinity);
    }

    private take(limit: number): bigint[] {
        const out: bigint[] = [];

        while (out.length < limit) {
            let next: DecodedAt<bigint> | null;
            try {
                next = decodeVaruintAt((i) => this.q.peek(i), 0);
            } catch (err) {
                // Hand back what was decoded; the bad header stays at the front
                // and throws on the next push or drain.
                if (out.length > 0) break;
                throw err;
            }
            if (!next) {
                break;
            }
            this.q.skip(next.bytes);
            out.push(this.opts.signed ? zigzagDecode(next.value) : next.value);
        }

        return out;
    }
}
