import type { ByteSource } from "../io/ports";

/**
 * FIFO of byte chunks. Doubles as a {@link ByteSource} so the stream codec can
 * read straight from whatever has arrived so far.
 */
export class ByteQueue implements ByteSource {
    private chunks: Uint8Array[] = [];
    private headOffset = 0;
    private _length = 0;

    get length(): number {
        return this._length;
    }

    push(chunk: Uint8Array): void {
        if (chunk.length === 0) {
            return;
        }
        this.chunks.push(chunk);
        this._length += chunk.length;
    }

    peek(i: number): number | null {
        if (i < 0 || i >= this._length) return null;
        let idx = i + this.headOffset;

        for (const chunk of this.chunks) {
            if (idx < chunk.length) return chunk[idx] ?? null;
            idx -= chunk.length;
        }
        return null;
    }

    read(): number | null {
        const b = this.peek(0);
        if (b !== null) {
            this.consume(1, null);
        }
        return b;
    }

    readSlice(count: number): Uint8Array {
        const out = new Uint8Array(count);
        this.consume(count, out);
        return out;
    }

    skip(count: number): void {
        this.consume(count, null);
    }

    clear(): void {
        this.chunks = [];
        this.headOffset = 0;
        this._length = 0;
    }

    private consume(count: number, out: Uint8Array | null): void {
        if (count > this._length) throw new Error("ByteQueue underflow");
        let done = 0;

        while (done < count) {
            const head = this.chunks[0];
            if (!head) break;
            const take = Math.min(head.length - this.headOffset, count - done);

            out?.set(head.subarray(this.headOffset, this.headOffset + take), done);
            done += take;

            this.headOffset += take;
            this._length -= take;

            if (this.headOffset >= head.length) {
                this.chunks.shift();
                this.headOffset = 0;
            }
        }
    }
}
