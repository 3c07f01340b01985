import type { ByteSink } from "./ports";

export class ByteWriter implements ByteSink {
    private buf: Uint8Array;
    private _length = 0;

    constructor(initialCapacity = 64) {
        this.buf = new Uint8Array(Math.max(1, initialCapacity));
    }

    get length(): number {
        return this._length;
    }

    write(bytes: Uint8Array): void {
        this.ensure(bytes.length);
        this.buf.set(bytes, this._length);
        this._length += bytes.length;
    }

    toBytes(): Uint8Array {
        return this.buf.slice(0, this._length);
    }

    reset(): void {
        this._length = 0;
    }

    private ensure(extra: number): void {
        const needed = this._length + extra;
        if (needed <= this.buf.length) {
            return;
        }
        let capacity = this.buf.length * 2;
        while (capacity < needed) capacity *= 2;
        const next = new Uint8Array(capacity);
        next.set(this.buf.subarray(0, this._length));
        this.buf = next;
    }
}
