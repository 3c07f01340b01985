import type { ByteSource } from "./ports";

export class ByteReader implements ByteSource {
    private _offset: number;

    constructor(private readonly buf: Uint8Array, offset = 0) {
        if (!Number.isInteger(offset) || offset < 0 || offset > buf.length) {
            throw new RangeError("Invalid offset");
        }
        this._offset = offset;
    }

    get offset(): number {
        return this._offset;
    }

    get remaining(): number {
        return this.buf.length - this._offset;
    }

    read(): number | null {
        if (this._offset >= this.buf.length) {
            return null;
        }
        return this.buf[this._offset++] ?? null;
    }
}
