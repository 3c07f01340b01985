export function uintBE(value: bigint, width: number): Uint8Array {
    const out = new Uint8Array(width);
    let v = value;
    for (let i = width - 1; i >= 0; i--) {
        out[i] = Number(v & 0xffn);
        v >>= 8n;
    }
    return out;
}

export function readUintBE(buf: Uint8Array, offset: number, width: number): bigint {
    if (offset + width > buf.length) {
        throw new RangeError("Uint out of bounds");
    }
    let value = 0n;
    for (let i = 0; i < width; i++) {
        value = (value << 8n) | BigInt(buf[offset + i] ?? 0);
    }
    return value;
}

export function concat(parts: Uint8Array[]): Uint8Array {
    const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
    let o = 0;
    for (const p of parts) {
        out.set(p, o);
        o += p.length;
    }
    return out;
}
