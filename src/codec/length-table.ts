export type LengthClass = {
    /** Total encoded length, header byte included. */
    length: number;
    firstHeader: number;
    lastHeader: number;
    min: bigint;
    max: bigint;
};

export const MAX_U64 = (1n << 64n) - 1n;
export const MAX_ENCODED_LENGTH = 9;

// Reserved for a future 128-bit class.
export const RESERVED_HEADER = 255;

export const LENGTH_CLASSES: readonly LengthClass[] = [
    { length: 1, firstHeader: 0, lastHeader: 240, min: 0n, max: 240n },
    { length: 2, firstHeader: 241, lastHeader: 247, min: 241n, max: 2031n },
    { length: 3, firstHeader: 248, lastHeader: 248, min: 2032n, max: 67567n },
    { length: 4, firstHeader: 249, lastHeader: 249, min: 67568n, max: 0xff_ffffn },
    { length: 5, firstHeader: 250, lastHeader: 250, min: 0x100_0000n, max: 0xffff_ffffn },
    { length: 6, firstHeader: 251, lastHeader: 251, min: 0x1_0000_0000n, max: 0xff_ffff_ffffn },
    { length: 7, firstHeader: 252, lastHeader: 252, min: 0x100_0000_0000n, max: 0xffff_ffff_ffffn },
    { length: 8, firstHeader: 253, lastHeader: 253, min: 0x1_0000_0000_0000n, max: 0xff_ffff_ffff_ffffn },
    { length: 9, firstHeader: 254, lastHeader: 254, min: 0x100_0000_0000_0000n, max: MAX_U64 }
];

export function classForValue(value: bigint): LengthClass {
    for (const c of LENGTH_CLASSES) {
        if (value <= c.max) {
            return c;
        }
    }
    throw new RangeError("Invalid varuint");
}

export function classForHeader(header: number): LengthClass | null {
    if (header <= 240) {
        return LENGTH_CLASSES[0] ?? null;
    }
    if (header <= 247) {
        return LENGTH_CLASSES[1] ?? null;
    }
    if (header === RESERVED_HEADER) {
        return null;
    }
    // 248..254 map one-to-one onto the raw and fold-3 classes
    return LENGTH_CLASSES[header - 246] ?? null;
}
