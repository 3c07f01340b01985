/**
 * Destination for encoded bytes. Implementations throw when the
 * underlying destination is unusable; the codec never retries.
 */
export interface ByteSink {
    write(bytes: Uint8Array): void;
}

/**
 * Origin of encoded bytes, one at a time.
 *
 * `read()` returns a byte in 0..255, or `null` once the data has ended.
 * Implementations throw when the underlying transport fails.
 */
export interface ByteSource {
    read(): number | null;
}

export type Peek = (i: number) => number | null;
