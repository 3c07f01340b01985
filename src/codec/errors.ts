export const VaruintErrorCode = {
    IO: "IO",
    TRUNCATED_INPUT: "TRUNCATED_INPUT",
    UNSUPPORTED_ENCODING: "UNSUPPORTED_ENCODING"
} as const;

export type VaruintErrorCode = (typeof VaruintErrorCode)[keyof typeof VaruintErrorCode];

export class VaruintError extends Error {
    readonly code: VaruintErrorCode;

    constructor(code: VaruintErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "VaruintError";
        this.code = code;
    }
}

/** A sink or source threw. The original error is kept as `cause`. */
export class IoError extends VaruintError {
    constructor(message: string, cause: unknown) {
        super(VaruintErrorCode.IO, message, { cause });
        this.name = "IoError";
    }
}

/** The source ran dry before the length announced by the header byte. */
export class TruncatedInputError extends VaruintError {
    constructor(
        readonly expected: number,
        readonly received: number
    ) {
        super(VaruintErrorCode.TRUNCATED_INPUT, `Truncated varuint: expected ${expected} bytes, got ${received}`);
        this.name = "TruncatedInputError";
    }
}

export class UnsupportedEncodingError extends VaruintError {
    constructor(readonly header: number) {
        super(VaruintErrorCode.UNSUPPORTED_ENCODING, `Unsupported varuint header: ${header}`);
        this.name = "UnsupportedEncodingError";
    }
}
