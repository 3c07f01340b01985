export {
    encodedLength,
    encodedLengthFromHeader,
    encode,
    decode,
    encodeVaruint,
    decodeVaruintAt,
    decodeVaruintFrom,
    decodeVaruintNumber
} from "./codec/varuint";
export type { DecodedAt } from "./codec/varuint";
export {
    encodedLengthSigned,
    encodeSigned,
    decodeSigned,
    encodeVarint,
    decodeVarintAt,
    decodeVarintNumber
} from "./codec/varint";
export { zigzagEncode, zigzagDecode, MIN_I64, MAX_I64 } from "./codec/zigzag";
export { LENGTH_CLASSES, MAX_U64, MAX_ENCODED_LENGTH, RESERVED_HEADER } from "./codec/length-table";
export type { LengthClass } from "./codec/length-table";
export {
    VaruintError,
    VaruintErrorCode,
    IoError,
    TruncatedInputError,
    UnsupportedEncodingError
} from "./codec/errors";
export { Varuint, Varint } from "./codec/values";
export type { Serializable } from "./codec/values";
export { VaruintParser } from "./codec/parser";
export type { VaruintParserOptions } from "./codec/parser";
export { ByteWriter } from "./io/byte-writer";
export { ByteReader } from "./io/byte-reader";
export { ByteQueue } from "./util/byte-queue";
export type { ByteSink, ByteSource, Peek } from "./io/ports";
