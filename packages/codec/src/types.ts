/**
 * Primitive layout for the persistence format.
 *
 *   unsigned integer: LEB128 varint, 7 bits per byte, high bit = continuation
 *   float:            8-byte IEEE-754 double, little-endian
 *   string:           [varint byteLength] [UTF-8 bytes]
 */

// ─── Sizes ──────────────────────────────────────────────────────────────────

export const FLOAT64_SIZE = 8

/** 8 × 7 = 56 payload bits, enough for Number.MAX_SAFE_INTEGER (2^53 - 1). */
export const MAX_VARINT_BYTES = 8

export const VARINT_CONTINUATION = 0x80
export const VARINT_PAYLOAD_MASK = 0x7f

/** Starting capacity of a ByteWriter; doubles on demand. */
export const INITIAL_CAPACITY = 64
