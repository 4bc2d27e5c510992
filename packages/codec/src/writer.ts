/**
 * Growable binary writer: values → Uint8Array via DataView.
 *
 * Multi-byte floats are little-endian; unsigned integers are LEB128 varints.
 */

import {
  FLOAT64_SIZE, INITIAL_CAPACITY, VARINT_CONTINUATION, VARINT_PAYLOAD_MASK,
} from './types'

const utf8 = new TextEncoder()

export class ByteWriter {
  private buffer: Uint8Array
  private view: DataView
  private length = 0

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity))
    this.view = new DataView(this.buffer.buffer)
  }

  /** Number of bytes written so far. */
  get byteLength(): number {
    return this.length
  }

  private ensure(extra: number): void {
    const needed = this.length + extra
    if (needed <= this.buffer.length) return
    let size = this.buffer.length
    while (size < needed) size *= 2
    const next = new Uint8Array(size)
    next.set(this.buffer.subarray(0, this.length))
    this.buffer = next
    this.view = new DataView(next.buffer)
  }

  writeUint8(value: number): void {
    this.ensure(1)
    this.buffer[this.length++] = value & 0xff
  }

  /** Write a non-negative safe integer as an LEB128 varint. */
  writeVarint(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Varint must be a non-negative safe integer, got ${value}`)
    }
    // Division instead of >>> so values above 2^32 survive
    let rest = value
    while (rest >= VARINT_CONTINUATION) {
      this.writeUint8((rest % VARINT_CONTINUATION) | VARINT_CONTINUATION)
      rest = Math.floor(rest / VARINT_CONTINUATION)
    }
    this.writeUint8(rest & VARINT_PAYLOAD_MASK)
  }

  writeFloat64(value: number): void {
    this.ensure(FLOAT64_SIZE)
    this.view.setFloat64(this.length, value, true)
    this.length += FLOAT64_SIZE
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length)
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
  }

  /** Length-prefixed UTF-8. */
  writeString(value: string): void {
    const bytes = utf8.encode(value)
    this.writeVarint(bytes.length)
    this.writeBytes(bytes)
  }

  /** Copy of the written bytes; the writer stays usable. */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }
}
