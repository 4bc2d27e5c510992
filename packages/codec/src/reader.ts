/**
 * Binary reader: Uint8Array → values via DataView.
 *
 * Reads the layout produced by writer.ts. Every read checks the remaining
 * length first and raises MalformedStreamError instead of a RangeError.
 */

import { MalformedStreamError } from './errors'
import {
  FLOAT64_SIZE, MAX_VARINT_BYTES, VARINT_CONTINUATION, VARINT_PAYLOAD_MASK,
} from './types'

const utf8 = new TextDecoder('utf-8', { fatal: true })

export class ByteReader {
  private readonly view: DataView
  private offset = 0

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  /** Current read offset from the start of the stream. */
  get position(): number {
    return this.offset
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset
  }

  /** True when no bytes are left to read. */
  atEnd(): boolean {
    return this.remaining === 0
  }

  private require(needed: number): void {
    if (this.remaining < needed) {
      throw new MalformedStreamError(
        `needed ${needed} byte(s), ${this.remaining} available`,
        this.offset,
      )
    }
  }

  readUint8(): number {
    this.require(1)
    const value = this.view.getUint8(this.offset)
    this.offset += 1
    return value
  }

  readVarint(): number {
    const start = this.offset
    let result = 0
    let scale = 1
    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const byte = this.readUint8()
      result += (byte & VARINT_PAYLOAD_MASK) * scale
      if ((byte & VARINT_CONTINUATION) === 0) {
        if (!Number.isSafeInteger(result)) {
          throw new MalformedStreamError(`varint ${result} exceeds the safe integer range`, start)
        }
        return result
      }
      scale *= VARINT_CONTINUATION
    }
    throw new MalformedStreamError(`varint longer than ${MAX_VARINT_BYTES} bytes`, start)
  }

  readFloat64(): number {
    this.require(FLOAT64_SIZE)
    const value = this.view.getFloat64(this.offset, true)
    this.offset += FLOAT64_SIZE
    return value
  }

  readBytes(length: number): Uint8Array {
    this.require(length)
    const bytes = this.bytes.subarray(this.offset, this.offset + length)
    this.offset += length
    return bytes
  }

  readString(): string {
    const start = this.offset
    const length = this.readVarint()
    const bytes = this.readBytes(length)
    try {
      return utf8.decode(bytes)
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      throw new MalformedStreamError(`invalid UTF-8 string (${detail})`, start)
    }
  }
}
