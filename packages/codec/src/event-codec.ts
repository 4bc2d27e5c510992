/**
 * Event codecs: how a single event key is laid out on the wire.
 *
 * Numeric events use a compact numeric encoding, text events are
 * length-prefixed. Callers pick the codec that matches their event type.
 */

import type { ByteReader } from './reader'
import type { ByteWriter } from './writer'

export type EventCodecKind = 'integer' | 'number' | 'text'

export interface EventCodec<E> {
  readonly kind: EventCodecKind
  encode(writer: ByteWriter, event: E): void
  decode(reader: ByteReader): E
}

/** Non-negative integer ids (vocabulary indices, category ids) as varints. */
export const integerEventCodec: EventCodec<number> = {
  kind: 'integer',
  encode: (writer, event) => writer.writeVarint(event),
  decode: (reader) => reader.readVarint(),
}

/** Arbitrary numbers as float64. */
export const numberEventCodec: EventCodec<number> = {
  kind: 'number',
  encode: (writer, event) => writer.writeFloat64(event),
  decode: (reader) => reader.readFloat64(),
}

/** Strings as [varint byteLength] [UTF-8 bytes]. */
export const textEventCodec: EventCodec<string> = {
  kind: 'text',
  encode: (writer, event) => writer.writeString(event),
  decode: (reader) => reader.readString(),
}
