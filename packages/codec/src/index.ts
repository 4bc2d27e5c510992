export {
  FLOAT64_SIZE, MAX_VARINT_BYTES, VARINT_CONTINUATION, VARINT_PAYLOAD_MASK, INITIAL_CAPACITY,
} from './types'

// Errors
export { MalformedStreamError } from './errors'

// Primitives
export { ByteWriter } from './writer'
export { ByteReader } from './reader'

// Event codecs
export {
  integerEventCodec, numberEventCodec, textEventCodec,
  type EventCodec, type EventCodecKind,
} from './event-codec'
