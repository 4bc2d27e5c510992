// ---------------------------------------------------------------------------
// Binary persistence
//
// Prior record:
//   [varint tag] 0 = symmetric:  [f64 alpha] [varint impliedN]
//                1 = asymmetric: [varint count] count × ([event] [f64 weight])
//
// Counts record:
//   [f64 total] [varint count] count × ([event] [f64 count])
//
// A multinomial is a counts record followed by its prior record. Zero bytes
// where a record would start means "nothing persisted" and loads as a no-op.
// ---------------------------------------------------------------------------

import { ByteReader, ByteWriter, MalformedStreamError, type EventCodec } from '@dirichlet-counts/codec';
import { settings } from '@dirichlet-counts/config';

import {
  encodableVocabularySize,
  makeAsymmetric,
  makeSymmetric,
  type DirichletPrior,
} from './dirichlet-prior.js';
import { log } from './log.js';

export const PRIOR_TAG_SYMMETRIC = 0;
export const PRIOR_TAG_ASYMMETRIC = 1;

export interface DecodeOptions {
  /** Largest entry count accepted in a table. Defaults to DIRICHLET_MAX_DECODE_ENTRIES. */
  maxEntries?: number;
}

/** Counts section as read from a stream. */
export interface CountsRecord<E> {
  counts: Map<E, number>;
  total: number;
}

function readEntryCount(reader: ByteReader, options: DecodeOptions): number {
  const offset = reader.position;
  const count = reader.readVarint();
  const limit = options.maxEntries ?? settings.maxDecodeEntries;
  if (count > limit) {
    throw new MalformedStreamError(`entry count ${count} exceeds limit ${limit}`, offset);
  }
  return count;
}

// ---------------------------------------------------------------------------
// Prior
// ---------------------------------------------------------------------------

/** @throws RangeError for a symmetric prior whose n cannot be recovered */
export function writePrior<E>(writer: ByteWriter, prior: DirichletPrior<E>, codec: EventCodec<E>): void {
  switch (prior.kind) {
    case 'symmetric': {
      const n = encodableVocabularySize(prior);
      writer.writeVarint(PRIOR_TAG_SYMMETRIC);
      writer.writeFloat64(prior.alpha);
      writer.writeVarint(n);
      break;
    }
    case 'asymmetric':
      writer.writeVarint(PRIOR_TAG_ASYMMETRIC);
      writer.writeVarint(prior.weights.size);
      for (const [event, weight] of prior.weights) {
        codec.encode(writer, event);
        writer.writeFloat64(weight);
      }
      break;
  }
}

/**
 * Read a prior record.
 *
 * @returns The decoded prior, or undefined when the stream is already
 *   exhausted (no persisted prior).
 * @throws MalformedStreamError when the record starts but cannot be completed
 */
export function readPrior<E>(
  reader: ByteReader,
  codec: EventCodec<E>,
  options: DecodeOptions = {},
): DirichletPrior<E> | undefined {
  if (reader.atEnd()) {
    log.debug('no prior record in stream', { offset: reader.position });
    return undefined;
  }

  const tagOffset = reader.position;
  const tag = reader.readVarint();

  switch (tag) {
    case PRIOR_TAG_SYMMETRIC: {
      const alphaOffset = reader.position;
      const alpha = reader.readFloat64();
      if (!Number.isFinite(alpha)) {
        throw new MalformedStreamError(`symmetric alpha must be finite, got ${alpha}`, alphaOffset);
      }
      const n = reader.readVarint();
      return makeSymmetric(alpha, n);
    }

    case PRIOR_TAG_ASYMMETRIC: {
      const count = readEntryCount(reader, options);
      const pairs: Array<[E, number]> = [];
      for (let i = 0; i < count; i++) {
        const event = codec.decode(reader);
        const weight = reader.readFloat64();
        pairs.push([event, weight]);
      }
      return makeAsymmetric(pairs);
    }

    default:
      throw new MalformedStreamError(`unknown prior tag ${tag}`, tagOffset);
  }
}

/** Serialize a prior on its own. */
export function encodePrior<E>(prior: DirichletPrior<E>, codec: EventCodec<E>): Uint8Array {
  const writer = new ByteWriter();
  writePrior(writer, prior, codec);
  return writer.finish();
}

/**
 * Deserialize a prior. An empty input yields `current` unchanged.
 */
export function decodePrior<E>(
  bytes: Uint8Array,
  codec: EventCodec<E>,
  current: DirichletPrior<E>,
  options: DecodeOptions = {},
): DirichletPrior<E> {
  return readPrior(new ByteReader(bytes), codec, options) ?? current;
}

// ---------------------------------------------------------------------------
// Counts
// ---------------------------------------------------------------------------

export function writeCounts<E>(
  writer: ByteWriter,
  total: number,
  entries: ReadonlyMap<E, number>,
  codec: EventCodec<E>,
): void {
  writer.writeFloat64(total);
  writer.writeVarint(entries.size);
  for (const [event, count] of entries) {
    codec.encode(writer, event);
    writer.writeFloat64(count);
  }
}

/**
 * Read a counts record.
 *
 * @returns The entries and the stored total, or undefined when the
 *   stream is already exhausted.
 */
export function readCounts<E>(
  reader: ByteReader,
  codec: EventCodec<E>,
  options: DecodeOptions = {},
): CountsRecord<E> | undefined {
  if (reader.atEnd()) {
    log.debug('no counts record in stream', { offset: reader.position });
    return undefined;
  }

  const total = reader.readFloat64();
  const count = readEntryCount(reader, options);

  const counts = new Map<E, number>();
  for (let i = 0; i < count; i++) {
    const eventOffset = reader.position;
    const event = codec.decode(reader);
    if (counts.has(event)) {
      throw new MalformedStreamError(`duplicate event ${String(event)} in counts record`, eventOffset);
    }
    counts.set(event, reader.readFloat64());
  }

  return { counts, total };
}
