// ---------------------------------------------------------------------------
// Counting Multinomial with a Dirichlet prior
// ---------------------------------------------------------------------------

import { ByteReader, ByteWriter, type EventCodec } from '@dirichlet-counts/codec';

import {
  ZERO_PRIOR,
  clonePrior,
  pseudoCount,
  totalPseudoCount,
  type DirichletPrior,
} from './dirichlet-prior.js';
import { SamplingError } from './errors.js';
import { log } from './log.js';
import {
  encodePrior,
  readCounts,
  readPrior,
  writeCounts,
  type CountsRecord,
  type DecodeOptions,
} from './persistence.js';
import type { PRNG } from './types.js';

/**
 * Empirical event counts smoothed by a Dirichlet prior.
 *
 * Counts may go negative; nothing is validated. `total` is kept equal to the
 * sum of all counts by every mutator. The prior is only ever replaced as a
 * whole.
 */
export class CountingMultinomial<E> {
  private counts = new Map<E, number>();
  private runningTotal = 0;
  private currentPrior: DirichletPrior<E>;

  constructor(prior: DirichletPrior<E> = ZERO_PRIOR) {
    this.currentPrior = prior;
  }

  get prior(): DirichletPrior<E> {
    return this.currentPrior;
  }

  /** Sum of the empirical counts, without pseudo-counts. */
  get total(): number {
    return this.runningTotal;
  }

  /** Number of events with an entry in the count table. */
  get size(): number {
    return this.counts.size;
  }

  /** Replace the prior. Returns the one it replaced. */
  setPrior(prior: DirichletPrior<E>): DirichletPrior<E> {
    const previous = this.currentPrior;
    this.currentPrior = prior;
    return previous;
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  increment(event: E, weight = 1): void {
    this.counts.set(event, (this.counts.get(event) ?? 0) + weight);
    this.runningTotal += weight;
  }

  decrement(event: E, weight = 1): void {
    this.increment(event, -weight);
  }

  /**
   * Add every count of `other` into this one. This prior is kept and
   * `other` is left untouched.
   */
  merge(other: CountingMultinomial<E>): void {
    for (const [event, count] of other.counts) {
      this.counts.set(event, (this.counts.get(event) ?? 0) + count);
    }
    this.runningTotal += other.runningTotal;
  }

  /** Drop all counts. The prior stays. */
  clear(): void {
    this.counts.clear();
    this.runningTotal = 0;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Raw empirical count; 0 for events never seen. */
  count(event: E): number {
    return this.counts.get(event) ?? 0;
  }

  /**
   * Empirical count plus pseudo-count.
   *
   * @throws KeyNotFoundError if the prior is asymmetric and lacks `event`
   */
  observedCount(event: E): number {
    return this.count(event) + pseudoCount(this.currentPrior, event);
  }

  totalCount(): number {
    return this.runningTotal + totalPseudoCount(this.currentPrior);
  }

  /** Smoothed probability. NaN or ±Infinity when totalCount() is 0. */
  probability(event: E): number {
    return this.observedCount(event) / this.totalCount();
  }

  /**
   * Draw one event by walking seen events in table order and returning the
   * first whose cumulative probability reaches a uniform draw.
   *
   * Prior mass on events never seen is not a candidate, so the walk can end
   * short of the draw.
   *
   * @throws SamplingError when no event reaches the draw
   */
  sample(rng: PRNG): E {
    const threshold = rng();
    let cumulative = 0;
    for (const event of this.counts.keys()) {
      cumulative += this.probability(event);
      if (cumulative >= threshold) return event;
    }
    log.warn('sampling exhausted seen events', {
      threshold,
      cumulative,
      candidates: this.counts.size,
    });
    throw new SamplingError(threshold, cumulative, this.counts.size);
  }

  /** Every event with an entry in the table, zero-valued ones included. */
  *seenEvents(): Generator<E, void, undefined> {
    yield* this.counts.keys();
  }

  /** [event, count] pairs in table order. */
  *entries(): Generator<[E, number], void, undefined> {
    yield* this.counts.entries();
  }

  /** Deep copy: counts, total and prior. */
  clone(): CountingMultinomial<E> {
    const copy = new CountingMultinomial<E>(clonePrior(this.currentPrior));
    copy.counts = new Map(this.counts);
    copy.runningTotal = this.runningTotal;
    return copy;
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Append the counts record then the prior record. Nothing is appended if
   * the prior cannot be encoded.
   *
   * @throws RangeError for a symmetric prior whose n cannot be recovered
   */
  writeTo(writer: ByteWriter, codec: EventCodec<E>): void {
    const prior = encodePrior(this.currentPrior, codec);
    writeCounts(writer, this.runningTotal, this.counts, codec);
    writer.writeBytes(prior);
  }

  /**
   * Replace this instance's state from a stream.
   *
   * Counts are cleared. An exhausted stream leaves them cleared and the
   * prior as it was. Nothing changes if the record is malformed.
   */
  readFrom(reader: ByteReader, codec: EventCodec<E>, options: DecodeOptions = {}): void {
    const record = readCounts(reader, codec, options);
    const prior = readPrior(reader, codec, options);

    this.counts = record?.counts ?? new Map<E, number>();
    this.runningTotal = record?.total ?? 0;
    if (prior !== undefined) this.currentPrior = prior;

    log.debug('multinomial loaded', {
      entries: this.counts.size,
      total: this.runningTotal,
      priorKind: this.currentPrior.kind,
      priorLoaded: prior !== undefined,
    });
  }

  toBytes(codec: EventCodec<E>): Uint8Array {
    const writer = new ByteWriter();
    this.writeTo(writer, codec);
    return writer.finish();
  }

  /**
   * Build from a decoded counts record; its total is taken as is, so the
   * record must already have unique events summing to it.
   */
  static fromRecord<E>(record: CountsRecord<E>, prior: DirichletPrior<E>): CountingMultinomial<E> {
    const multinomial = new CountingMultinomial<E>(prior);
    multinomial.counts = new Map(record.counts);
    multinomial.runningTotal = record.total;
    return multinomial;
  }

  static fromBytes<E>(
    bytes: Uint8Array,
    codec: EventCodec<E>,
    options: DecodeOptions = {},
  ): CountingMultinomial<E> {
    const multinomial = new CountingMultinomial<E>();
    multinomial.readFrom(new ByteReader(bytes), codec, options);
    return multinomial;
  }
}

/** Exchange the priors of two multinomials. */
export function swapPriors<E>(a: CountingMultinomial<E>, b: CountingMultinomial<E>): void {
  b.setPrior(a.setPrior(b.prior));
}
