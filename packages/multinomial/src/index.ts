// ---------------------------------------------------------------------------
// @dirichlet-counts/multinomial
// Dirichlet prior + counting multinomial: smoothed probabilities from
// sparse counts, weighted sampling, merging and binary persistence.
// ---------------------------------------------------------------------------

// Types
export { createPRNG } from './types.js';
export type { PRNG } from './types.js';

// Errors
export { KeyNotFoundError, SamplingError, InvalidSnapshotError } from './errors.js';
export { MalformedStreamError } from '@dirichlet-counts/codec';

// Codecs
export {
  ByteReader,
  ByteWriter,
  integerEventCodec,
  numberEventCodec,
  textEventCodec,
} from '@dirichlet-counts/codec';
export type { EventCodec } from '@dirichlet-counts/codec';

// Dirichlet prior
export {
  makeSymmetric,
  makeAsymmetric,
  pseudoCount,
  totalPseudoCount,
  impliedVocabularySize,
  encodableVocabularySize,
  clonePrior,
  priorsEqual,
  describePrior,
  ZERO_PRIOR,
} from './dirichlet-prior.js';
export type { DirichletPrior, SymmetricPrior, AsymmetricPrior } from './dirichlet-prior.js';

// Counting multinomial
export { CountingMultinomial, swapPriors } from './counting-multinomial.js';

// Persistence
export {
  writePrior,
  readPrior,
  encodePrior,
  decodePrior,
  writeCounts,
  readCounts,
  PRIOR_TAG_SYMMETRIC,
  PRIOR_TAG_ASYMMETRIC,
} from './persistence.js';
export type { DecodeOptions, CountsRecord } from './persistence.js';

// Snapshots
export {
  toSnapshot,
  fromSnapshot,
  priorToSnapshot,
  priorFromSnapshot,
  multinomialSnapshotSchema,
  priorSnapshotSchema,
  SNAPSHOT_VERSION,
} from './snapshot.js';
export type { MultinomialSnapshot, PriorSnapshot, EventKey } from './snapshot.js';

// Logging
export { log, setLogLevel, setLogSink } from './log.js';
export type { LogEntry, LogSink, EntryLevel } from './log.js';
