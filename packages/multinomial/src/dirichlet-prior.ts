// ---------------------------------------------------------------------------
// Dirichlet Prior: symmetric or asymmetric pseudo-counts
// ---------------------------------------------------------------------------

import { KeyNotFoundError } from './errors.js';

/** One pseudo-count `alpha` shared by every event, seen or not. */
export interface SymmetricPrior {
  readonly kind: 'symmetric';
  readonly alpha: number;
  /** n * alpha for the vocabulary size given at construction. Cached. */
  readonly alphaSum: number;
}

/** An explicit pseudo-count per event. Other events have none. */
export interface AsymmetricPrior<E> {
  readonly kind: 'asymmetric';
  readonly weights: ReadonlyMap<E, number>;
  /** Raw sum of the weights as supplied, duplicates included. */
  readonly alphaSum: number;
}

/** Immutable once built; replace the whole value to change it. */
export type DirichletPrior<E> = SymmetricPrior | AsymmetricPrior<E>;

/**
 * Build a symmetric prior over a vocabulary of `n` events.
 *
 * @param alpha Pseudo-count per event (finite)
 * @param n Vocabulary size (non-negative integer, may be 0)
 */
export function makeSymmetric(alpha: number, n: number): SymmetricPrior {
  if (!Number.isFinite(alpha)) {
    throw new RangeError(`Symmetric prior alpha must be finite, got ${alpha}`);
  }
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Vocabulary size must be a non-negative integer, got ${n}`);
  }
  const prior: SymmetricPrior = { kind: 'symmetric', alpha, alphaSum: n * alpha };
  return Object.freeze(prior);
}

/**
 * Build an asymmetric prior from (event, weight) pairs, consumed once.
 *
 * A repeated event keeps its last weight in the table, but every weight is
 * still added to alphaSum. The two can therefore disagree when the input
 * has duplicates.
 */
export function makeAsymmetric<E>(pairs: Iterable<readonly [E, number]>): AsymmetricPrior<E> {
  const weights = new Map<E, number>();
  let alphaSum = 0;
  for (const [event, weight] of pairs) {
    weights.set(event, weight);
    alphaSum += weight;
  }
  const prior: AsymmetricPrior<E> = { kind: 'asymmetric', weights, alphaSum };
  return Object.freeze(prior);
}

/** Symmetric prior with no mass: alpha = 0 over an empty vocabulary. */
export const ZERO_PRIOR: SymmetricPrior = makeSymmetric(0, 0);

/**
 * Pseudo-count for one event.
 *
 * @throws KeyNotFoundError for an asymmetric prior that lacks `event`
 */
export function pseudoCount<E>(prior: DirichletPrior<E>, event: E): number {
  switch (prior.kind) {
    case 'symmetric':
      return prior.alpha;
    case 'asymmetric': {
      const weight = prior.weights.get(event);
      if (weight === undefined) throw new KeyNotFoundError(event);
      return weight;
    }
  }
}

export function totalPseudoCount<E>(prior: DirichletPrior<E>): number {
  return prior.alphaSum;
}

/**
 * Vocabulary size implied by a symmetric prior: round(alphaSum / alpha).
 * Lossy when alpha is 0 (reported as 0).
 */
export function impliedVocabularySize(prior: SymmetricPrior): number {
  const n = Math.round(prior.alphaSum / prior.alpha);
  return Number.isSafeInteger(n) && n >= 0 ? n : 0;
}

/**
 * Vocabulary size to persist for a symmetric prior. Unlike
 * impliedVocabularySize, only alpha = 0 may lose n.
 *
 * @throws RangeError when alphaSum / alpha is not a safe non-negative integer
 *   (n * alpha overflowed)
 */
export function encodableVocabularySize(prior: SymmetricPrior): number {
  if (prior.alpha === 0) return 0;
  const n = Math.round(prior.alphaSum / prior.alpha);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(
      `Cannot recover a vocabulary size from alpha=${prior.alpha}, sum=${prior.alphaSum}`,
    );
  }
  return n;
}

/** Deep copy. Only an asymmetric prior owns anything worth copying. */
export function clonePrior<E>(prior: DirichletPrior<E>): DirichletPrior<E> {
  switch (prior.kind) {
    case 'symmetric':
      return Object.freeze({ ...prior });
    case 'asymmetric': {
      const copy: AsymmetricPrior<E> = {
        kind: 'asymmetric',
        weights: new Map(prior.weights),
        alphaSum: prior.alphaSum,
      };
      return Object.freeze(copy);
    }
  }
}

/** Structural equality: same variant, same alphaSum, same per-event weights. */
export function priorsEqual<E>(a: DirichletPrior<E>, b: DirichletPrior<E>): boolean {
  if (a.alphaSum !== b.alphaSum) return false;
  if (a.kind === 'symmetric') return b.kind === 'symmetric' && a.alpha === b.alpha;
  if (b.kind !== 'asymmetric' || a.weights.size !== b.weights.size) return false;
  for (const [event, weight] of a.weights) {
    if (b.weights.get(event) !== weight) return false;
  }
  return true;
}

export function describePrior<E>(prior: DirichletPrior<E>): string {
  switch (prior.kind) {
    case 'symmetric':
      return `symmetric(alpha=${prior.alpha}, n=${impliedVocabularySize(prior)}, sum=${prior.alphaSum})`;
    case 'asymmetric':
      return `asymmetric(${prior.weights.size} events, sum=${prior.alphaSum})`;
  }
}
