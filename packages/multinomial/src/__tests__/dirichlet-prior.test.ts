// ---------------------------------------------------------------------------
// Tests for the Dirichlet prior (symmetric / asymmetric)
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  makeSymmetric,
  makeAsymmetric,
  pseudoCount,
  totalPseudoCount,
  impliedVocabularySize,
  clonePrior,
  priorsEqual,
  describePrior,
  ZERO_PRIOR,
} from '../dirichlet-prior.js';
import { KeyNotFoundError } from '../errors.js';

// ---------------------------------------------------------------------------
// Symmetric
// ---------------------------------------------------------------------------

describe('makeSymmetric', () => {
  it('gives every event the same pseudo-count', () => {
    const prior = makeSymmetric(0.1, 3);
    expect(pseudoCount(prior, 'a')).toBe(0.1);
    expect(pseudoCount(prior, 'never-seen')).toBe(0.1);
    expect(totalPseudoCount(prior)).toBeCloseTo(0.3, 12);
  });

  it('accepts an empty vocabulary', () => {
    const prior = makeSymmetric(2, 0);
    expect(totalPseudoCount(prior)).toBe(0);
    expect(pseudoCount(prior, 42)).toBe(2);
  });

  it('rejects a non-finite alpha', () => {
    expect(() => makeSymmetric(Number.NaN, 3)).toThrow(RangeError);
    expect(() => makeSymmetric(Infinity, 3)).toThrow(RangeError);
  });

  it('rejects a negative or fractional vocabulary size', () => {
    expect(() => makeSymmetric(1, -1)).toThrow(RangeError);
    expect(() => makeSymmetric(1, 2.5)).toThrow(RangeError);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(makeSymmetric(1, 1))).toBe(true);
  });

  it('ZERO_PRIOR has no mass', () => {
    expect(ZERO_PRIOR.alpha).toBe(0);
    expect(totalPseudoCount(ZERO_PRIOR)).toBe(0);
  });
});

describe('impliedVocabularySize', () => {
  it('recovers n from alphaSum / alpha', () => {
    expect(impliedVocabularySize(makeSymmetric(0.1, 3))).toBe(3);
    expect(impliedVocabularySize(makeSymmetric(-0.5, 8))).toBe(8);
  });

  it('reports 0 when alpha is 0', () => {
    expect(impliedVocabularySize(makeSymmetric(0, 10))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Asymmetric
// ---------------------------------------------------------------------------

describe('makeAsymmetric', () => {
  it('looks up per-event weights', () => {
    const prior = makeAsymmetric([['x', 0.5], ['y', 1.5]]);
    expect(pseudoCount(prior, 'x')).toBe(0.5);
    expect(pseudoCount(prior, 'y')).toBe(1.5);
    expect(totalPseudoCount(prior)).toBe(2);
  });

  it('throws KeyNotFoundError for events it was not built with', () => {
    const prior = makeAsymmetric([['x', 0.5], ['y', 1.5]]);
    expect(() => pseudoCount(prior, 'z')).toThrow(KeyNotFoundError);
    try {
      pseudoCount(prior, 'z');
    } catch (err) {
      expect(err).toBeInstanceOf(KeyNotFoundError);
      if (err instanceof KeyNotFoundError) expect(err.event).toBe('z');
    }
  });

  it('keeps the last weight of a duplicate but sums every weight', () => {
    const prior = makeAsymmetric([['x', 1], ['y', 2], ['x', 4]]);
    expect(pseudoCount(prior, 'x')).toBe(4);
    expect(prior.weights.size).toBe(2);
    expect(totalPseudoCount(prior)).toBe(7);
  });

  it('consumes a one-shot iterable', () => {
    function* pairs(): Generator<[number, number]> {
      yield [1, 0.25];
      yield [2, 0.75];
    }
    const prior = makeAsymmetric(pairs());
    expect(pseudoCount(prior, 2)).toBe(0.75);
    expect(totalPseudoCount(prior)).toBe(1);
  });

  it('builds an empty prior from no pairs', () => {
    const prior = makeAsymmetric<string>([]);
    expect(totalPseudoCount(prior)).toBe(0);
    expect(() => pseudoCount(prior, 'a')).toThrow(KeyNotFoundError);
  });
});

// ---------------------------------------------------------------------------
// Copy / equality / description
// ---------------------------------------------------------------------------

describe('clonePrior', () => {
  it('copies the weight table instead of sharing it', () => {
    const prior = makeAsymmetric([['x', 1]]);
    const copy = clonePrior(prior);
    expect(copy).not.toBe(prior);
    expect(copy.kind).toBe('asymmetric');
    if (copy.kind === 'asymmetric') {
      expect(copy.weights).not.toBe(prior.weights);
    }
    expect(priorsEqual(copy, prior)).toBe(true);
  });

  it('preserves the raw alphaSum of a prior built with duplicates', () => {
    const prior = makeAsymmetric([['x', 1], ['x', 2]]);
    expect(totalPseudoCount(clonePrior(prior))).toBe(3);
  });

  it('copies symmetric priors', () => {
    const prior = makeSymmetric(0.5, 4);
    const copy = clonePrior(prior);
    expect(copy).not.toBe(prior);
    expect(priorsEqual(copy, prior)).toBe(true);
  });
});

describe('priorsEqual', () => {
  it('distinguishes variants', () => {
    expect(priorsEqual<string>(makeSymmetric(1, 1), makeAsymmetric([['a', 1]]))).toBe(false);
    expect(priorsEqual<string>(makeAsymmetric([['a', 1]]), makeSymmetric(1, 1))).toBe(false);
  });

  it('compares weights per event', () => {
    expect(priorsEqual(makeAsymmetric([['a', 1], ['b', 2]]), makeAsymmetric([['b', 2], ['a', 1]]))).toBe(true);
    expect(priorsEqual(makeAsymmetric([['a', 1], ['b', 2]]), makeAsymmetric([['a', 2], ['b', 1]]))).toBe(false);
  });

  it('compares alpha and alphaSum', () => {
    expect(priorsEqual(makeSymmetric(1, 2), makeSymmetric(1, 2))).toBe(true);
    expect(priorsEqual(makeSymmetric(1, 2), makeSymmetric(1, 3))).toBe(false);
    expect(priorsEqual(makeSymmetric(2, 1), makeSymmetric(1, 2))).toBe(false);
  });
});

describe('describePrior', () => {
  it('summarizes each variant', () => {
    expect(describePrior(makeSymmetric(0.5, 4))).toBe('symmetric(alpha=0.5, n=4, sum=2)');
    expect(describePrior(makeAsymmetric([['x', 0.5], ['y', 1.5]]))).toBe('asymmetric(2 events, sum=2)');
  });
});

// ---------------------------------------------------------------------------
// Property-based tests
// ---------------------------------------------------------------------------

describe('Property-based tests', () => {
  const arbWeight = fc.double({ min: -10, max: 10, noNaN: true });

  it('symmetric: every event gets alpha and the total is n * alpha', () => {
    fc.assert(fc.property(
      fc.double({ min: -100, max: 100, noNaN: true }),
      fc.nat({ max: 100_000 }),
      fc.string(),
      (alpha, n, event) => {
        const prior = makeSymmetric(alpha, n);
        expect(pseudoCount(prior, event)).toBe(alpha);
        expect(totalPseudoCount(prior)).toBe(n * alpha);
      },
    ), { numRuns: 200 });
  });

  it('asymmetric: alphaSum is the raw input sum, the table holds the last writer', () => {
    fc.assert(fc.property(
      fc.array(fc.tuple(fc.constantFrom('a', 'b', 'c'), arbWeight), { maxLength: 30 }),
      (pairs) => {
        const prior = makeAsymmetric(pairs);
        const rawSum = pairs.reduce((sum, [, w]) => sum + w, 0);
        expect(totalPseudoCount(prior)).toBe(rawSum);

        const last = new Map<string, number>();
        for (const [e, w] of pairs) last.set(e, w);
        for (const e of ['a', 'b', 'c']) {
          const expected = last.get(e);
          if (expected === undefined) {
            expect(() => pseudoCount(prior, e)).toThrow(KeyNotFoundError);
          } else {
            expect(pseudoCount(prior, e)).toBe(expected);
          }
        }
      },
    ), { numRuns: 300 });
  });
});
