// ---------------------------------------------------------------------------
// Dirichlet-Multinomial: Core Types
// ---------------------------------------------------------------------------

/** Uniform random source on [0, 1). `Math.random` fits; createPRNG gives a seeded one. */
export type PRNG = () => number;

/**
 * Mulberry32 PRNG. Deterministic for a given seed, which keeps sampling
 * reproducible in tests and simulations.
 */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
