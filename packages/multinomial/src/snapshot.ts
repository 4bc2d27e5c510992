// ---------------------------------------------------------------------------
// JSON snapshots for string- or number-keyed multinomials
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { CountingMultinomial } from './counting-multinomial.js';
import {
  encodableVocabularySize,
  makeAsymmetric,
  makeSymmetric,
  type DirichletPrior,
} from './dirichlet-prior.js';
import { InvalidSnapshotError } from './errors.js';

export const SNAPSHOT_VERSION = 1;

const eventSchema = z.union([z.string(), z.number()]);

export const priorSnapshotSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('symmetric'),
    alpha: z.number(),
    vocabularySize: z.number().int().min(0),
  }),
  z.object({
    kind: z.literal('asymmetric'),
    weights: z.array(z.tuple([eventSchema, z.number()])),
  }),
]);

const countsSchema = z
  .array(z.tuple([eventSchema, z.number()]))
  .superRefine((pairs, ctx) => {
    const seen = new Set<string | number>();
    pairs.forEach(([event], index) => {
      if (seen.has(event)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 0],
          message: `Duplicate event ${JSON.stringify(event)}`,
        });
      }
      seen.add(event);
    });
  });

export const multinomialSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  /** Informational; the loaded total is the sum of `counts`. */
  total: z.number(),
  counts: countsSchema,
  prior: priorSnapshotSchema,
});

export type EventKey = z.infer<typeof eventSchema>;
export type PriorSnapshot = z.infer<typeof priorSnapshotSchema>;
export type MultinomialSnapshot = z.infer<typeof multinomialSnapshotSchema>;

export function priorToSnapshot<E extends EventKey>(prior: DirichletPrior<E>): PriorSnapshot {
  switch (prior.kind) {
    case 'symmetric':
      return { kind: 'symmetric', alpha: prior.alpha, vocabularySize: encodableVocabularySize(prior) };
    case 'asymmetric':
      return { kind: 'asymmetric', weights: Array.from(prior.weights) };
  }
}

export function priorFromSnapshot(snapshot: PriorSnapshot): DirichletPrior<EventKey> {
  switch (snapshot.kind) {
    case 'symmetric':
      return makeSymmetric(snapshot.alpha, snapshot.vocabularySize);
    case 'asymmetric':
      return makeAsymmetric(snapshot.weights);
  }
}

/** Plain-JSON view of a multinomial; same information as the binary record. */
export function toSnapshot<E extends EventKey>(multinomial: CountingMultinomial<E>): MultinomialSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    total: multinomial.total,
    counts: Array.from(multinomial.entries()),
    prior: priorToSnapshot(multinomial.prior),
  };
}

/**
 * Rebuild a multinomial from an untrusted snapshot (e.g. parsed JSON).
 * Events must be unique; the total is recomputed from the counts.
 *
 * @throws InvalidSnapshotError listing every schema violation
 */
export function fromSnapshot(input: unknown): CountingMultinomial<EventKey> {
  const result = multinomialSnapshotSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSnapshotError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const snapshot = result.data;
  let total = 0;
  for (const [, count] of snapshot.counts) total += count;
  return CountingMultinomial.fromRecord(
    { counts: new Map(snapshot.counts), total },
    priorFromSnapshot(snapshot.prior),
  );
}
