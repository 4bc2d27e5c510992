// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** An asymmetric prior was asked for an event it was not built with. */
export class KeyNotFoundError extends Error {
  constructor(public readonly event: unknown) {
    super(`No pseudo-count for event ${String(event)} in the asymmetric prior`);
    this.name = 'KeyNotFoundError';
  }
}

/**
 * Weighted sampling walked every seen event without the cumulative
 * probability reaching the drawn threshold.
 */
export class SamplingError extends Error {
  constructor(
    public readonly threshold: number,
    public readonly cumulative: number,
    public readonly candidates: number,
  ) {
    super(
      `Sampling failed: cumulative probability ${cumulative} over ${candidates} seen event(s) never reached ${threshold}`,
    );
    this.name = 'SamplingError';
  }
}

/** A JSON snapshot did not match the expected shape. */
export class InvalidSnapshotError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid multinomial snapshot: ${issues.join('; ')}`);
    this.name = 'InvalidSnapshotError';
  }
}
