/** Raised when a byte stream ends mid-record or carries an impossible value. */
export class MalformedStreamError extends Error {
  constructor(
    public readonly reason: string,
    public readonly offset: number,
  ) {
    super(`Malformed stream at byte ${offset}: ${reason}`)
    this.name = 'MalformedStreamError'
  }
}
