/**
 * Monotonic sequence numbers shared by every catalog that uses the same
 * counter. Registrations to different catalogs interleave in one numbering.
 */
export class SequenceCounter {
  #current: number;

  constructor(start = 0) {
    this.#current = start;
  }

  /** The last value handed out, or the start value if none was. */
  get current(): number {
    return this.#current;
  }

  /** Advances and returns the new value. */
  next(): number {
    this.#current += 1;
    return this.#current;
  }
}

/**
 * Process-wide counter. Catalogs use it unless given their own.
 */
export const globalSequence = new SequenceCounter();
