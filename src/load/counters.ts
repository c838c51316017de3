/**
 * Counters shared by every client of a scenario.
 */

export interface CounterSnapshot {
  readonly produced: number;
  readonly consumed: number;
  readonly errors: number;
  /** Unix timestamp in milliseconds */
  readonly takenAt: number;
}

export class SharedCounters {
  private produced = 0;
  private consumed = 0;
  private errors = 0;

  incrementProduced(): void {
    this.produced++;
  }

  incrementConsumed(): void {
    this.consumed++;
  }

  incrementErrors(): void {
    this.errors++;
  }

  snapshot(): CounterSnapshot {
    return {
      produced: this.produced,
      consumed: this.consumed,
      errors: this.errors,
      takenAt: Date.now(),
    };
  }
}

/**
 * Cooperative stop flag shared by every client of a scenario.
 * Once set it stays set.
 */
export class DoneSignal {
  private done = false;

  get isSet(): boolean {
    return this.done;
  }

  set(): void {
    this.done = true;
  }
}
