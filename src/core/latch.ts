/**
 * One-shot completion signal.
 *
 * Released exactly once by its owner; any number of waiters observe the
 * release through `wait()`.
 */
export class Latch {
  private released = false;
  private release: () => void = () => undefined;
  private readonly promise: Promise<void>;

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Releases all waiters. Later calls have no effect.
   */
  countDown(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.release();
  }

  wait(): Promise<void> {
    return this.promise;
  }
}
