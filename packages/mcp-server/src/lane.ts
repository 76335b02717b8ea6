/**
 * Promise-chain mutex. Tasks run one at a time in submission order; each
 * caller gets its own task's outcome.
 */
export class CommandLane {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private running = false;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(async () => {
      this.waiting--;
      this.running = true;
      try {
        return await task();
      } finally {
        this.running = false;
      }
    });
    // The caller owns the outcome; the tail only orders the next task.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Tasks submitted but not yet started. */
  get depth(): number {
    return this.waiting;
  }

  /** A task is running or waiting to run. */
  get busy(): boolean {
    return this.running || this.waiting > 0;
  }
}
