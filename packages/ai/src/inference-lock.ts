/**
 * @module inference-lock
 * Serializes access to the inference engine.
 *
 * The runtime session must not run two inferences at once, so every call
 * queues behind the previous one. A failed call releases the lock like a
 * successful one.
 */

export class InferenceLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Calls queued or running. */
  get pending(): number {
    return this.waiting;
  }

  /** Run `fn` once every earlier holder has finished. */
  run<T>(fn: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(fn).finally(() => {
      this.waiting--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
