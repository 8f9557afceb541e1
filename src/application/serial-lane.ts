/**
 * Single-writer task lane.
 *
 * Every task submitted through `run()` starts only after the previous one
 * settled, so state owned by a component is never mutated by two callers
 * at once. Timers, lifecycle callbacks and host calls all queue here.
 *
 * A failing task rejects its own promise but never blocks the lane.
 */
export class SerialLane {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
