/**
 * Per-key mutual exclusion.
 *
 * Tasks sharing a key run one at a time in call order; tasks with
 * different keys never wait on each other. A failing task releases the
 * key and its error reaches only its own caller.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The tail only orders the next task; `run` carries the outcome.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return run;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
