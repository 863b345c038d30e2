/**
 * Bounded pool for outbound publish and fallback attempts.
 *
 * At most `limit` tasks run at once; the rest wait in FIFO order. A
 * finishing task hands its slot straight to the next waiter.
 */
export class PublishPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(private readonly limit: number) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    const execution = this.execute(task);
    this.inFlight.add(execution);
    const forget = (): void => {
      this.inFlight.delete(execution);
    };
    execution.then(forget, forget);
    return execution;
  }

  /** Settles once every task accepted so far has finished. */
  async idle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  get size(): number {
    return this.inFlight.size;
  }

  private async execute<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.limit) {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    } else {
      this.active++;
    }

    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }
}
