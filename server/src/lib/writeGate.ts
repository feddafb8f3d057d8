/**
 * Exclusive-access gate for one connection's outbound side. Every send on a
 * socket goes through `run`, so a heartbeat ping, an event broadcast and a
 * frame broadcast never interleave on the same connection.
 */
export class WriteGate {
  private busy = false;
  private readonly waiters: Array<() => void> = [];

  /** Number of tasks waiting for the gate, not counting the one holding it. */
  get pending(): number {
    return this.waiters.length;
  }

  get locked(): boolean {
    return this.busy;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.busy) {
        this.busy = true;
        resolve();
      } else {
        this.waiters.push(resolve);
      }
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.busy = false;
    }
  }
}
