export interface HeartbeatOptions {
  /** Ping period. */
  intervalMs: number;
  /** Silence allowed before the peer is declared dead. */
  timeoutMs: number;
  /** Sends one ping. Rejections are reported to `onPingFailed`. */
  ping: () => Promise<void>;
  /** Called once when the deadline passes without `touch`. */
  onExpired: () => void;
  onPingFailed?: (err: unknown) => void;
}

/**
 * Rolling read-inactivity deadline plus a periodic ping ticker for one connection.
 */
export class Heartbeat {
  private deadline?: NodeJS.Timeout;
  private ticker?: NodeJS.Timeout;
  private stopped = false;

  constructor(private readonly options: HeartbeatOptions) {}

  get running(): boolean {
    return this.ticker !== undefined;
  }

  start(): void {
    if (this.stopped || this.ticker) return;
    this.touch();
    this.ticker = setInterval(() => {
      this.options.ping().catch((err: unknown) => this.options.onPingFailed?.(err));
    }, this.options.intervalMs);
    this.ticker.unref();
  }

  /** Pushes the deadline `timeoutMs` into the future. */
  touch(): void {
    if (this.stopped) return;
    if (this.deadline) clearTimeout(this.deadline);
    this.deadline = setTimeout(() => {
      this.stop();
      this.options.onExpired();
    }, this.options.timeoutMs);
    this.deadline.unref();
  }

  stop(): void {
    this.stopped = true;
    if (this.deadline) clearTimeout(this.deadline);
    if (this.ticker) clearInterval(this.ticker);
    this.deadline = undefined;
    this.ticker = undefined;
  }
}
