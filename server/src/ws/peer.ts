import { v4 as uuid } from 'uuid';
import { DeliveryError } from '../lib/errors.js';
import { Heartbeat } from '../lib/heartbeat.js';
import { logger } from '../lib/logger.js';
import { WriteGate } from '../lib/writeGate.js';
import type { ClientRole, HubEvent, RelaySocket } from '../types.js';

export interface PeerOptions {
  heartbeatMs: number;
  pongTimeoutMs: number;
  /** Deadline for events and pings. Frame sends pass their own. */
  sendTimeoutMs: number;
}

/**
 * One accepted connection together with the resources it owns: its write gate
 * and its heartbeat. Sessions hold the Peer; the registry only routes to it.
 */
export class Peer {
  readonly id: string = uuid();
  private readonly gate = new WriteGate();
  private heartbeat?: Heartbeat;
  private disposed = false;

  constructor(
    readonly role: ClientRole,
    readonly socket: RelaySocket,
    private readonly options: PeerOptions,
    readonly remoteAddress?: string,
  ) {}

  get isOpen(): boolean {
    return !this.disposed && this.socket.readyState === this.socket.OPEN;
  }

  /** Starts pinging and arms the read deadline; any inbound message or pong re-arms it. */
  startHeartbeat(): void {
    if (this.heartbeat || this.disposed) return;
    const heartbeat = new Heartbeat({
      intervalMs: this.options.heartbeatMs,
      timeoutMs: this.options.pongTimeoutMs,
      ping: () => this.ping(),
      onExpired: () => {
        logger.info({ peerId: this.id, role: this.role }, 'heartbeat_expired');
        this.terminate();
      },
      onPingFailed: (err) => {
        logger.debug({ err, peerId: this.id }, 'ping_failed');
      },
    });
    this.socket.on('pong', () => heartbeat.touch());
    this.socket.on('message', () => heartbeat.touch());
    this.heartbeat = heartbeat;
    heartbeat.start();
  }

  sendEvent(event: HubEvent): Promise<void> {
    const data = JSON.stringify(event);
    return this.gate.run(() => this.write((cb) => this.socket.send(data, cb), this.options.sendTimeoutMs));
  }

  sendFrame(message: Buffer, timeoutMs: number): Promise<void> {
    return this.gate.run(() => this.write((cb) => this.socket.send(message, cb), timeoutMs));
  }

  ping(): Promise<void> {
    return this.gate.run(() =>
      this.write((cb) => this.socket.ping(undefined, undefined, cb), this.options.sendTimeoutMs),
    );
  }

  /** Graceful close. Releases the heartbeat straight away. */
  close(code = 1000, reason = ''): void {
    this.dispose();
    if (this.socket.readyState === this.socket.OPEN) {
      this.socket.close(code, reason);
    }
  }

  /** Drops the transport without a closing handshake. */
  terminate(): void {
    this.dispose();
    this.socket.terminate();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.heartbeat?.stop();
  }

  private write(op: (cb: (err?: Error) => void) => void, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new DeliveryError(this.id, 'connection_closed'));
        return;
      }
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        reject(new DeliveryError(this.id, 'send_timeout'));
      }, timeoutMs);
      try {
        op((err) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          if (err) {
            reject(new DeliveryError(this.id, 'send_failed', err));
          } else {
            resolve();
          }
        });
      } catch (err) {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(new DeliveryError(this.id, 'send_failed', err));
      }
    });
  }
}
