import type { RawData } from 'ws';

export type ClientRole = 'ingest' | 'viewer';

export interface StreamMeta {
  device_id: string;
  room: string;
  width: number;
  height: number;
  fps: number;
  /** Epoch milliseconds of the latest registration for this device. */
  last_seen: number;
}

export type StreamDescriptor = Omit<StreamMeta, 'last_seen'>;

export type HubEvent =
  | { type: 'manifest'; streams: StreamMeta[] }
  | { type: 'join'; stream: StreamMeta }
  | { type: 'leave'; device_id: string };

/** Response body of the point-in-time manifest query. */
export interface ManifestSnapshot {
  type: 'manifest';
  stream: StreamMeta[];
}

export interface ConnectParams {
  room?: string;
  token?: string;
  remoteAddress?: string;
}

/**
 * The part of a `ws` WebSocket the relay relies on. Anything shaped like this
 * (including the in-process fakes used by the tests) can be handed to the hub.
 */
export interface RelaySocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: Buffer | string, cb?: (err?: Error) => void): void;
  ping(data?: unknown, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): this;
  on(event: 'pong', listener: () => void): this;
  on(event: 'close', listener: (code: number) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}
