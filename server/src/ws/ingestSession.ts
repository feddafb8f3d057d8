import type { RawData } from 'ws';
import { HandshakeError } from '../lib/errors.js';
import { createFrameEncoder } from '../lib/frameCodec.js';
import { logger } from '../lib/logger.js';
import type { ConnectParams, StreamDescriptor, StreamMeta } from '../types.js';
import type { Hub } from './hub.js';
import type { Peer } from './peer.js';
import { ingestHandshakeSchema, resolveRoom } from './schemas.js';
import { toBuffer } from './utils.js';

export type IngestState = 'awaiting_handshake' | 'streaming' | 'closed';

/**
 * Drives one producer connection: a JSON handshake describing the stream,
 * then binary frames relayed to the room until the connection goes away.
 *
 * Outbound work for the device (join, frames, leave) runs on a single task
 * chain, so viewers never see a frame before the join or after the leave.
 */
export class IngestSession {
  private currentState: IngestState = 'awaiting_handshake';
  private current?: StreamMeta;
  private encode?: (payload: Uint8Array) => Buffer;
  private tail: Promise<void> = Promise.resolve();
  private readonly backlog: Buffer[] = [];
  private pumping = false;
  private relayed = 0;
  private dropped = 0;

  constructor(
    private readonly hub: Hub,
    readonly peer: Peer,
    private readonly params: ConnectParams,
  ) {
    peer.socket.on('message', (data, isBinary) => this.onMessage(data, isBinary));
    peer.socket.on('close', (code) => this.onClose(code));
    peer.socket.on('error', (err) => {
      logger.warn({ err, peerId: peer.id, deviceId: this.current?.device_id }, 'ws_error');
    });
    peer.startHeartbeat();
    logger.info({ peerId: peer.id, ip: peer.remoteAddress }, 'ingest_connected');
  }

  get state(): IngestState {
    return this.currentState;
  }

  get stream(): StreamMeta | undefined {
    return this.current ? { ...this.current } : undefined;
  }

  /** Resolves once every queued broadcast for this device has finished. */
  idle(): Promise<void> {
    return this.tail;
  }

  private onMessage(data: RawData, isBinary: boolean): void {
    switch (this.currentState) {
      case 'awaiting_handshake':
        this.handshake(data);
        break;
      case 'streaming':
        if (!this.ownsDevice()) {
          this.backlog.length = 0;
          break;
        }
        if (isBinary) this.onFrame(toBuffer(data));
        break;
      case 'closed':
        break;
    }
  }

  private handshake(data: RawData): void {
    let descriptor: StreamDescriptor;
    try {
      descriptor = this.parseHandshake(data);
    } catch (err) {
      logger.warn({ err, peerId: this.peer.id }, 'ingest_handshake_rejected');
      this.currentState = 'closed';
      this.peer.close(1008, 'Invalid stream handshake');
      return;
    }

    const { stream, previous } = this.hub.registry.registerIngest(descriptor, this.peer);
    this.current = stream;
    this.encode = createFrameEncoder(stream.device_id);
    this.currentState = 'streaming';

    if (previous) {
      logger.info(
        { deviceId: stream.device_id, peerId: this.peer.id, replacedPeerId: previous.id },
        'ingest_replaced',
      );
      previous.close(4001, 'Device reconnected');
    }

    logger.info(
      { deviceId: stream.device_id, room: stream.room, peerId: this.peer.id },
      'ingest_registered',
    );
    this.enqueue(() => this.hub.broadcastEvent(stream.room, { type: 'join', stream }));
  }

  private parseHandshake(data: RawData): StreamDescriptor {
    let raw: unknown;
    try {
      raw = JSON.parse(toBuffer(data).toString('utf8'));
    } catch (err) {
      throw new HandshakeError(
        'stream handshake is not valid JSON',
        err instanceof Error ? err.message : undefined,
      );
    }

    const parsed = ingestHandshakeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HandshakeError('stream handshake is missing required fields', parsed.error.flatten());
    }

    const { device_id, width, height, fps } = parsed.data;
    return {
      device_id,
      room: resolveRoom(this.hub.options.defaultRoom, parsed.data.room, this.params.room),
      width,
      height,
      fps,
    };
  }

  private onFrame(frame: Buffer): void {
    this.backlog.push(frame);
    if (this.backlog.length > this.hub.options.maxFrameQueue) {
      this.backlog.shift();
      this.dropped += 1;
    }
    if (!this.pumping) {
      this.pumping = true;
      this.enqueue(() => this.pump());
    }
  }

  private async pump(): Promise<void> {
    try {
      let frame = this.backlog.shift();
      while (frame && this.current && this.encode && this.ownsDevice()) {
        await this.hub.broadcastFrame(this.current.room, this.encode(frame));
        this.relayed += 1;
        frame = this.backlog.shift();
      }
    } finally {
      this.pumping = false;
    }
  }

  /** False once this connection has been closed or displaced by a newer one for the same device. */
  private ownsDevice(): boolean {
    return (
      this.peer.isOpen &&
      this.current !== undefined &&
      this.hub.registry.ingestOf(this.current.device_id) === this.peer
    );
  }

  private onClose(code: number): void {
    const wasStreaming = this.currentState === 'streaming';
    this.currentState = 'closed';
    this.peer.dispose();
    this.backlog.length = 0;

    const stream = this.current;
    if (!wasStreaming || !stream) {
      logger.info({ peerId: this.peer.id, code }, 'ingest_disconnected');
      return;
    }

    const removed = this.hub.registry.unregisterIngest(stream.device_id, this.peer);
    logger.info(
      {
        peerId: this.peer.id,
        deviceId: stream.device_id,
        room: stream.room,
        code,
        relayed: this.relayed,
        dropped: this.dropped,
      },
      'ingest_disconnected',
    );
    if (removed) {
      this.enqueue(() =>
        this.hub.broadcastEvent(stream.room, { type: 'leave', device_id: stream.device_id }),
      );
    }
  }

  private enqueue(task: () => Promise<unknown>): void {
    this.tail = this.tail
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          logger.error(
            { err, peerId: this.peer.id, deviceId: this.current?.device_id },
            'ingest_task_failed',
          );
        },
      );
  }
}
