import { logger } from '../lib/logger.js';
import type { ConnectParams } from '../types.js';
import type { Hub } from './hub.js';
import type { Peer } from './peer.js';
import { resolveRoom } from './schemas.js';

export type ViewerState = 'connected' | 'registered' | 'idle' | 'closed';

/**
 * Drives one viewer connection. The viewer is registered and sent its manifest
 * on construction; after that, frames and room events reach it from ingest
 * sessions, and this session only waits for the connection to end.
 */
export class ViewerSession {
  readonly room: string;
  private currentState: ViewerState = 'connected';
  private readonly manifestSent: Promise<void>;

  constructor(
    private readonly hub: Hub,
    readonly peer: Peer,
    params: ConnectParams,
  ) {
    this.room = resolveRoom(hub.options.defaultRoom, params.room);

    peer.socket.on('close', (code) => this.onClose(code));
    peer.socket.on('error', (err) => {
      logger.warn({ err, peerId: peer.id, room: this.room }, 'ws_error');
    });

    const streams = hub.registry.registerViewer(this.room, peer);
    this.currentState = 'registered';
    this.manifestSent = peer.sendEvent({ type: 'manifest', streams }).then(
      () => {
        if (this.currentState === 'registered') this.currentState = 'idle';
      },
      (err: unknown) => {
        logger.warn({ err, peerId: peer.id, room: this.room }, 'manifest_delivery_failed');
        this.hub.registry.unregisterViewer(this.room, peer);
        peer.terminate();
      },
    );
    peer.startHeartbeat();

    logger.info(
      { peerId: peer.id, room: this.room, streams: streams.length, ip: peer.remoteAddress },
      'viewer_registered',
    );
  }

  get state(): ViewerState {
    return this.currentState;
  }

  /** Resolves once the initial manifest has been written (or has failed). */
  idle(): Promise<void> {
    return this.manifestSent;
  }

  private onClose(code: number): void {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';
    this.hub.registry.unregisterViewer(this.room, this.peer);
    this.peer.dispose();
    logger.info({ peerId: this.peer.id, room: this.room, code }, 'viewer_disconnected');
  }
}
