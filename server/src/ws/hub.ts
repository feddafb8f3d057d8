import { config } from '../config.js';
import { DeliveryError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { ConnectionRegistry, type RegistryStats } from '../lib/registry.js';
import type { ConnectParams, HubEvent, ManifestSnapshot, RelaySocket } from '../types.js';
import { IngestSession } from './ingestSession.js';
import { Peer, type PeerOptions } from './peer.js';
import { ViewerSession } from './viewerSession.js';

export interface HubOptions extends PeerOptions {
  defaultRoom: string;
  /** Per-viewer deadline for one frame; a stalled viewer is evicted after it. */
  frameSendTimeoutMs: number;
  /** Frames an ingest session keeps while a broadcast is in flight. */
  maxFrameQueue: number;
}

export interface BroadcastResult {
  delivered: number;
  failed: number;
}

export function hubOptionsFromConfig(): HubOptions {
  return {
    defaultRoom: config.defaultRoom,
    heartbeatMs: config.heartbeatMs,
    pongTimeoutMs: config.pongTimeoutMs,
    sendTimeoutMs: config.sendTimeoutMs,
    frameSendTimeoutMs: config.frameSendTimeoutMs,
    maxFrameQueue: config.maxFrameQueue,
  };
}

export class Hub {
  readonly registry = new ConnectionRegistry<Peer>();
  readonly options: HubOptions;

  constructor(options: Partial<HubOptions> = {}) {
    this.options = { ...hubOptionsFromConfig(), ...options };
  }

  onIngestConnect(socket: RelaySocket, params: ConnectParams = {}): IngestSession {
    const peer = new Peer('ingest', socket, this.options, params.remoteAddress);
    return new IngestSession(this, peer, params);
  }

  onViewerConnect(socket: RelaySocket, params: ConnectParams = {}): ViewerSession {
    const peer = new Peer('viewer', socket, this.options, params.remoteAddress);
    return new ViewerSession(this, peer, params);
  }

  manifest(): ManifestSnapshot {
    return { type: 'manifest', stream: this.registry.allMeta() };
  }

  stats(): RegistryStats {
    return this.registry.stats();
  }

  broadcastEvent(room: string, event: HubEvent): Promise<BroadcastResult> {
    return this.deliver(room, (viewer) => viewer.sendEvent(event));
  }

  broadcastFrame(room: string, message: Buffer): Promise<BroadcastResult> {
    return this.deliver(room, (viewer) => viewer.sendFrame(message, this.options.frameSendTimeoutMs));
  }

  /** Closes every registered connection; their sessions clean up on the resulting close events. */
  shutdown(code = 1001, reason = 'Server shutting down'): void {
    const { ingest, viewers } = this.registry.connections();
    for (const peer of [...ingest, ...viewers]) {
      peer.close(code, reason);
    }
    logger.info({ ingest: ingest.length, viewers: viewers.length }, 'hub_shutdown');
  }

  private async deliver(room: string, send: (viewer: Peer) => Promise<void>): Promise<BroadcastResult> {
    // Viewers already closing (shutdown, displacement) are skipped, not evicted.
    const viewers = this.registry.viewersOf(room).filter((viewer) => viewer.isOpen);
    if (viewers.length === 0) {
      return { delivered: 0, failed: 0 };
    }

    const results = await Promise.allSettled(viewers.map(send));
    const failed: Peer[] = [];
    let delivered = 0;
    results.forEach((result, index) => {
      const viewer = viewers[index];
      if (result.status === 'fulfilled') {
        delivered += 1;
      } else if (result.reason instanceof DeliveryError && result.reason.code === 'connection_closed') {
        logger.debug({ peerId: viewer.id, room }, 'viewer_closed_before_delivery');
      } else {
        logger.warn({ err: result.reason, peerId: viewer.id, room }, 'viewer_delivery_failed');
        failed.push(viewer);
      }
    });

    if (failed.length > 0) {
      for (const viewer of this.registry.evictViewers(room, failed)) {
        logger.info({ peerId: viewer.id, room }, 'viewer_evicted');
        viewer.terminate();
      }
    }

    return { delivered, failed: failed.length };
  }
}
