import type { IncomingMessage, Server } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';
import type { ConnectParams } from '../types.js';
import type { Hub } from './hub.js';
import { connectQuerySchema } from './schemas.js';

export interface RelayEndpoints {
  ingest: WebSocketServer;
  viewer: WebSocketServer;
  close(): void;
}

export interface RelayEndpointOptions {
  ingestPath: string;
  viewerPath: string;
  maxFrameBytes: number;
  maxViewerMessageBytes: number;
}

const defaultEndpointOptions: RelayEndpointOptions = {
  ingestPath: config.ingestPath,
  viewerPath: config.viewerPath,
  maxFrameBytes: config.maxFrameBytes,
  maxViewerMessageBytes: config.maxViewerMessageBytes,
};

function connectParams(request: IncomingMessage, url: URL): ConnectParams {
  const query = connectQuerySchema.safeParse(Object.fromEntries(url.searchParams));
  return {
    room: query.success ? query.data.room : undefined,
    token: query.success ? query.data.token : undefined,
    remoteAddress: request.socket.remoteAddress,
  };
}

/**
 * Mounts the ingest and viewer endpoints on `httpServer`. Upgrades on any
 * other path are refused.
 */
export function registerWebSocketServer(
  httpServer: Server,
  hub: Hub,
  options: Partial<RelayEndpointOptions> = {},
): RelayEndpoints {
  const opts = { ...defaultEndpointOptions, ...options };
  const ingest = new WebSocketServer({ noServer: true, maxPayload: opts.maxFrameBytes });
  const viewer = new WebSocketServer({ noServer: true, maxPayload: opts.maxViewerMessageBytes });

  httpServer.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '/', 'http://localhost');
    const target =
      url.pathname === opts.ingestPath ? ingest : url.pathname === opts.viewerPath ? viewer : undefined;
    if (!target) {
      logger.debug({ path: url.pathname }, 'ws_upgrade_refused');
      socket.destroy();
      return;
    }
    target.handleUpgrade(request, socket, head, (client) => {
      target.emit('connection', client, request, url);
    });
  });

  ingest.on('connection', (socket: WebSocket, request: IncomingMessage, url: URL) => {
    const params = connectParams(request, url);
    logger.debug({ ip: params.remoteAddress, hasToken: Boolean(params.token) }, 'ws_ingest_upgrade');
    hub.onIngestConnect(socket, params);
  });

  viewer.on('connection', (socket: WebSocket, request: IncomingMessage, url: URL) => {
    const params = connectParams(request, url);
    logger.debug({ ip: params.remoteAddress, room: params.room }, 'ws_viewer_upgrade');
    hub.onViewerConnect(socket, params);
  });

  for (const wss of [ingest, viewer]) {
    wss.on('error', (err) => {
      logger.error({ err }, 'ws_server_error');
    });
  }

  return {
    ingest,
    viewer,
    close() {
      ingest.close();
      viewer.close();
    },
  };
}
