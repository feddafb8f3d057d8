import fs from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import { createApp } from './app.js';
import { config } from './config.js';
import { logger } from './lib/logger.js';
import { Hub } from './ws/hub.js';
import { registerWebSocketServer } from './ws/server.js';

const hub = new Hub();
const app = createApp(hub);

const server = config.tls
  ? https.createServer(
      {
        cert: fs.readFileSync(config.tls.certPath),
        key: fs.readFileSync(config.tls.keyPath),
      },
      app,
    )
  : http.createServer(app);
const endpoints = registerWebSocketServer(server, hub);

server.listen(config.port, config.host, () => {
  logger.info(
    {
      host: config.host,
      port: config.port,
      tls: Boolean(config.tls),
      ingest: config.ingestPath,
      view: config.viewerPath,
    },
    'server_started',
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'shutting_down');
  hub.shutdown();
  endpoints.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
