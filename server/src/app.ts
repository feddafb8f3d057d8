import express, { type ErrorRequestHandler, type Express } from 'express';
import cors from 'cors';
import { config } from './config.js';
import { formatErrorResponse } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { createHealthRouter } from './routes/health.js';
import { createManifestRouter } from './routes/manifest.js';
import type { Hub } from './ws/hub.js';

export function createApp(hub: Hub): Express {
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    }),
  );

  app.get('/', (_req, res) => {
    res.json({
      name: 'camhub relay',
      version: '0.1.0',
      ingest: config.ingestPath,
      view: config.viewerPath,
    });
  });

  app.use(createHealthRouter(hub));
  app.use(createManifestRouter(hub));

  app.use((_req, res) => {
    res.status(404).json({ error: 'NOT_FOUND' });
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    logger.error({ err, path: req.path }, 'http_error');
    res.status(500).json(formatErrorResponse(err));
  };
  app.use(onError);

  return app;
}
