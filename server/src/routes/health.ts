import { Router } from 'express';
import type { Hub } from '../ws/hub.js';

export function createHealthRouter(hub: Hub): Router {
  const router = Router();

  router.get('/healthcheck', (_req, res) => {
    res.type('text/plain').send('I am alive');
  });

  router.get('/health', (_req, res) => {
    const memory = process.memoryUsage();
    const stats = hub.stats();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      rooms: stats.rooms,
      viewers: stats.viewers,
      streams: stats.streams,
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
