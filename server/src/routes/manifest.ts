import { Router } from 'express';
import type { Hub } from '../ws/hub.js';

export function createManifestRouter(hub: Hub): Router {
  const router = Router();

  // Every registered stream across all rooms, at the moment of the request.
  router.get('/manifest', (_req, res) => {
    res.json(hub.manifest());
  });

  return router;
}
