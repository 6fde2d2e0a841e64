import type { Express } from 'express';
import { createImagesRouter } from '../api/v1/images/router.js';
import type { ServiceContext } from '../services/index.js';

export function setupRoutes(app: Express, services: ServiceContext) {
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/v1/images', createImagesRouter(services.images));
}
