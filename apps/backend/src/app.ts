import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestContext, type AccessLogOptions } from './middleware/requestContext.js';
import { setupRoutes } from './routes/index.js';
import type { ServiceContext } from './services/index.js';

export type AppOptions = {
  services: ServiceContext;
  corsAllowOrigin?: string;
  jsonBodyLimit?: string;
  accessLog?: AccessLogOptions;
};

export function createApp(options: AppOptions): Express {
  const app = express();

  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  app.use(requestContext(options.accessLog ?? { sampleRate: 1, slowMs: 2000 }));
  // JSON API only: no pages to protect with a CSP.
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(
    cors({
      origin: options.corsAllowOrigin ?? '*',
      allowedHeaders: ['Content-Type', 'user-id', 'X-Request-Id'],
      exposedHeaders: ['X-Request-Id'],
    })
  );
  app.use(express.json({ limit: options.jsonBodyLimit ?? '1mb' }));

  setupRoutes(app, options.services);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
