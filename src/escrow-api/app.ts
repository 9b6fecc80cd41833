import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';
import type { EscrowServices } from './services';

export interface AppOptions {
  corsOrigin?: string;
  logRequests?: boolean;
}

export function createApp(services: EscrowServices, options: AppOptions = {}) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? false }));
  app.use(express.json({ limit: '100kb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, createApiRouter(services));

  app.use(errorHandler);

  return app;
}
