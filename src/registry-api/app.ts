import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRegistry } from '@core/registry';
import type { Registry } from '@core/registry';
import { config } from './config';
import { errorHandler, notFoundHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

/**
 * Builds the HTTP application around a registry. Stores live as long as the
 * registry does; nothing is persisted.
 */
export function createApp(registry: Registry = createRegistry()): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.clientUrl }));
  app.use(express.json({ limit: config.bodyLimit }));
  if (config.logRequests) {
    app.use(requestLogger);
  }

  app.use(createApiRouter(registry));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
