import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createDeedRouter } from './routes/deeds.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { PipelineDeps } from '../services/pipeline/index.js';

export function createApp(deps: PipelineDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', counties: deps.catalog.length, timestamp: new Date().toISOString() });
  });

  app.use(createDeedRouter(deps));

  app.use(errorHandler);

  return app;
}
