import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { ClaimEngine } from '@core/engine';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export function createApp(engine: ClaimEngine) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (!config.isProd) app.use(requestLogger);

  app.use(API_PREFIX, createApiRouter(engine));

  app.use(errorHandler);
  return app;
}
