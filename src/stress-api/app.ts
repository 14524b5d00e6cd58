import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter, type ApiDependencies } from './routes/index';

export function createApp(deps: ApiDependencies) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (config.nodeEnv !== 'test') app.use(requestLogger);

  app.use(API_PREFIX, createApiRouter(deps));

  app.use(errorHandler);

  return app;
}
