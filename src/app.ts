import express, { type ErrorRequestHandler } from 'express';

import { createAnalyzeRouter } from './routes/analyze';
import { createAudioRouter } from './routes/audio';
import { createHealthRouter } from './routes/health';
import { createModelsRouter } from './routes/models';
import { createResultRouter } from './routes/result';
import { createSessionsRouter } from './routes/sessions';
import { createUploadRouter } from './routes/upload';
import type { AppServices } from './services';
import logger from './util/logger';

const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : 500;

  if (status >= 500) {
    logger.error({ err: error }, 'Unhandled request error.');
    res.status(500).json({ error: 'Internal server error' });
    return;
  }

  res.status(status).json({ error: error instanceof Error ? error.message : 'Request failed' });
};

export const createApp = (services: AppServices): express.Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/upload', createUploadRouter());
  app.use('/sessions', createSessionsRouter(services.sessions));
  app.use('/analyze', createAnalyzeRouter(services));
  app.use('/result', createResultRouter());
  app.use('/audio', createAudioRouter(services.synthesizer));
  app.use('/models', createModelsRouter(services));

  if (services.config.diagnostics) {
    app.use('/health', createHealthRouter(services));
  }

  app.use(errorHandler);

  return app;
};
