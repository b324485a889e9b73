import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { ZodError } from 'zod';

import type { AppConfig } from './config/env';
import type { ErrorReader } from './domain/ports/ErrorReader';
import type { ErrorWriter } from './domain/ports/ErrorWriter';
import { AppError, errorMessage } from './libs/errors';
import type { Logger } from './libs/logger';

import { makeIngestWebhook } from './usecases/ingest-webhook';
import { makeGetLatestError, makeListErrors } from './usecases/read-errors';

import { webhookController } from './controllers/webhook.controller';
import { errorsController } from './controllers/errors.controller';
import { infoController } from './controllers/info.controller';
import { webhookRoutes } from './routes/webhook.routes';
import { errorsRoutes } from './routes/errors.routes';
import { infoRoutes } from './routes/info.routes';

export type AppDeps = {
  config: AppConfig;
  logger: Logger;
  store: ErrorWriter & ErrorReader;
  now?: () => Date;
};

function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser and http-errors put the status on the error
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createApp({ config, logger, store, now }: AppDeps): Express {
  const ingest = makeIngestWebhook({ writer: store, config, logger, now });
  const getLatest = makeGetLatestError(store);
  const list = makeListErrors(store, {
    defaultLimit: config.errorsDefaultLimit,
    maxLimit: config.errorsMaxLimit,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(cors());
  app.use(pinoHttp({ logger }));

  app.use('/', webhookRoutes(webhookController({ ingest }), { bodyLimit: config.webhookBodyLimit }));
  app.use('/', errorsRoutes(errorsController({ getLatest, list })));
  app.use('/', infoRoutes(infoController(config)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found' });
  });

  // error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'invalid_query', issues: err.issues });
      return;
    }
    const status = statusOf(err);
    if (status >= 500) logger.error({ err }, 'request failed');
    else logger.warn({ err }, 'request rejected');
    res.status(status).json({ error: errorMessage(err) || 'Internal error' });
  });

  return app;
}
