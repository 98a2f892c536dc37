import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import type { ClientSource } from './db.js';
import { notFound } from './errors.js';
import type { Logger } from './logger.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createReportsRouter } from './routes/reports.js';

export type AppDeps = {
  db: ClientSource;
  logger: Logger;
  openApiDocument?: Record<string, unknown>;
};

export function createApp({ db, logger, openApiDocument }: AppDeps): Express {
  const httpLogger = logger.child({ component: 'http' });

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(
    morgan('combined', {
      stream: { write: (line: string) => httpLogger.info(line.trimEnd()) },
    })
  );

  app.use('/health', createHealthRouter(db));

  if (openApiDocument) {
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
    app.get('/openapi.json', (_req, res) => {
      res.json(openApiDocument);
    });
  }

  app.use(createReportsRouter(db));

  app.use((_req, _res, next) => {
    next(notFound('route not found'));
  });
  app.use(createErrorHandler(httpLogger));

  return app;
}
