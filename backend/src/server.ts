import 'dotenv/config';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createPool } from './db.js';
import { createLogger } from './logger.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');
const openApiDocument = z.record(z.string(), z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));

const config = loadConfig();
const logger = createLogger(config.logLevel);
const pool = createPool(config.db);

pool.on('error', (err) => {
  logger.error({ err }, 'idle database client failed');
});

const app = createApp({ db: pool, logger, openApiDocument });

const server = app.listen(config.api.port, () => {
  logger.info({ port: config.api.port }, 'reporting api listening');
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, 'shutting down');
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'failed to close database pool');
        process.exit(1);
      }
    );
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
