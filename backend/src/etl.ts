import { loadConfig, type AppConfig } from './config.js';
import type { ClientFactory } from './db.js';
import { createLogger, type Logger } from './logger.js';
import { runPipeline } from './services/pipeline.js';
import type { RemoteCollectionReader } from './services/remote-collection.js';

export type EtlDeps = {
  logger?: Logger;
  reader?: RemoteCollectionReader;
  clientFactory?: ClientFactory;
};

/** Runs one extraction and resolves to the process exit code. */
export async function main(
  env: NodeJS.ProcessEnv,
  { logger: given, reader, clientFactory }: EtlDeps = {}
): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    (given ?? createLogger()).fatal({ err }, 'invalid configuration');
    return 1;
  }

  const logger = given ?? createLogger(config.logLevel);
  try {
    const { rejections, ...summary } = await runPipeline({ config, logger, reader, clientFactory });
    logger.info(
      { ...summary, rejectedCartIds: rejections.map((rejection) => rejection.childId) },
      'extraction finished'
    );
    return 0;
  } catch (err) {
    logger.fatal({ err }, 'extraction failed');
    return 1;
  }
}
