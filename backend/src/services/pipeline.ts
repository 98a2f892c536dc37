import type { AppConfig, LineItemPolicy } from '../config.js';
import { withConnection, type ClientFactory } from '../db.js';
import type { ReferentialRejection } from '../errors.js';
import type { Logger } from '../logger.js';
import { partition } from './referential-filter.js';
import { RemoteCollectionReader } from './remote-collection.js';
import { remoteCartSchema, remoteUserSchema } from './remote-schemas.js';
import { ensureSchema } from './schema.js';
import { upsertCarts, upsertUsers } from './upsert-writer.js';

export const PIPELINE_STATES = [
  'CONNECT',
  'ENSURE_SCHEMA',
  'EXTRACT_USERS',
  'SAVE_USERS',
  'EXTRACT_CARTS',
  'FILTER_AND_SAVE_CARTS',
  'CLOSE',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export type PipelineSummary = {
  usersExtracted: number;
  usersSaved: number;
  cartsExtracted: number;
  cartsSaved: number;
  cartsRejected: number;
  lineItemsWritten: number;
  lineItemsRemoved: number;
  lineItemPolicy: LineItemPolicy;
  rejections: ReferentialRejection[];
};

export type PipelineDeps = {
  config: AppConfig;
  logger: Logger;
  reader?: RemoteCollectionReader;
  clientFactory?: ClientFactory;
  onTransition?: (state: PipelineState) => void;
};

/**
 * One full extract/load run. States advance strictly forward; the first
 * failure stops the run, the connection is still ended, and the typed error
 * is rethrown as is.
 */
export async function runPipeline({
  config,
  logger: rootLogger,
  reader,
  clientFactory,
  onTransition,
}: PipelineDeps): Promise<PipelineSummary> {
  const logger = rootLogger.child({ component: 'pipeline' });
  const source =
    reader ??
    new RemoteCollectionReader({ baseUrl: config.source.baseUrl, pageSize: config.source.pageSize, logger: rootLogger });
  const { lineItemPolicy, writeBatchSize } = config.load;

  let state: PipelineState = 'CONNECT';
  const enter = (next: PipelineState) => {
    state = next;
    logger.info({ state }, 'pipeline state');
    onTransition?.(next);
  };

  enter('CONNECT');
  try {
    const summary = await withConnection(
      config.db,
      async (client) => {
        enter('ENSURE_SCHEMA');
        await ensureSchema(client);

        enter('EXTRACT_USERS');
        const users = await source.fetchAll('users', remoteUserSchema);

        enter('SAVE_USERS');
        const usersSaved = await upsertUsers(client, users, { batchSize: writeBatchSize });
        const userIds = new Set(users.map((user) => user.id));
        logger.info({ usersSaved, validUserIds: userIds.size }, 'users saved');

        enter('EXTRACT_CARTS');
        const carts = await source.fetchAll('carts', remoteCartSchema);

        enter('FILTER_AND_SAVE_CARTS');
        const { accepted, rejections } = partition(carts, userIds, {
          childId: (cart) => cart.id,
          parentId: (cart) => cart.userId,
          logger,
        });
        const written = await upsertCarts(client, accepted, { batchSize: writeBatchSize, lineItemPolicy });
        logger.info({ cartsSaved: written.carts, cartsRejected: rejections.length }, 'carts saved');

        return {
          usersExtracted: users.length,
          usersSaved,
          cartsExtracted: carts.length,
          cartsSaved: written.carts,
          cartsRejected: rejections.length,
          lineItemsWritten: written.lineItems,
          lineItemsRemoved: written.lineItemsRemoved,
          lineItemPolicy,
          rejections,
        };
      },
      { factory: clientFactory, logger }
    );

    enter('CLOSE');
    return summary;
  } catch (error) {
    logger.error({ state, err: error }, 'pipeline aborted');
    throw error;
  }
}
