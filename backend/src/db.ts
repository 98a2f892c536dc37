import pg from 'pg';
import type { ClientBase, PoolClient, QueryResult, QueryResultRow } from 'pg';
import type { DatabaseConfig } from './config.js';
import { StorageConnectError } from './errors.js';
import type { Logger } from './logger.js';

/** A client the pipeline owns for the whole run: connected once, ended once. */
export type ExclusiveClient = ClientBase & {
  end(): Promise<void>;
};

export type ClientFactory = (config: DatabaseConfig) => ExclusiveClient;

export interface ClientSource {
  connect(): Promise<PoolClient>;
}

export const openClient: ClientFactory = (config) => new pg.Client(config);

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool(config);
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  client: ClientBase,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return client.query<T>(text, params);
}

export type ConnectionOptions = {
  factory?: ClientFactory;
  logger?: Logger;
};

/**
 * Opens one exclusive connection, hands it to `fn` and ends it on every exit
 * path. A failed connect surfaces as StorageConnectError. When `fn` fails, a
 * failing end() is logged and the error from `fn` is the one rethrown.
 */
export async function withConnection<T>(
  config: DatabaseConfig,
  fn: (client: ExclusiveClient) => Promise<T>,
  { factory = openClient, logger }: ConnectionOptions = {}
): Promise<T> {
  const client = factory(config);
  try {
    await client.connect();
  } catch (error) {
    throw new StorageConnectError(error);
  }

  let result: T;
  try {
    result = await fn(client);
  } catch (error) {
    try {
      await client.end();
    } catch (endError) {
      logger?.warn({ err: endError }, 'connection end failed after an error');
    }
    throw error;
  }

  await client.end();
  return result;
}

export async function withPoolClient<T>(source: ClientSource, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  let client: PoolClient;
  try {
    client = await source.connect();
  } catch (error) {
    throw new StorageConnectError(error);
  }

  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(client: ClientBase, fn: (client: ClientBase) => Promise<T>): Promise<T> {
  await client.query('begin');
  try {
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  }
}
