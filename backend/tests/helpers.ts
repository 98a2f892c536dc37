import { newDb, type IMemoryDb } from 'pg-mem';
import type { ClientSource, ClientFactory } from '../src/db.js';
import { createLogger } from '../src/logger.js';
import type { RemoteCart, RemoteProduct, RemoteUser } from '../src/services/remote-schemas.js';

export const silentLogger = createLogger('silent');

export function createMemoryDb(): IMemoryDb {
  return newDb({ noAstCoverageCheck: true });
}

type Snapshot = ReturnType<IMemoryDb['backup']>;
type MemoryClient = InstanceType<ReturnType<IMemoryDb['adapters']['createPg']>['Client']>;

/**
 * pg-mem accepts begin/commit/rollback but keeps every write, so the client
 * snapshots the database on begin and restores it on rollback.
 */
export function emulateTransactions(mem: IMemoryDb, client: MemoryClient): MemoryClient {
  const run = client.query.bind(client);
  let snapshot: Snapshot | undefined;
  client.query = async (text: string, values?: unknown[]) => {
    const statement = text.trim().toLowerCase();
    if (statement === 'begin') {
      snapshot = mem.backup();
    } else if (statement === 'commit') {
      snapshot = undefined;
    } else if (statement === 'rollback') {
      snapshot?.restore();
      snapshot = undefined;
    }
    return run(text, values);
  };
  return client;
}

/** A pg-compatible client bound to the in-memory database, already connected. */
export async function connectMemoryClient(mem: IMemoryDb) {
  const { Client } = mem.adapters.createPg();
  const client = emulateTransactions(mem, new Client());
  await client.connect();
  return client;
}

export function memoryClientFactory(mem: IMemoryDb): ClientFactory {
  const { Client } = mem.adapters.createPg();
  return () => emulateTransactions(mem, new Client());
}

export function memoryClientSource(mem: IMemoryDb): ClientSource {
  return {
    connect: async () => {
      const client = await connectMemoryClient(mem);
      client.release = () => undefined;
      return client;
    },
  };
}

export function countRows(mem: IMemoryDb, table: string): number {
  return Number(mem.public.one(`select count(*) as count from ${table}`).count);
}

export function makeUser(id: number, overrides: Partial<RemoteUser> = {}): RemoteUser {
  return {
    id,
    firstName: `First${id}`,
    lastName: `Last${id}`,
    email: `user${id}@example.test`,
    phone: `+1 555 000 ${String(id).padStart(4, '0')}`,
    age: 30,
    ...overrides,
  };
}

export function makeProduct(id: number, overrides: Partial<RemoteProduct> = {}): RemoteProduct {
  return {
    id,
    title: `Product ${id}`,
    price: 10,
    quantity: 1,
    total: 10,
    discountPercentage: 0,
    ...overrides,
  };
}

export function makeCart(id: number, userId: number, overrides: Partial<RemoteCart> = {}): RemoteCart {
  const products = overrides.products ?? [makeProduct(id * 10)];
  return {
    id,
    userId,
    total: 10,
    discountedTotal: 10,
    totalProducts: products.length,
    totalQuantity: products.reduce((sum, product) => sum + product.quantity, 0),
    ...overrides,
    products,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/** Serves `records` from a list resource the way the remote API pages them. */
export function pagedResponse(resource: string, records: readonly unknown[], url: string): Response {
  const params = new URL(url).searchParams;
  const limit = Number(params.get('limit'));
  const skip = Number(params.get('skip'));
  return jsonResponse({
    [resource]: records.slice(skip, skip + limit),
    total: records.length,
    skip,
    limit,
  });
}
