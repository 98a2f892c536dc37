import type { ClientBase } from 'pg';
import type { LineItemPolicy } from '../config.js';
import { query, withTransaction } from '../db.js';
import { WriteError } from '../errors.js';
import type { RemoteCart, RemoteUser } from './remote-schemas.js';

export const DEFAULT_BATCH_SIZE = 500;

export type WriterOptions = {
  batchSize?: number;
};

export type CartWriterOptions = WriterOptions & {
  lineItemPolicy?: LineItemPolicy;
};

export type CartWriteResult = {
  carts: number;
  lineItems: number;
  lineItemsRemoved: number;
};

type SqlValue = string | number | null;

const USER_COLUMNS = ['id', 'firstName', 'lastName', 'email', 'phone', 'age'] as const;
const CART_COLUMNS = ['id', 'user_id', 'total', 'discounted_total', 'total_products', 'total_quantity'] as const;
const LINE_ITEM_COLUMNS = [
  'cart_id',
  'product_id',
  'title',
  'price',
  'quantity',
  'total',
  'discount_percentage',
] as const;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/** Keeps the last record per id, in first-seen order; one statement cannot upsert a key twice. */
function dedupeById<T extends { id: number }>(records: readonly T[]): T[] {
  const byId = new Map<number, T>();
  for (const record of records) {
    byId.set(record.id, record);
  }
  return [...byId.values()];
}

function placeholders(rowCount: number, columnCount: number): string {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row += 1) {
    const cells: string[] = [];
    for (let column = 0; column < columnCount; column += 1) {
      cells.push(`$${row * columnCount + column + 1}`);
    }
    rows.push(`(${cells.join(', ')})`);
  }
  return rows.join(', ');
}

export function buildInsert(
  table: string,
  columns: readonly string[],
  rows: readonly SqlValue[][],
  conflictKey?: string
): { text: string; values: SqlValue[] } {
  let text = `insert into ${table} (${columns.join(', ')}) values ${placeholders(rows.length, columns.length)}`;
  if (conflictKey) {
    const updates = columns
      .filter((column) => column !== conflictKey)
      .map((column) => `${column} = excluded.${column}`);
    text += ` on conflict (${conflictKey}) do update set ${updates.join(', ')}`;
  }
  return { text, values: rows.flat() };
}

function userRow(user: RemoteUser): SqlValue[] {
  return [user.id, user.firstName, user.lastName, user.email, user.phone, user.age];
}

function cartRow(cart: RemoteCart): SqlValue[] {
  return [cart.id, cart.userId, cart.total, cart.discountedTotal, cart.totalProducts, cart.totalQuantity];
}

function lineItemRows(cart: RemoteCart): SqlValue[][] {
  return cart.products.map((product) => [
    cart.id,
    product.id,
    product.title,
    product.price,
    product.quantity,
    product.total,
    product.discountPercentage,
  ]);
}

export async function upsertUsers(
  client: ClientBase,
  users: readonly RemoteUser[],
  { batchSize = DEFAULT_BATCH_SIZE }: WriterOptions = {}
): Promise<number> {
  const rows = dedupeById(users);
  if (!rows.length) return 0;

  try {
    return await withTransaction(client, async (tx) => {
      for (const batch of chunk(rows, batchSize)) {
        const { text, values } = buildInsert('users', USER_COLUMNS, batch.map(userRow), 'id');
        await query(tx, text, values);
      }
      return rows.length;
    });
  } catch (error) {
    throw new WriteError('upsertUsers', error);
  }
}

/**
 * Upserts carts and writes their line items in one transaction. Under the
 * `replace` policy the stored line items of each cart are deleted before the
 * fresh ones are inserted; under `append` they accumulate across runs.
 */
export async function upsertCarts(
  client: ClientBase,
  carts: readonly RemoteCart[],
  { batchSize = DEFAULT_BATCH_SIZE, lineItemPolicy = 'append' }: CartWriterOptions = {}
): Promise<CartWriteResult> {
  const rows = dedupeById(carts);
  const result: CartWriteResult = { carts: 0, lineItems: 0, lineItemsRemoved: 0 };
  if (!rows.length) return result;

  try {
    return await withTransaction(client, async (tx) => {
      for (const batch of chunk(rows, batchSize)) {
        const { text, values } = buildInsert('carts', CART_COLUMNS, batch.map(cartRow), 'id');
        await query(tx, text, values);
        result.carts += batch.length;

        if (lineItemPolicy === 'replace') {
          const ids = batch.map((cart) => cart.id);
          const removed = await query(
            tx,
            `delete from cart_products where cart_id in ${placeholders(1, ids.length)}`,
            ids
          );
          result.lineItemsRemoved += removed.rowCount ?? 0;
        }

        for (const items of chunk(batch.flatMap(lineItemRows), batchSize)) {
          const insert = buildInsert('cart_products', LINE_ITEM_COLUMNS, items);
          await query(tx, insert.text, insert.values);
          result.lineItems += items.length;
        }
      }
      return result;
    });
  } catch (error) {
    throw new WriteError('upsertCarts', error);
  }
}
