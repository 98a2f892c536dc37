import type { ClientBase } from 'pg';
import { query, withTransaction } from '../db.js';
import { WriteError } from '../errors.js';

export const SCHEMA_STATEMENTS = [
  `create table if not exists users (
    id integer primary key,
    firstName varchar(100),
    lastName varchar(100),
    email varchar(150),
    phone varchar(50),
    age integer
  )`,
  `create table if not exists carts (
    id integer primary key,
    user_id integer references users(id),
    total decimal(10, 2),
    discounted_total decimal(10, 2),
    total_products integer,
    total_quantity integer
  )`,
  `create table if not exists cart_products (
    id serial primary key,
    cart_id integer references carts(id),
    product_id integer,
    title varchar(255),
    price decimal(10, 2),
    quantity integer,
    total decimal(10, 2),
    discount_percentage decimal(5, 2)
  )`,
] as const;

/** Creates the three tables when missing. Existing tables and rows are left as they are. */
export async function ensureSchema(client: ClientBase): Promise<void> {
  try {
    await withTransaction(client, async (tx) => {
      for (const statement of SCHEMA_STATEMENTS) {
        await query(tx, statement);
      }
    });
  } catch (error) {
    throw new WriteError('ensureSchema', error);
  }
}
