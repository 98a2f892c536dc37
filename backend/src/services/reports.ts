import type { ClientBase } from 'pg';
import { query } from '../db.js';

export type TopSpender = {
  user_id: number;
  first_name: string;
  last_name: string;
  total_spent: number;
};

export type TopProduct = {
  product_id: number;
  title: string;
  total_quantity_sold: number;
  total_revenue: number;
};

type TopSpenderRow = {
  user_id: number | string;
  first_name: string;
  last_name: string;
  total_spent: number | string | null;
};

type TopProductRow = {
  product_id: number | string;
  title: string;
  total_quantity_sold: number | string | null;
  total_revenue: number | string | null;
};

// numeric and bigint aggregates come back from pg as strings
function toNumber(value: number | string | null): number {
  if (value === null) return 0;
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  return Number.isFinite(parsed) ? parsed : 0;
}

export async function topSpenders(client: ClientBase, limit: number): Promise<TopSpender[]> {
  const { rows } = await query<TopSpenderRow>(
    client,
    `select u.id as user_id,
            u.firstName as first_name,
            u.lastName as last_name,
            sum(c.discounted_total) as total_spent
     from carts c
     join users u on c.user_id = u.id
     group by u.id, u.firstName, u.lastName
     order by sum(c.discounted_total) desc
     limit $1`,
    [limit]
  );

  return rows.map((row) => ({
    user_id: toNumber(row.user_id),
    first_name: row.first_name,
    last_name: row.last_name,
    total_spent: toNumber(row.total_spent),
  }));
}

export async function topProducts(client: ClientBase, limit: number): Promise<TopProduct[]> {
  const { rows } = await query<TopProductRow>(
    client,
    `select cp.product_id as product_id,
            cp.title as title,
            sum(cp.quantity) as total_quantity_sold,
            sum(cp.total) as total_revenue
     from cart_products cp
     group by cp.product_id, cp.title
     order by sum(cp.quantity) desc
     limit $1`,
    [limit]
  );

  return rows.map((row) => ({
    product_id: toNumber(row.product_id),
    title: row.title,
    total_quantity_sold: toNumber(row.total_quantity_sold),
    total_revenue: toNumber(row.total_revenue),
  }));
}
