/**
 * Postgres client
 *
 * The ledger only needs `query`, so it is written against the Queryable
 * interface; production passes a pg Pool, tests pass an in-memory fake.
 */

import { Pool } from "pg";

export interface QueryRows {
  rows: unknown[];
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryRows>;
}

export function createPool(connectionString: string | undefined = process.env.DATABASE_URL): Pool {
  return new Pool({ connectionString });
}

/**
 * Adapt a pool (or a checked-out client) to Queryable
 */
export function fromPool(pool: Pick<Pool, "query">): Queryable {
  return {
    async query(text, values = []) {
      const res = await pool.query(text, values);
      return { rows: res.rows };
    },
  };
}
