import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import type { PoolClient } from 'pg';

import { loadConfig } from '../config.js';

let pool: Pool | undefined;

export const getPool = () => {
  if (!pool) {
    const { databaseUrl, databaseName } = loadConfig();
    pool = databaseUrl ? new Pool({ connectionString: databaseUrl }) : new Pool({ database: databaseName });
  }
  return pool;
};

export const describeDatabase = () => {
  const { databaseUrl, databaseName } = loadConfig();
  if (!databaseUrl) return databaseName;
  try {
    return new URL(databaseUrl).pathname.replace(/^\//, '') || databaseName;
  } catch {
    return databaseName;
  }
};

export const createDb = (client: PoolClient) => drizzle(client);

export type DbClient = ReturnType<typeof createDb>;
