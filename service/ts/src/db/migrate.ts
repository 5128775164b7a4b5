import 'dotenv/config';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { PoolClient } from 'pg';

import { describeDatabase, getPool } from './client.js';
import { ConnectionError } from '../store/errors.js';

const MIGRATIONS_DIR = process.env.MIGRATIONS_DIR ?? join(process.cwd(), 'drizzle');
const MIGRATIONS_TABLE = '__swiss_tournament_migrations';

const ensureTableSQL = `
CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

async function main() {
  const pool = getPool();
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (err) {
    await pool.end();
    throw new ConnectionError(`Unable to connect to database "${describeDatabase()}"`, { cause: err });
  }

  try {
    await client.query(ensureTableSQL);

    const applied = new Set<string>();
    const result = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY name`);
    for (const row of result.rows) applied.add(row.name);

    const migrations = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort();

    for (const file of migrations) {
      if (applied.has(file)) continue;

      const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');
      console.log(`Applying migration ${file}`);
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    console.log('Migrations up to date');
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((err) => {
  console.error('migrate_failed', err);
  process.exitCode = 1;
});
