import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

const connectionString =
  process.env.DATABASE_URL ?? `postgres://localhost:5432/${process.env.DATABASE_NAME ?? 'tournament'}`;

export default defineConfig({
  schema: './src/db/schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: connectionString,
  },
});
