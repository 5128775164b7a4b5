import { z } from 'zod';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_NAME: z.string().min(1).optional(),
  STORE_DRIVER: z.enum(['memory', 'postgres']).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export const DEFAULT_DATABASE_NAME = 'tournament';
export const DEFAULT_PORT = 8080;

export interface ServiceConfig {
  storeDriver: 'memory' | 'postgres';
  databaseName: string;
  databaseUrl?: string;
  port: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const { DATABASE_URL, DATABASE_NAME, STORE_DRIVER, PORT } = parsed.data;
  const storeDriver = STORE_DRIVER ?? (DATABASE_URL || DATABASE_NAME ? 'postgres' : 'memory');

  return {
    storeDriver,
    databaseName: DATABASE_NAME ?? DEFAULT_DATABASE_NAME,
    databaseUrl: DATABASE_URL,
    port: PORT ?? DEFAULT_PORT,
  };
};
