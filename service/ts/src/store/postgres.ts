import type { PoolClient } from 'pg';

import { createDb, describeDatabase, getPool } from '../db/client.js';
import type { StoreSession, TournamentStore } from './types.js';
import { ConnectionError } from './types.js';
import { createPostgresSession } from './postgres/session.js';

export interface ConnectionSource {
  connect(): Promise<PoolClient>;
}

export class PostgresStore implements TournamentStore {
  constructor(
    private readonly source: ConnectionSource = getPool(),
    private readonly databaseName: string = describeDatabase()
  ) {}

  async withSession<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.source.connect();
    } catch (err) {
      throw new ConnectionError(`Unable to connect to database "${this.databaseName}"`, { cause: err });
    }

    try {
      return await work(createPostgresSession(createDb(client)));
    } finally {
      client.release();
    }
  }
}
