import type { TournamentStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';
import { loadConfig } from '../config.js';

export * from './types.js';

let store: TournamentStore | null = null;

export const getStore = (): TournamentStore => {
  if (!store) {
    store = loadConfig().storeDriver === 'postgres' ? new PostgresStore() : new MemoryStore();
  }
  return store;
};
