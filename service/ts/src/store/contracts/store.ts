import type { PlayerTally, Scope } from '../../engine/types.js';
import type { PlayerCreateInput, PlayerRecord } from './players.js';
import type { MatchCreateInput, MatchRecord } from './matches.js';

/**
 * Operations available while a store session is open. A session is only valid
 * inside the callback handed to {@link TournamentStore.withSession}.
 */
export interface StoreSession {
  insertPlayer(input: PlayerCreateInput): Promise<PlayerRecord>;
  insertMatch(input: MatchCreateInput): Promise<MatchRecord>;
  listPlayers(): Promise<PlayerRecord[]>;
  countMatches(scope: Scope): Promise<number>;
  /** ALL: registered players. TOURNAMENT: distinct participants. */
  countPlayers(scope: Scope): Promise<number>;
  /** One tally per registered player, in registration order. */
  loadTallies(scope: Scope): Promise<PlayerTally[]>;
  clearMatches(): Promise<number>;
  /** Also removes every match referencing the removed players. */
  clearPlayers(): Promise<number>;
}

export interface TournamentStore {
  withSession<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
}
