export type { Scope, PlayerTally, StandingRow, Pairing } from '../engine/types.js';
export type { PlayerCreateInput, PlayerRecord } from './contracts/players.js';
export type { MatchCreateInput, MatchRecord } from './contracts/matches.js';
export type { StoreSession, TournamentStore } from './contracts/store.js';
export { PlayerLookupError, ConnectionError, InvalidScopeError } from './errors.js';
