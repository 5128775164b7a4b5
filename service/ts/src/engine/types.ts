export type Scope = { type: 'ALL' } | { type: 'TOURNAMENT'; tournamentId: number };

export interface PlayerRecord {
  playerId: number;
  name: string;
}

export interface MatchRecord {
  matchId: number;
  winnerId: number;
  loserId: number;
  tournamentId: number | null;
}

/** Aggregates for one player inside a scope, before ranking. */
export interface PlayerTally {
  playerId: number;
  name: string;
  wins: number;
  gamesPlayed: number;
  opponentMatchWins: number;
}

export interface StandingRow extends PlayerTally {
  rank: number;
}

export interface Pairing {
  player1Id: number;
  name1: string;
  player2Id: number;
  name2: string;
}
