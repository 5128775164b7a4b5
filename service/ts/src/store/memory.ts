import type { Scope } from '../engine/types.js';
import { matchInScope } from '../engine/scope.js';
import { tallyMatches } from '../engine/standings.js';
import type {
  MatchCreateInput,
  MatchRecord,
  PlayerCreateInput,
  PlayerRecord,
  StoreSession,
  TournamentStore,
} from './types.js';
import { PlayerLookupError } from './types.js';

export class MemoryStore implements TournamentStore {
  private players: PlayerRecord[] = [];
  private matches: MatchRecord[] = [];
  private nextPlayerId = 1;
  private nextMatchId = 1;

  private readonly session: StoreSession = {
    insertPlayer: async (input) => this.insertPlayer(input),
    insertMatch: async (input) => this.insertMatch(input),
    listPlayers: async () => this.players.map((player) => ({ ...player })),
    countMatches: async (scope) => this.scopedMatches(scope).length,
    countPlayers: async (scope) => this.countPlayers(scope),
    loadTallies: async (scope) => tallyMatches(this.players, this.matches, scope),
    clearMatches: async () => {
      const removed = this.matches.length;
      this.matches = [];
      return removed;
    },
    clearPlayers: async () => {
      const removed = this.players.length;
      this.players = [];
      this.matches = [];
      return removed;
    },
  };

  async withSession<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    return work(this.session);
  }

  private insertPlayer(input: PlayerCreateInput): PlayerRecord {
    const player: PlayerRecord = { playerId: this.nextPlayerId++, name: input.name };
    this.players.push(player);
    return { ...player };
  }

  private insertMatch(input: MatchCreateInput): MatchRecord {
    const known = new Set(this.players.map((player) => player.playerId));
    const missing = [input.winnerId, input.loserId].filter((id) => !known.has(id));
    if (missing.length) {
      throw new PlayerLookupError(`Players not found: ${missing.join(', ')}`, { missing });
    }

    const match: MatchRecord = {
      matchId: this.nextMatchId++,
      winnerId: input.winnerId,
      loserId: input.loserId,
      tournamentId: input.tournamentId ?? null,
    };
    this.matches.push(match);
    return { ...match };
  }

  private scopedMatches(scope: Scope) {
    return this.matches.filter((match) => matchInScope(match, scope));
  }

  private countPlayers(scope: Scope) {
    if (scope.type === 'ALL') return this.players.length;
    const participants = new Set<number>();
    for (const match of this.scopedMatches(scope)) {
      participants.add(match.winnerId);
      participants.add(match.loserId);
    }
    return participants.size;
  }
}
