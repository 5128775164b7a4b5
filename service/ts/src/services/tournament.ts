import type { Pairing, PlayerRecord, Scope, StandingRow } from '../engine/types.js';
import { pairAdjacent } from '../engine/pairings.js';
import { MAX_RECORD_ID } from '../engine/scope.js';
import { rankStandings, zeroRecordStandings } from '../engine/standings.js';
import type { MatchCreateInput, MatchRecord, StoreSession, TournamentStore } from '../store/index.js';
import { InvalidScopeError, PlayerLookupError } from '../store/index.js';

const assertTournamentId = (tournamentId: number) => {
  if (!Number.isInteger(tournamentId) || tournamentId < 0 || tournamentId > MAX_RECORD_ID) {
    throw new InvalidScopeError(`Invalid tournament id: ${tournamentId}`);
  }
};

const assertScope = (scope: Scope) => {
  if (scope.type === 'TOURNAMENT') assertTournamentId(scope.tournamentId);
};

/**
 * Ranked standings for a scope, inside an already open session.
 *
 * A scope without matches yields every registered player at zero, in
 * registration order. Otherwise ALL ranks every registered player and a
 * tournament ranks only the players who took part in it.
 */
export const standingsInSession = async (session: StoreSession, scope: Scope): Promise<StandingRow[]> => {
  const matchCount = await session.countMatches(scope);
  if (matchCount === 0) {
    return zeroRecordStandings(await session.listPlayers());
  }

  const tallies = await session.loadTallies(scope);
  return rankStandings(tallies, { participantsOnly: scope.type === 'TOURNAMENT' });
};

export class TournamentService {
  constructor(private readonly store: TournamentStore) {}

  registerPlayer(name: string): Promise<PlayerRecord> {
    return this.store.withSession((session) => session.insertPlayer({ name }));
  }

  listPlayers(): Promise<PlayerRecord[]> {
    return this.store.withSession((session) => session.listPlayers());
  }

  async reportMatch(input: MatchCreateInput): Promise<MatchRecord> {
    if (input.tournamentId !== undefined && input.tournamentId !== null) {
      assertTournamentId(input.tournamentId);
    }
    // ids past the column range can never have been assigned
    const unassignable = [input.winnerId, input.loserId].filter((id) => id > MAX_RECORD_ID);
    if (unassignable.length > 0) {
      throw new PlayerLookupError(`Players not found: ${unassignable.join(', ')}`, { missing: unassignable });
    }
    return this.store.withSession((session) => session.insertMatch(input));
  }

  /**
   * ALL counts every registered player. A tournament counts its distinct
   * participants, or every registered player while it has no match yet.
   */
  async countPlayers(scope: Scope): Promise<number> {
    assertScope(scope);
    return this.store.withSession(async (session) => {
      if (scope.type === 'ALL') return session.countPlayers(scope);
      const participants = await session.countPlayers(scope);
      if (participants > 0) return participants;
      return session.countPlayers({ type: 'ALL' });
    });
  }

  async computeStandings(scope: Scope): Promise<StandingRow[]> {
    assertScope(scope);
    return this.store.withSession((session) => standingsInSession(session, scope));
  }

  async generatePairings(scope: Scope): Promise<Pairing[]> {
    const standings = await this.computeStandings(scope);
    return pairAdjacent(standings);
  }

  deleteMatches(): Promise<number> {
    return this.store.withSession((session) => session.clearMatches());
  }

  deletePlayers(): Promise<number> {
    return this.store.withSession((session) => session.clearPlayers());
  }
}
