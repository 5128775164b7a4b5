import { asc, inArray, sql } from 'drizzle-orm';

import type { DbClient } from '../../db/client.js';
import { matches, players } from '../../db/schema.js';
import type { PlayerTally, Scope } from '../../engine/types.js';
import type { MatchCreateInput, MatchRecord, PlayerRecord, StoreSession } from '../types.js';
import { PlayerLookupError } from '../types.js';
import { isForeignKeyViolation, scopeCondition } from './sql-helpers.js';

export type TallyRow = {
  player_id: number;
  name: string;
  wins: number;
  games_played: number;
  opponent_match_wins: number;
};

const toMatchRecord = (row: typeof matches.$inferSelect): MatchRecord => ({
  matchId: row.matchId,
  winnerId: row.winnerId,
  loserId: row.loserId,
  tournamentId: row.tournamentId,
});

const findMissingPlayers = async (db: DbClient, ids: number[]) => {
  const rows = await db
    .select({ playerId: players.playerId })
    .from(players)
    .where(inArray(players.playerId, ids));
  const found = new Set(rows.map((row) => row.playerId));
  return ids.filter((id) => !found.has(id));
};

const insertMatch = async (db: DbClient, input: MatchCreateInput): Promise<MatchRecord> => {
  try {
    const [row] = await db
      .insert(matches)
      .values({
        winnerId: input.winnerId,
        loserId: input.loserId,
        tournamentId: input.tournamentId ?? null,
      })
      .returning();
    if (!row) throw new Error('Match insert returned no row');
    return toMatchRecord(row);
  } catch (err) {
    if (isForeignKeyViolation(err)) {
      const missing = await findMissingPlayers(db, [input.winnerId, input.loserId]);
      throw new PlayerLookupError(`Players not found: ${missing.join(', ')}`, { missing });
    }
    throw err;
  }
};

const countPlayers = async (db: DbClient, scope: Scope) => {
  if (scope.type === 'ALL') {
    const [row] = await db.select({ count: sql<number>`count(*)::int` }).from(players);
    return row?.count ?? 0;
  }

  const result = await db.execute<{ count: number }>(participantCountStatement(scope));
  return result.rows[0]?.count ?? 0;
};

export const participantCountStatement = (scope: Scope) => {
  const condition = scopeCondition(scope);
  return sql`
    SELECT count(*)::int AS count
    FROM (
      SELECT ${matches.winnerId} AS player_id FROM ${matches} WHERE ${condition}
      UNION
      SELECT ${matches.loserId} AS player_id FROM ${matches} WHERE ${condition}
    ) AS participants
  `;
};

/** One row per registered player, in registration order, with in-scope tallies. */
export const tallyStatement = (scope: Scope) => {
  const condition = scopeCondition(scope);
  return sql`
    WITH scoped AS (
      SELECT ${matches.winnerId} AS winner_id, ${matches.loserId} AS loser_id
      FROM ${matches}
      WHERE ${condition}
    ),
    appearances AS (
      SELECT winner_id AS player_id, loser_id AS opponent_id FROM scoped
      UNION ALL
      SELECT loser_id AS player_id, winner_id AS opponent_id FROM scoped
    ),
    win_counts AS (
      SELECT winner_id AS player_id, count(*)::int AS wins
      FROM scoped
      GROUP BY winner_id
    ),
    game_counts AS (
      SELECT player_id, count(*)::int AS games_played
      FROM appearances
      GROUP BY player_id
    ),
    opponent_wins AS (
      SELECT a.player_id, coalesce(sum(w.wins), 0)::int AS opponent_match_wins
      FROM appearances a
      LEFT JOIN win_counts w ON w.player_id = a.opponent_id
      GROUP BY a.player_id
    )
    SELECT
      p.player_id,
      p.name,
      coalesce(w.wins, 0)::int AS wins,
      coalesce(g.games_played, 0)::int AS games_played,
      coalesce(o.opponent_match_wins, 0)::int AS opponent_match_wins
    FROM ${players} p
    LEFT JOIN win_counts w ON w.player_id = p.player_id
    LEFT JOIN game_counts g ON g.player_id = p.player_id
    LEFT JOIN opponent_wins o ON o.player_id = p.player_id
    ORDER BY p.player_id ASC
  `;
};

export const toPlayerTally = (row: TallyRow): PlayerTally => ({
  playerId: row.player_id,
  name: row.name,
  wins: row.wins,
  gamesPlayed: row.games_played,
  opponentMatchWins: row.opponent_match_wins,
});

const loadTallies = async (db: DbClient, scope: Scope): Promise<PlayerTally[]> => {
  const result = await db.execute<TallyRow>(tallyStatement(scope));
  return result.rows.map(toPlayerTally);
};

export const createPostgresSession = (db: DbClient): StoreSession => ({
  insertPlayer: async (input) => {
    const [row] = await db
      .insert(players)
      .values({ name: input.name })
      .returning({ playerId: players.playerId, name: players.name });
    if (!row) throw new Error('Player insert returned no row');
    return row;
  },
  insertMatch: (input) => insertMatch(db, input),
  listPlayers: async (): Promise<PlayerRecord[]> =>
    db
      .select({ playerId: players.playerId, name: players.name })
      .from(players)
      .orderBy(asc(players.playerId)),
  countMatches: async (scope) => {
    const [row] = await db
      .select({ count: sql<number>`count(*)::int` })
      .from(matches)
      .where(scopeCondition(scope));
    return row?.count ?? 0;
  },
  countPlayers: (scope) => countPlayers(db, scope),
  loadTallies: (scope) => loadTallies(db, scope),
  clearMatches: async () => {
    const removed = await db.delete(matches).returning({ matchId: matches.matchId });
    return removed.length;
  },
  clearPlayers: async () => {
    const removed = await db.delete(players).returning({ playerId: players.playerId });
    return removed.length;
  },
});
