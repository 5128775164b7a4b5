import { pgTable, text, timestamp, integer, serial, index } from 'drizzle-orm/pg-core';

export const players = pgTable('players', {
  playerId: serial('player_id').primaryKey(),
  name: text('name').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const matches = pgTable('matches', {
  matchId: serial('match_id').primaryKey(),
  tournamentId: integer('tournament_id'),
  winnerId: integer('winner_id').references(() => players.playerId, {
    onDelete: 'cascade',
  }).notNull(),
  loserId: integer('loser_id').references(() => players.playerId, {
    onDelete: 'cascade',
  }).notNull(),
  reportedAt: timestamp('reported_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  tournamentIdx: index('matches_tournament_idx').on(table.tournamentId),
}));
