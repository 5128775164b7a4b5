import type { MatchRecord, PlayerRecord, PlayerTally, Scope, StandingRow } from './types.js';
import { matchInScope } from './scope.js';

interface Counters {
  wins: number;
  gamesPlayed: number;
  opponents: number[];
}

const emptyCounters = (): Counters => ({ wins: 0, gamesPlayed: 0, opponents: [] });

/**
 * Tallies wins, games played and opponent match wins for every registered
 * player, in registration order. Players without a match in scope get zeros.
 *
 * Opponent match wins add the opponent's wins once per match played against
 * them, so a repeated pairing counts the opponent twice.
 */
export const tallyMatches = (
  players: PlayerRecord[],
  matches: MatchRecord[],
  scope: Scope
): PlayerTally[] => {
  const counters = new Map<number, Counters>();
  const countersFor = (playerId: number) => {
    let entry = counters.get(playerId);
    if (!entry) {
      entry = emptyCounters();
      counters.set(playerId, entry);
    }
    return entry;
  };

  for (const match of matches) {
    if (!matchInScope(match, scope)) continue;
    const winner = countersFor(match.winnerId);
    const loser = countersFor(match.loserId);
    winner.wins += 1;
    winner.gamesPlayed += 1;
    loser.gamesPlayed += 1;
    winner.opponents.push(match.loserId);
    loser.opponents.push(match.winnerId);
  }

  return [...players]
    .sort((a, b) => a.playerId - b.playerId)
    .map((player) => {
      const entry = counters.get(player.playerId) ?? emptyCounters();
      const opponentMatchWins = entry.opponents.reduce(
        (sum, opponentId) => sum + (counters.get(opponentId)?.wins ?? 0),
        0
      );
      return {
        playerId: player.playerId,
        name: player.name,
        wins: entry.wins,
        gamesPlayed: entry.gamesPlayed,
        opponentMatchWins,
      };
    });
};

export const compareTallies = (a: PlayerTally, b: PlayerTally) =>
  b.wins - a.wins ||
  b.opponentMatchWins - a.opponentMatchWins ||
  a.gamesPlayed - b.gamesPlayed ||
  a.playerId - b.playerId;

export interface RankStandingsOptions {
  // drop players with no game in scope
  participantsOnly?: boolean;
}

export const rankStandings = (tallies: PlayerTally[], options: RankStandingsOptions = {}): StandingRow[] =>
  tallies
    .filter((tally) => !options.participantsOnly || tally.gamesPlayed > 0)
    .sort(compareTallies)
    .map((tally, index) => ({ rank: index + 1, ...tally }));

/** Standings before any match: everyone at zero, in registration order. */
export const zeroRecordStandings = (players: PlayerRecord[]): StandingRow[] =>
  [...players]
    .sort((a, b) => a.playerId - b.playerId)
    .map((player, index) => ({
      rank: index + 1,
      playerId: player.playerId,
      name: player.name,
      wins: 0,
      gamesPlayed: 0,
      opponentMatchWins: 0,
    }));
