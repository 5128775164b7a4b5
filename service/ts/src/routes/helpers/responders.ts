import type { MatchRecord, Pairing, PlayerRecord, StandingRow } from '../../store/index.js';

export const toPlayerResponse = (player: PlayerRecord) => ({
  player_id: player.playerId,
  name: player.name,
});

export const toMatchResponse = (match: MatchRecord) => ({
  match_id: match.matchId,
  winner_id: match.winnerId,
  loser_id: match.loserId,
  tournament_id: match.tournamentId,
});

export const toStandingResponse = (row: StandingRow) => ({
  rank: row.rank,
  player_id: row.playerId,
  name: row.name,
  wins: row.wins,
  matches: row.gamesPlayed,
  opponent_match_wins: row.opponentMatchWins,
});

export const toPairingResponse = (pairing: Pairing) => ({
  player1_id: pairing.player1Id,
  name1: pairing.name1,
  player2_id: pairing.player2Id,
  name2: pairing.name2,
});
