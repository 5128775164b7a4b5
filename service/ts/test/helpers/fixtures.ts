import type { TournamentService } from '../../src/services/tournament.js';

export const ROSTER = [
  'Dee',
  'Temur',
  'Annie',
  'Adam',
  'Shikhikhutug',
  'Lakshmi',
  'Yuji',
  'Bleda',
  'Attila',
  'Marie',
] as const;

export const registerRoster = async (service: TournamentService) => {
  const ids: number[] = [];
  for (const name of ROSTER) {
    const player = await service.registerPlayer(name);
    ids.push(player.playerId);
  }
  return ids;
};

// [winner index, loser index] into ROSTER
export const OPENING_ROUND: Array<[number, number]> = [
  [0, 3],
  [6, 3],
  [6, 1],
  [0, 4],
  [4, 1],
];

export const SECOND_ROUND: Array<[number, number]> = [
  [0, 6],
  [4, 3],
  [6, 1],
  [2, 5],
  [0, 4],
  [2, 8],
];

export const reportAll = async (
  service: TournamentService,
  ids: number[],
  results: Array<[number, number]>,
  tournamentId: number | null
) => {
  for (const [winner, loser] of results) {
    const winnerId = ids[winner];
    const loserId = ids[loser];
    if (winnerId === undefined || loserId === undefined) {
      throw new Error(`Unknown roster index in result ${winner}-${loser}`);
    }
    await service.reportMatch({ winnerId, loserId, tournamentId });
  }
};
