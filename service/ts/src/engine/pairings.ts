import type { Pairing, StandingRow } from './types.js';

/**
 * Pairs ranked players two by two: (1st, 2nd), (3rd, 4th), ...
 * With an odd count the last player is left out; nothing checks whether a
 * pair has met before.
 */
export const pairAdjacent = (standings: StandingRow[]): Pairing[] => {
  const pairings: Pairing[] = [];
  for (let index = 1; index < standings.length; index += 2) {
    const first = standings[index - 1];
    const second = standings[index];
    if (!first || !second) break;
    pairings.push({
      player1Id: first.playerId,
      name1: first.name,
      player2Id: second.playerId,
      name2: second.name,
    });
  }
  return pairings;
};
