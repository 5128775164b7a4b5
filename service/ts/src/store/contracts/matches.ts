import type { MatchRecord } from '../../engine/types.js';

export type { MatchRecord };

export interface MatchCreateInput {
  winnerId: number;
  loserId: number;
  // omitted or null: reported outside any tournament
  tournamentId?: number | null;
}
