import type { MatchRecord, Scope } from './types.js';

export const ALL_SCOPE: Scope = { type: 'ALL' };

export const tournamentScope = (tournamentId: number): Scope => ({ type: 'TOURNAMENT', tournamentId });

export const scopeFromTournamentId = (tournamentId?: number | null): Scope =>
  tournamentId === undefined || tournamentId === null ? ALL_SCOPE : tournamentScope(tournamentId);

export const scopeTournamentId = (scope: Scope): number | null =>
  scope.type === 'TOURNAMENT' ? scope.tournamentId : null;

export const matchInScope = (match: MatchRecord, scope: Scope) =>
  scope.type === 'ALL' || match.tournamentId === scope.tournamentId;

export const describeScope = (scope: Scope) =>
  scope.type === 'ALL' ? 'all tournaments' : `tournament ${scope.tournamentId}`;

// Upper bound of the integer id columns.
export const MAX_RECORD_ID = 2_147_483_647;
