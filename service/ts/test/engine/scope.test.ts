import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  ALL_SCOPE,
  describeScope,
  matchInScope,
  scopeFromTournamentId,
  scopeTournamentId,
  tournamentScope,
} from '../../src/engine/scope.js';

test('scopeFromTournamentId treats a missing id as every tournament', () => {
  assert.deepEqual(scopeFromTournamentId(undefined), ALL_SCOPE);
  assert.deepEqual(scopeFromTournamentId(null), ALL_SCOPE);
});

test('tournament id 0 is a real tournament', () => {
  const scope = scopeFromTournamentId(0);
  assert.deepEqual(scope, { type: 'TOURNAMENT', tournamentId: 0 });
  assert.equal(scopeTournamentId(scope), 0);
  assert.equal(describeScope(scope), 'tournament 0');
});

test('matchInScope filters by tournament id', () => {
  const unscoped = { matchId: 1, winnerId: 1, loserId: 2, tournamentId: null };
  const scoped = { matchId: 2, winnerId: 1, loserId: 2, tournamentId: 4 };

  assert.equal(matchInScope(unscoped, ALL_SCOPE), true);
  assert.equal(matchInScope(scoped, ALL_SCOPE), true);
  assert.equal(matchInScope(scoped, tournamentScope(4)), true);
  assert.equal(matchInScope(scoped, tournamentScope(5)), false);
  assert.equal(matchInScope(unscoped, tournamentScope(0)), false);
  assert.equal(scopeTournamentId(ALL_SCOPE), null);
  assert.equal(describeScope(ALL_SCOPE), 'all tournaments');
});
