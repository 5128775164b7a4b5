import assert from 'node:assert/strict';
import { beforeEach, test } from 'node:test';

import { TournamentService } from '../../src/services/tournament.js';
import { MemoryStore } from '../../src/store/memory.js';
import { InvalidScopeError, PlayerLookupError } from '../../src/store/index.js';
import { ALL_SCOPE, tournamentScope } from '../../src/engine/scope.js';
import type { StandingRow } from '../../src/engine/types.js';
import { OPENING_ROUND, ROSTER, SECOND_ROUND, registerRoster, reportAll } from '../helpers/fixtures.js';

let service: TournamentService;

beforeEach(() => {
  service = new TournamentService(new MemoryStore());
});

const names = (rows: StandingRow[]) => rows.map((row) => row.name);

const isRanked = (rows: StandingRow[]) =>
  rows.every((row, index) => {
    const next = rows[index + 1];
    if (!next) return true;
    if (row.wins !== next.wins) return row.wins > next.wins;
    if (row.opponentMatchWins !== next.opponentMatchWins) {
      return row.opponentMatchWins > next.opponentMatchWins;
    }
    return row.gamesPlayed <= next.gamesPlayed;
  });

test('standings before any match list every player at zero in registration order', async () => {
  await registerRoster(service);

  for (const scope of [ALL_SCOPE, tournamentScope(16)]) {
    const standings = await service.computeStandings(scope);
    assert.deepEqual(names(standings), [...ROSTER]);
    assert.ok(standings.every((row) => row.wins === 0 && row.gamesPlayed === 0 && row.opponentMatchWins === 0));
  }
});

test('opening round of tournament 16 ranks participants by wins then opponent wins', async () => {
  const ids = await registerRoster(service);
  await reportAll(service, ids, OPENING_ROUND, 16);

  const standings = await service.computeStandings(tournamentScope(16));

  assert.deepEqual(
    standings.map((row) => [row.rank, row.name, row.wins, row.gamesPlayed, row.opponentMatchWins]),
    [
      [1, 'Dee', 2, 2, 1],
      [2, 'Yuji', 2, 2, 0],
      [3, 'Shikhikhutug', 1, 2, 2],
      [4, 'Adam', 0, 2, 4],
      [5, 'Temur', 0, 2, 3],
    ]
  );
  assert.ok(isRanked(standings));

  const pairings = await service.generatePairings(tournamentScope(16));
  assert.deepEqual(
    pairings.map((pairing) => [pairing.name1, pairing.name2]),
    [
      ['Dee', 'Yuji'],
      ['Shikhikhutug', 'Adam'],
    ]
  );

  assert.equal(await service.countPlayers(tournamentScope(16)), 5);
});

test('second round of tournament 16 brings in new participants', async () => {
  const ids = await registerRoster(service);
  await reportAll(service, ids, OPENING_ROUND, 16);
  await reportAll(service, ids, SECOND_ROUND, 16);

  const standings = await service.computeStandings(tournamentScope(16));

  assert.deepEqual(names(standings), [
    'Dee',
    'Yuji',
    'Shikhikhutug',
    'Annie',
    'Adam',
    'Temur',
    'Lakshmi',
    'Attila',
  ]);
  assert.deepEqual(
    standings.map((row) => row.opponentMatchWins),
    [7, 4, 8, 0, 9, 8, 2, 2]
  );
  assert.ok(isRanked(standings));
  assert.equal(await service.countPlayers(tournamentScope(16)), 8);

  const pairings = await service.generatePairings(tournamentScope(16));
  assert.deepEqual(
    pairings.map((pairing) => [pairing.name1, pairing.name2]),
    [
      ['Dee', 'Yuji'],
      ['Shikhikhutug', 'Annie'],
      ['Adam', 'Temur'],
      ['Lakshmi', 'Attila'],
    ]
  );
});

test('standings across all tournaments keep players without matches', async () => {
  const ids = await registerRoster(service);
  await reportAll(
    service,
    ids,
    [
      [0, 1],
      [2, 3],
      [3, 1],
      [0, 2],
    ],
    null
  );

  const standings = await service.computeStandings(ALL_SCOPE);

  assert.deepEqual(names(standings), [
    'Dee',
    'Annie',
    'Adam',
    'Temur',
    'Shikhikhutug',
    'Lakshmi',
    'Yuji',
    'Bleda',
    'Attila',
    'Marie',
  ]);
  assert.equal(await service.countPlayers(ALL_SCOPE), 10);

  const pairings = await service.generatePairings(ALL_SCOPE);
  assert.equal(pairings.length, 5);
  assert.deepEqual(pairings[1], {
    player1Id: ids[3],
    name1: 'Adam',
    player2Id: ids[1],
    name2: 'Temur',
  });
});

test('the ALL scope counts matches from every tournament', async () => {
  const ana = await service.registerPlayer('Ana');
  const bo = await service.registerPlayer('Bo');
  const cy = await service.registerPlayer('Cy');
  await service.reportMatch({ winnerId: ana.playerId, loserId: bo.playerId, tournamentId: 5 });
  await service.reportMatch({ winnerId: ana.playerId, loserId: cy.playerId });

  const all = await service.computeStandings(ALL_SCOPE);
  assert.deepEqual(
    all.map((row) => [row.name, row.wins, row.gamesPlayed, row.opponentMatchWins]),
    [
      ['Ana', 2, 2, 0],
      ['Bo', 0, 1, 2],
      ['Cy', 0, 1, 2],
    ]
  );

  const scoped = await service.computeStandings(tournamentScope(5));
  assert.deepEqual(
    scoped.map((row) => [row.name, row.wins, row.gamesPlayed]),
    [
      ['Ana', 1, 1],
      ['Bo', 0, 1],
    ]
  );
});

test('count falls back to every registered player while a tournament has no match', async () => {
  const ids = await registerRoster(service);
  assert.equal(await service.countPlayers(tournamentScope(3)), 10);

  await reportAll(service, ids, [[0, 1]], 3);
  assert.equal(await service.countPlayers(tournamentScope(3)), 2);
  assert.equal(await service.countPlayers(ALL_SCOPE), 10);
});

test('clearing matches restores the zero-record standings', async () => {
  const ids = await registerRoster(service);
  await reportAll(service, ids, OPENING_ROUND, 16);

  assert.equal(await service.deleteMatches(), OPENING_ROUND.length);

  const standings = await service.computeStandings(tournamentScope(16));
  assert.deepEqual(names(standings), [...ROSTER]);
  assert.ok(standings.every((row) => row.wins === 0 && row.gamesPlayed === 0));
});

test('clearing players empties standings and pairings', async () => {
  const ids = await registerRoster(service);
  await reportAll(service, ids, OPENING_ROUND, 16);

  assert.equal(await service.deletePlayers(), ROSTER.length);
  assert.deepEqual(await service.computeStandings(tournamentScope(16)), []);
  assert.deepEqual(await service.generatePairings(ALL_SCOPE), []);
  assert.equal(await service.countPlayers(ALL_SCOPE), 0);
});

test('standings are stable between reads without writes', async () => {
  const ids = await registerRoster(service);
  await reportAll(service, ids, OPENING_ROUND, 16);

  const first = await service.computeStandings(tournamentScope(16));
  const second = await service.computeStandings(tournamentScope(16));
  assert.deepEqual(second, first);
});

test('rejects negative or fractional tournament ids', async () => {
  await assert.rejects(service.computeStandings(tournamentScope(-1)), InvalidScopeError);
  await assert.rejects(service.countPlayers(tournamentScope(1.5)), InvalidScopeError);
  await assert.rejects(service.reportMatch({ winnerId: 1, loserId: 2, tournamentId: -4 }), InvalidScopeError);
});

test('reporting a match for an unknown player fails in the store', async () => {
  const ana = await service.registerPlayer('Ana');
  await assert.rejects(
    service.reportMatch({ winnerId: ana.playerId, loserId: 42, tournamentId: 1 }),
    PlayerLookupError
  );
});

test('rejects ids beyond the integer column range', async () => {
  const ana = await service.registerPlayer('Ana');

  await assert.rejects(service.computeStandings(tournamentScope(2_147_483_648)), InvalidScopeError);
  await assert.rejects(
    service.reportMatch({ winnerId: ana.playerId, loserId: 2, tournamentId: 2_147_483_648 }),
    InvalidScopeError
  );
  await assert.rejects(
    service.reportMatch({ winnerId: ana.playerId, loserId: 2_147_483_648, tournamentId: 1 }),
    (err: unknown) => {
      assert.ok(err instanceof PlayerLookupError);
      assert.equal(err.message, 'Players not found: 2147483648');
      assert.deepEqual(err.context.missing, [2_147_483_648]);
      return true;
    }
  );
  assert.equal((await service.computeStandings(tournamentScope(2_147_483_647))).length, 1);
});
