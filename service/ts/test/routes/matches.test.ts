import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

process.env.AUTH_DISABLE = '1';
process.env.NODE_ENV = 'test';

const { createTestApp } = await import('../helpers/app.js');

let agent: ReturnType<typeof request>;

beforeEach(async () => {
  const { app } = createTestApp();
  agent = request(app);
  await agent.post('/v1/players').send({ name: 'Ana' });
  await agent.post('/v1/players').send({ name: 'Bo' });
});

test('records a match inside a tournament', async () => {
  const res = await agent.post('/v1/matches').send({ winner_id: 2, loser_id: 1, tournament_id: 0 });
  assert.equal(res.status, 201, res.text);
  assert.deepEqual(res.body, { match_id: 1, winner_id: 2, loser_id: 1, tournament_id: 0 });
});

test('records a match without a tournament', async () => {
  const res = await agent.post('/v1/matches').send({ winner_id: 1, loser_id: 2 });
  assert.equal(res.status, 201, res.text);
  assert.deepEqual(res.body, { match_id: 1, winner_id: 1, loser_id: 2, tournament_id: null });
});

test('returns 404 when a player does not exist', async () => {
  const res = await agent.post('/v1/matches').send({ winner_id: 1, loser_id: 7, tournament_id: 3 });
  assert.equal(res.status, 404);
  assert.deepEqual(res.body, {
    error: 'player_not_found',
    message: 'Players not found: 7',
    context: { missing: [7] },
  });
});

test('validates match payloads', async () => {
  const missingLoser = await agent.post('/v1/matches').send({ winner_id: 1 });
  assert.equal(missingLoser.status, 400);
  assert.equal(missingLoser.body.error, 'validation_error');

  const negativeTournament = await agent.post('/v1/matches').send({ winner_id: 1, loser_id: 2, tournament_id: -1 });
  assert.equal(negativeTournament.status, 400);
  assert.equal(negativeTournament.body.error, 'validation_error');
});

test('deletes every match', async () => {
  await agent.post('/v1/matches').send({ winner_id: 1, loser_id: 2, tournament_id: 1 });
  await agent.post('/v1/matches').send({ winner_id: 2, loser_id: 1, tournament_id: 2 });

  const res = await agent.delete('/v1/matches');
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { deleted: 2 });

  const players = await agent.get('/v1/players');
  assert.equal(players.body.players.length, 2);
});

test('rejects ids beyond the integer column range', async () => {
  const tournament = await agent
    .post('/v1/matches')
    .send({ winner_id: 1, loser_id: 2, tournament_id: 2147483648 });
  assert.equal(tournament.status, 400);
  assert.equal(tournament.body.error, 'validation_error');

  const player = await agent.post('/v1/matches').send({ winner_id: 2147483648, loser_id: 1, tournament_id: 3 });
  assert.equal(player.status, 404);
  assert.deepEqual(player.body, {
    error: 'player_not_found',
    message: 'Players not found: 2147483648',
    context: { missing: [2147483648] },
  });
});
