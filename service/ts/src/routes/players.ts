import type { Express } from 'express';
import { z } from 'zod';

import { WRITE_SCOPE, requireAuth, requireScope } from '../auth.js';
import { scopeFromTournamentId, scopeTournamentId } from '../engine/scope.js';
import type { TournamentService } from '../services/tournament.js';
import { sendError } from './helpers/errors.js';
import { toPlayerResponse } from './helpers/responders.js';
import { ScopeQuerySchema } from './helpers/scope.js';

const PlayerRegisterSchema = z.object({
  name: z.string().trim().min(1),
});

export const registerPlayerRoutes = (app: Express, deps: { tournaments: TournamentService }) => {
  const { tournaments } = deps;

  app.post('/v1/players', requireAuth, requireScope(WRITE_SCOPE), async (req, res) => {
    const parsed = PlayerRegisterSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const player = await tournaments.registerPlayer(parsed.data.name);
      return res.status(201).send(toPlayerResponse(player));
    } catch (err) {
      return sendError(res, err, 'player_register_error');
    }
  });

  app.get('/v1/players', async (_req, res) => {
    try {
      const players = await tournaments.listPlayers();
      return res.send({ players: players.map(toPlayerResponse) });
    } catch (err) {
      return sendError(res, err, 'players_list_error');
    }
  });

  app.get('/v1/players/count', async (req, res) => {
    const parsed = ScopeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const scope = scopeFromTournamentId(parsed.data.tournament_id);
    try {
      const count = await tournaments.countPlayers(scope);
      return res.send({ tournament_id: scopeTournamentId(scope), count });
    } catch (err) {
      return sendError(res, err, 'players_count_error');
    }
  });

  app.delete('/v1/players', requireAuth, requireScope(WRITE_SCOPE), async (_req, res) => {
    try {
      const deleted = await tournaments.deletePlayers();
      return res.send({ deleted });
    } catch (err) {
      return sendError(res, err, 'players_delete_error');
    }
  });
};
