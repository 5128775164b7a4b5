import type { Express } from 'express';

import { scopeFromTournamentId, scopeTournamentId } from '../engine/scope.js';
import type { TournamentService } from '../services/tournament.js';
import { sendError } from './helpers/errors.js';
import { toPairingResponse, toStandingResponse } from './helpers/responders.js';
import { ScopeQuerySchema } from './helpers/scope.js';

export const registerStandingsRoutes = (app: Express, deps: { tournaments: TournamentService }) => {
  const { tournaments } = deps;

  app.get('/v1/standings', async (req, res) => {
    const parsed = ScopeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const scope = scopeFromTournamentId(parsed.data.tournament_id);
    try {
      const standings = await tournaments.computeStandings(scope);
      return res.send({
        tournament_id: scopeTournamentId(scope),
        standings: standings.map(toStandingResponse),
      });
    } catch (err) {
      return sendError(res, err, 'standings_error');
    }
  });

  app.get('/v1/pairings', async (req, res) => {
    const parsed = ScopeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const scope = scopeFromTournamentId(parsed.data.tournament_id);
    try {
      const pairings = await tournaments.generatePairings(scope);
      return res.send({
        tournament_id: scopeTournamentId(scope),
        pairings: pairings.map(toPairingResponse),
      });
    } catch (err) {
      return sendError(res, err, 'pairings_error');
    }
  });
};
