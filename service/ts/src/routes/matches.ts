import type { Express } from 'express';
import { z } from 'zod';

import { WRITE_SCOPE, requireAuth, requireScope } from '../auth.js';
import { MAX_RECORD_ID } from '../engine/scope.js';
import type { TournamentService } from '../services/tournament.js';
import { sendError } from './helpers/errors.js';
import { toMatchResponse } from './helpers/responders.js';

const PlayerIdSchema = z.number().int().positive();

const MatchReportSchema = z.object({
  winner_id: PlayerIdSchema,
  loser_id: PlayerIdSchema,
  tournament_id: z.number().int().min(0).max(MAX_RECORD_ID).nullable().optional(),
});

export const registerMatchRoutes = (app: Express, deps: { tournaments: TournamentService }) => {
  const { tournaments } = deps;

  app.post('/v1/matches', requireAuth, requireScope(WRITE_SCOPE), async (req, res) => {
    const parsed = MatchReportSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const match = await tournaments.reportMatch({
        winnerId: parsed.data.winner_id,
        loserId: parsed.data.loser_id,
        tournamentId: parsed.data.tournament_id ?? null,
      });
      return res.status(201).send(toMatchResponse(match));
    } catch (err) {
      return sendError(res, err, 'match_report_error');
    }
  });

  app.delete('/v1/matches', requireAuth, requireScope(WRITE_SCOPE), async (_req, res) => {
    try {
      const deleted = await tournaments.deleteMatches();
      return res.send({ deleted });
    } catch (err) {
      return sendError(res, err, 'matches_delete_error');
    }
  });
};
