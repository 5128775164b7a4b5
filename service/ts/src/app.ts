import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import type { TournamentStore } from './store/index.js';
import { TournamentService } from './services/tournament.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerPlayerRoutes } from './routes/players.js';
import { registerMatchRoutes } from './routes/matches.js';
import { registerStandingsRoutes } from './routes/standings.js';
import { serializeError } from './routes/helpers/errors.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  // body-parser marks malformed JSON with a client status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ error: 'invalid_json', message: err.message });
  }

  const payload = serializeError(err);
  if (payload.log) {
    console.error('unhandled_error', err);
  }

  return res.status(payload.status).json(payload.body);
};

export const createApp = (store: TournamentStore): Express => {
  const app = express();
  app.use(express.json());

  const tournaments = new TournamentService(store);

  registerHealthRoutes(app);
  registerPlayerRoutes(app, { tournaments });
  registerMatchRoutes(app, { tournaments });
  registerStandingsRoutes(app, { tournaments });

  app.use(errorHandler);

  return app;
};
