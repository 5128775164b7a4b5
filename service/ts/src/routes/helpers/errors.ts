import type { Response } from 'express';

import { ConnectionError, InvalidScopeError, PlayerLookupError } from '../../store/index.js';

export interface SerializedError {
  status: number;
  body: Record<string, unknown>;
  log?: boolean;
}

export const serializeError = (err: unknown): SerializedError => {
  if (err instanceof PlayerLookupError) {
    return {
      status: 404,
      body: {
        error: 'player_not_found',
        message: err.message,
        ...(err.context.missing?.length ? { context: { missing: err.context.missing } } : {}),
      },
    };
  }

  if (err instanceof InvalidScopeError) {
    return { status: 400, body: { error: 'invalid_tournament_id', message: err.message } };
  }

  if (err instanceof ConnectionError) {
    return {
      status: 503,
      body: { error: 'store_unavailable', message: err.message },
      log: true,
    };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: true,
  };
};

export const sendError = (res: Response, err: unknown, context: string) => {
  const payload = serializeError(err);
  if (payload.log) {
    console.error(context, err);
  }
  return res.status(payload.status).send(payload.body);
};
