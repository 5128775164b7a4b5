import { z } from 'zod';

import { MAX_RECORD_ID } from '../../engine/scope.js';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const TournamentIdSchema = z.coerce.number().int().min(0).max(MAX_RECORD_ID);

export const ScopeQuerySchema = z.object({
  tournament_id: z.preprocess(blankToUndefined, TournamentIdSchema.optional()),
});
