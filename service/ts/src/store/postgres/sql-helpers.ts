import { eq, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm/sql';

import type { Scope } from '../../engine/types.js';
import { matches } from '../../db/schema.js';

export const scopeCondition = (scope: Scope): SQL =>
  scope.type === 'ALL' ? sql`true` : eq(matches.tournamentId, scope.tournamentId);

const readErrorCode = (err: unknown): string | undefined => {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return readErrorCode(err.cause);
  return undefined;
};

// SQLSTATE 23503
export const isForeignKeyViolation = (err: unknown) => readErrorCode(err) === '23503';
