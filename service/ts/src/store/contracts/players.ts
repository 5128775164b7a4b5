import type { PlayerRecord } from '../../engine/types.js';

export type { PlayerRecord };

export interface PlayerCreateInput {
  name: string;
}
