import type { ActionName, HoldingKey } from './enums';

/** One executed step of an agent's reaction waterfall for the current day. */
export interface ReactionAction {
  action: ActionName;
  amount: number;
  source?: HoldingKey;
  counterparties?: string[];
}

export interface WaterfallCap {
  shortfallShare: number;
  holdingCap: number;
}
