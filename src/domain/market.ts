import type { MarketVariable } from './enums';

export type MarketLevels = Record<MarketVariable, number>;

/**
 * Quantities generated by agent behaviour during a day. Reset from the scenario at the start
 * of every day and accumulated through stages 2 and 3.
 */
export interface EndogenousMarketState {
  giltSelling: number;
  corpSelling: number;
  equitySelling: number;
  repoDemand: number;
  giltAbsorbed: number;
  corpAbsorbed: number;
  giltYieldAddBps: number;
  corpSpreadAddBps: number;
  repoAvailability: number;
  giltBidAskBps: number;
  corpBidAskBps: number;
  giltDepth: number;
  corpDepth: number;
}

export interface MarketState {
  day: number;
  // Scenario levels for the day; `levels` adds the endogenous price impact on top.
  exogenous: MarketLevels;
  levels: MarketLevels;
  deltas: MarketLevels;
  endogenous: EndogenousMarketState;
}

export interface MarketSnapshot {
  day: number;
  levels: MarketLevels;
  endogenous: EndogenousMarketState;
}
