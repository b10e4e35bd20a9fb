import type { MarketVariable } from './enums';

/**
 * Exogenous market paths over the horizon, as cumulative levels (not deltas).
 * Variables missing from `variablePaths` stay at their baseline level.
 */
export interface Scenario {
  id: string;
  name: string;
  horizonDays: number;
  variablePaths: Partial<Record<MarketVariable, number[]>>;
}
