import type { BalanceSheetCategory, HoldingKey, MarketVariable } from './enums';

/** Fractional value change per unit move of each market variable (bps or % as quoted). */
export type Sensitivities = Partial<Record<MarketVariable, number>>;

export interface BalanceSheetItem {
  key: HoldingKey;
  label: string;
  amount: number; // £mm, never negative
  category: BalanceSheetCategory;
  sensitivities: Sensitivities;
}

export interface BalanceSheet {
  items: BalanceSheetItem[];
}
