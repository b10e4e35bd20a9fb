import type { Agent } from '../../domain/agents';
import type { BalanceSheetItem } from '../../domain/balanceSheet';
import type { HoldingKey } from '../../domain/enums';
import type { MarketLevels } from '../../domain/market';

export const findItem = (agent: Agent, key: HoldingKey): BalanceSheetItem | undefined =>
  agent.balanceSheet.items.find((item) => item.key === key);

export const holdingAmount = (agent: Agent, key: HoldingKey): number => findItem(agent, key)?.amount ?? 0;

const isMarketVariable = (key: string, levels: MarketLevels): key is keyof MarketLevels => key in levels;

/**
 * Sum over items and (variable, sensitivity) pairs of |amount x sensitivity x move|.
 * Each contribution counts as a loss regardless of direction.
 */
export const markToMarketLoss = (items: readonly BalanceSheetItem[], deltas: MarketLevels): number =>
  items.reduce((total, item) => {
    let itemLoss = 0;
    for (const [variable, sensitivity] of Object.entries(item.sensitivities)) {
      if (sensitivity === undefined || !isMarketVariable(variable, deltas)) continue;
      itemLoss += Math.abs(item.amount * sensitivity * deltas[variable]);
    }
    return total + itemLoss;
  }, 0);
