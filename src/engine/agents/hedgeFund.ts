import type { HedgeFundAgent } from '../../domain/agents';
import { ActionName, BalanceSheetCategory, HedgeFundStrategy, HoldingKey, MarketVariable } from '../../domain/enums';
import { stressIndex } from '../market';
import { markToMarketLoss } from './holdings';
import { seekRepoFromBanks } from './repo';
import { holdingStep, redeemStep } from './waterfall';
import type { AgentBehaviour, WaterfallStep } from './waterfall';

const BPS = 0.0001;
const LEVERAGE_PASS_THROUGH = 0.3;
const VARIATION_MARGIN_RATE = 0.022;
const INITIAL_MARGIN_RATE = 0.002;
const HAIRCUT_MARGIN_RATE = 0.003;
const HAIRCUT_DEPENDENCE_TRIGGER = 0.5;
const LP_REDEMPTION_STRESS_TRIGGER = 2.5;
const LP_REDEMPTION_VAR_TRIGGER = 0.85;
const LP_REDEMPTION_RATE = 0.02;

const ASSET_CATEGORIES: readonly BalanceSheetCategory[] = [
  BalanceSheetCategory.LiquidAsset,
  BalanceSheetCategory.IlliquidAsset,
];

const seekPrimeBrokerRepo: WaterfallStep<HedgeFundAgent> = (fund, ctx, ledger) => {
  if (ledger.remaining <= 0) return;
  const params = ctx.config.reactions.hedgeFund;
  const dependence = ctx.config.repoDependenceMultipliers[fund.repoDependence];
  const ask = ledger.remaining * Math.max(dependence, params.minRepoDependence) * params.repoAskPct;
  if (ask <= 0) return;
  fund.soughtRepo = true;
  const outcome = seekRepoFromBanks(fund, ask, ctx, ledger);
  if (outcome.refusedByAll) {
    fund.refusedByAll = true;
  }
};

const sellGilts = holdingStep<HedgeFundAgent>(ActionName.SellGilts, HoldingKey.Gilts, (c) => c.reactions.hedgeFund.sellGilts);

// Fire-sale order once repo is exhausted, by strategy.
const SALES_BY_STRATEGY: Record<HedgeFundStrategy, readonly WaterfallStep<HedgeFundAgent>[]> = {
  [HedgeFundStrategy.RelativeValue]: [
    holdingStep(ActionName.UnwindBasisTrades, HoldingKey.BasisTrades, (c) => c.reactions.hedgeFund.unwindBasisTrades),
    sellGilts,
  ],
  [HedgeFundStrategy.MacroRates]: [sellGilts],
  [HedgeFundStrategy.CreditLongShort]: [
    holdingStep(ActionName.SellCorporateBonds, HoldingKey.CorporateBonds, (c) => c.reactions.hedgeFund.sellCorporateBonds),
  ],
  [HedgeFundStrategy.LongShortEquity]: [
    holdingStep(ActionName.SellEquities, HoldingKey.Equities, (c) => c.reactions.hedgeFund.sellEquities),
  ],
  [HedgeFundStrategy.MultiStrategy]: [
    holdingStep(ActionName.SellGilts, HoldingKey.Gilts, (c) => c.reactions.hedgeFund.multiStrategySale),
    holdingStep(ActionName.SellCorporateBonds, HoldingKey.CorporateBonds, (c) => c.reactions.hedgeFund.multiStrategySale),
    holdingStep(ActionName.SellEquities, HoldingKey.Equities, (c) => c.reactions.hedgeFund.multiStrategySale),
  ],
};

const redeem = redeemStep<HedgeFundAgent>((c) => c.reactions.hedgeFund.redeemFunds);

export const hedgeFundBehaviour: AgentBehaviour<HedgeFundAgent> = {
  // Only asset lines mark to market; leverage amplifies the move.
  markToMarket: (fund, ctx) => {
    const assets = fund.balanceSheet.items.filter((item) => ASSET_CATEGORIES.includes(item.category));
    return markToMarketLoss(assets, ctx.market.deltas) * (1 + (fund.grossLeverage - 1) * LEVERAGE_PASS_THROUGH);
  },
  marginCalls: (fund, ctx) => {
    const levels = ctx.market.levels;
    const stress = stressIndex(levels, ctx.config.market);
    const exposure = fund.sizeFactor * fund.grossLeverage;
    const largestMove = fund.primarySensitivities.reduce((max, variable) => Math.max(max, Math.abs(levels[variable])), 0);
    const variation = exposure * largestMove * BPS * VARIATION_MARGIN_RATE;
    const initial = exposure * Math.max(0, stress - 1) * INITIAL_MARGIN_RATE;
    const dependence = ctx.config.repoDependenceMultipliers[fund.repoDependence];
    const haircut =
      dependence > HAIRCUT_DEPENDENCE_TRIGGER
        ? fund.sizeFactor * dependence * Math.max(0, levels[MarketVariable.RepoHaircutGilt]) * HAIRCUT_MARGIN_RATE
        : 0;
    return variation + initial + haircut;
  },
  outflows: (fund, ctx) => {
    const stress = stressIndex(ctx.market.levels, ctx.config.market);
    if (stress <= LP_REDEMPTION_STRESS_TRIGGER || fund.varUtilisation <= LP_REDEMPTION_VAR_TRIGGER) return 0;
    return fund.sizeFactor * LP_REDEMPTION_RATE;
  },
  waterfall: (fund) => [seekPrimeBrokerRepo, ...SALES_BY_STRATEGY[fund.strategy], redeem],
};
