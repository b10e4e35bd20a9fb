import type { InsurerAgent } from '../../domain/agents';
import { ActionName, HoldingKey, MarketVariable } from '../../domain/enums';
import { stressIndex } from '../market';
import { holdingAmount, markToMarketLoss } from './holdings';
import { seekRepoFromBanks } from './repo';
import { holdingStep, redeemStep } from './waterfall';
import type { AgentBehaviour, WaterfallStep } from './waterfall';

const BPS = 0.0001;
const HEDGE_OFFSET = 0.3;
const VARIATION_MARGIN_RATE = 0.008;
const INITIAL_MARGIN_RATE = 0.0008;
// Non-cash collateral under dirty CSAs is re-margined as its haircut widens.
const DIRTY_CSA_RATE = 0.01 * 0.05;
const SURRENDER_STRESS_TRIGGER = 2.5;
const SURRENDER_RATE = 0.005;

const seekDiscretionaryRepo: WaterfallStep<InsurerAgent> = (insurer, ctx, ledger) => {
  if (ledger.remaining <= 0) return;
  seekRepoFromBanks(insurer, ledger.remaining * ctx.config.reactions.insurer.repoAskPct, ctx, ledger);
};

const insurerWaterfall: readonly WaterfallStep<InsurerAgent>[] = [
  holdingStep(ActionName.DrawRepoLines, HoldingKey.CommittedRepoLines, (c) => c.reactions.insurer.drawRepoLines),
  holdingStep(ActionName.DrawRevolvingCredit, HoldingKey.RevolvingCreditFacility, (c) => c.reactions.insurer.drawRevolvingCredit),
  holdingStep(ActionName.SellGilts, HoldingKey.Gilts, (c) => c.reactions.insurer.sellGilts),
  holdingStep(ActionName.SellCorporateBonds, HoldingKey.CorporateBonds, (c) => c.reactions.insurer.sellCorporateBonds),
  holdingStep(ActionName.SellEquities, HoldingKey.Equities, (c) => c.reactions.insurer.sellEquities),
  seekDiscretionaryRepo,
  redeemStep((c) => c.reactions.insurer.redeemFunds),
];

export const insurerBehaviour: AgentBehaviour<InsurerAgent> = {
  markToMarket: (insurer, ctx) => {
    const loss = markToMarketLoss(insurer.balanceSheet.items, ctx.market.deltas);
    const hedged = holdingAmount(insurer, HoldingKey.DerivativesExposure) > 0;
    return hedged ? loss * (1 - insurer.hedgeRatio * HEDGE_OFFSET) : loss;
  },
  marginCalls: (insurer, ctx) => {
    const levels = ctx.market.levels;
    const derivatives = holdingAmount(insurer, HoldingKey.DerivativesExposure);
    const stress = stressIndex(levels, ctx.config.market);
    const variation = derivatives * Math.abs(levels[MarketVariable.Gilt10y]) * BPS * VARIATION_MARGIN_RATE;
    const dirtyCsa =
      derivatives * insurer.dirtyCsaPct * Math.max(0, levels[MarketVariable.RepoHaircutCorp]) * DIRTY_CSA_RATE;
    const initial = derivatives * Math.max(0, stress - 1) * INITIAL_MARGIN_RATE;
    return variation + dirtyCsa + initial;
  },
  outflows: (insurer, ctx) =>
    stressIndex(ctx.market.levels, ctx.config.market) > SURRENDER_STRESS_TRIGGER ? insurer.sizeFactor * SURRENDER_RATE : 0,
  waterfall: () => insurerWaterfall,
};
