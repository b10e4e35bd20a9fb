import type { Agent, FundComplexAgent } from '../../domain/agents';
import type { RedemptionParameters } from '../../domain/config';
import { ActionName, AgentType, HoldingKey } from '../../domain/enums';
import { formatPct } from '../../utils/formatters';
import { markToMarketLoss } from './holdings';
import { holdingStep } from './waterfall';
import type { AgentBehaviour, WaterfallStep } from './waterfall';

/** Investor-base weighting of a redeemer's demand on a given fund. */
export const redeemerMultiplier = (fund: FundComplexAgent, redeemer: Agent, params: RedemptionParameters): number => {
  switch (redeemer.type) {
    case AgentType.LdiPension:
      return fund.pensionInvestorPct * params.ldiInvestorMultiplier;
    case AgentType.Insurer:
      return fund.insurerInvestorPct * params.insurerInvestorMultiplier;
    case AgentType.HedgeFund:
      return params.hedgeFundMultiplier;
    case AgentType.FundComplex:
      return params.fundComplexMultiplier;
    case AgentType.Bank:
      return 0;
  }
};

/**
 * Redemption demand on `fund` from its network-connected redeemers.
 *
 * `stressOf` must return each redeemer's pre-redemption stress (E1 / B0 before any fund
 * redemptions are added), so the result does not depend on the order funds are processed in.
 * Only redeemers above the stress trigger redeem; an active gate dampens the demand.
 */
export const inboundRedemptionDemand = (
  fund: FundComplexAgent,
  redeemers: readonly Agent[],
  stressOf: (agent: Agent) => number,
  params: RedemptionParameters
): number => {
  const demand = redeemers.reduce((total, redeemer) => {
    const stress = stressOf(redeemer);
    if (!(stress > params.stressTrigger)) return total;
    return total + redeemer.sizeFactor * params.sizeRate * stress * redeemerMultiplier(fund, redeemer, params);
  }, 0);
  return fund.gateActive ? demand * (1 - params.gateDampening) : demand;
};

// Swing pricing / gates kick in once cumulative redemptions pass the threshold share of AUM.
// The throttle funds nothing: it is recorded without reducing the shortfall.
const swingPricingStep: WaterfallStep<FundComplexAgent> = (fund, ctx, ledger) => {
  if (fund.sizeFactor <= 0) return;
  const inflowShare = fund.cumulativeRedemptionInflows / fund.sizeFactor;
  if (inflowShare <= ctx.config.redemption.gateInflowThreshold) return;
  if (!fund.gateActive) {
    fund.gateActive = true;
    ctx.log.emit(
      ctx.day,
      'warning',
      `${fund.name}: swing pricing activated after redemptions reached ${formatPct(inflowShare, 1)} of AUM`,
      fund.id
    );
  }
  if (ledger.remaining > 0) {
    ledger.actions.push({
      action: ActionName.SwingPricing,
      amount: ledger.remaining * ctx.config.reactions.fundComplex.swingPricingShare,
    });
  }
};

const fundComplexWaterfall: readonly WaterfallStep<FundComplexAgent>[] = [
  holdingStep(ActionName.UseCashBuffer, HoldingKey.Cash, (c) => c.reactions.fundComplex.useCashBuffer),
  holdingStep(ActionName.SellGilts, HoldingKey.Gilts, (c) => c.reactions.fundComplex.sellGilts),
  holdingStep(ActionName.SellCorporateBonds, HoldingKey.CorporateBonds, (c) => c.reactions.fundComplex.sellCorporateBonds),
  swingPricingStep,
];

export const fundComplexBehaviour: AgentBehaviour<FundComplexAgent> = {
  markToMarket: (fund, ctx) => markToMarketLoss(fund.balanceSheet.items, ctx.market.deltas),
  marginCalls: () => 0,
  // Redemptions arrive through the network; see `inboundRedemptionDemand`.
  outflows: () => 0,
  waterfall: () => fundComplexWaterfall,
};
