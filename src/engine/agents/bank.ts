/**
 * Bank behaviour.
 *
 * Besides its own waterfall a bank is a counterparty to the rest of the system: it assesses
 * repo requests from connected non-banks and absorbs a share of the day's asset selling
 * through its market-making capacity. Repo willingness shrinks as the bank's own stress rises,
 * which is how bank distress reaches its clients.
 */
import type { BankAgent } from '../../domain/agents';
import type { BankParameters } from '../../domain/config';
import { ActionName, HoldingKey, MarketVariable } from '../../domain/enums';
import type { MarketState } from '../../domain/market';
import { stressIndex } from '../market';
import type { RelationshipNetwork } from '../network';
import { holdingAmount, markToMarketLoss } from './holdings';
import { cappedAmount, holdingStep, recordStep } from './waterfall';
import type { AgentBehaviour, WaterfallStep } from './waterfall';

const VARIATION_MARGIN_RATE = 0.05;
const INITIAL_MARGIN_RATE = 0.005;
const WHOLESALE_RUN_TRIGGER = 2;
const WHOLESALE_RUN_RATE = 0.02;
const BPS = 0.0001;

const bankWaterfall: readonly WaterfallStep<BankAgent>[] = [
  holdingStep(ActionName.CentralBankFacility, HoldingKey.BoeEligibleCollateral, (c) => c.reactions.bank.centralBankFacility),
  (bank, ctx, ledger) => {
    if (ledger.remaining <= 0) return;
    const cap = ctx.config.reactions.bank.reduceRepoLending;
    const lendingRoom = holdingAmount(bank, HoldingKey.RepoLending) * (1 - bank.riskAppetite);
    recordStep(ledger, ActionName.ReduceRepoLending, cappedAmount(ledger, cap, lendingRoom), HoldingKey.RepoLending);
  },
  holdingStep(ActionName.SellGilts, HoldingKey.Gilts, (c) => c.reactions.bank.sellGilts),
  holdingStep(ActionName.SellCorporateBonds, HoldingKey.CorporateBonds, (c) => c.reactions.bank.sellCorporateBonds),
];

export const bankBehaviour: AgentBehaviour<BankAgent> = {
  markToMarket: (bank, ctx) => markToMarketLoss(bank.balanceSheet.items, ctx.market.deltas),
  marginCalls: (bank, ctx) => {
    const derivatives = holdingAmount(bank, HoldingKey.DerivativeAssets);
    const stress = stressIndex(ctx.market.levels, ctx.config.market);
    const variation = derivatives * Math.abs(ctx.market.levels[MarketVariable.Gilt10y]) * BPS * VARIATION_MARGIN_RATE;
    const initial = stress > 1 ? derivatives * (stress - 1) * INITIAL_MARGIN_RATE : 0;
    return variation + initial;
  },
  outflows: (bank, ctx) => {
    const stress = stressIndex(ctx.market.levels, ctx.config.market);
    if (stress <= WHOLESALE_RUN_TRIGGER) return 0;
    return holdingAmount(bank, HoldingKey.WholesaleFunding) * (stress - WHOLESALE_RUN_TRIGGER) * WHOLESALE_RUN_RATE;
  },
  waterfall: () => bankWaterfall,
};

/** E1 / B0 for the current day; zero before stage 1 has run. */
export const bankStress = (bank: BankAgent): number =>
  bank.liquidity.b0 > 0 ? bank.liquidity.e1 / bank.liquidity.b0 : 0;

/**
 * Repo a bank is willing to provide against a request.
 *
 * Returns zero unless the requester is connected to the bank. Otherwise the answer is capped
 * by capacity x willingness-to-extend x risk appetite and scaled down linearly as the bank's own
 * stress approaches the refusal threshold, reaching zero at the threshold.
 */
export const assessRepoRequest = (
  bank: BankAgent,
  requesterId: string,
  requested: number,
  network: RelationshipNetwork,
  params: BankParameters
): number => {
  if (requested <= 0 || !network.isConnected(bank.id, requesterId)) return 0;
  const stressScaling = Math.max(0, 1 - bankStress(bank) / params.repoRefusalStressThreshold);
  const available =
    bank.repoProvision.totalCapacity * bank.repoProvision.willingnessToExtendNew * bank.riskAppetite * stressScaling;
  return Math.max(0, Math.min(requested, available));
};

export type AbsorptionMarket = 'gilt' | 'corp';

/**
 * Takes up to `amount` of selling into the bank's remaining capacity, limited by risk appetite.
 * Capacity is cumulative over the horizon and never replenished.
 */
export const absorbSelling = (bank: BankAgent, market: AbsorptionMarket, amount: number): number => {
  const mm = bank.marketMaking;
  const remaining = market === 'gilt' ? mm.giltRemaining : mm.corpRemaining;
  const absorbed = Math.max(0, Math.min(amount, remaining * bank.riskAppetite));
  if (market === 'gilt') {
    mm.giltRemaining = remaining - absorbed;
  } else {
    mm.corpRemaining = remaining - absorbed;
  }
  return absorbed;
};

const byId = (a: BankAgent, b: BankAgent) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const distribute = (banks: readonly BankAgent[], market: AbsorptionMarket, selling: number): number => {
  if (selling <= 0) return 0;
  const remainingOf = (bank: BankAgent) =>
    market === 'gilt' ? bank.marketMaking.giltRemaining : bank.marketMaking.corpRemaining;
  // Shares are fixed from the pre-absorption totals, so visiting order cannot change them.
  const shares = banks.map((bank) => ({ bank, remaining: remainingOf(bank) }));
  const total = shares.reduce((sum, s) => sum + s.remaining, 0);
  if (total <= 0) return 0;
  return shares.reduce((absorbed, s) => absorbed + absorbSelling(s.bank, market, selling * (s.remaining / total)), 0);
};

/**
 * Splits the day's registered gilt and corporate selling across banks in proportion to their
 * remaining capacity. Must run only after every agent has registered its actions.
 */
export const absorbSellingPressure = (banks: readonly BankAgent[], market: MarketState): void => {
  const ordered = [...banks].sort(byId);
  market.endogenous.giltAbsorbed = distribute(ordered, 'gilt', market.endogenous.giltSelling);
  market.endogenous.corpAbsorbed = distribute(ordered, 'corp', market.endogenous.corpSelling);
};

/** Permanent tightening of repo willingness after the bank has reacted. */
export const tightenRepoProvision = (bank: BankAgent, params: BankParameters): void => {
  if (!bank.hasReacted) return;
  const reduction = (1 - bank.riskAppetite) * params.tighteningPerReaction;
  bank.repoProvision.willingnessToExtendNew = Math.max(0, bank.repoProvision.willingnessToExtendNew - reduction);
};

/** Share of initial gilt market-making capacity used so far. */
export const giltCapacityConsumed = (bank: BankAgent): number =>
  bank.marketMaking.giltCapacity > 0 ? 1 - bank.marketMaking.giltRemaining / bank.marketMaking.giltCapacity : 0;

