/**
 * Shared three-stage lifecycle of every agent.
 *
 * Purpose:
 * - Stage 1: exogenous shock. Compute the starting buffer B0 and the direct loss E1
 *   (mark-to-market + margin calls + redemptions), giving B1 = B0 - E1.
 * - Stage 2: own reaction. If the loss breaches the usable threshold, run the variant's
 *   waterfall and credit each action at its instrument efficiency, giving B2.
 * - Stage 3: network feedback. The feedback engine adds E2 and sets B3 = B2 - E2.
 *
 * Variant-specific pieces come from the behaviour table; everything here is shared.
 * All functions mutate the agent in place.
 */
import type { ReactionAction } from '../../domain/actions';
import { ACTION_META } from '../../domain/actionMeta';
import type { Agent, FundComplexAgent } from '../../domain/agents';
import type { BufferConfig, EfficiencyConfig } from '../../domain/config';
import { ActionName, AgentType, AssetClass, InstrumentClass } from '../../domain/enums';
import { InvariantViolationError } from '../../domain/errors';
import type { MarketState } from '../../domain/market';
import type { AgentSnapshot } from '../../domain/results';
import { withBehaviour } from './behaviours';
import { findItem } from './holdings';
import { createLedger } from './waterfall';
import type { ReactionContext, StageContext } from './waterfall';

const requireNonNegative = (agent: Agent, label: string, value: number): number => {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvariantViolationError([`${agent.id}: ${label} is ${value}`]);
  }
  return value;
};

/** Clears the per-day fields; cumulative counters are left untouched. */
export const resetDaily = (agent: Agent): void => {
  agent.liquidity.e1 = 0;
  agent.liquidity.e2 = 0;
  agent.liquidity.stage1 = { markToMarket: 0, marginCalls: 0, redemptions: 0 };
  agent.hasReacted = false;
  agent.reactions = [];
  agent.unmetShortfall = 0;
};

/**
 * B0 as the weighted sum of the variant's buffer items, floored at a fraction of the agent's
 * size and at an absolute floor so it is strictly positive even for an agent with no liquid assets.
 */
export const computeInitialBuffer = (agent: Agent, buffers: BufferConfig): number => {
  const params = buffers.byType[agent.type];
  let weighted = 0;
  for (const item of agent.balanceSheet.items) {
    const weight = params.weights[item.key];
    if (weight !== undefined) weighted += weight * item.amount;
  }
  const floor = Math.max(params.floorPctOfSize * agent.sizeFactor, buffers.absoluteFloor);
  agent.bufferFloored = !(weighted >= floor);
  agent.liquidity.b0 = agent.bufferFloored ? floor : weighted;
  return agent.liquidity.b0;
};

/**
 * Stage 1 without network-routed redemptions. Fund-complex inbound demand is added afterwards
 * through `applyInboundRedemptions`, once every agent's own loss is known.
 */
export const computeStage1 = (agent: Agent, ctx: StageContext): number => {
  const { markToMarket, marginCalls, outflows } = withBehaviour(agent, (a, behaviour) => ({
    markToMarket: behaviour.markToMarket(a, ctx),
    marginCalls: behaviour.marginCalls(a, ctx),
    outflows: behaviour.outflows(a, ctx),
  }));
  const liquidity = agent.liquidity;
  liquidity.stage1 = {
    markToMarket: requireNonNegative(agent, 'mark-to-market loss', markToMarket),
    marginCalls: requireNonNegative(agent, 'margin calls', marginCalls),
    redemptions: requireNonNegative(agent, 'redemptions', outflows),
  };
  liquidity.e1 = markToMarket + marginCalls + outflows;
  liquidity.b1 = liquidity.b0 - liquidity.e1;
  agent.counters.marginCalls += marginCalls;
  agent.counters.redemptionsFaced += outflows;
  return liquidity.e1;
};

export const applyInboundRedemptions = (fund: FundComplexAgent, amount: number): void => {
  requireNonNegative(fund, 'inbound redemptions', amount);
  const liquidity = fund.liquidity;
  liquidity.stage1.redemptions += amount;
  liquidity.e1 += amount;
  liquidity.b1 = liquidity.b0 - liquidity.e1;
  fund.counters.redemptionsFaced += amount;
  fund.cumulativeRedemptionInflows += amount;
};

/** Stage-1 stress ratio E1 / B0. */
export const stressRatio = (agent: Agent): number =>
  agent.liquidity.b0 > 0 ? agent.liquidity.e1 / agent.liquidity.b0 : 0;

/**
 * True when the loss breaches the usable threshold theta x (1 + u). An agent sitting on its
 * buffer floor reacts to any positive loss.
 */
export const shouldReact = (agent: Agent): boolean => {
  const { b0, e1 } = agent.liquidity;
  if (!(b0 > 0)) return false;
  if (agent.bufferFloored) return e1 > 0;
  return e1 / b0 > agent.theta * (1 + agent.bufferUsability);
};

export const actionEfficiency = (reaction: ReactionAction, market: MarketState, params: EfficiencyConfig): number => {
  const meta = ACTION_META[reaction.action];
  switch (meta.instrument) {
    case InstrumentClass.AssetSale: {
      const spread =
        meta.assetClass === AssetClass.Gilt ? market.endogenous.giltBidAskBps : market.endogenous.corpBidAskBps;
      return Math.max(params.saleFloor, 1 - spread / params.saleSpreadDivisorBps);
    }
    case InstrumentClass.Repo:
      return market.endogenous.repoAvailability;
    case InstrumentClass.CentralBank:
      return params.centralBank;
    case InstrumentClass.Redemption:
      return params.redemption;
    case InstrumentClass.Facility:
      return params.facility;
    case InstrumentClass.Throttle:
      return params.throttle;
  }
};

/** Stage 2: runs the variant waterfall when the agent reacts and sets B2. */
export const computeStage2 = (agent: Agent, ctx: ReactionContext): void => {
  const liquidity = agent.liquidity;
  agent.reactions = [];
  agent.unmetShortfall = 0;
  agent.hasReacted = shouldReact(agent);
  if (!agent.hasReacted) {
    liquidity.b2 = liquidity.b1;
    return;
  }

  const ledger = createLedger(liquidity.e1);
  withBehaviour(agent, (a, behaviour) => {
    behaviour.waterfall(a).forEach((step) => step(a, ctx, ledger));
  });
  agent.reactions = ledger.actions;
  agent.unmetShortfall = Math.max(0, ledger.remaining);

  let mitigation = 0;
  agent.reactions.forEach((reaction) => {
    requireNonNegative(agent, `${reaction.action} amount`, reaction.amount);
    mitigation += reaction.amount * actionEfficiency(reaction, ctx.market, ctx.config.efficiency);
    const meta = ACTION_META[reaction.action];
    if (meta.instrument === InstrumentClass.AssetSale) {
      agent.counters.assetSales += reaction.amount;
      if (meta.assetClass === AssetClass.Gilt) agent.counters.giltSales += reaction.amount;
    } else if (meta.instrument === InstrumentClass.Repo) {
      agent.counters.repoDemand += reaction.amount;
    }
  });
  liquidity.b2 = liquidity.b1 + mitigation;
};

/** Stage 3: adds a feedback increment. Only the feedback engine calls this. */
export const applyStage3 = (agent: Agent, e2: number): void => {
  requireNonNegative(agent, 'feedback increment', e2);
  agent.liquidity.e2 += e2;
  agent.liquidity.b3 = agent.liquidity.b2 - agent.liquidity.e2;
};

/** Zero-feedback close of the day: E2 stays 0 and B3 = B2. */
export const closeWithoutFeedback = (agent: Agent): void => {
  agent.liquidity.b3 = agent.liquidity.b2 - agent.liquidity.e2;
};

/** Size of the day's reaction; throttles such as swing pricing move no money and are excluded. */
export const reactionTotal = (agent: Agent): number =>
  agent.reactions.reduce(
    (sum, reaction) => (ACTION_META[reaction.action].instrument === InstrumentClass.Throttle ? sum : sum + reaction.amount),
    0
  );

/**
 * End-of-day realisation: sold holdings, drawn facilities and posted or pledged collateral
 * leave the balance sheet. Redemptions use up redeemable room and recapitalisation received is
 * booked against the sponsor's commitment.
 */
export const realiseActions = (agent: Agent): void => {
  agent.reactions.forEach((reaction) => {
    const meta = ACTION_META[reaction.action];
    if (meta.depletesSource) {
      const key = reaction.source ?? meta.defaultSource;
      const item = key === undefined ? undefined : findItem(agent, key);
      if (item) item.amount = Math.max(0, item.amount - reaction.amount);
    }
    if (reaction.action === ActionName.RedeemFunds) {
      agent.counters.fundRedemptions += reaction.amount;
    }
    if (agent.type === AgentType.LdiPension && reaction.action === ActionName.Recapitalisation) {
      agent.recapitalisation.used += reaction.amount;
    }
  });
};

export const snapshotAgent = (agent: Agent, day: number): AgentSnapshot => {
  const { liquidity } = agent;
  const snapshot: AgentSnapshot = {
    day,
    agentId: agent.id,
    name: agent.name,
    type: agent.type,
    sizeFactor: agent.sizeFactor,
    b0: liquidity.b0,
    b1: liquidity.b1,
    b2: liquidity.b2,
    b3: liquidity.b3,
    e1: liquidity.e1,
    e2: liquidity.e2,
    markToMarket: liquidity.stage1.markToMarket,
    marginCalls: liquidity.stage1.marginCalls,
    redemptions: liquidity.stage1.redemptions,
    hasReacted: agent.hasReacted,
    bufferFloored: agent.bufferFloored,
    unmetShortfall: agent.unmetShortfall,
    reactions: agent.reactions.map((reaction) => ({
      ...reaction,
      ...(reaction.counterparties ? { counterparties: [...reaction.counterparties] } : {}),
    })),
    counters: { ...agent.counters },
  };
  if (agent.type === AgentType.Bank) {
    snapshot.marketMaking = { ...agent.marketMaking };
  }
  return snapshot;
};
