/**
 * Stage-3 feedback engine.
 *
 * Each iteration first turns the day's selling and repo demand into market impact, then
 * computes every agent's feedback increment from the current state and only then applies
 * them, so no agent sees another's increment from the same iteration. E2 accumulates across
 * iterations.
 *
 * Channels:
 * - bilateral: funding stress between hedge funds and their prime brokers, and redemption
 *   pressure on fund-complexes from reacting redeemers. Only network edges carry it.
 * - broadcast: a market-wide mark-down of liquid holdings, scaled by the share of agents reacting.
 * - reputation: reacting agents pay a stress-dependent premium on what they did.
 * - crowding: reacting agents lose more when many of their own type react alongside them.
 */
import type { Agent } from '../domain/agents';
import { isBank, isHedgeFund } from '../domain/agents';
import type { FeedbackParameters, SimulationConfig } from '../domain/config';
import { AgentType, BalanceSheetCategory, HoldingKey, RelationshipKind } from '../domain/enums';
import type { MarketState } from '../domain/market';
import { applyStage3, reactionTotal, stressRatio } from './agents/lifecycle';
import { holdingAmount } from './agents/holdings';
import { applyEndogenousFeedback, feedbackStress } from './market';
import type { RelationshipNetwork } from './network';

const BPS = 0.0001;

export interface FeedbackContext {
  agents: readonly Agent[];
  agentsById: ReadonlyMap<string, Agent>;
  network: RelationshipNetwork;
  market: MarketState;
  config: SimulationConfig;
}

export interface FeedbackBreakdown {
  bilateral: number;
  broadcast: number;
  reputation: number;
  crowding: number;
}

const reactingPeers = (ids: readonly string[], agentsById: ReadonlyMap<string, Agent>): Agent[] =>
  ids.flatMap((id) => {
    const peer = agentsById.get(id);
    return peer && peer.hasReacted ? [peer] : [];
  });

const bilateralFeedback = (agent: Agent, ctx: FeedbackContext, stress: number): number => {
  const params = ctx.config.feedback;
  switch (agent.type) {
    case AgentType.HedgeFund: {
      const repoBorrowing = holdingAmount(agent, HoldingKey.RepoBorrowing);
      return reactingPeers(ctx.network.banksOf(agent.id), ctx.agentsById)
        .filter(isBank)
        .reduce(
          (sum, bank) => sum + repoBorrowing * (reactionTotal(bank) / bank.liquidity.b0) * stress * params.hedgeFundFundingCoeff,
          0
        );
    }
    case AgentType.Bank:
      return reactingPeers(ctx.network.neighbours(agent.id, RelationshipKind.PrimeBrokerage), ctx.agentsById)
        .filter(isHedgeFund)
        .reduce((sum, fund) => {
          const bankCount = Math.max(1, ctx.network.banksOf(fund.id).length);
          const exposure = holdingAmount(fund, HoldingKey.RepoBorrowing) / bankCount;
          return sum + stressRatio(fund) * exposure * params.bankCounterpartyLossCoeff * stress;
        }, 0);
    case AgentType.FundComplex:
      return reactingPeers(ctx.network.redeemersOf(agent.id), ctx.agentsById).reduce(
        (sum, redeemer) => sum + reactionTotal(redeemer) * params.redemptionPressureCoeff,
        0
      );
    case AgentType.LdiPension:
    case AgentType.Insurer:
      return 0;
  }
};

const broadcastFeedback = (agent: Agent, params: FeedbackParameters, stress: number, reactingShare: number): number => {
  if (reactingShare <= 0) return 0;
  const sensitiveValue = agent.balanceSheet.items
    .filter((item) => item.category === BalanceSheetCategory.LiquidAsset)
    .reduce((sum, item) => {
      const sensitivity = Object.values(item.sensitivities).reduce((s, v) => s + Math.abs(v ?? 0), 0);
      return sum + item.amount * sensitivity;
    }, 0);
  return sensitiveValue * BPS * stress * params.broadcastCoeff * reactingShare;
};

/** Per-agent increments for one iteration, computed without mutating any agent. */
export const computeFeedbackIncrements = (ctx: FeedbackContext): Map<string, FeedbackBreakdown> => {
  const params = ctx.config.feedback;
  const stress = feedbackStress(ctx.market.levels, ctx.config.market);
  const total = ctx.agents.length;
  const reacting = ctx.agents.filter((agent) => agent.hasReacted).length;
  const reactingShare = total > 0 ? reacting / total : 0;

  const typeCounts = new Map<AgentType, { total: number; reacting: number }>();
  ctx.agents.forEach((agent) => {
    const counts = typeCounts.get(agent.type) ?? { total: 0, reacting: 0 };
    counts.total += 1;
    if (agent.hasReacted) counts.reacting += 1;
    typeCounts.set(agent.type, counts);
  });

  const increments = new Map<string, FeedbackBreakdown>();
  ctx.agents.forEach((agent) => {
    const ownReaction = agent.hasReacted ? reactionTotal(agent) : 0;
    const counts = typeCounts.get(agent.type);
    const sameTypeShare = counts && counts.total > 0 ? counts.reacting / counts.total : 0;
    increments.set(agent.id, {
      bilateral: bilateralFeedback(agent, ctx, stress),
      broadcast: broadcastFeedback(agent, params, stress, reactingShare),
      reputation: ownReaction * (Math.sqrt(stress) - 1) * params.reputationCoeff,
      crowding: ownReaction * sameTypeShare * sameTypeShare * stress * params.crowdingCoeff,
    });
  });
  return increments;
};

export const totalIncrement = (breakdown: FeedbackBreakdown): number =>
  breakdown.bilateral + breakdown.broadcast + breakdown.reputation + breakdown.crowding;

/** Runs one feedback iteration and applies it to every agent. */
export const runFeedbackIteration = (ctx: FeedbackContext): void => {
  applyEndogenousFeedback(ctx.market, ctx.config.market);
  const increments = computeFeedbackIncrements(ctx);
  ctx.agents.forEach((agent) => {
    const breakdown = increments.get(agent.id);
    applyStage3(agent, breakdown ? totalIncrement(breakdown) : 0);
  });
};
