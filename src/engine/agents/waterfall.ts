/**
 * Building blocks for per-variant behaviour: the reaction context, the shortfall ledger and
 * the waterfall step helpers every variant table is made of.
 */
import type { ReactionAction, WaterfallCap } from '../../domain/actions';
import type { Agent } from '../../domain/agents';
import type { SimulationConfig } from '../../domain/config';
import { ActionName } from '../../domain/enums';
import type { HoldingKey } from '../../domain/enums';
import { InvariantViolationError } from '../../domain/errors';
import type { MarketState } from '../../domain/market';
import type { EventLog } from '../events';
import type { RelationshipNetwork } from '../network';
import { holdingAmount } from './holdings';

export interface StageContext {
  day: number;
  market: MarketState;
  config: SimulationConfig;
}

export interface ReactionContext extends StageContext {
  network: RelationshipNetwork;
  agentsById: ReadonlyMap<string, Agent>;
  log: EventLog;
}

/** Outstanding shortfall of one agent's waterfall and the actions executed so far. */
export interface WaterfallLedger {
  remaining: number;
  actions: ReactionAction[];
}

export type WaterfallStep<A extends Agent> = (agent: A, ctx: ReactionContext, ledger: WaterfallLedger) => void;

/**
 * Variant-specific behaviour. Everything else about an agent's day is shared.
 */
export interface AgentBehaviour<A extends Agent> {
  markToMarket: (agent: A, ctx: StageContext) => number;
  marginCalls: (agent: A, ctx: StageContext) => number;
  outflows: (agent: A, ctx: StageContext) => number;
  waterfall: (agent: A) => readonly WaterfallStep<A>[];
}

export const createLedger = (shortfall: number): WaterfallLedger => ({ remaining: shortfall, actions: [] });

/** min(shortfall x share, base x cap); the base is a holding or a facility's remaining room. */
export const cappedAmount = (ledger: WaterfallLedger, cap: WaterfallCap, base: number): number =>
  Math.min(ledger.remaining * cap.shortfallShare, base * cap.holdingCap);

/**
 * Records an executed step and reduces the outstanding shortfall. Non-positive amounts and an
 * exhausted shortfall are skipped. Returns the amount recorded.
 */
export const recordStep = (
  ledger: WaterfallLedger,
  action: ActionName,
  amount: number,
  source?: HoldingKey,
  counterparties?: string[]
): number => {
  if (Number.isNaN(amount)) {
    throw new InvariantViolationError([`${action} produced a NaN amount`]);
  }
  if (amount <= 0 || ledger.remaining <= 0) return 0;
  const executed = Math.min(amount, ledger.remaining);
  const reaction: ReactionAction = { action, amount: executed };
  if (source !== undefined) reaction.source = source;
  if (counterparties !== undefined) reaction.counterparties = counterparties;
  ledger.actions.push(reaction);
  ledger.remaining -= executed;
  return executed;
};

/** A step funded from a single holding: amount = min(shortfall x share, holding x cap). */
export const holdingStep =
  <A extends Agent>(action: ActionName, key: HoldingKey, capOf: (config: SimulationConfig) => WaterfallCap): WaterfallStep<A> =>
  (agent, ctx, ledger) => {
    if (ledger.remaining <= 0) return;
    recordStep(ledger, action, cappedAmount(ledger, capOf(ctx.config), holdingAmount(agent, key)), key);
  };

/**
 * Redeem holdings in the fund-complexes the agent is linked to. Capped as a fraction of the
 * room left after earlier redemptions, which is the agent's size to begin with.
 */
export const redeemStep =
  <A extends Agent>(capOf: (config: SimulationConfig) => WaterfallCap): WaterfallStep<A> =>
  (agent, ctx, ledger) => {
    if (ledger.remaining <= 0) return;
    const targets = ctx.network.redemptionTargets(agent.id);
    if (targets.length === 0) return;
    const room = Math.max(0, agent.sizeFactor - agent.counters.fundRedemptions);
    const amount = cappedAmount(ledger, capOf(ctx.config), room);
    recordStep(ledger, ActionName.RedeemFunds, amount, undefined, targets);
  };
