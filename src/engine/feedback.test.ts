import { describe, expect, it } from 'vitest';
import { baseConfig } from '../config/baseConfig';
import type { Agent } from '../domain/agents';
import { ActionName, MarketVariable, RelationshipKind } from '../domain/enums';
import type { MarketState } from '../domain/market';
import { computeFeedbackIncrements, runFeedbackIteration } from './feedback';
import type { FeedbackContext } from './feedback';
import { networkFromEdges } from './network';
import type { RelationshipEdge } from './network';
import { marketAt, testBank, testFundComplex, testHedgeFund, testLdiPension } from './testFixtures';

const feedbackContext = (agents: Agent[], edges: RelationshipEdge[], market: MarketState): FeedbackContext => ({
  agents,
  agentsById: new Map(agents.map((agent) => [agent.id, agent])),
  network: networkFromEdges(agents, edges),
  market,
  config: baseConfig,
});

// VIX 60 puts the stress index at 4.
const stressedMarket = () => marketAt({ [MarketVariable.Vix]: 60 });

const primeBrokerage = (): { bank: Agent; fund: Agent; ctx: FeedbackContext } => {
  const bank = testBank();
  bank.hasReacted = true;
  bank.reactions = [{ action: ActionName.CentralBankFacility, amount: 100 }];
  bank.liquidity.b0 = 1000;
  bank.liquidity.b2 = 500;
  const fund = testHedgeFund();
  const ctx = feedbackContext(
    [bank, fund],
    [{ from: fund.id, to: bank.id, kind: RelationshipKind.PrimeBrokerage }],
    stressedMarket()
  );
  return { bank, fund, ctx };
};

describe('computeFeedbackIncrements', () => {
  it('passes a reacting prime broker funding stress to its hedge fund', () => {
    const { fund, ctx } = primeBrokerage();
    const increment = computeFeedbackIncrements(ctx).get(fund.id);
    // 480 repo x (100 / 1000) x 4 x 0.05
    expect(increment?.bilateral).toBeCloseTo(9.6, 9);
    // 3.08 of rate-sensitive value x 1bp x 4 x 0.05 x half the population reacting
    expect(increment?.broadcast).toBeCloseTo(3.08e-5, 12);
    expect(increment?.reputation).toBe(0);
    expect(increment?.crowding).toBe(0);
  });

  it('charges reacting agents reputation and crowding on their own reaction', () => {
    const { bank, ctx } = primeBrokerage();
    const increment = computeFeedbackIncrements(ctx).get(bank.id);
    expect(increment?.bilateral).toBe(0);
    expect(increment?.broadcast).toBe(0);
    expect(increment?.reputation).toBeCloseTo(15, 9);
    expect(increment?.crowding).toBeCloseTo(12, 9);
  });

  it('loads redemption pressure onto fund-complexes from reacting redeemers', () => {
    const fund = testFundComplex();
    const redeemer = testLdiPension();
    redeemer.hasReacted = true;
    redeemer.reactions = [
      { action: ActionName.SellGilts, amount: 30 },
      { action: ActionName.RedeemFunds, amount: 20 },
    ];
    const ctx = feedbackContext(
      [fund, redeemer],
      [{ from: redeemer.id, to: fund.id, kind: RelationshipKind.Redemption }],
      marketAt()
    );
    expect(computeFeedbackIncrements(ctx).get(fund.id)?.bilateral).toBeCloseTo(5, 9);
  });

  it('carries nothing without an edge', () => {
    const { bank, fund } = primeBrokerage();
    const ctx = feedbackContext([bank, fund], [], stressedMarket());
    expect(computeFeedbackIncrements(ctx).get(fund.id)?.bilateral).toBe(0);
  });
});

describe('runFeedbackIteration', () => {
  it('accumulates increments across iterations', () => {
    const { bank, ctx } = primeBrokerage();
    runFeedbackIteration(ctx);
    runFeedbackIteration(ctx);
    expect(bank.liquidity.e2).toBeCloseTo(54, 9);
    expect(bank.liquidity.b3).toBeCloseTo(446, 9);
  });
});
