import { describe, expect, it } from 'vitest';
import { baseConfig } from '../../config/baseConfig';
import { ActionName, HedgeFundStrategy, HoldingKey, MarketVariable, RelationshipKind } from '../../domain/enums';
import { marketAt, reactionContext, setLiquidity, testBank, testHedgeFund } from '../testFixtures';
import type { HedgeFundAgent } from '../../domain/agents';
import { hedgeFundBehaviour } from './hedgeFund';
import { holdingAmount } from './holdings';
import { computeStage2 } from './lifecycle';

const primeBroker = (fundId: string, bankId: string) => ({ from: fundId, to: bankId, kind: RelationshipKind.PrimeBrokerage });

describe('hedge fund waterfall', () => {
  it('funds the shortfall with prime-broker repo before selling', () => {
    const bank = testBank({ repoCapacity: 1000, riskAppetite: 0.5 });
    setLiquidity(bank, 100, 0);
    const fund = testHedgeFund();
    setLiquidity(fund, 50, 100);
    const ctx = reactionContext([bank, fund], [primeBroker(fund.id, bank.id)]);

    computeStage2(fund, ctx);

    expect(fund.reactions.map((r) => r.action)).toEqual([ActionName.SeekRepo, ActionName.SellGilts]);
    expect(fund.reactions[0].amount).toBeCloseTo(68, 9);
    expect(fund.reactions[0].counterparties).toEqual([bank.id]);
    expect(fund.reactions[1].amount).toBeCloseTo(3.2, 9);
    expect(fund.soughtRepo).toBe(true);
    expect(fund.refusedByAll).toBe(false);
    expect(fund.counters.repoDemand).toBeCloseTo(68, 9);
  });

  it('fire-sells when every connected bank refuses', () => {
    const bank = testBank({ repoCapacity: 1000, riskAppetite: 0.5 });
    setLiquidity(bank, 100, 50);
    const fund = testHedgeFund();
    setLiquidity(fund, 50, 100);
    const ctx = reactionContext([bank, fund], [primeBroker(fund.id, bank.id)]);

    computeStage2(fund, ctx);

    expect(fund.reactions).toEqual([{ action: ActionName.SellGilts, amount: 10, source: HoldingKey.Gilts }]);
    expect(fund.refusedByAll).toBe(true);
    expect(fund.unmetShortfall).toBeCloseTo(90, 9);
    expect(ctx.log.events).toHaveLength(1);
    expect(ctx.log.events[0]).toMatchObject({ id: 'evt-0-0', day: 0, severity: 'warning', agentId: fund.id });
  });

  it('unwinds basis trades first for relative-value funds', () => {
    const fund = testHedgeFund({ strategy: HedgeFundStrategy.RelativeValue });
    setLiquidity(fund, 50, 100);
    computeStage2(fund, reactionContext([fund]));

    expect(fund.reactions.map((r) => r.action)).toEqual([ActionName.UnwindBasisTrades, ActionName.SellGilts]);
    expect(fund.reactions[0].amount).toBeCloseTo(10, 9);
    expect(fund.reactions[1].amount).toBeCloseTo(9, 9);
  });
});

describe('hedge fund stage 1', () => {
  it('builds the exposure mix from AUM, leverage and strategy', () => {
    const fund = testHedgeFund();
    expect(holdingAmount(fund, HoldingKey.Gilts)).toBeCloseTo(1400, 9);
    expect(holdingAmount(fund, HoldingKey.RepoBorrowing)).toBeCloseTo(480, 9);
  });

  it('charges initial margin on stress and haircut margin on repo dependence', () => {
    const fund = testHedgeFund();
    const market = marketAt({ [MarketVariable.Vix]: 30, [MarketVariable.RepoHaircutGilt]: 2 });
    const margin = hedgeFundBehaviour.marginCalls(fund, { day: 0, market, config: baseConfig });
    // 2000 x 1 x 0.002 initial + 1000 x 0.8 x 2 x 0.003 haircut
    expect(margin).toBeCloseTo(4 + 4.8, 9);
  });

  it('faces LP redemptions only under heavy stress with high VaR usage', () => {
    const stage = (vix: number) => ({ day: 0, market: marketAt({ [MarketVariable.Vix]: vix }), config: baseConfig });
    const fund = testHedgeFund({ varUtilisation: 0.9 });
    expect(hedgeFundBehaviour.outflows(fund, stage(30))).toBe(0);
    expect(hedgeFundBehaviour.outflows(fund, stage(45))).toBe(20);
    expect(hedgeFundBehaviour.outflows(testHedgeFund({ varUtilisation: 0.8 }), stage(45))).toBe(0);
  });
});

describe('prime-broker contagion', () => {
  const repoObtained = (fund: HedgeFundAgent): number =>
    fund.reactions.filter((r) => r.action === ActionName.SeekRepo).reduce((sum, r) => sum + r.amount, 0);

  // Bank A serves hf-1 and hf-2, bank B serves only hf-3, bank C serves nobody.
  const runDay = (bankAStress: number): HedgeFundAgent[] => {
    const banks = ['bank-a', 'bank-b', 'bank-c'].map((id) => testBank({ id, repoCapacity: 200 }));
    banks.forEach((bank) => setLiquidity(bank, 100, 0));
    setLiquidity(banks[0], 100, 100 * bankAStress);
    const funds = ['hf-1', 'hf-2', 'hf-3'].map((id) => testHedgeFund({ id }));
    funds.forEach((fund) => setLiquidity(fund, 50, 100));
    const ctx = reactionContext(
      [...banks, ...funds],
      [primeBroker('hf-1', 'bank-a'), primeBroker('hf-2', 'bank-a'), primeBroker('hf-3', 'bank-b')]
    );
    funds.forEach((fund) => computeStage2(fund, ctx));
    return funds;
  };

  it('cuts repo to every client of a bank past its refusal threshold and no one else', () => {
    const calm = runDay(0).map(repoObtained);
    const stressed = runDay(0.3).map(repoObtained);

    expect(calm[0]).toBeCloseTo(68, 9);
    expect(calm[1]).toBeCloseTo(68, 9);
    expect(stressed[0]).toBe(0);
    expect(stressed[1]).toBe(0);
    expect(stressed[2]).toBeCloseTo(calm[2], 9);
    expect(stressed[2]).toBeCloseTo(68, 9);
  });
});
