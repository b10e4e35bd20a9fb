import { describe, expect, it } from 'vitest';
import { baseConfig } from '../../config/baseConfig';
import { ActionName, HoldingKey, MarketVariable, RelationshipKind } from '../../domain/enums';
import { InvariantViolationError } from '../../domain/errors';
import {
  marketAt,
  reactionContext,
  setLiquidity,
  testBank,
  testFundComplex,
  testHedgeFund,
  testInsurer,
} from '../testFixtures';
import {
  actionEfficiency,
  applyStage3,
  closeWithoutFeedback,
  computeInitialBuffer,
  computeStage2,
  realiseActions,
  reactionTotal,
  shouldReact,
} from './lifecycle';
import { holdingAmount } from './holdings';

describe('initial buffer', () => {
  it('weights buffer items by agent type', () => {
    const fund = testHedgeFund();
    expect(computeInitialBuffer(fund, baseConfig.buffers)).toBe(100);
    expect(fund.bufferFloored).toBe(false);
  });

  it('floors at a share of size when the weighted buffer is too small', () => {
    const fund = testFundComplex({ gilts: 500 });
    expect(computeInitialBuffer(fund, baseConfig.buffers)).toBe(10);
    expect(fund.bufferFloored).toBe(true);
  });

  it('stays strictly positive for an agent with no size and no liquid assets', () => {
    const fund = testHedgeFund({ aum: 0 });
    expect(computeInitialBuffer(fund, baseConfig.buffers)).toBe(0.001);
  });
});

describe('reaction threshold', () => {
  it('reacts only once the loss exceeds theta x (1 + usability) of the buffer', () => {
    const bank = testBank({ theta: 0.25, bufferUsability: 1 });
    setLiquidity(bank, 100, 50);
    expect(shouldReact(bank)).toBe(false);
    setLiquidity(bank, 100, 51);
    expect(shouldReact(bank)).toBe(true);
  });

  it('reacts to any positive loss when the buffer is floored', () => {
    const fund = testFundComplex({ theta: 5 });
    fund.bufferFloored = true;
    setLiquidity(fund, 10, 0);
    expect(shouldReact(fund)).toBe(false);
    setLiquidity(fund, 10, 0.5);
    expect(shouldReact(fund)).toBe(true);
  });
});

describe('action efficiency', () => {
  const market = marketAt({ [MarketVariable.Vix]: 30 });
  const efficiency = (action: ActionName) => actionEfficiency({ action, amount: 1 }, market, baseConfig.efficiency);

  it('discounts asset sales by the bid/ask spread', () => {
    expect(efficiency(ActionName.SellGilts)).toBeCloseTo(0.96, 12);
    expect(efficiency(ActionName.SellCorporateBonds)).toBeCloseTo(0.9, 12);
  });

  it('credits every repo-type action at current repo availability', () => {
    expect(efficiency(ActionName.SeekRepo)).toBeCloseTo(0.85, 12);
    expect(efficiency(ActionName.DrawRepoLines)).toBeCloseTo(0.85, 12);
    expect(efficiency(ActionName.ReduceRepoLending)).toBeCloseTo(0.85, 12);
  });

  it('uses fixed efficiencies for other instruments', () => {
    expect(efficiency(ActionName.CentralBankFacility)).toBe(0.95);
    expect(efficiency(ActionName.RedeemFunds)).toBe(0.9);
    expect(efficiency(ActionName.DrawRevolvingCredit)).toBe(0.8);
    expect(efficiency(ActionName.SwingPricing)).toBe(0);
  });
});

describe('stage 2 waterfall', () => {
  it('uses cash first and sells gilts for the rest', () => {
    const fund = testFundComplex({ cash: 100, gilts: 1000, corporateBonds: 1000 });
    setLiquidity(fund, 50, 150);
    computeStage2(fund, reactionContext([fund]));

    expect(fund.hasReacted).toBe(true);
    expect(fund.reactions).toEqual([
      { action: ActionName.UseCashBuffer, amount: 100, source: HoldingKey.Cash },
      { action: ActionName.SellGilts, amount: 50, source: HoldingKey.Gilts },
    ]);
    expect(fund.unmetShortfall).toBe(0);
    expect(fund.liquidity.b2).toBeCloseTo(-100 + 100 * 0.8 + 50 * 0.98, 9);
    expect(fund.counters.assetSales).toBe(50);
    expect(fund.counters.giltSales).toBe(50);
  });

  it('caps every step by both shortfall share and holding cap', () => {
    const bank = testBank({ boeEligible: 1000, repoLending: 1000, gilts: 10000, corporateBonds: 10000 });
    setLiquidity(bank, 150, 1000);
    computeStage2(bank, reactionContext([bank]));

    const amounts = bank.reactions.map((r) => [r.action, r.amount] as const);
    expect(amounts.map(([action]) => action)).toEqual([
      ActionName.CentralBankFacility,
      ActionName.ReduceRepoLending,
      ActionName.SellGilts,
      ActionName.SellCorporateBonds,
    ]);
    expect(amounts[0][1]).toBeCloseTo(300, 9);
    expect(amounts[1][1]).toBeCloseTo(150, 9);
    expect(amounts[2][1]).toBeCloseTo(55, 9);
    expect(amounts[3][1]).toBeCloseTo(39.6, 9);
    expect(bank.unmetShortfall).toBeCloseTo(455.4, 9);
  });

  it('counts drawn repo lines as repo demand', () => {
    const insurer = testInsurer({ committedRepoLines: 1000 });
    setLiquidity(insurer, 100, 1000);
    computeStage2(insurer, reactionContext([insurer], [], marketAt({ [MarketVariable.Vix]: 30 })));

    expect(insurer.reactions).toEqual([
      { action: ActionName.DrawRepoLines, amount: 300, source: HoldingKey.CommittedRepoLines },
    ]);
    expect(insurer.liquidity.b2).toBeCloseTo(-900 + 300 * 0.85, 9);
    expect(insurer.counters.repoDemand).toBe(300);
    expect(insurer.counters.assetSales).toBe(0);
  });

  it('leaves B2 at B1 when the agent does not react', () => {
    const bank = testBank({ boeEligible: 1000 });
    setLiquidity(bank, 150, 10);
    computeStage2(bank, reactionContext([bank]));
    expect(bank.hasReacted).toBe(false);
    expect(bank.reactions).toEqual([]);
    expect(bank.liquidity.b2).toBe(140);
  });
});

describe('stage 3 and realisation', () => {
  it('accumulates feedback and keeps B3 = B2 - E2', () => {
    const bank = testBank();
    bank.liquidity.b2 = 50;
    applyStage3(bank, 5);
    applyStage3(bank, 7);
    expect(bank.liquidity.e2).toBe(12);
    expect(bank.liquidity.b3).toBe(38);
  });

  it('rejects a negative feedback increment', () => {
    expect(() => applyStage3(testBank(), -1)).toThrow(InvariantViolationError);
  });

  it('closes the day at B3 = B2 without feedback', () => {
    const bank = testBank();
    bank.liquidity.b2 = 42;
    closeWithoutFeedback(bank);
    expect(bank.liquidity.b3).toBe(42);
  });

  it('depletes sold holdings and leaves throttles out of the reaction total', () => {
    const fund = testFundComplex({ cash: 100, gilts: 300 });
    fund.hasReacted = true;
    fund.reactions = [
      { action: ActionName.UseCashBuffer, amount: 60, source: HoldingKey.Cash },
      { action: ActionName.SellGilts, amount: 40, source: HoldingKey.Gilts },
      { action: ActionName.SwingPricing, amount: 25 },
    ];
    expect(reactionTotal(fund)).toBe(100);
    realiseActions(fund);
    expect(holdingAmount(fund, HoldingKey.Cash)).toBe(40);
    expect(holdingAmount(fund, HoldingKey.Gilts)).toBe(260);
  });

  it('encumbers central bank collateral so repeated draws cannot exceed it', () => {
    const bank = testBank({ boeEligible: 100 });
    const ctx = reactionContext([bank]);
    const draws: number[] = [];
    for (let day = 0; day < 10; day += 1) {
      setLiquidity(bank, 100, 1000);
      computeStage2(bank, ctx);
      bank.reactions
        .filter((r) => r.action === ActionName.CentralBankFacility)
        .forEach((r) => draws.push(r.amount));
      realiseActions(bank);
    }

    expect(draws[0]).toBeCloseTo(50, 9);
    expect(draws[1]).toBeCloseTo(25, 9);
    const drawn = draws.reduce((sum, amount) => sum + amount, 0);
    expect(drawn).toBeCloseTo(100 - 100 / 1024, 9);
    expect(holdingAmount(bank, HoldingKey.BoeEligibleCollateral)).toBeCloseTo(100 / 1024, 9);
  });

  it('shrinks redeemable room by what has already been redeemed', () => {
    const insurer = testInsurer({ totalAssets: 10000 });
    const fund = testFundComplex();
    const ctx = reactionContext([insurer, fund], [{ from: insurer.id, to: fund.id, kind: RelationshipKind.Redemption }]);
    const redeemed = () => insurer.reactions.find((r) => r.action === ActionName.RedeemFunds)?.amount;

    setLiquidity(insurer, 100, 1e6);
    computeStage2(insurer, ctx);
    expect(redeemed()).toBeCloseTo(300, 9);
    realiseActions(insurer);

    setLiquidity(insurer, 100, 1e6);
    computeStage2(insurer, ctx);
    expect(redeemed()).toBeCloseTo(291, 9);
    realiseActions(insurer);
    expect(insurer.counters.fundRedemptions).toBeCloseTo(591, 9);

    insurer.counters.fundRedemptions = 10000;
    computeStage2(insurer, ctx);
    expect(redeemed()).toBeUndefined();
  });
});
