import { describe, expect, it } from 'vitest';
import type { AgentSnapshot, DaySnapshot } from '../domain/results';
import { AgentType, HedgeFundStrategy } from '../domain/enums';
import { computeAmplification, dailySystemAmplification, summariseRun, systemAmplificationSeries } from './metrics';
import { marketAt, testBank, testHedgeFund, testLdiPension } from './testFixtures';
import { snapshotMarket } from './market';

const EPS = 0.001;

const snapshot = (agentId: string, type: AgentType, b0: number, b1: number, e2: number, hasReacted = false): AgentSnapshot => ({
  day: 0,
  agentId,
  name: agentId,
  type,
  sizeFactor: 1000,
  b0,
  b1,
  b2: b1,
  b3: b1 - e2,
  e1: b0 - b1,
  e2,
  markToMarket: b0 - b1,
  marginCalls: 0,
  redemptions: 0,
  hasReacted,
  bufferFloored: false,
  unmetShortfall: 0,
  reactions: [],
  counters: { marginCalls: 0, assetSales: 0, giltSales: 0, repoDemand: 0, redemptionsFaced: 0, fundRedemptions: 0 },
});

const day = (n: number, agents: AgentSnapshot[], systemAmplification = 1): DaySnapshot => ({
  day: n,
  agents,
  market: snapshotMarket(marketAt()),
  systemAmplification,
});

const days = [
  day(0, [snapshot('bank-a', AgentType.Bank, 100, 60, 10, true), snapshot('hf-b', AgentType.HedgeFund, 100, 100, 5)], 1.4),
  day(1, [snapshot('bank-a', AgentType.Bank, 100, 80, 0), snapshot('hf-b', AgentType.HedgeFund, 100, 100, 0)], 1),
];

describe('amplification', () => {
  it('floors each agent term before summing across the system', () => {
    expect(dailySystemAmplification(days[0].agents, EPS)).toBeCloseTo(55 / 40.001, 12);
  });

  it('is exactly one without feedback', () => {
    expect(dailySystemAmplification(days[1].agents, EPS)).toBe(1);
    expect(dailySystemAmplification([], EPS)).toBe(1);
  });

  it('accumulates losses over the horizon per agent, type and system', () => {
    const report = computeAmplification(days, EPS);
    expect(report.byAgent['bank-a']).toBeCloseTo(70 / 60, 12);
    expect(report.byAgent['hf-b']).toBeCloseTo(5 / EPS, 6);
    expect(report.byType[AgentType.Bank]).toBeCloseTo(70 / 60, 12);
    expect(report.byType[AgentType.LdiPension]).toBeUndefined();
    expect(report.system).toBeCloseTo(75 / 60.001, 12);
  });

  it('reads the daily series off the snapshots', () => {
    expect(systemAmplificationSeries(days)).toEqual([1.4, 1]);
  });
});

describe('summariseRun', () => {
  it('totals counters, refusals and consumed capacity', () => {
    const bank = testBank({ giltMarketMakingCapacity: 100 });
    bank.marketMaking.giltRemaining = 30;
    bank.counters.marginCalls = 10;
    const refused = testHedgeFund({ id: 'hf-1' });
    refused.soughtRepo = true;
    refused.refusedByAll = true;
    refused.counters.marginCalls = 5;
    refused.counters.giltSales = 40;
    const funded = testHedgeFund({ id: 'hf-2', strategy: HedgeFundStrategy.RelativeValue });
    funded.soughtRepo = true;
    const scheme = testLdiPension();
    scheme.recapitalisation.used = 150;

    const summary = summariseRun([bank, refused, funded, scheme], days, snapshotMarket(marketAt()));
    expect(summary).toMatchObject({
      totalAgents: 4,
      horizonDays: 2,
      agentsReactedFinalDay: 0,
      agentsEverReacted: 1,
      totalMarginCalls: 15,
      nbfiMarginCalls: 5,
      nbfiGiltSales: 40,
      ldiRecapitalisation: 150,
      hedgeFundsSeekingRepo: 2,
      hedgeFundsRefusedByAll: 1,
      repoRefusalRate: 0.5,
      finalRepoAvailability: 1,
    });
    expect(summary.bankGiltCapacityConsumedPct).toBeCloseTo(0.7, 12);
  });

  it('reports no refusals when no hedge fund asked for repo', () => {
    expect(summariseRun([testHedgeFund()], [], snapshotMarket(marketAt())).repoRefusalRate).toBe(0);
  });
});
