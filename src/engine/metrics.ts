import { isHedgeFund } from '../domain/agents';
import type { Agent } from '../domain/agents';
import { AgentType } from '../domain/enums';
import type { MarketSnapshot } from '../domain/market';
import type { AgentSnapshot, AmplificationReport, DaySnapshot, RunSummary } from '../domain/results';

interface AmplificationTerms {
  direct: number;
  total: number;
}

const ratio = (terms: AmplificationTerms): number => terms.total / terms.direct;

const addTerms = (acc: AmplificationTerms, terms: AmplificationTerms): AmplificationTerms => ({
  direct: acc.direct + terms.direct,
  total: acc.total + terms.total,
});

/**
 * Direct loss B0 - B1 (= E1) and total loss B0 - B1 + E2, each floored at `epsilon`.
 * Stage-2 mitigation does not depend on feedback, so it stays out of both terms.
 */
const flooredTerms = (direct: number, feedback: number, epsilon: number): AmplificationTerms => ({
  direct: Math.max(direct, epsilon),
  total: Math.max(direct + feedback, epsilon),
});

/** System amplification for a single day. */
export const dailySystemAmplification = (agents: readonly AgentSnapshot[], epsilon: number): number => {
  if (agents.length === 0) return 1;
  const terms = agents
    .map((a) => flooredTerms(a.b0 - a.b1, a.e2, epsilon))
    .reduce(addTerms, { direct: 0, total: 0 });
  return ratio(terms);
};

/**
 * End-of-run amplification. Each agent's direct and total losses are accumulated over the
 * horizon and floored; type and system ratios divide the sums of the floored terms.
 */
export const computeAmplification = (days: readonly DaySnapshot[], epsilon: number): AmplificationReport => {
  const raw = new Map<string, { type: AgentType; direct: number; feedback: number }>();
  days.forEach((day) => {
    day.agents.forEach((snapshot) => {
      const acc = raw.get(snapshot.agentId) ?? { type: snapshot.type, direct: 0, feedback: 0 };
      acc.direct += snapshot.b0 - snapshot.b1;
      acc.feedback += snapshot.e2;
      raw.set(snapshot.agentId, acc);
    });
  });

  const byAgent: Record<string, number> = {};
  const typeTerms = new Map<AgentType, AmplificationTerms>();
  let systemTerms: AmplificationTerms = { direct: 0, total: 0 };
  raw.forEach((acc, agentId) => {
    const terms = flooredTerms(acc.direct, acc.feedback, epsilon);
    byAgent[agentId] = ratio(terms);
    typeTerms.set(acc.type, addTerms(typeTerms.get(acc.type) ?? { direct: 0, total: 0 }, terms));
    systemTerms = addTerms(systemTerms, terms);
  });

  const byType: AmplificationReport['byType'] = {};
  typeTerms.forEach((terms, type) => {
    byType[type] = ratio(terms);
  });

  return {
    byAgent,
    byType,
    system: systemTerms.direct > 0 ? ratio(systemTerms) : 1,
  };
};

export const systemAmplificationSeries = (days: readonly DaySnapshot[]): number[] =>
  days.map((day) => day.systemAmplification);

const sum = <T>(items: readonly T[], valueOf: (item: T) => number): number =>
  items.reduce((total, item) => total + valueOf(item), 0);

/**
 * Headline totals for a completed run. Counters are cumulative on the agents, so the final
 * population state is enough; reaction history comes from the daily snapshots.
 */
export const summariseRun = (
  agents: readonly Agent[],
  days: readonly DaySnapshot[],
  finalMarket: MarketSnapshot
): RunSummary => {
  const nonBanks = agents.filter((a) => a.type !== AgentType.Bank);
  const hedgeFunds = agents.filter(isHedgeFund);
  const banks = agents.flatMap((a) => (a.type === AgentType.Bank ? [a] : []));
  const lastDay = days.length > 0 ? days[days.length - 1] : undefined;

  const everReacted = new Set<string>();
  days.forEach((day) => day.agents.filter((s) => s.hasReacted).forEach((s) => everReacted.add(s.agentId)));

  const seeking = hedgeFunds.filter((f) => f.soughtRepo).length;
  const refused = hedgeFunds.filter((f) => f.refusedByAll).length;
  const giltCapacity = sum(banks, (b) => b.marketMaking.giltCapacity);
  const giltUsed = sum(banks, (b) => b.marketMaking.giltCapacity - b.marketMaking.giltRemaining);

  return {
    totalAgents: agents.length,
    horizonDays: days.length,
    agentsReactedFinalDay: lastDay ? lastDay.agents.filter((s) => s.hasReacted).length : 0,
    agentsEverReacted: everReacted.size,
    totalMarginCalls: sum(agents, (a) => a.counters.marginCalls),
    nbfiMarginCalls: sum(nonBanks, (a) => a.counters.marginCalls),
    totalAssetSales: sum(agents, (a) => a.counters.assetSales),
    nbfiGiltSales: sum(nonBanks, (a) => a.counters.giltSales),
    totalRepoDemand: sum(agents, (a) => a.counters.repoDemand),
    totalRedemptions: sum(agents, (a) => a.counters.redemptionsFaced),
    ldiRecapitalisation: sum(agents, (a) => (a.type === AgentType.LdiPension ? a.recapitalisation.used : 0)),
    hedgeFundsSeekingRepo: seeking,
    hedgeFundsRefusedByAll: refused,
    repoRefusalRate: seeking > 0 ? refused / seeking : 0,
    bankGiltCapacityConsumedPct: giltCapacity > 0 ? giltUsed / giltCapacity : 0,
    finalLevels: { ...finalMarket.levels },
    finalRepoAvailability: finalMarket.endogenous.repoAvailability,
  };
};
