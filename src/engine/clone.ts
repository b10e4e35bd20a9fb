import type { Agent, CumulativeCounters } from '../domain/agents';
import type { BalanceSheet } from '../domain/balanceSheet';
import type { LiquidityPosition } from '../domain/liquidity';
import { AgentType } from '../domain/enums';

const cloneBalanceSheet = (bs: BalanceSheet): BalanceSheet => ({
  items: bs.items.map((item) => ({
    ...item,
    sensitivities: { ...item.sensitivities },
  })),
});

const cloneLiquidity = (l: LiquidityPosition): LiquidityPosition => ({ ...l, stage1: { ...l.stage1 } });

const cloneCounters = (c: CumulativeCounters): CumulativeCounters => ({ ...c });

export const cloneAgent = (agent: Agent): Agent => {
  const common = {
    balanceSheet: cloneBalanceSheet(agent.balanceSheet),
    liquidity: cloneLiquidity(agent.liquidity),
    reactions: agent.reactions.map((r) => ({
      ...r,
      ...(r.counterparties ? { counterparties: [...r.counterparties] } : {}),
    })),
    counters: cloneCounters(agent.counters),
  };
  switch (agent.type) {
    case AgentType.Bank:
      return {
        ...agent,
        ...common,
        marketMaking: { ...agent.marketMaking },
        repoProvision: { ...agent.repoProvision },
      };
    case AgentType.HedgeFund:
      return {
        ...agent,
        ...common,
        primarySensitivities: [...agent.primarySensitivities],
        secondarySensitivities: [...agent.secondarySensitivities],
      };
    case AgentType.LdiPension:
      return { ...agent, ...common, recapitalisation: { ...agent.recapitalisation } };
    case AgentType.Insurer:
    case AgentType.FundComplex:
      return { ...agent, ...common };
  }
};

export const clonePopulation = (agents: readonly Agent[]): Agent[] => agents.map(cloneAgent);
