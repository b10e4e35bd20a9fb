import type { ReactionAction } from './actions';
import type { AgentType } from './enums';
import type { CumulativeCounters, MarketMakingCapacity } from './agents';
import type { MarketLevels, MarketSnapshot } from './market';
import type { SimulationEvent } from './events';

export interface AgentSnapshot {
  day: number;
  agentId: string;
  name: string;
  type: AgentType;
  sizeFactor: number;
  b0: number;
  b1: number;
  b2: number;
  b3: number;
  e1: number;
  e2: number;
  markToMarket: number;
  marginCalls: number;
  redemptions: number;
  hasReacted: boolean;
  bufferFloored: boolean;
  unmetShortfall: number;
  reactions: ReactionAction[];
  counters: CumulativeCounters;
  marketMaking?: MarketMakingCapacity;
}

export interface DaySnapshot {
  day: number;
  agents: AgentSnapshot[];
  market: MarketSnapshot;
  systemAmplification: number;
}

export interface AmplificationReport {
  byAgent: Record<string, number>;
  byType: Partial<Record<AgentType, number>>;
  system: number;
}

export interface RunSummary {
  totalAgents: number;
  horizonDays: number;
  agentsReactedFinalDay: number;
  agentsEverReacted: number;
  totalMarginCalls: number;
  nbfiMarginCalls: number;
  totalAssetSales: number;
  nbfiGiltSales: number;
  totalRepoDemand: number;
  totalRedemptions: number;
  ldiRecapitalisation: number;
  hedgeFundsSeekingRepo: number;
  hedgeFundsRefusedByAll: number;
  repoRefusalRate: number;
  bankGiltCapacityConsumedPct: number;
  finalLevels: MarketLevels;
  finalRepoAvailability: number;
}

export interface SimulationRunResult {
  scenarioId: string;
  days: DaySnapshot[];
  events: SimulationEvent[];
  amplification: AmplificationReport;
  summary: RunSummary;
}
