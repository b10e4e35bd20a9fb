import type { ReactionAction } from './actions';
import type { BalanceSheet } from './balanceSheet';
import { AgentType } from './enums';
import type { HedgeFundStrategy, MarketVariable, RepoDependence } from './enums';
import type { LiquidityPosition } from './liquidity';

/** Accumulate across the whole horizon; never reset mid-run. */
export interface CumulativeCounters {
  marginCalls: number;
  assetSales: number;
  giltSales: number;
  repoDemand: number;
  redemptionsFaced: number;
  // Fund holdings redeemed by this agent; bounds its remaining redeemable room.
  fundRedemptions: number;
}

interface AgentCommon {
  id: string;
  name: string;
  theta: number;
  bufferUsability: number;
  sizeFactor: number;
  balanceSheet: BalanceSheet;
  liquidity: LiquidityPosition;
  bufferFloored: boolean;
  hasReacted: boolean;
  reactions: ReactionAction[];
  unmetShortfall: number;
  counters: CumulativeCounters;
}

export type BankTier = 'major' | 'mid' | 'small';

/** Structural and cumulative: remaining capacity is never replenished within a run. */
export interface MarketMakingCapacity {
  giltCapacity: number;
  giltRemaining: number;
  corpCapacity: number;
  corpRemaining: number;
}

export interface RepoProvision {
  totalCapacity: number;
  willingnessToExtendNew: number;
}

export interface BankAgent extends AgentCommon {
  type: AgentType.Bank;
  tier: BankTier;
  riskAppetite: number;
  marketMaking: MarketMakingCapacity;
  repoProvision: RepoProvision;
}

export interface HedgeFundAgent extends AgentCommon {
  type: AgentType.HedgeFund;
  strategy: HedgeFundStrategy;
  grossLeverage: number;
  varUtilisation: number;
  repoDependence: RepoDependence;
  primarySensitivities: MarketVariable[];
  secondarySensitivities: MarketVariable[];
  soughtRepo: boolean;
  refusedByAll: boolean;
}

export interface LdiRecapitalisation {
  available: number;
  used: number;
  speedDays: number;
  pooled: boolean;
  requestedOnDay: number | null;
}

export interface LdiPensionAgent extends AgentCommon {
  type: AgentType.LdiPension;
  yieldBufferBps: number;
  leverageRatio: number;
  recapitalisation: LdiRecapitalisation;
  yieldBufferConsumed: number;
}

export interface InsurerAgent extends AgentCommon {
  type: AgentType.Insurer;
  hedgeRatio: number;
  dirtyCsaPct: number;
}

export interface FundComplexAgent extends AgentCommon {
  type: AgentType.FundComplex;
  strategy: string;
  pensionInvestorPct: number;
  insurerInvestorPct: number;
  cumulativeRedemptionInflows: number;
  gateActive: boolean;
}

export type Agent = BankAgent | HedgeFundAgent | LdiPensionAgent | InsurerAgent | FundComplexAgent;

export type AgentOfType<T extends AgentType> = Extract<Agent, { type: T }>;

export const isBank = (agent: Agent): agent is BankAgent => agent.type === AgentType.Bank;

export const isHedgeFund = (agent: Agent): agent is HedgeFundAgent => agent.type === AgentType.HedgeFund;

export const isFundComplex = (agent: Agent): agent is FundComplexAgent => agent.type === AgentType.FundComplex;
