// Small hand-built agents and contexts shared by the unit tests.
import { baseConfig } from '../config/baseConfig';
import type { Agent, BankAgent, FundComplexAgent, HedgeFundAgent, InsurerAgent, LdiPensionAgent } from '../domain/agents';
import { HedgeFundStrategy, RepoDependence } from '../domain/enums';
import type { MarketLevels, MarketState } from '../domain/market';
import {
  createBank,
  createFundComplex,
  createHedgeFund,
  createInsurer,
  createLdiPension,
} from './agents/builders';
import type { BankParams, FundComplexParams, HedgeFundParams, InsurerParams, LdiPensionParams } from './agents/builders';
import type { ReactionContext } from './agents/waterfall';
import { createEventLog } from './events';
import { applyExogenousScenario, baselineLevels, createMarketState } from './market';
import { networkFromEdges } from './network';
import type { RelationshipEdge } from './network';

export const marketAt = (levels: Partial<MarketLevels> = {}, previous: MarketLevels | null = null, day = 0): MarketState => {
  const market = createMarketState(baseConfig.market);
  applyExogenousScenario(market, day, { ...baselineLevels(baseConfig.market), ...levels }, previous, baseConfig.market);
  return market;
};

export const setLiquidity = (agent: Agent, b0: number, e1: number): void => {
  agent.liquidity.b0 = b0;
  agent.liquidity.e1 = e1;
  agent.liquidity.b1 = b0 - e1;
};

export const reactionContext = (
  agents: readonly Agent[],
  edges: readonly RelationshipEdge[] = [],
  market: MarketState = marketAt(),
  day = 0
): ReactionContext => ({
  day,
  market,
  config: baseConfig,
  network: networkFromEdges(agents, edges),
  agentsById: new Map(agents.map((agent) => [agent.id, agent])),
  log: createEventLog(),
});

export const testBank = (overrides: Partial<BankParams> = {}): BankAgent =>
  createBank({
    id: 'bank-1',
    theta: 0.4,
    bufferUsability: 0.5,
    tier: 'major',
    riskAppetite: 0.5,
    balanceSheetSize: 10000,
    gilts: 0,
    corporateBonds: 0,
    equities: 0,
    repoLending: 0,
    derivativeAssets: 0,
    boeEligible: 0,
    wholesaleFunding: 0,
    cet1: 0,
    giltMarketMakingCapacity: 0,
    repoCapacity: 0,
    ...overrides,
  });

export const testHedgeFund = (overrides: Partial<HedgeFundParams> = {}): HedgeFundAgent =>
  createHedgeFund({
    id: 'hf-1',
    theta: 0.3,
    bufferUsability: 0.3,
    strategy: HedgeFundStrategy.MacroRates,
    aum: 1000,
    grossLeverage: 2,
    varUtilisation: 0.5,
    repoDependence: RepoDependence.High,
    ...overrides,
  });

export const testLdiPension = (overrides: Partial<LdiPensionParams> = {}): LdiPensionAgent =>
  createLdiPension({
    id: 'ldi-1',
    theta: 0.3,
    bufferUsability: 0.4,
    aum: 5000,
    gilts: 0,
    indexLinkedGilts: 0,
    corporateBonds: 0,
    cash: 0,
    unencumberedCollateral: 0,
    derivativesNotional: 0,
    leverageRatio: 2,
    yieldBufferBps: 100,
    pooled: true,
    recapitalisationAvailable: 0,
    recapitalisationSpeedDays: 1,
    ...overrides,
  });

export const testInsurer = (overrides: Partial<InsurerParams> = {}): InsurerAgent =>
  createInsurer({
    id: 'ins-1',
    theta: 0.35,
    bufferUsability: 0.3,
    totalAssets: 10000,
    gilts: 0,
    corporateBonds: 0,
    equities: 0,
    cash: 0,
    committedRepoLines: 0,
    revolvingCredit: 0,
    derivativesNotional: 0,
    hedgeRatio: 0.5,
    dirtyCsaPct: 0,
    ...overrides,
  });

export const testFundComplex = (overrides: Partial<FundComplexParams> = {}): FundComplexAgent =>
  createFundComplex({
    id: 'fund-1',
    theta: 0.1,
    bufferUsability: 0,
    strategy: 'bond',
    aum: 1000,
    cash: 0,
    gilts: 0,
    corporateBonds: 0,
    assetBackedSecurities: 0,
    pensionInvestorPct: 0,
    insurerInvestorPct: 0,
    ...overrides,
  });
