// Illustrative UK-style population. Amounts are in £mm.
import type { Agent } from '../domain/agents';
import { HedgeFundStrategy, RepoDependence } from '../domain/enums';
import {
  createBank,
  createFundComplex,
  createHedgeFund,
  createInsurer,
  createLdiPension,
} from '../engine/agents/builders';
import { buildNetwork } from '../engine/network';
import type { RelationshipNetwork } from '../engine/network';
import { baseConfig } from './baseConfig';

export const SAMPLE_NETWORK_SEED = 42;

const banks = (): Agent[] => [
  createBank({
    id: 'bank-a',
    name: 'Major Bank A',
    tier: 'major',
    theta: 0.4,
    bufferUsability: 0.5,
    riskAppetite: 0.6,
    balanceSheetSize: 800000,
    gilts: 60000,
    corporateBonds: 15000,
    equities: 5000,
    repoLending: 40000,
    derivativeAssets: 30000,
    boeEligible: 120000,
    wholesaleFunding: 100000,
    cet1: 40000,
    giltMarketMakingCapacity: 8000,
    repoCapacity: 30000,
  }),
  createBank({
    id: 'bank-b',
    name: 'Major Bank B',
    tier: 'major',
    theta: 0.4,
    bufferUsability: 0.5,
    riskAppetite: 0.5,
    balanceSheetSize: 600000,
    gilts: 45000,
    corporateBonds: 12000,
    equities: 4000,
    repoLending: 30000,
    derivativeAssets: 25000,
    boeEligible: 90000,
    wholesaleFunding: 80000,
    cet1: 30000,
    giltMarketMakingCapacity: 6000,
    repoCapacity: 22000,
  }),
  createBank({
    id: 'bank-c',
    name: 'Mid-tier Bank C',
    tier: 'mid',
    theta: 0.35,
    bufferUsability: 0.4,
    riskAppetite: 0.4,
    balanceSheetSize: 200000,
    gilts: 15000,
    corporateBonds: 5000,
    equities: 1000,
    repoLending: 8000,
    derivativeAssets: 6000,
    boeEligible: 30000,
    wholesaleFunding: 35000,
    cet1: 10000,
    giltMarketMakingCapacity: 2000,
    repoCapacity: 6000,
  }),
  createBank({
    id: 'bank-d',
    name: 'Small Bank D',
    tier: 'small',
    theta: 0.3,
    bufferUsability: 0.3,
    riskAppetite: 0.3,
    balanceSheetSize: 60000,
    gilts: 4000,
    corporateBonds: 1500,
    equities: 300,
    repoLending: 2000,
    derivativeAssets: 1000,
    boeEligible: 9000,
    wholesaleFunding: 12000,
    cet1: 3500,
    giltMarketMakingCapacity: 500,
    repoCapacity: 1500,
  }),
];

const hedgeFunds = (): Agent[] => [
  createHedgeFund({
    id: 'hf-macro-1',
    name: 'Macro Rates Fund',
    strategy: HedgeFundStrategy.MacroRates,
    theta: 0.3,
    bufferUsability: 0.3,
    aum: 3000,
    grossLeverage: 5,
    varUtilisation: 0.8,
    repoDependence: RepoDependence.High,
  }),
  createHedgeFund({
    id: 'hf-rv-1',
    name: 'Basis Relative Value Fund',
    strategy: HedgeFundStrategy.RelativeValue,
    theta: 0.25,
    bufferUsability: 0.2,
    aum: 4000,
    grossLeverage: 12,
    varUtilisation: 0.9,
    repoDependence: RepoDependence.VeryHigh,
  }),
  createHedgeFund({
    id: 'hf-rv-2',
    name: 'Gilt Relative Value Fund',
    strategy: HedgeFundStrategy.RelativeValue,
    theta: 0.3,
    bufferUsability: 0.2,
    aum: 1500,
    grossLeverage: 10,
    varUtilisation: 0.7,
    repoDependence: RepoDependence.High,
  }),
  createHedgeFund({
    id: 'hf-eq-1',
    name: 'Long/Short Equity Fund',
    strategy: HedgeFundStrategy.LongShortEquity,
    theta: 0.35,
    bufferUsability: 0.3,
    aum: 2500,
    grossLeverage: 2,
    varUtilisation: 0.6,
    repoDependence: RepoDependence.Low,
  }),
  createHedgeFund({
    id: 'hf-credit-1',
    name: 'Credit Long/Short Fund',
    strategy: HedgeFundStrategy.CreditLongShort,
    theta: 0.3,
    bufferUsability: 0.3,
    aum: 2000,
    grossLeverage: 3,
    varUtilisation: 0.75,
    repoDependence: RepoDependence.Medium,
  }),
  createHedgeFund({
    id: 'hf-multi-1',
    name: 'Multi-Strategy Fund',
    strategy: HedgeFundStrategy.MultiStrategy,
    theta: 0.3,
    bufferUsability: 0.25,
    aum: 5000,
    grossLeverage: 4,
    varUtilisation: 0.88,
    repoDependence: RepoDependence.High,
  }),
];

const ldiPensions = (): Agent[] => [
  createLdiPension({
    id: 'ldi-pooled-1',
    name: 'Pooled LDI Fund',
    theta: 0.3,
    bufferUsability: 0.4,
    aum: 20000,
    gilts: 14000,
    indexLinkedGilts: 9000,
    corporateBonds: 2000,
    cash: 600,
    unencumberedCollateral: 2500,
    derivativesNotional: 30000,
    leverageRatio: 2.5,
    yieldBufferBps: 150,
    pooled: true,
    recapitalisationAvailable: 3000,
    recapitalisationSpeedDays: 1,
  }),
  createLdiPension({
    id: 'ldi-seg-1',
    name: 'Segregated Mandate 1',
    theta: 0.3,
    bufferUsability: 0.4,
    aum: 12000,
    gilts: 8000,
    indexLinkedGilts: 5000,
    corporateBonds: 800,
    cash: 300,
    unencumberedCollateral: 1200,
    derivativesNotional: 20000,
    leverageRatio: 3,
    yieldBufferBps: 100,
    pooled: false,
    recapitalisationAvailable: 2500,
    recapitalisationSpeedDays: 3,
  }),
  createLdiPension({
    id: 'ldi-seg-2',
    name: 'Segregated Mandate 2',
    theta: 0.25,
    bufferUsability: 0.3,
    aum: 6000,
    gilts: 4000,
    indexLinkedGilts: 2500,
    corporateBonds: 300,
    cash: 150,
    unencumberedCollateral: 500,
    derivativesNotional: 10000,
    leverageRatio: 3.5,
    yieldBufferBps: 80,
    pooled: false,
    recapitalisationAvailable: 1000,
    recapitalisationSpeedDays: 5,
  }),
];

const insurers = (): Agent[] => [
  createInsurer({
    id: 'ins-1',
    name: 'Life Insurer 1',
    theta: 0.35,
    bufferUsability: 0.4,
    totalAssets: 150000,
    gilts: 30000,
    corporateBonds: 45000,
    equities: 15000,
    cash: 4000,
    committedRepoLines: 5000,
    revolvingCredit: 3000,
    derivativesNotional: 40000,
    hedgeRatio: 0.8,
    dirtyCsaPct: 0.3,
  }),
  createInsurer({
    id: 'ins-2',
    name: 'Life Insurer 2',
    theta: 0.35,
    bufferUsability: 0.3,
    totalAssets: 60000,
    gilts: 12000,
    corporateBonds: 20000,
    equities: 5000,
    cash: 1500,
    committedRepoLines: 2000,
    revolvingCredit: 1000,
    derivativesNotional: 15000,
    hedgeRatio: 0.6,
    dirtyCsaPct: 0.5,
  }),
  createInsurer({
    id: 'ins-3',
    name: 'General Insurer 3',
    theta: 0.4,
    bufferUsability: 0.3,
    totalAssets: 25000,
    gilts: 4000,
    corporateBonds: 8000,
    equities: 3000,
    cash: 600,
    committedRepoLines: 800,
    revolvingCredit: 500,
    derivativesNotional: 5000,
    hedgeRatio: 0.5,
    dirtyCsaPct: 0.2,
  }),
];

const fundComplexes = (): Agent[] => [
  createFundComplex({
    id: 'fund-mmf',
    name: 'Sterling Liquidity Fund',
    strategy: 'money-market',
    theta: 0.2,
    bufferUsability: 0.5,
    aum: 40000,
    cash: 25000,
    gilts: 10000,
    corporateBonds: 4000,
    assetBackedSecurities: 0,
    pensionInvestorPct: 0.4,
    insurerInvestorPct: 0.2,
  }),
  createFundComplex({
    id: 'fund-bond',
    name: 'Corporate Bond Fund',
    strategy: 'corporate-bond',
    theta: 0.25,
    bufferUsability: 0.3,
    aum: 15000,
    cash: 800,
    gilts: 2000,
    corporateBonds: 11000,
    assetBackedSecurities: 1000,
    pensionInvestorPct: 0.3,
    insurerInvestorPct: 0.3,
  }),
  createFundComplex({
    id: 'fund-gilt',
    name: 'Gilt Fund',
    strategy: 'gilt',
    theta: 0.25,
    bufferUsability: 0.3,
    aum: 8000,
    cash: 400,
    gilts: 7000,
    corporateBonds: 400,
    assetBackedSecurities: 0,
    pensionInvestorPct: 0.6,
    insurerInvestorPct: 0.1,
  }),
];

/** A fresh copy of the sample population; callers may mutate it freely. */
export const createSamplePopulation = (): Agent[] => [
  ...banks(),
  ...hedgeFunds(),
  ...ldiPensions(),
  ...insurers(),
  ...fundComplexes(),
];

export const createSampleNetwork = (population: readonly Agent[], seed: number = SAMPLE_NETWORK_SEED): RelationshipNetwork =>
  buildNetwork(population, seed, baseConfig.network);
