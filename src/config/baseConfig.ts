import { AgentType, HoldingKey, RepoDependence } from '../domain/enums';
import type {
  BufferConfig,
  CalibrationAnchors,
  EfficiencyConfig,
  FeedbackParameters,
  MarketParameters,
  NetworkRules,
  ReactionConfig,
  RedemptionParameters,
  SimulationConfig,
} from '../domain/config';

const buffers: BufferConfig = {
  byType: {
    [AgentType.Bank]: {
      weights: {
        [HoldingKey.BoeEligibleCollateral]: 0.15,
        [HoldingKey.Cet1]: 0.08,
        [HoldingKey.WholesaleFunding]: -0.1,
      },
      floorPctOfSize: 0.002,
    },
    [AgentType.HedgeFund]: {
      weights: { [HoldingKey.Cash]: 1.0 },
      floorPctOfSize: 0.005,
    },
    [AgentType.LdiPension]: {
      weights: { [HoldingKey.Cash]: 1.0, [HoldingKey.UnencumberedCollateral]: 0.3 },
      floorPctOfSize: 0.005,
    },
    [AgentType.Insurer]: {
      weights: {
        [HoldingKey.Cash]: 0.5,
        [HoldingKey.CommittedRepoLines]: 0.2,
        [HoldingKey.RevolvingCreditFacility]: 0.2,
      },
      floorPctOfSize: 0.002,
    },
    [AgentType.FundComplex]: {
      weights: { [HoldingKey.Cash]: 0.5 },
      floorPctOfSize: 0.01,
    },
  },
  absoluteFloor: 0.001,
};

// (shortfall share, cap as a fraction of the funding source)
const reactions: ReactionConfig = {
  bank: {
    centralBankFacility: { shortfallShare: 0.3, holdingCap: 0.5 },
    reduceRepoLending: { shortfallShare: 0.3, holdingCap: 0.3 },
    sellGilts: { shortfallShare: 0.1, holdingCap: 0.2 },
    sellCorporateBonds: { shortfallShare: 0.08, holdingCap: 0.02 },
  },
  hedgeFund: {
    repoAskPct: 0.85,
    minRepoDependence: 0.6,
    sellGilts: { shortfallShare: 0.1, holdingCap: 0.1 },
    sellCorporateBonds: { shortfallShare: 0.1, holdingCap: 0.025 },
    sellEquities: { shortfallShare: 0.1, holdingCap: 0.025 },
    unwindBasisTrades: { shortfallShare: 0.1, holdingCap: 0.04 },
    multiStrategySale: { shortfallShare: 0.05, holdingCap: 0.03 },
    redeemFunds: { shortfallShare: 0.2, holdingCap: 0.05 },
  },
  ldiPension: {
    postCollateral: { shortfallShare: 0.4, holdingCap: 0.5 },
    recapitalisationShare: 0.3,
    sellGilts: { shortfallShare: 0.15, holdingCap: 0.15 },
    sellIndexLinkedGilts: { shortfallShare: 0.08, holdingCap: 0.02 },
    sellCorporateBonds: { shortfallShare: 0.05, holdingCap: 0.015 },
    repoAskPct: 0.85,
    redeemFunds: { shortfallShare: 0.2, holdingCap: 0.05 },
  },
  insurer: {
    drawRepoLines: { shortfallShare: 0.3, holdingCap: 0.5 },
    drawRevolvingCredit: { shortfallShare: 0.2, holdingCap: 0.5 },
    sellGilts: { shortfallShare: 0.15, holdingCap: 0.1 },
    sellCorporateBonds: { shortfallShare: 0.08, holdingCap: 0.02 },
    sellEquities: { shortfallShare: 0.05, holdingCap: 0.025 },
    repoAskPct: 0.8,
    redeemFunds: { shortfallShare: 0.15, holdingCap: 0.03 },
  },
  fundComplex: {
    useCashBuffer: { shortfallShare: 1.0, holdingCap: 1.0 },
    sellGilts: { shortfallShare: 1.0, holdingCap: 0.2 },
    sellCorporateBonds: { shortfallShare: 1.0, holdingCap: 0.02 },
    swingPricingShare: 0.2,
  },
};

const efficiency: EfficiencyConfig = {
  saleFloor: 0.5,
  saleSpreadDivisorBps: 100,
  centralBank: 0.95,
  redemption: 0.9,
  facility: 0.8,
  throttle: 0,
};

const market: MarketParameters = {
  baselineVix: 15,
  giltBidAskPerStress: 2,
  corpBidAskPerStress: 5,
  repoAvailabilityFloor: 0.5,
  repoAvailabilityStressSlope: 0.15,
  giltDepthBase: 5000,
  giltDepthFloor: 1000,
  corpDepthBase: 2000,
  corpDepthFloor: 500,
  giltImpactBps: 20,
  corpImpactBps: 30,
  gilt10yPassThrough: 0.5,
  gilt30yPassThrough: 0.7,
  igPassThrough: 0.6,
  hyPassThrough: 1.2,
  systemRepoCapacity: 50000,
  repoPressureSlope: 0.25,
  giltBidAskPerMm: 0.001,
  corpBidAskPerMm: 0.002,
};

const redemption: RedemptionParameters = {
  stressTrigger: 0.3,
  sizeRate: 0.001,
  ldiInvestorMultiplier: 2.0,
  insurerInvestorMultiplier: 1.5,
  hedgeFundMultiplier: 0.5,
  fundComplexMultiplier: 0.5,
  gateInflowThreshold: 0.15,
  gateDampening: 0.5,
};

const feedback: FeedbackParameters = {
  iterationsPerDay: 3,
  hedgeFundFundingCoeff: 0.05,
  bankCounterpartyLossCoeff: 0.005,
  redemptionPressureCoeff: 0.1,
  broadcastCoeff: 0.05,
  reputationCoeff: 0.15,
  crowdingCoeff: 0.03,
};

const network: NetworkRules = {
  hedgeFundBanks: { min: 2, max: 3 },
  ldiBanks: { min: 1, max: 2 },
  insurerBanks: { min: 1, max: 3 },
  redemptionFunds: { min: 1, max: 3 },
  fundCrossHoldings: { min: 0, max: 1 },
};

// Bank of England system-wide exploratory scenario outcomes, £bn / %.
const anchors: CalibrationAnchors = {
  nbfiMarginCallsBn: 94,
  ldiRecapitalisationBn: 16.5,
  nbfiGiltSalesBn: 4.7,
  bankGiltCapacityConsumedPct: 70,
  nbfiRepoRefusalPct: 33,
};

export const baseConfig: SimulationConfig = {
  version: 'v1',
  buffers,
  reactions,
  efficiency,
  market,
  bank: {
    repoRefusalStressThreshold: 0.266353,
    tighteningPerReaction: 0.3,
    corpCapacityShareOfGilt: 0.3,
  },
  repoDependenceMultipliers: {
    [RepoDependence.Low]: 0.2,
    [RepoDependence.Medium]: 0.5,
    [RepoDependence.High]: 0.8,
    [RepoDependence.VeryHigh]: 1.0,
  },
  redemption,
  feedback,
  network,
  amplificationEpsilon: 0.001,
  anchors,
};
