import type { WaterfallCap } from './actions';
import type { AgentType, HoldingKey, RepoDependence } from './enums';

export interface BufferParameters {
  // Negative weights model destabilising liabilities netted off the buffer.
  weights: Partial<Record<HoldingKey, number>>;
  floorPctOfSize: number;
}

export interface BufferConfig {
  byType: Record<AgentType, BufferParameters>;
  absoluteFloor: number;
}

export interface BankReactionParameters {
  centralBankFacility: WaterfallCap;
  reduceRepoLending: WaterfallCap;
  sellGilts: WaterfallCap;
  sellCorporateBonds: WaterfallCap;
}

export interface HedgeFundReactionParameters {
  repoAskPct: number;
  minRepoDependence: number;
  sellGilts: WaterfallCap;
  sellCorporateBonds: WaterfallCap;
  sellEquities: WaterfallCap;
  unwindBasisTrades: WaterfallCap;
  multiStrategySale: WaterfallCap;
  redeemFunds: WaterfallCap;
}

export interface LdiReactionParameters {
  postCollateral: WaterfallCap;
  recapitalisationShare: number;
  sellGilts: WaterfallCap;
  sellIndexLinkedGilts: WaterfallCap;
  sellCorporateBonds: WaterfallCap;
  repoAskPct: number;
  redeemFunds: WaterfallCap;
}

export interface InsurerReactionParameters {
  drawRepoLines: WaterfallCap;
  drawRevolvingCredit: WaterfallCap;
  sellGilts: WaterfallCap;
  sellCorporateBonds: WaterfallCap;
  sellEquities: WaterfallCap;
  repoAskPct: number;
  redeemFunds: WaterfallCap;
}

export interface FundComplexReactionParameters {
  useCashBuffer: WaterfallCap;
  sellGilts: WaterfallCap;
  sellCorporateBonds: WaterfallCap;
  swingPricingShare: number;
}

export interface ReactionConfig {
  bank: BankReactionParameters;
  hedgeFund: HedgeFundReactionParameters;
  ldiPension: LdiReactionParameters;
  insurer: InsurerReactionParameters;
  fundComplex: FundComplexReactionParameters;
}

export interface EfficiencyConfig {
  saleFloor: number;
  saleSpreadDivisorBps: number;
  centralBank: number;
  redemption: number;
  facility: number;
  throttle: number;
}

export interface MarketParameters {
  baselineVix: number;
  giltBidAskPerStress: number;
  corpBidAskPerStress: number;
  repoAvailabilityFloor: number;
  repoAvailabilityStressSlope: number;
  giltDepthBase: number;
  giltDepthFloor: number;
  corpDepthBase: number;
  corpDepthFloor: number;
  giltImpactBps: number;
  corpImpactBps: number;
  gilt10yPassThrough: number;
  gilt30yPassThrough: number;
  igPassThrough: number;
  hyPassThrough: number;
  systemRepoCapacity: number;
  repoPressureSlope: number;
  giltBidAskPerMm: number;
  corpBidAskPerMm: number;
}

export interface BankParameters {
  repoRefusalStressThreshold: number;
  tighteningPerReaction: number;
  corpCapacityShareOfGilt: number;
}

export interface RedemptionParameters {
  stressTrigger: number;
  sizeRate: number;
  ldiInvestorMultiplier: number;
  insurerInvestorMultiplier: number;
  hedgeFundMultiplier: number;
  fundComplexMultiplier: number;
  gateInflowThreshold: number;
  gateDampening: number;
}

export interface FeedbackParameters {
  iterationsPerDay: number;
  hedgeFundFundingCoeff: number;
  bankCounterpartyLossCoeff: number;
  redemptionPressureCoeff: number;
  broadcastCoeff: number;
  reputationCoeff: number;
  crowdingCoeff: number;
}

export interface DegreeRange {
  min: number;
  max: number;
}

export interface NetworkRules {
  hedgeFundBanks: DegreeRange;
  ldiBanks: DegreeRange;
  insurerBanks: DegreeRange;
  redemptionFunds: DegreeRange;
  fundCrossHoldings: DegreeRange;
}

export interface CalibrationAnchors {
  nbfiMarginCallsBn: number;
  ldiRecapitalisationBn: number;
  nbfiGiltSalesBn: number;
  bankGiltCapacityConsumedPct: number;
  nbfiRepoRefusalPct: number;
}

export interface SimulationConfig {
  version: string;
  buffers: BufferConfig;
  reactions: ReactionConfig;
  efficiency: EfficiencyConfig;
  market: MarketParameters;
  bank: BankParameters;
  repoDependenceMultipliers: Record<RepoDependence, number>;
  redemption: RedemptionParameters;
  feedback: FeedbackParameters;
  network: NetworkRules;
  amplificationEpsilon: number;
  anchors: CalibrationAnchors;
}

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

export type SimulationConfigOverrides = DeepPartial<SimulationConfig>;
