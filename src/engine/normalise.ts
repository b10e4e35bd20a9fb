/**
 * Validation and normalisation of everything that enters a run from outside: configuration
 * overrides, scenarios and populations. Problems are collected from the zod issues and raised
 * together as one `ConfigurationError` before the first simulated day.
 */
import { z } from 'zod';
import { baseConfig } from '../config/baseConfig';
import type { Agent } from '../domain/agents';
import type { SimulationConfig, SimulationConfigOverrides } from '../domain/config';
import {
  AgentType,
  BalanceSheetCategory,
  HedgeFundStrategy,
  HoldingKey,
  MARKET_VARIABLES,
  MarketVariable,
  RepoDependence,
} from '../domain/enums';
import { ConfigurationError } from '../domain/errors';
import type { Scenario } from '../domain/scenario';

export const CURRENT_CONFIG_VERSION = 'v1';

const nonNegative = z.number().finite().min(0);
const fraction = z.number().finite().min(0).max(1);
const positive = z.number().finite().positive();

const capSchema = z.object({ shortfallShare: fraction, holdingCap: fraction });
const bufferSchema = z.object({
  weights: z.record(z.nativeEnum(HoldingKey), z.number().finite()),
  floorPctOfSize: nonNegative,
});
const degreeSchema = z
  .object({ min: z.number().int().min(0), max: z.number().int().min(0) })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

const simulationConfigSchema: z.ZodType<SimulationConfig> = z.object({
  version: z.string().min(1),
  buffers: z.object({
    byType: z.object({
      [AgentType.Bank]: bufferSchema,
      [AgentType.HedgeFund]: bufferSchema,
      [AgentType.LdiPension]: bufferSchema,
      [AgentType.Insurer]: bufferSchema,
      [AgentType.FundComplex]: bufferSchema,
    }),
    absoluteFloor: positive,
  }),
  reactions: z.object({
    bank: z.object({
      centralBankFacility: capSchema,
      reduceRepoLending: capSchema,
      sellGilts: capSchema,
      sellCorporateBonds: capSchema,
    }),
    hedgeFund: z.object({
      repoAskPct: fraction,
      minRepoDependence: fraction,
      sellGilts: capSchema,
      sellCorporateBonds: capSchema,
      sellEquities: capSchema,
      unwindBasisTrades: capSchema,
      multiStrategySale: capSchema,
      redeemFunds: capSchema,
    }),
    ldiPension: z.object({
      postCollateral: capSchema,
      recapitalisationShare: fraction,
      sellGilts: capSchema,
      sellIndexLinkedGilts: capSchema,
      sellCorporateBonds: capSchema,
      repoAskPct: fraction,
      redeemFunds: capSchema,
    }),
    insurer: z.object({
      drawRepoLines: capSchema,
      drawRevolvingCredit: capSchema,
      sellGilts: capSchema,
      sellCorporateBonds: capSchema,
      sellEquities: capSchema,
      repoAskPct: fraction,
      redeemFunds: capSchema,
    }),
    fundComplex: z.object({
      useCashBuffer: capSchema,
      sellGilts: capSchema,
      sellCorporateBonds: capSchema,
      swingPricingShare: fraction,
    }),
  }),
  efficiency: z.object({
    saleFloor: fraction,
    saleSpreadDivisorBps: positive,
    centralBank: fraction,
    redemption: fraction,
    facility: fraction,
    throttle: fraction,
  }),
  market: z.object({
    baselineVix: positive,
    giltBidAskPerStress: nonNegative,
    corpBidAskPerStress: nonNegative,
    repoAvailabilityFloor: fraction,
    repoAvailabilityStressSlope: nonNegative,
    giltDepthBase: positive,
    giltDepthFloor: positive,
    corpDepthBase: positive,
    corpDepthFloor: positive,
    giltImpactBps: nonNegative,
    corpImpactBps: nonNegative,
    gilt10yPassThrough: nonNegative,
    gilt30yPassThrough: nonNegative,
    igPassThrough: nonNegative,
    hyPassThrough: nonNegative,
    systemRepoCapacity: positive,
    repoPressureSlope: nonNegative,
    giltBidAskPerMm: nonNegative,
    corpBidAskPerMm: nonNegative,
  }),
  bank: z.object({
    repoRefusalStressThreshold: positive,
    tighteningPerReaction: fraction,
    corpCapacityShareOfGilt: nonNegative,
  }),
  repoDependenceMultipliers: z.object({
    [RepoDependence.Low]: fraction,
    [RepoDependence.Medium]: fraction,
    [RepoDependence.High]: fraction,
    [RepoDependence.VeryHigh]: fraction,
  }),
  redemption: z.object({
    stressTrigger: nonNegative,
    sizeRate: nonNegative,
    ldiInvestorMultiplier: nonNegative,
    insurerInvestorMultiplier: nonNegative,
    hedgeFundMultiplier: nonNegative,
    fundComplexMultiplier: nonNegative,
    gateInflowThreshold: nonNegative,
    gateDampening: fraction,
  }),
  feedback: z.object({
    iterationsPerDay: z.number().int().min(0),
    hedgeFundFundingCoeff: nonNegative,
    bankCounterpartyLossCoeff: nonNegative,
    redemptionPressureCoeff: nonNegative,
    broadcastCoeff: nonNegative,
    reputationCoeff: nonNegative,
    crowdingCoeff: nonNegative,
  }),
  network: z.object({
    hedgeFundBanks: degreeSchema,
    ldiBanks: degreeSchema,
    insurerBanks: degreeSchema,
    redemptionFunds: degreeSchema,
    fundCrossHoldings: degreeSchema,
  }),
  amplificationEpsilon: positive,
  anchors: z.object({
    nbfiMarginCallsBn: nonNegative,
    ldiRecapitalisationBn: nonNegative,
    nbfiGiltSalesBn: nonNegative,
    bankGiltCapacityConsumedPct: nonNegative,
    nbfiRepoRefusalPct: nonNegative,
  }),
});

const balanceSheetItemSchema = z.object({
  key: z.nativeEnum(HoldingKey),
  label: z.string(),
  amount: nonNegative,
  category: z.nativeEnum(BalanceSheetCategory),
  sensitivities: z.record(z.nativeEnum(MarketVariable), z.number().finite()),
});

const commonAgentShape = {
  id: z.string().min(1),
  name: z.string().min(1),
  theta: positive,
  bufferUsability: nonNegative,
  sizeFactor: nonNegative,
  balanceSheet: z.object({ items: z.array(balanceSheetItemSchema) }),
};

const agentSchema = z.discriminatedUnion('type', [
  z.object({
    ...commonAgentShape,
    type: z.literal(AgentType.Bank),
    riskAppetite: fraction,
    marketMaking: z.object({
      giltCapacity: nonNegative,
      giltRemaining: nonNegative,
      corpCapacity: nonNegative,
      corpRemaining: nonNegative,
    }),
    repoProvision: z.object({
      totalCapacity: nonNegative,
      willingnessToExtendNew: fraction,
    }),
  }),
  z.object({
    ...commonAgentShape,
    type: z.literal(AgentType.HedgeFund),
    strategy: z.nativeEnum(HedgeFundStrategy),
    grossLeverage: z.number().finite().min(1),
    varUtilisation: nonNegative,
    repoDependence: z.nativeEnum(RepoDependence),
    primarySensitivities: z.array(z.nativeEnum(MarketVariable)),
  }),
  z.object({
    ...commonAgentShape,
    type: z.literal(AgentType.LdiPension),
    yieldBufferBps: nonNegative,
    leverageRatio: nonNegative,
    recapitalisation: z.object({
      available: nonNegative,
      used: nonNegative,
      speedDays: z.number().int().min(1),
      pooled: z.boolean(),
    }),
  }),
  z.object({
    ...commonAgentShape,
    type: z.literal(AgentType.Insurer),
    hedgeRatio: fraction,
    dirtyCsaPct: fraction,
  }),
  z.object({
    ...commonAgentShape,
    type: z.literal(AgentType.FundComplex),
    pensionInvestorPct: fraction,
    insurerInvestorPct: fraction,
    cumulativeRedemptionInflows: nonNegative,
  }),
]);

const isMarketVariable = (value: string): value is MarketVariable =>
  MARKET_VARIABLES.some((variable) => variable === value);

const scenarioSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    horizonDays: z.number().int().min(1),
    variablePaths: z.record(z.string(), z.array(z.number().finite())),
  })
  .superRefine((scenario, ctx) => {
    Object.entries(scenario.variablePaths).forEach(([variable, path]) => {
      if (!isMarketVariable(variable)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['variablePaths', variable], message: 'unknown market variable' });
        return;
      }
      if (path.length !== scenario.horizonDays) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['variablePaths', variable],
          message: `expected ${scenario.horizonDays} values, got ${path.length}`,
        });
      }
      if (variable === MarketVariable.Vix && path.some((level) => level <= 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['variablePaths', variable], message: 'VIX must stay positive' });
      }
    });
  });

const formatIssues = (error: z.ZodError, prefix = ''): string[] =>
  error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter((part) => part.length > 0).join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const mergeDeep = (base: unknown, override: unknown): unknown => {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;
  const merged: Record<string, unknown> = { ...base };
  Object.entries(override).forEach(([key, value]) => {
    merged[key] = mergeDeep(base[key], value);
  });
  return merged;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

/**
 * Deep-merges `overrides` over the base configuration, validates the result and freezes it.
 * The returned configuration is safe to share across runs.
 */
export const normaliseConfig = (overrides: SimulationConfigOverrides = {}): SimulationConfig => {
  const parsed = simulationConfigSchema.safeParse(
    mergeDeep({ ...baseConfig, version: CURRENT_CONFIG_VERSION }, overrides)
  );
  if (!parsed.success) {
    throw new ConfigurationError('Invalid simulation configuration', formatIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
};

/** Validates a scenario read from JSON or built by a caller. */
export const normaliseScenario = (raw: unknown): Scenario => {
  const parsed = scenarioSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid scenario', formatIssues(parsed.error));
  }
  const variablePaths: Scenario['variablePaths'] = {};
  Object.entries(parsed.data.variablePaths).forEach(([variable, path]) => {
    if (isMarketVariable(variable)) variablePaths[variable] = [...path];
  });
  return {
    id: parsed.data.id ?? 'custom',
    name: parsed.data.name ?? 'Custom scenario',
    horizonDays: parsed.data.horizonDays,
    variablePaths,
  };
};

/** Checks every agent's parameters and that ids are unique. */
export const validatePopulation = (population: readonly Agent[]): void => {
  const issues: string[] = [];
  if (population.length === 0) {
    issues.push('population is empty');
  }
  const seen = new Set<string>();
  population.forEach((agent, index) => {
    const parsed = agentSchema.safeParse(agent);
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error, `population.${index}`));
    }
    if (seen.has(agent.id)) {
      issues.push(`population.${index}: duplicate agent id ${agent.id}`);
    }
    seen.add(agent.id);
  });
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid population', issues);
  }
};
