/**
 * Builders for fully-parameterised agents.
 *
 * Each builder lays out the variant's standard balance sheet with its market sensitivities;
 * the caller supplies sizes and behavioural parameters. Sampling those parameters from
 * distributions is left to the caller.
 */
import { baseConfig } from '../../config/baseConfig';
import type {
  BankAgent,
  BankTier,
  CumulativeCounters,
  FundComplexAgent,
  HedgeFundAgent,
  InsurerAgent,
  LdiPensionAgent,
} from '../../domain/agents';
import type { BalanceSheetItem, Sensitivities } from '../../domain/balanceSheet';
import { AgentType, BalanceSheetCategory, HedgeFundStrategy, HoldingKey, MarketVariable, RepoDependence } from '../../domain/enums';
import { emptyLiquidityPosition } from '../../domain/liquidity';

const HOLDING_LABELS: Record<HoldingKey, string> = {
  [HoldingKey.Cash]: 'Cash & MMF',
  [HoldingKey.Gilts]: 'Gilts',
  [HoldingKey.IndexLinkedGilts]: 'Index-linked gilts',
  [HoldingKey.CorporateBonds]: 'Corporate bonds',
  [HoldingKey.Equities]: 'Equities',
  [HoldingKey.BasisTrades]: 'Gilt futures basis',
  [HoldingKey.AssetBackedSecurities]: 'ABS',
  [HoldingKey.RepoLending]: 'Repo lending',
  [HoldingKey.DerivativeAssets]: 'Derivative assets',
  [HoldingKey.DerivativesExposure]: 'Derivatives notional',
  [HoldingKey.BoeEligibleCollateral]: 'BoE-eligible collateral',
  [HoldingKey.UnencumberedCollateral]: 'Unencumbered collateral',
  [HoldingKey.CommittedRepoLines]: 'Committed repo lines',
  [HoldingKey.RevolvingCreditFacility]: 'Revolving credit facility',
  [HoldingKey.MarginPosted]: 'Margin posted',
  [HoldingKey.WholesaleFunding]: 'Wholesale funding',
  [HoldingKey.RepoBorrowing]: 'Repo borrowing',
  [HoldingKey.Cet1]: 'CET1 capital',
};

interface ItemOptions {
  sensitivities?: Sensitivities;
}

export const createItem = (
  key: HoldingKey,
  amount: number,
  category: BalanceSheetCategory,
  options: ItemOptions = {}
): BalanceSheetItem => ({
  key,
  label: HOLDING_LABELS[key],
  amount,
  category,
  sensitivities: options.sensitivities ?? {},
});

const zeroCounters = (): CumulativeCounters => ({
  marginCalls: 0,
  assetSales: 0,
  giltSales: 0,
  repoDemand: 0,
  redemptionsFaced: 0,
  fundRedemptions: 0,
});

export interface CommonAgentParams {
  id: string;
  name?: string;
  theta: number;
  bufferUsability: number;
}

const commonFields = (params: CommonAgentParams, sizeFactor: number, items: BalanceSheetItem[]) => ({
  id: params.id,
  name: params.name ?? params.id,
  theta: params.theta,
  bufferUsability: params.bufferUsability,
  sizeFactor,
  // Zero-amount lines carry no information and are left off the balance sheet.
  balanceSheet: { items: items.filter((item) => item.amount > 0) },
  liquidity: emptyLiquidityPosition(),
  bufferFloored: false,
  hasReacted: false,
  reactions: [],
  unmetShortfall: 0,
  counters: zeroCounters(),
});

export interface BankParams extends CommonAgentParams {
  tier: BankTier;
  riskAppetite: number;
  balanceSheetSize: number;
  gilts: number;
  corporateBonds: number;
  equities: number;
  repoLending: number;
  derivativeAssets: number;
  boeEligible: number;
  wholesaleFunding: number;
  cet1: number;
  giltMarketMakingCapacity: number;
  corpMarketMakingCapacity?: number;
  repoCapacity: number;
  willingnessToExtendNew?: number;
}

export const createBank = (p: BankParams): BankAgent => {
  const corpCapacity = p.corpMarketMakingCapacity ?? p.giltMarketMakingCapacity * baseConfig.bank.corpCapacityShareOfGilt;
  return {
    ...commonFields(p, p.balanceSheetSize, [
      createItem(HoldingKey.Gilts, p.gilts, BalanceSheetCategory.LiquidAsset, {
        sensitivities: { [MarketVariable.Gilt10y]: -0.00045, [MarketVariable.Gilt30y]: -0.00065 },
      }),
      createItem(HoldingKey.CorporateBonds, p.corporateBonds, BalanceSheetCategory.LiquidAsset, {
        sensitivities: { [MarketVariable.IgCorpSpread]: -0.0004, [MarketVariable.HyCorpSpread]: -0.0002 },
      }),
      createItem(HoldingKey.Equities, p.equities, BalanceSheetCategory.LiquidAsset, {
        sensitivities: { [MarketVariable.Equity]: 0.01 },
      }),
      createItem(HoldingKey.RepoLending, p.repoLending, BalanceSheetCategory.LiquidAsset),
      createItem(HoldingKey.DerivativeAssets, p.derivativeAssets, BalanceSheetCategory.IlliquidAsset, {
        sensitivities: { [MarketVariable.Gilt10y]: -0.0002, [MarketVariable.SoniaSwap]: -0.0002 },
      }),
      createItem(HoldingKey.BoeEligibleCollateral, p.boeEligible, BalanceSheetCategory.LiquidAsset),
      createItem(HoldingKey.WholesaleFunding, p.wholesaleFunding, BalanceSheetCategory.Liability),
      createItem(HoldingKey.Cet1, p.cet1, BalanceSheetCategory.Equity),
    ]),
    type: AgentType.Bank,
    tier: p.tier,
    riskAppetite: p.riskAppetite,
    marketMaking: {
      giltCapacity: p.giltMarketMakingCapacity,
      giltRemaining: p.giltMarketMakingCapacity,
      corpCapacity,
      corpRemaining: corpCapacity,
    },
    repoProvision: {
      totalCapacity: p.repoCapacity,
      willingnessToExtendNew: p.willingnessToExtendNew ?? 0.7,
    },
  };
};

interface StrategyProfile {
  primary: MarketVariable[];
  secondary: MarketVariable[];
  // Share of gross exposure per asset class.
  mix: { gilts: number; corporateBonds: number; equities: number; basisTrades: number };
}

export const STRATEGY_PROFILES: Record<HedgeFundStrategy, StrategyProfile> = {
  [HedgeFundStrategy.MacroRates]: {
    primary: [MarketVariable.Gilt10y, MarketVariable.Gilt30y, MarketVariable.SoniaSwap],
    secondary: [MarketVariable.Ust10y, MarketVariable.FxGbpUsd],
    mix: { gilts: 0.7, corporateBonds: 0.1, equities: 0.1, basisTrades: 0.1 },
  },
  [HedgeFundStrategy.RelativeValue]: {
    primary: [MarketVariable.BondFuturesBasis, MarketVariable.Gilt10y],
    secondary: [MarketVariable.Gilt30y, MarketVariable.SoniaSwap],
    mix: { gilts: 0.4, corporateBonds: 0, equities: 0, basisTrades: 0.6 },
  },
  [HedgeFundStrategy.LongShortEquity]: {
    primary: [MarketVariable.Equity],
    secondary: [MarketVariable.IgCorpSpread],
    mix: { gilts: 0, corporateBonds: 0.1, equities: 0.9, basisTrades: 0 },
  },
  [HedgeFundStrategy.CreditLongShort]: {
    primary: [MarketVariable.IgCorpSpread, MarketVariable.HyCorpSpread],
    secondary: [MarketVariable.Gilt10y],
    mix: { gilts: 0.1, corporateBonds: 0.8, equities: 0.1, basisTrades: 0 },
  },
  [HedgeFundStrategy.MultiStrategy]: {
    primary: [MarketVariable.Gilt10y, MarketVariable.Equity, MarketVariable.IgCorpSpread],
    secondary: [MarketVariable.SoniaSwap, MarketVariable.HyCorpSpread],
    mix: { gilts: 0.35, corporateBonds: 0.25, equities: 0.3, basisTrades: 0.1 },
  },
};

export interface HedgeFundParams extends CommonAgentParams {
  strategy: HedgeFundStrategy;
  aum: number;
  grossLeverage: number;
  varUtilisation: number;
  repoDependence: RepoDependence;
}

const HEDGE_FUND_CASH_SHARE = 0.1;
const HEDGE_FUND_MARGIN_SHARE = 0.08;
const HEDGE_FUND_REPO_SHARE = 0.3;

export const createHedgeFund = (p: HedgeFundParams): HedgeFundAgent => {
  const profile = STRATEGY_PROFILES[p.strategy];
  const gross = p.aum * p.grossLeverage;
  const isPrimary = (variable: MarketVariable) => profile.primary.includes(variable);
  const isSecondary = (variable: MarketVariable) => profile.secondary.includes(variable);

  const giltSensitivities: Sensitivities = isPrimary(MarketVariable.Gilt10y)
    ? { [MarketVariable.Gilt10y]: -0.0006, [MarketVariable.Gilt30y]: -0.0008, [MarketVariable.SoniaSwap]: -0.0003 }
    : { [MarketVariable.Gilt10y]: -0.0002 };
  const equitySensitivity = isPrimary(MarketVariable.Equity) ? 0.012 : isSecondary(MarketVariable.Equity) ? 0.005 : 0.002;
  const corpSensitivities: Sensitivities = isPrimary(MarketVariable.IgCorpSpread)
    ? { [MarketVariable.IgCorpSpread]: -0.0005, [MarketVariable.HyCorpSpread]: -0.0003 }
    : { [MarketVariable.IgCorpSpread]: -0.0002 };

  return {
    ...commonFields(p, p.aum, [
      createItem(HoldingKey.Gilts, gross * profile.mix.gilts, BalanceSheetCategory.LiquidAsset, {
        sensitivities: giltSensitivities,
      }),
      createItem(HoldingKey.CorporateBonds, gross * profile.mix.corporateBonds, BalanceSheetCategory.LiquidAsset, {
        sensitivities: corpSensitivities,
      }),
      createItem(HoldingKey.Equities, gross * profile.mix.equities, BalanceSheetCategory.LiquidAsset, {
        sensitivities: { [MarketVariable.Equity]: equitySensitivity },
      }),
      createItem(HoldingKey.BasisTrades, gross * profile.mix.basisTrades, BalanceSheetCategory.LiquidAsset, {
        sensitivities: { [MarketVariable.BondFuturesBasis]: -0.001, [MarketVariable.Gilt10y]: -0.0003 },
      }),
      createItem(HoldingKey.Cash, p.aum * HEDGE_FUND_CASH_SHARE, BalanceSheetCategory.LiquidAsset),
      createItem(HoldingKey.MarginPosted, p.aum * HEDGE_FUND_MARGIN_SHARE, BalanceSheetCategory.IlliquidAsset),
      createItem(
        HoldingKey.RepoBorrowing,
        gross * baseConfig.repoDependenceMultipliers[p.repoDependence] * HEDGE_FUND_REPO_SHARE,
        BalanceSheetCategory.Liability
      ),
    ]),
    type: AgentType.HedgeFund,
    strategy: p.strategy,
    grossLeverage: p.grossLeverage,
    varUtilisation: p.varUtilisation,
    repoDependence: p.repoDependence,
    primarySensitivities: [...profile.primary],
    secondarySensitivities: [...profile.secondary],
    soughtRepo: false,
    refusedByAll: false,
  };
};

export interface LdiPensionParams extends CommonAgentParams {
  aum: number;
  gilts: number;
  indexLinkedGilts: number;
  corporateBonds: number;
  cash: number;
  unencumberedCollateral: number;
  derivativesNotional: number;
  leverageRatio: number;
  yieldBufferBps: number;
  pooled: boolean;
  recapitalisationAvailable: number;
  recapitalisationSpeedDays: number;
}

export const createLdiPension = (p: LdiPensionParams): LdiPensionAgent => ({
  ...commonFields(p, p.aum, [
    createItem(HoldingKey.Gilts, p.gilts, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.Gilt10y]: -0.0006, [MarketVariable.Gilt30y]: -0.0009 },
    }),
    createItem(HoldingKey.IndexLinkedGilts, p.indexLinkedGilts, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.IndexLinkedGilt]: -0.0007 },
    }),
    createItem(HoldingKey.CorporateBonds, p.corporateBonds, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.IgCorpSpread]: -0.0004 },
    }),
    createItem(HoldingKey.Cash, p.cash, BalanceSheetCategory.LiquidAsset),
    createItem(HoldingKey.UnencumberedCollateral, p.unencumberedCollateral, BalanceSheetCategory.LiquidAsset),
    createItem(HoldingKey.DerivativesExposure, p.derivativesNotional, BalanceSheetCategory.OffBalanceSheet, {
      sensitivities: {
        [MarketVariable.Gilt10y]: -0.0003,
        [MarketVariable.SoniaSwap]: -0.0003,
        [MarketVariable.Gilt30y]: -0.0004,
      },
    }),
  ]),
  type: AgentType.LdiPension,
  yieldBufferBps: p.yieldBufferBps,
  leverageRatio: p.leverageRatio,
  recapitalisation: {
    available: p.recapitalisationAvailable,
    used: 0,
    speedDays: p.recapitalisationSpeedDays,
    pooled: p.pooled,
    requestedOnDay: null,
  },
  yieldBufferConsumed: 0,
});

export interface InsurerParams extends CommonAgentParams {
  totalAssets: number;
  gilts: number;
  corporateBonds: number;
  equities: number;
  cash: number;
  committedRepoLines: number;
  revolvingCredit: number;
  derivativesNotional: number;
  hedgeRatio: number;
  dirtyCsaPct: number;
}

export const createInsurer = (p: InsurerParams): InsurerAgent => ({
  ...commonFields(p, p.totalAssets, [
    createItem(HoldingKey.Gilts, p.gilts, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.Gilt10y]: -0.0005, [MarketVariable.Gilt30y]: -0.0007 },
    }),
    createItem(HoldingKey.CorporateBonds, p.corporateBonds, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.IgCorpSpread]: -0.0004, [MarketVariable.HyCorpSpread]: -0.0002 },
    }),
    createItem(HoldingKey.Equities, p.equities, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.Equity]: 0.01 },
    }),
    createItem(HoldingKey.Cash, p.cash, BalanceSheetCategory.LiquidAsset),
    createItem(HoldingKey.CommittedRepoLines, p.committedRepoLines, BalanceSheetCategory.OffBalanceSheet),
    createItem(HoldingKey.RevolvingCreditFacility, p.revolvingCredit, BalanceSheetCategory.OffBalanceSheet),
    createItem(HoldingKey.DerivativesExposure, p.derivativesNotional, BalanceSheetCategory.OffBalanceSheet, {
      sensitivities: { [MarketVariable.Gilt10y]: -0.0002, [MarketVariable.SoniaSwap]: -0.0002 },
    }),
  ]),
  type: AgentType.Insurer,
  hedgeRatio: p.hedgeRatio,
  dirtyCsaPct: p.dirtyCsaPct,
});

export interface FundComplexParams extends CommonAgentParams {
  strategy: string;
  aum: number;
  cash: number;
  gilts: number;
  corporateBonds: number;
  assetBackedSecurities: number;
  pensionInvestorPct: number;
  insurerInvestorPct: number;
}

export const createFundComplex = (p: FundComplexParams): FundComplexAgent => ({
  ...commonFields(p, p.aum, [
    createItem(HoldingKey.Gilts, p.gilts, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.Gilt10y]: -0.0005, [MarketVariable.Gilt30y]: -0.0006 },
    }),
    createItem(HoldingKey.CorporateBonds, p.corporateBonds, BalanceSheetCategory.LiquidAsset, {
      sensitivities: { [MarketVariable.IgCorpSpread]: -0.0004, [MarketVariable.HyCorpSpread]: -0.0002 },
    }),
    createItem(HoldingKey.AssetBackedSecurities, p.assetBackedSecurities, BalanceSheetCategory.IlliquidAsset, {
      sensitivities: { [MarketVariable.IgCorpSpread]: -0.0002 },
    }),
    createItem(HoldingKey.Cash, p.cash, BalanceSheetCategory.LiquidAsset),
  ]),
  type: AgentType.FundComplex,
  strategy: p.strategy,
  pensionInvestorPct: p.pensionInvestorPct,
  insurerInvestorPct: p.insurerInvestorPct,
  cumulativeRedemptionInflows: 0,
  gateActive: false,
});
