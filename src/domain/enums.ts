export enum AgentType {
  Bank = 'Bank',
  HedgeFund = 'HedgeFund',
  LdiPension = 'LdiPension',
  Insurer = 'Insurer',
  FundComplex = 'FundComplex',
}

export enum BalanceSheetCategory {
  LiquidAsset = 'LiquidAsset',
  IlliquidAsset = 'IlliquidAsset',
  Liability = 'Liability',
  Equity = 'Equity',
  OffBalanceSheet = 'OffBalanceSheet',
}

/**
 * Typed identifiers for balance-sheet lines. Waterfall steps and buffer weights address
 * holdings through these keys rather than display names.
 */
export enum HoldingKey {
  Cash = 'Cash',
  Gilts = 'Gilts',
  IndexLinkedGilts = 'IndexLinkedGilts',
  CorporateBonds = 'CorporateBonds',
  Equities = 'Equities',
  BasisTrades = 'BasisTrades',
  AssetBackedSecurities = 'AssetBackedSecurities',
  RepoLending = 'RepoLending',
  DerivativeAssets = 'DerivativeAssets',
  DerivativesExposure = 'DerivativesExposure',
  BoeEligibleCollateral = 'BoeEligibleCollateral',
  UnencumberedCollateral = 'UnencumberedCollateral',
  CommittedRepoLines = 'CommittedRepoLines',
  RevolvingCreditFacility = 'RevolvingCreditFacility',
  MarginPosted = 'MarginPosted',
  WholesaleFunding = 'WholesaleFunding',
  RepoBorrowing = 'RepoBorrowing',
  Cet1 = 'Cet1',
}

/**
 * Identifiers of the exogenous market variables. Values double as the keys used by
 * scenario files.
 */
export enum MarketVariable {
  Gilt10y = 'gilt_10y_yield',
  Gilt30y = 'gilt_30y_yield',
  IndexLinkedGilt = 'il_gilt_yield',
  Ust10y = 'ust_10y_yield',
  IgCorpSpread = 'ig_corp_spread',
  HyCorpSpread = 'hy_corp_spread',
  Equity = 'equity',
  SoniaSwap = 'sonia_swap',
  FxGbpUsd = 'fx_gbpusd',
  RepoHaircutGilt = 'repo_haircut_gilt',
  RepoHaircutCorp = 'repo_haircut_corp',
  BondFuturesBasis = 'bond_futures_basis',
  Vix = 'vix',
}

export const MARKET_VARIABLES: readonly MarketVariable[] = Object.values(MarketVariable);

export enum HedgeFundStrategy {
  MacroRates = 'MacroRates',
  RelativeValue = 'RelativeValue',
  LongShortEquity = 'LongShortEquity',
  CreditLongShort = 'CreditLongShort',
  MultiStrategy = 'MultiStrategy',
}

export enum RepoDependence {
  Low = 'Low',
  Medium = 'Medium',
  High = 'High',
  VeryHigh = 'VeryHigh',
}

export enum RelationshipKind {
  PrimeBrokerage = 'PrimeBrokerage',
  Clearing = 'Clearing',
  DerivativesRepo = 'DerivativesRepo',
  Redemption = 'Redemption',
}

export enum ActionName {
  CentralBankFacility = 'boe_facility',
  ReduceRepoLending = 'reduce_repo_lending',
  SellGilts = 'sell_gilts',
  SellIndexLinkedGilts = 'sell_il_gilts',
  SellCorporateBonds = 'sell_corp_bonds',
  SellEquities = 'sell_equities',
  UnwindBasisTrades = 'unwind_basis_trades',
  SeekRepo = 'seek_repo',
  DrawRepoLines = 'draw_repo_lines',
  DrawRevolvingCredit = 'draw_rcf',
  PostCollateral = 'post_collateral',
  Recapitalisation = 'recapitalisation',
  RedeemFunds = 'redeem_funds',
  UseCashBuffer = 'use_cash_buffer',
  SwingPricing = 'swing_pricing',
}

export enum InstrumentClass {
  AssetSale = 'AssetSale',
  Repo = 'Repo',
  CentralBank = 'CentralBank',
  Redemption = 'Redemption',
  Facility = 'Facility',
  Throttle = 'Throttle',
}

export enum AssetClass {
  Gilt = 'Gilt',
  Corporate = 'Corporate',
  Equity = 'Equity',
}
