/**
 * Market state: the exogenous scenario layer plus the endogenous layer generated by agent behaviour.
 *
 * The exogenous layer is overwritten from the scenario every day. The endogenous layer
 * accumulates selling pressure and repo demand through the day and turns them into price
 * impact, repo rationing and wider bid/ask spreads.
 */
import type { Agent } from '../domain/agents';
import type { MarketParameters } from '../domain/config';
import { ACTION_META } from '../domain/actionMeta';
import { AssetClass, InstrumentClass, MarketVariable } from '../domain/enums';
import type { EndogenousMarketState, MarketLevels, MarketSnapshot, MarketState } from '../domain/market';
import type { Scenario } from '../domain/scenario';

const mapLevels = (valueOf: (variable: MarketVariable) => number): MarketLevels => ({
  [MarketVariable.Gilt10y]: valueOf(MarketVariable.Gilt10y),
  [MarketVariable.Gilt30y]: valueOf(MarketVariable.Gilt30y),
  [MarketVariable.IndexLinkedGilt]: valueOf(MarketVariable.IndexLinkedGilt),
  [MarketVariable.Ust10y]: valueOf(MarketVariable.Ust10y),
  [MarketVariable.IgCorpSpread]: valueOf(MarketVariable.IgCorpSpread),
  [MarketVariable.HyCorpSpread]: valueOf(MarketVariable.HyCorpSpread),
  [MarketVariable.Equity]: valueOf(MarketVariable.Equity),
  [MarketVariable.SoniaSwap]: valueOf(MarketVariable.SoniaSwap),
  [MarketVariable.FxGbpUsd]: valueOf(MarketVariable.FxGbpUsd),
  [MarketVariable.RepoHaircutGilt]: valueOf(MarketVariable.RepoHaircutGilt),
  [MarketVariable.RepoHaircutCorp]: valueOf(MarketVariable.RepoHaircutCorp),
  [MarketVariable.BondFuturesBasis]: valueOf(MarketVariable.BondFuturesBasis),
  [MarketVariable.Vix]: valueOf(MarketVariable.Vix),
});

export const baselineLevels = (params: MarketParameters): MarketLevels =>
  mapLevels((variable) => (variable === MarketVariable.Vix ? params.baselineVix : 0));

/** Scenario levels for `day`; variables without a path sit at their baseline. */
export const scenarioLevels = (scenario: Scenario, day: number, params: MarketParameters): MarketLevels => {
  const baseline = baselineLevels(params);
  return mapLevels((variable) => {
    const path = scenario.variablePaths[variable];
    return path && day < path.length ? path[day] : baseline[variable];
  });
};

/** Day-over-day moves. Day 0 is measured against zero for every variable. */
export const levelDeltas = (current: MarketLevels, previous: MarketLevels | null): MarketLevels =>
  mapLevels((variable) => current[variable] - (previous ? previous[variable] : 0));

/** VIX relative to its calm baseline; 1.0 means no stress. */
export const stressIndex = (levels: MarketLevels, params: MarketParameters): number =>
  levels[MarketVariable.Vix] / params.baselineVix;

/** Stress index floored at 1, used wherever calm markets must not dampen feedback. */
export const feedbackStress = (levels: MarketLevels, params: MarketParameters): number =>
  Math.max(1, stressIndex(levels, params));

const exogenousConditions = (
  levels: MarketLevels,
  params: MarketParameters
): Pick<EndogenousMarketState, 'repoAvailability' | 'giltBidAskBps' | 'corpBidAskBps' | 'giltDepth' | 'corpDepth'> => {
  const stress = stressIndex(levels, params);
  return {
    repoAvailability: Math.min(
      1,
      Math.max(params.repoAvailabilityFloor, 1 - (stress - 1) * params.repoAvailabilityStressSlope)
    ),
    giltBidAskBps: params.giltBidAskPerStress * stress,
    corpBidAskBps: params.corpBidAskPerStress * stress,
    giltDepth: Math.max(params.giltDepthFloor, params.giltDepthBase / stress),
    corpDepth: Math.max(params.corpDepthFloor, params.corpDepthBase / stress),
  };
};

const freshEndogenous = (levels: MarketLevels, params: MarketParameters): EndogenousMarketState => ({
  giltSelling: 0,
  corpSelling: 0,
  equitySelling: 0,
  repoDemand: 0,
  giltAbsorbed: 0,
  corpAbsorbed: 0,
  giltYieldAddBps: 0,
  corpSpreadAddBps: 0,
  ...exogenousConditions(levels, params),
});

export const createMarketState = (params: MarketParameters): MarketState => {
  const levels = baselineLevels(params);
  return {
    day: -1,
    exogenous: { ...levels },
    levels,
    deltas: levelDeltas(levels, levels),
    endogenous: freshEndogenous(levels, params),
  };
};

/**
 * Starts a new day: overwrites the exogenous layer and resets the endogenous accumulators.
 */
export const applyExogenousScenario = (
  market: MarketState,
  day: number,
  levels: MarketLevels,
  previous: MarketLevels | null,
  params: MarketParameters
): void => {
  market.day = day;
  market.exogenous = { ...levels };
  market.levels = { ...levels };
  market.deltas = levelDeltas(levels, previous);
  market.endogenous = freshEndogenous(levels, params);
};

/** Posts an agent's sales and repo requests for the day. */
export const registerActionsToMarket = (market: MarketState, agent: Agent): void => {
  agent.reactions.forEach((reaction) => {
    const meta = ACTION_META[reaction.action];
    if (meta.instrument === InstrumentClass.Repo) {
      market.endogenous.repoDemand += reaction.amount;
      return;
    }
    if (meta.instrument !== InstrumentClass.AssetSale) return;
    switch (meta.assetClass) {
      case AssetClass.Gilt:
        market.endogenous.giltSelling += reaction.amount;
        break;
      case AssetClass.Corporate:
        market.endogenous.corpSelling += reaction.amount;
        break;
      case AssetClass.Equity:
        market.endogenous.equitySelling += reaction.amount;
        break;
      default:
        break;
    }
  });
};

/**
 * Turns the day's selling pressure and repo demand into price impact.
 *
 * Only selling that banks did not absorb moves prices. The result depends on the day's
 * accumulated pressure alone, so calling it once per feedback iteration does not compound
 * the same sales.
 */
export const applyEndogenousFeedback = (market: MarketState, params: MarketParameters): void => {
  const base = exogenousConditions(market.exogenous, params);
  const endo = market.endogenous;
  const netGilt = Math.max(0, endo.giltSelling - endo.giltAbsorbed);
  const netCorp = Math.max(0, endo.corpSelling - endo.corpAbsorbed);

  endo.giltDepth = base.giltDepth;
  endo.corpDepth = base.corpDepth;
  endo.giltYieldAddBps = (netGilt / base.giltDepth) * params.giltImpactBps;
  endo.corpSpreadAddBps = (netCorp / base.corpDepth) * params.corpImpactBps;
  endo.repoAvailability = Math.max(
    params.repoAvailabilityFloor,
    base.repoAvailability - (endo.repoDemand / params.systemRepoCapacity) * params.repoPressureSlope
  );
  endo.giltBidAskBps = base.giltBidAskBps + endo.giltSelling * params.giltBidAskPerMm;
  endo.corpBidAskBps = base.corpBidAskBps + endo.corpSelling * params.corpBidAskPerMm;

  const exo = market.exogenous;
  market.levels = {
    ...exo,
    [MarketVariable.Gilt10y]: exo[MarketVariable.Gilt10y] + endo.giltYieldAddBps * params.gilt10yPassThrough,
    [MarketVariable.Gilt30y]: exo[MarketVariable.Gilt30y] + endo.giltYieldAddBps * params.gilt30yPassThrough,
    [MarketVariable.IgCorpSpread]: exo[MarketVariable.IgCorpSpread] + endo.corpSpreadAddBps * params.igPassThrough,
    [MarketVariable.HyCorpSpread]: exo[MarketVariable.HyCorpSpread] + endo.corpSpreadAddBps * params.hyPassThrough,
  };
};

export const snapshotMarket = (market: MarketState): MarketSnapshot => ({
  day: market.day,
  levels: { ...market.levels },
  endogenous: { ...market.endogenous },
});
