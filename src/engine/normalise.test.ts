import { describe, expect, it } from 'vitest';
import { baseConfig } from '../config/baseConfig';
import { ConfigurationError } from '../domain/errors';
import { MarketVariable } from '../domain/enums';
import { CURRENT_CONFIG_VERSION, normaliseConfig, normaliseScenario, validatePopulation } from './normalise';
import { testBank, testHedgeFund } from './testFixtures';

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  return [];
};

describe('normaliseConfig', () => {
  it('returns a frozen copy of the base configuration', () => {
    const config = normaliseConfig();
    expect(config.version).toBe(CURRENT_CONFIG_VERSION);
    expect(config.market).toEqual(baseConfig.market);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.reactions.bank.sellGilts)).toBe(true);
  });

  it('merges nested overrides over the defaults', () => {
    const config = normaliseConfig({ feedback: { iterationsPerDay: 0 }, reactions: { bank: { sellGilts: { holdingCap: 0.5 } } } });
    expect(config.feedback.iterationsPerDay).toBe(0);
    expect(config.feedback.crowdingCoeff).toBe(baseConfig.feedback.crowdingCoeff);
    expect(config.reactions.bank.sellGilts).toEqual({ shortfallShare: 0.1, holdingCap: 0.5 });
  });

  it('collects every invalid value', () => {
    expect(
      issuesOf(() =>
        normaliseConfig({ amplificationEpsilon: 0, network: { ldiBanks: { min: 3, max: 2 } } })
      )
    ).toEqual(['network.ldiBanks: min must not exceed max', 'amplificationEpsilon: Number must be greater than 0']);
  });
});

describe('normaliseScenario', () => {
  it('fills in a default id and name', () => {
    const scenario = normaliseScenario({ horizonDays: 2, variablePaths: { vix: [20, 25] } });
    expect(scenario).toEqual({
      id: 'custom',
      name: 'Custom scenario',
      horizonDays: 2,
      variablePaths: { [MarketVariable.Vix]: [20, 25] },
    });
  });

  it('rejects unknown variables, short paths and a non-positive VIX', () => {
    expect(
      issuesOf(() =>
        normaliseScenario({
          id: 'broken',
          horizonDays: 2,
          variablePaths: { vix: [20, 0], libor: [1, 2], gilt_10y_yield: [1] },
        })
      )
    ).toEqual([
      'variablePaths.vix: VIX must stay positive',
      'variablePaths.libor: unknown market variable',
      'variablePaths.gilt_10y_yield: expected 2 values, got 1',
    ]);
  });

  it('requires a horizon of at least one day', () => {
    expect(issuesOf(() => normaliseScenario({ horizonDays: 0, variablePaths: {} }))).toEqual([
      'horizonDays: Number must be greater than or equal to 1',
    ]);
  });
});

describe('validatePopulation', () => {
  it('accepts hand-built agents', () => {
    expect(() => validatePopulation([testBank(), testHedgeFund()])).not.toThrow();
  });

  it('rejects an empty population', () => {
    expect(issuesOf(() => validatePopulation([]))).toEqual(['population is empty']);
  });

  it('reports bad parameters and duplicate ids by position', () => {
    expect(issuesOf(() => validatePopulation([testBank(), testBank({ theta: 0 })]))).toEqual([
      'population.1.theta: Number must be greater than 0',
      'population.1: duplicate agent id bank-1',
    ]);
  });
});
