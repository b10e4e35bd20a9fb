import { describe, expect, it } from 'vitest';
import { baseConfig } from '../../config/baseConfig';
import { ActionName, MarketVariable } from '../../domain/enums';
import { marketAt, reactionContext, setLiquidity, testInsurer } from '../testFixtures';
import { insurerBehaviour } from './insurer';
import { computeStage2 } from './lifecycle';

const stage = (levels: Parameters<typeof marketAt>[0]) => ({ day: 0, market: marketAt(levels), config: baseConfig });

describe('insurer stage 1', () => {
  it('charges variation, dirty-CSA and initial margin on the derivative book', () => {
    const insurer = testInsurer({ derivativesNotional: 10000, dirtyCsaPct: 0.5 });
    const margin = insurerBehaviour.marginCalls(
      insurer,
      stage({ [MarketVariable.Gilt10y]: 100, [MarketVariable.RepoHaircutCorp]: 4, [MarketVariable.Vix]: 30 })
    );
    expect(margin).toBeCloseTo(0.8 + 10 + 8, 9);
  });

  it('ignores a tightening corporate haircut', () => {
    const insurer = testInsurer({ derivativesNotional: 10000, dirtyCsaPct: 0.5 });
    expect(insurerBehaviour.marginCalls(insurer, stage({ [MarketVariable.RepoHaircutCorp]: -2 }))).toBe(0);
  });

  it('offsets mark-to-market losses by its hedge ratio', () => {
    const insurer = testInsurer({ gilts: 1000, derivativesNotional: 10000, hedgeRatio: 0.5 });
    // (1000 x 0.0005 + 10000 x 0.0002) x 10bps, less 15%
    expect(insurerBehaviour.markToMarket(insurer, stage({ [MarketVariable.Gilt10y]: 10 }))).toBeCloseTo(21.25, 9);
  });
});

describe('insurer waterfall', () => {
  it('draws facilities before selling assets', () => {
    const insurer = testInsurer({
      committedRepoLines: 1000,
      revolvingCredit: 1000,
      gilts: 1000,
      corporateBonds: 1000,
      equities: 1000,
    });
    setLiquidity(insurer, 100, 1000);
    computeStage2(insurer, reactionContext([insurer]));

    const expected: Array<[ActionName, number]> = [
      [ActionName.DrawRepoLines, 300],
      [ActionName.DrawRevolvingCredit, 140],
      [ActionName.SellGilts, 84],
      [ActionName.SellCorporateBonds, 20],
      [ActionName.SellEquities, 22.8],
    ];
    expect(insurer.reactions.map((r) => r.action)).toEqual(expected.map(([action]) => action));
    insurer.reactions.forEach((reaction, i) => expect(reaction.amount).toBeCloseTo(expected[i][1], 9));
    expect(insurer.unmetShortfall).toBeCloseTo(433.2, 9);
  });
});
