import { describe, expect, it } from 'vitest';
import { baseConfig } from '../config/baseConfig';
import type { Agent } from '../domain/agents';
import { RelationshipKind } from '../domain/enums';
import { ConfigurationError } from '../domain/errors';
import { buildNetwork, networkFromEdges, summariseNetwork } from './network';
import type { RelationshipEdge } from './network';
import { testBank, testFundComplex, testHedgeFund, testInsurer, testLdiPension } from './testFixtures';

const population = (): Agent[] => [
  testBank({ id: 'bank-a', balanceSheetSize: 50000 }),
  testBank({ id: 'bank-b', balanceSheetSize: 20000 }),
  testHedgeFund({ id: 'hf-1' }),
  testHedgeFund({ id: 'hf-2' }),
  testLdiPension({ id: 'ldi-1' }),
  testInsurer({ id: 'ins-1' }),
  testFundComplex({ id: 'fund-a' }),
  testFundComplex({ id: 'fund-b' }),
];

const issuesOf = (edges: RelationshipEdge[]): string[] => {
  try {
    networkFromEdges(population(), edges);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  return [];
};

describe('networkFromEdges', () => {
  const edges: RelationshipEdge[] = [
    { from: 'hf-1', to: 'bank-a', kind: RelationshipKind.PrimeBrokerage },
    { from: 'hf-1', to: 'bank-b', kind: RelationshipKind.PrimeBrokerage },
    { from: 'ldi-1', to: 'bank-a', kind: RelationshipKind.Clearing },
    { from: 'ins-1', to: 'bank-b', kind: RelationshipKind.DerivativesRepo },
    { from: 'ldi-1', to: 'fund-a', kind: RelationshipKind.Redemption },
    { from: 'fund-b', to: 'fund-a', kind: RelationshipKind.Redemption },
  ];

  it('answers adjacency queries from both ends', () => {
    const network = networkFromEdges(population(), edges);
    expect(network.banksOf('hf-1')).toEqual(['bank-a', 'bank-b']);
    expect(network.banksOf('ldi-1')).toEqual(['bank-a']);
    expect(network.banksOf('bank-a')).toEqual([]);
    expect(network.neighbours('bank-a')).toEqual(['hf-1', 'ldi-1']);
    expect(network.neighbours('bank-a', RelationshipKind.Clearing)).toEqual(['ldi-1']);
    expect(network.isConnected('bank-b', 'ins-1')).toBe(true);
    expect(network.isConnected('ins-1', 'bank-b', RelationshipKind.PrimeBrokerage)).toBe(false);
    expect(network.redemptionTargets('ldi-1')).toEqual(['fund-a']);
    expect(network.redeemersOf('fund-a')).toEqual(['ldi-1', 'fund-b']);
    expect(network.neighbours('hf-2')).toEqual([]);
  });

  it('summarises edges by kind', () => {
    expect(summariseNetwork(networkFromEdges(population(), edges))).toEqual({
      nodes: 8,
      edges: 6,
      edgesByKind: {
        [RelationshipKind.PrimeBrokerage]: 2,
        [RelationshipKind.Clearing]: 1,
        [RelationshipKind.DerivativesRepo]: 1,
        [RelationshipKind.Redemption]: 2,
      },
    });
  });

  it('rejects edges that break the relationship rules', () => {
    expect(
      issuesOf([
        { from: 'bank-a', to: 'hf-1', kind: RelationshipKind.PrimeBrokerage },
        { from: 'hf-1', to: 'ghost', kind: RelationshipKind.PrimeBrokerage },
        { from: 'fund-a', to: 'fund-a', kind: RelationshipKind.Redemption },
        { from: 'ldi-1', to: 'bank-a', kind: RelationshipKind.Clearing },
        { from: 'ldi-1', to: 'bank-a', kind: RelationshipKind.Clearing },
      ])
    ).toEqual([
      'edge PrimeBrokerage:bank-a->hf-1 cannot start at a Bank',
      'edge PrimeBrokerage:bank-a->hf-1 cannot end at a HedgeFund',
      'edge PrimeBrokerage:hf-1->ghost references unknown agent ghost',
      'edge Redemption:fund-a->fund-a is a self-loop',
      'duplicate edge Clearing:ldi-1->bank-a',
    ]);
  });
});

describe('buildNetwork', () => {
  it('is deterministic for a given seed', () => {
    const first = buildNetwork(population(), 7, baseConfig.network);
    const second = buildNetwork(population(), 7, baseConfig.network);
    expect(second.edges).toEqual(first.edges);
  });

  it('respects degree ranges and pool sizes', () => {
    const network = buildNetwork(population(), 11, baseConfig.network);
    ['hf-1', 'hf-2'].forEach((id) => {
      expect(network.neighbours(id, RelationshipKind.PrimeBrokerage)).toHaveLength(2);
    });
    const ldiBanks = network.banksOf('ldi-1').length;
    expect(ldiBanks).toBeGreaterThanOrEqual(1);
    expect(ldiBanks).toBeLessThanOrEqual(2);
    expect(network.redemptionTargets('fund-a').every((id) => id === 'fund-b')).toBe(true);
    expect(network.banksOf('bank-a')).toEqual([]);
  });
});
