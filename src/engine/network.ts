/**
 * Bilateral relationship network.
 *
 * The network is the only authority on who may interact with whom: prime brokerage
 * (hedge fund -> bank), clearing (LDI -> bank), derivatives/repo (insurer -> bank) and
 * redemption (redeemer -> fund-complex). Edges are stored once and indexed in both
 * directions, so lookups from either end cost the size of that node's adjacency list.
 */
import type { Agent } from '../domain/agents';
import type { NetworkRules } from '../domain/config';
import { AgentType, RelationshipKind } from '../domain/enums';
import { ConfigurationError } from '../domain/errors';
import { createRng, weightedSampleWithoutReplacement } from './rng';

export interface RelationshipEdge {
  from: string;
  to: string;
  kind: RelationshipKind;
}

type Direction = 'out' | 'in';

interface Adjacency {
  peer: string;
  kind: RelationshipKind;
  direction: Direction;
}

export interface RelationshipNetwork {
  readonly nodeIds: readonly string[];
  readonly edges: readonly RelationshipEdge[];
  hasNode: (id: string) => boolean;
  neighbours: (id: string, kind?: RelationshipKind) => string[];
  isConnected: (a: string, b: string, kind?: RelationshipKind) => boolean;
  /** Banks linked to `id` through any prime-brokerage, clearing or derivatives/repo edge. */
  banksOf: (id: string) => string[];
  redemptionTargets: (id: string) => string[];
  redeemersOf: (fundId: string) => string[];
}

export interface NetworkSummary {
  nodes: number;
  edges: number;
  edgesByKind: Record<RelationshipKind, number>;
}

const BANK_KINDS: readonly RelationshipKind[] = [
  RelationshipKind.PrimeBrokerage,
  RelationshipKind.Clearing,
  RelationshipKind.DerivativesRepo,
];

// Which agent type may sit at each end of an edge kind.
const EDGE_RULES: Record<RelationshipKind, { from: readonly AgentType[]; to: readonly AgentType[] }> = {
  [RelationshipKind.PrimeBrokerage]: { from: [AgentType.HedgeFund], to: [AgentType.Bank] },
  [RelationshipKind.Clearing]: { from: [AgentType.LdiPension], to: [AgentType.Bank] },
  [RelationshipKind.DerivativesRepo]: { from: [AgentType.Insurer], to: [AgentType.Bank] },
  [RelationshipKind.Redemption]: {
    from: [AgentType.HedgeFund, AgentType.LdiPension, AgentType.Insurer, AgentType.FundComplex],
    to: [AgentType.FundComplex],
  },
};

const edgeKey = (edge: RelationshipEdge): string => `${edge.kind}:${edge.from}->${edge.to}`;

const indexEdges = (nodeIds: readonly string[], edges: readonly RelationshipEdge[]) => {
  const adjacency = new Map<string, Adjacency[]>();
  nodeIds.forEach((id) => adjacency.set(id, []));
  edges.forEach((edge) => {
    adjacency.get(edge.from)?.push({ peer: edge.to, kind: edge.kind, direction: 'out' });
    adjacency.get(edge.to)?.push({ peer: edge.from, kind: edge.kind, direction: 'in' });
  });
  return adjacency;
};

const unique = (ids: string[]): string[] => [...new Set(ids)];

const createNetwork = (nodeIds: readonly string[], edges: readonly RelationshipEdge[]): RelationshipNetwork => {
  const frozenIds = Object.freeze([...nodeIds]);
  const frozenEdges = Object.freeze(edges.map((edge) => Object.freeze({ ...edge })));
  const adjacency = indexEdges(frozenIds, frozenEdges);
  const adjacent = (id: string): Adjacency[] => adjacency.get(id) ?? [];

  const neighbours = (id: string, kind?: RelationshipKind): string[] =>
    unique(
      adjacent(id)
        .filter((a) => kind === undefined || a.kind === kind)
        .map((a) => a.peer)
    );

  return {
    nodeIds: frozenIds,
    edges: frozenEdges,
    hasNode: (id) => adjacency.has(id),
    neighbours,
    isConnected: (a, b, kind) => adjacent(a).some((adj) => adj.peer === b && (kind === undefined || adj.kind === kind)),
    banksOf: (id) =>
      unique(
        adjacent(id)
          .filter((a) => a.direction === 'out' && BANK_KINDS.includes(a.kind))
          .map((a) => a.peer)
      ),
    redemptionTargets: (id) =>
      unique(
        adjacent(id)
          .filter((a) => a.kind === RelationshipKind.Redemption && a.direction === 'out')
          .map((a) => a.peer)
      ),
    redeemersOf: (fundId) =>
      unique(
        adjacent(fundId)
          .filter((a) => a.kind === RelationshipKind.Redemption && a.direction === 'in')
          .map((a) => a.peer)
      ),
  };
};

/**
 * Builds a network from an explicit edge list, checking endpoints and edge kinds against the population.
 * Throws `ConfigurationError` listing every problem found.
 */
export const networkFromEdges = (population: readonly Agent[], edges: readonly RelationshipEdge[]): RelationshipNetwork => {
  const typeById = new Map<string, AgentType>();
  const issues: string[] = [];
  population.forEach((agent) => {
    if (typeById.has(agent.id)) issues.push(`duplicate agent id ${agent.id}`);
    typeById.set(agent.id, agent.type);
  });

  const seen = new Set<string>();
  edges.forEach((edge) => {
    const fromType = typeById.get(edge.from);
    const toType = typeById.get(edge.to);
    if (fromType === undefined) issues.push(`edge ${edgeKey(edge)} references unknown agent ${edge.from}`);
    if (toType === undefined) issues.push(`edge ${edgeKey(edge)} references unknown agent ${edge.to}`);
    if (edge.from === edge.to) issues.push(`edge ${edgeKey(edge)} is a self-loop`);
    const rule = EDGE_RULES[edge.kind];
    if (fromType !== undefined && !rule.from.includes(fromType)) {
      issues.push(`edge ${edgeKey(edge)} cannot start at a ${fromType}`);
    }
    if (toType !== undefined && !rule.to.includes(toType)) {
      issues.push(`edge ${edgeKey(edge)} cannot end at a ${toType}`);
    }
    const key = edgeKey(edge);
    if (seen.has(key)) issues.push(`duplicate edge ${key}`);
    seen.add(key);
  });

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid relationship network', issues);
  }
  return createNetwork(
    population.map((a) => a.id),
    edges
  );
};

/**
 * Seeded weighted assignment of relationships. Counterparties are drawn without replacement
 * with probability proportional to their size, so large banks and funds attract more links.
 * The same population and seed always yield the same edge list.
 */
export const buildNetwork = (population: readonly Agent[], seed: number, rules: NetworkRules): RelationshipNetwork => {
  const rng = createRng(seed);
  const banks = population.filter((a) => a.type === AgentType.Bank);
  const funds = population.filter((a) => a.type === AgentType.FundComplex);
  const edges: RelationshipEdge[] = [];
  const bySize = (agent: Agent) => agent.sizeFactor;

  const link = (agent: Agent, pool: readonly Agent[], range: NetworkRules[keyof NetworkRules], kind: RelationshipKind) => {
    if (pool.length === 0) return;
    const count = Math.min(rng.integer(range.min, range.max), pool.length);
    weightedSampleWithoutReplacement(rng, pool, count, bySize).forEach((peer) => {
      edges.push({ from: agent.id, to: peer.id, kind });
    });
  };

  population.forEach((agent) => {
    switch (agent.type) {
      case AgentType.HedgeFund:
        link(agent, banks, rules.hedgeFundBanks, RelationshipKind.PrimeBrokerage);
        link(agent, funds, rules.redemptionFunds, RelationshipKind.Redemption);
        break;
      case AgentType.LdiPension:
        link(agent, banks, rules.ldiBanks, RelationshipKind.Clearing);
        link(agent, funds, rules.redemptionFunds, RelationshipKind.Redemption);
        break;
      case AgentType.Insurer:
        link(agent, banks, rules.insurerBanks, RelationshipKind.DerivativesRepo);
        link(agent, funds, rules.redemptionFunds, RelationshipKind.Redemption);
        break;
      case AgentType.FundComplex:
        link(
          agent,
          funds.filter((f) => f.id !== agent.id),
          rules.fundCrossHoldings,
          RelationshipKind.Redemption
        );
        break;
      case AgentType.Bank:
        break;
    }
  });

  return networkFromEdges(population, edges);
};

export const summariseNetwork = (network: RelationshipNetwork): NetworkSummary => {
  const edgesByKind: Record<RelationshipKind, number> = {
    [RelationshipKind.PrimeBrokerage]: 0,
    [RelationshipKind.Clearing]: 0,
    [RelationshipKind.DerivativesRepo]: 0,
    [RelationshipKind.Redemption]: 0,
  };
  network.edges.forEach((edge) => {
    edgesByKind[edge.kind] += 1;
  });
  return { nodes: network.nodeIds.length, edges: network.edges.length, edgesByKind };
};
