import { baseConfig } from '../config/baseConfig';
import { createSampleNetwork, createSamplePopulation } from '../config/samplePopulation';
import { getScenarioById } from '../config/scenarios';
import type { Agent } from '../domain/agents';
import type { SimulationConfig } from '../domain/config';
import type { SimulationRunResult } from '../domain/results';
import type { Scenario } from '../domain/scenario';
import { formatMm, formatMultiple, formatPct } from '../utils/formatters';
import type { RelationshipNetwork } from './network';
import { runSimulation } from './simulation';

export interface SimulationTestResult {
  id: string;
  name: string;
  group: string;
  passed: boolean;
  detail: string;
}

export interface SimulationTestContext {
  config: SimulationConfig;
  scenario: Scenario;
  createPopulation: () => Agent[];
  createNetwork: (population: readonly Agent[]) => RelationshipNetwork;
}

export interface SimulationTestCase {
  id: string;
  name: string;
  group: string;
  run: (ctx: SimulationTestContext) => string;
}

export interface RunSimulationTestSuiteOptions {
  config?: SimulationConfig;
  scenario?: Scenario;
  createPopulation?: () => Agent[];
  createNetwork?: (population: readonly Agent[]) => RelationshipNetwork;
  filter?: (testCase: SimulationTestCase) => boolean;
}

const defaultScenario = (): Scenario => {
  const scenario = getScenarioById('gilt-selloff');
  if (!scenario) {
    throw new Error('Missing built-in scenario gilt-selloff');
  }
  return scenario;
};

export const createSimulationTestContext = (options: RunSimulationTestSuiteOptions = {}): SimulationTestContext => ({
  config: options.config ?? baseConfig,
  scenario: options.scenario ?? defaultScenario(),
  createPopulation: options.createPopulation ?? createSamplePopulation,
  createNetwork: options.createNetwork ?? ((population) => createSampleNetwork(population)),
});

const run = (
  ctx: SimulationTestContext,
  overrides: { population?: Agent[]; feedbackIterations?: number } = {}
): SimulationRunResult => {
  const population = overrides.population ?? ctx.createPopulation();
  return runSimulation({
    population,
    network: ctx.createNetwork(population),
    scenario: ctx.scenario,
    config: ctx.config,
    feedbackIterations: overrides.feedbackIterations,
  });
};

const reactionDays = (result: SimulationRunResult, agentId: string): number =>
  result.days.filter((day) => day.agents.some((a) => a.agentId === agentId && a.hasReacted)).length;

export const simulationTestCases: SimulationTestCase[] = [
  {
    id: 'buffer-positive',
    group: 'Liquidity mechanics',
    name: 'every agent has a strictly positive starting buffer on every day',
    run: (ctx) => {
      const result = run(ctx);
      let smallest = Number.POSITIVE_INFINITY;
      result.days.forEach((day) =>
        day.agents.forEach((agent) => {
          if (!(agent.b0 > 0)) {
            throw new Error(`${agent.agentId} has B0 ${agent.b0} on day ${day.day}`);
          }
          smallest = Math.min(smallest, agent.b0);
        })
      );
      return `Smallest B0 ${formatMm(smallest)}`;
    },
  },
  {
    id: 'losses-non-negative',
    group: 'Liquidity mechanics',
    name: 'direct and feedback losses are never negative and buffer identities hold',
    run: (ctx) => {
      const result = run(ctx);
      result.days.forEach((day) =>
        day.agents.forEach((agent) => {
          if (agent.e1 < 0 || agent.e2 < 0) {
            throw new Error(`${agent.agentId} day ${day.day}: E1 ${agent.e1}, E2 ${agent.e2}`);
          }
          if (Math.abs(agent.b0 - agent.e1 - agent.b1) > 1e-6 || Math.abs(agent.b2 - agent.e2 - agent.b3) > 1e-6) {
            throw new Error(`${agent.agentId} day ${day.day}: buffer identities broken`);
          }
        })
      );
      const totalE2 = result.days.reduce((sum, day) => sum + day.agents.reduce((s, a) => s + a.e2, 0), 0);
      return `Total feedback loss ${formatMm(totalE2)}`;
    },
  },
  {
    id: 'idempotent-runs',
    group: 'Determinism',
    name: 'identical inputs produce identical results',
    run: (ctx) => {
      const first = JSON.stringify(run(ctx));
      const second = JSON.stringify(run(ctx));
      if (first !== second) {
        throw new Error('Two runs over the same inputs diverged');
      }
      return `Results match (${first.length} characters)`;
    },
  },
  {
    id: 'caller-population-untouched',
    group: 'Determinism',
    name: 'running a simulation does not mutate the caller population',
    run: (ctx) => {
      const population = ctx.createPopulation();
      const before = JSON.stringify(population);
      run(ctx, { population });
      if (JSON.stringify(population) !== before) {
        throw new Error('Input population was mutated by the run');
      }
      return `${population.length} agents unchanged`;
    },
  },
  {
    id: 'zero-iteration-amplification',
    group: 'Amplification',
    name: 'disabling feedback gives amplification of exactly 1.0 everywhere',
    run: (ctx) => {
      const result = run(ctx, { feedbackIterations: 0 });
      const ratios = [
        ...Object.values(result.amplification.byAgent),
        ...Object.values(result.amplification.byType),
        result.amplification.system,
      ];
      const off = ratios.filter((r) => r !== 1);
      if (off.length > 0) {
        throw new Error(`Amplification ratios differ from 1.0: ${off.map((r) => formatMultiple(r, 6)).join(', ')}`);
      }
      return `${ratios.length} ratios at 1.00x`;
    },
  },
  {
    id: 'feedback-amplifies',
    group: 'Amplification',
    name: 'feedback never dampens the direct shock',
    run: (ctx) => {
      const result = run(ctx);
      if (result.amplification.system < 1) {
        throw new Error(`System amplification ${formatMultiple(result.amplification.system)} is below 1.0`);
      }
      return `System amplification ${formatMultiple(result.amplification.system)}`;
    },
  },
  {
    id: 'threshold-monotonicity',
    group: 'Reactions',
    name: 'raising one agent\'s threshold or buffer usability never adds reaction days for it',
    run: (ctx) => {
      const baseline = run(ctx);
      const raises: Array<[string, (agent: Agent) => Agent]> = [
        ['threshold', (agent) => ({ ...agent, theta: agent.theta * 1.5 })],
        ['buffer usability', (agent) => ({ ...agent, bufferUsability: agent.bufferUsability + 0.5 })],
      ];
      let compared = 0;
      ctx.createPopulation().forEach((target) => {
        const before = reactionDays(baseline, target.id);
        raises.forEach(([label, raise]) => {
          const population = ctx.createPopulation().map((agent) => (agent.id === target.id ? raise(agent) : agent));
          const after = reactionDays(run(ctx, { population }), target.id);
          if (after > before) {
            throw new Error(`${target.id} reacted on ${after} days with a higher ${label}, ${before} before`);
          }
          compared += 1;
        });
      });
      return `${compared} single-agent increases, none added reaction days`;
    },
  },
  {
    id: 'bank-capacity-carry-over',
    group: 'Market making',
    name: 'bank market-making capacity falls by exactly what banks absorb and is never replenished',
    run: (ctx) => {
      const result = run(ctx);
      const previous = new Map<string, { gilt: number; corp: number }>();
      result.days.forEach((day) => {
        let giltDrawn = 0;
        let corpDrawn = 0;
        day.agents.forEach((agent) => {
          if (!agent.marketMaking) return;
          const { giltCapacity, giltRemaining, corpCapacity, corpRemaining } = agent.marketMaking;
          const before = previous.get(agent.agentId) ?? { gilt: giltCapacity, corp: corpCapacity };
          if (giltRemaining > before.gilt + 1e-9 || corpRemaining > before.corp + 1e-9) {
            throw new Error(`${agent.agentId} market-making capacity grew on day ${day.day}`);
          }
          giltDrawn += before.gilt - giltRemaining;
          corpDrawn += before.corp - corpRemaining;
          previous.set(agent.agentId, { gilt: giltRemaining, corp: corpRemaining });
        });
        const { giltAbsorbed, corpAbsorbed } = day.market.endogenous;
        if (Math.abs(giltDrawn - giltAbsorbed) > 1e-6 || Math.abs(corpDrawn - corpAbsorbed) > 1e-6) {
          throw new Error(
            `Day ${day.day}: capacity fell by ${formatMm(giltDrawn)} gilt / ${formatMm(corpDrawn)} corporate ` +
              `but banks absorbed ${formatMm(giltAbsorbed)} / ${formatMm(corpAbsorbed)}`
          );
        }
      });
      return `Bank gilt capacity consumed ${formatPct(result.summary.bankGiltCapacityConsumedPct, 1)}`;
    },
  },
];

export const runSimulationTestSuite = (options: RunSimulationTestSuiteOptions = {}): SimulationTestResult[] => {
  const shouldInclude = options.filter ?? (() => true);
  return simulationTestCases.filter(shouldInclude).map((testCase) => {
    const ctx = createSimulationTestContext(options);
    try {
      const detail = testCase.run(ctx);
      return { id: testCase.id, name: testCase.name, group: testCase.group, passed: true, detail };
    } catch (err: unknown) {
      return {
        id: testCase.id,
        name: testCase.name,
        group: testCase.group,
        passed: false,
        detail: err instanceof Error ? err.message : String(err),
      };
    }
  });
};

if (import.meta.vitest) {
  const { describe, expect, it } = import.meta.vitest;

  describe('Simulation test suite metadata', () => {
    it('simulation test ids are unique', () => {
      const ids = new Set<string>();
      const dupes = new Set<string>();
      simulationTestCases.forEach((testCase) => {
        if (ids.has(testCase.id)) dupes.add(testCase.id);
        ids.add(testCase.id);
      });
      expect([...dupes]).toEqual([]);
    });

    it('reports results for the selected cases only', () => {
      const results = runSimulationTestSuite({ filter: (testCase) => testCase.group === 'Market making' });
      expect(results.map((r) => r.id)).toEqual(['bank-capacity-carry-over']);
      expect(results[0].passed).toBe(true);
    });
  });

  const groupedCases = simulationTestCases.reduce<Record<string, SimulationTestCase[]>>((acc, testCase) => {
    if (!acc[testCase.group]) {
      acc[testCase.group] = [];
    }
    acc[testCase.group].push(testCase);
    return acc;
  }, {});

  Object.entries(groupedCases).forEach(([group, cases]) => {
    describe(group, () => {
      cases.forEach((testCase) => {
        it(`${testCase.id}: ${testCase.name}`, () => {
          const ctx = createSimulationTestContext();
          const detail = testCase.run(ctx);
          expect(detail).toBeTypeOf('string');
          expect(detail.length).toBeGreaterThan(0);
        });
      });
    });
  });
}
