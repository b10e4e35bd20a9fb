import { describe, expect, it } from 'vitest';
import { createSampleNetwork, createSamplePopulation } from '../config/samplePopulation';
import { getScenarioById } from '../config/scenarios';
import { isBank } from '../domain/agents';
import { ConfigurationError, SimulationStateError } from '../domain/errors';
import type { Scenario } from '../domain/scenario';
import { createSimulationEngine, runSimulation } from './simulation';
import type { SimulationInput } from './simulation';

const selloff = (): Scenario => {
  const scenario = getScenarioById('gilt-selloff');
  if (!scenario) throw new Error('gilt-selloff scenario is missing');
  return scenario;
};

const sampleInput = (overrides: Partial<SimulationInput> = {}): SimulationInput => {
  const population = createSamplePopulation();
  return { population, network: createSampleNetwork(population), scenario: selloff(), ...overrides };
};

const issuesOf = (input: SimulationInput): string[] => {
  try {
    createSimulationEngine(input);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  return [];
};

describe('input validation', () => {
  it('rejects a network built for another population', () => {
    const population = createSamplePopulation();
    const network = createSampleNetwork(population.filter((agent) => agent.id !== 'hf-rv-2'));
    expect(issuesOf({ population, network, scenario: selloff() })).toEqual(['agent hf-rv-2 is missing from the network']);
  });

  it('rejects a fractional iteration count', () => {
    expect(issuesOf(sampleInput({ feedbackIterations: 1.5 }))).toEqual(['expected a non-negative integer, got 1.5']);
  });

  it('rejects a scenario whose paths do not cover the horizon', () => {
    const scenario: Scenario = { id: 'short', name: 'Short', horizonDays: 3, variablePaths: { vix: [20, 30] } };
    expect(issuesOf(sampleInput({ scenario }))).toEqual(['variablePaths.vix: expected 3 values, got 2']);
  });
});

describe('createSimulationEngine', () => {
  it('steps one day at a time until the horizon', () => {
    const engine = createSimulationEngine(sampleInput());
    expect(engine.phase()).toBe('ready');

    const first = engine.step();
    expect(first.snapshot.day).toBe(0);
    expect(engine.phase()).toBe('running');
    expect(engine.nextDay()).toBe(1);
    expect(() => engine.result()).toThrow(SimulationStateError);

    const result = engine.run();
    expect(engine.phase()).toBe('complete');
    expect(result.days).toHaveLength(10);
    expect(result.days[0]).toEqual(first.snapshot);
    expect(() => engine.step()).toThrow(SimulationStateError);
    expect(engine.result()).toEqual(result);
  });

  it('returns each day its own slice of the event log', () => {
    const engine = createSimulationEngine(sampleInput());
    const stepped = Array.from({ length: 10 }, () => engine.step().events);
    expect(stepped.flat()).toEqual(engine.result().events);
    stepped.forEach((events, day) => events.forEach((event) => expect(event.day).toBe(day)));
  });
});

describe('runSimulation', () => {
  it('is deterministic for identical inputs', () => {
    expect(runSimulation(sampleInput())).toEqual(runSimulation(sampleInput()));
  });

  it('numbers events by day and run sequence', () => {
    const { events } = runSimulation(sampleInput());
    expect(events.length).toBeGreaterThan(0);
    events.forEach((event, index) => expect(event.id).toBe(`evt-${event.day}-${index}`));
  });

  it('keeps every buffer identity', () => {
    runSimulation(sampleInput()).days.forEach((day) =>
      day.agents.forEach((agent) => {
        expect(agent.b1).toBeCloseTo(agent.b0 - agent.e1, 6);
        expect(agent.b3).toBeCloseTo(agent.b2 - agent.e2, 6);
        expect(agent.e2).toBeGreaterThanOrEqual(0);
      })
    );
  });

  it('has no amplification without feedback', () => {
    const result = runSimulation(sampleInput({ feedbackIterations: 0 }));
    expect(result.amplification.system).toBe(1);
    Object.values(result.amplification.byAgent).forEach((ratio) => expect(ratio).toBe(1));
    result.days.forEach((day) => {
      expect(day.systemAmplification).toBe(1);
      day.agents.forEach((agent) => expect(agent.b3).toBe(agent.b2));
    });
  });

  it('draws down bank gilt capacity by exactly what banks absorbed', () => {
    const engine = createSimulationEngine(sampleInput());
    const result = engine.run();
    const absorbed = result.days.reduce((sum, day) => sum + day.market.endogenous.giltAbsorbed, 0);
    const consumed = engine
      .agents()
      .filter(isBank)
      .reduce((sum, bank) => sum + bank.marketMaking.giltCapacity - bank.marketMaking.giltRemaining, 0);
    expect(absorbed).toBeGreaterThan(0);
    expect(consumed).toBeCloseTo(absorbed, 6);
  });
});
