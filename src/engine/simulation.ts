/**
 * Core simulation loop.
 *
 * The engine treats the input population as immutable: it clones it and mutates the clone
 * through the daily pipeline:
 * exogenous scenario -> buffers -> stage 1 (own losses, then fund-complex redemptions) ->
 * stage 2 reactions -> register actions -> bank absorption and tightening -> stage 3 feedback ->
 * invariant checks -> snapshots -> realisation of sold holdings and drawn facilities.
 *
 * Most helpers in this file mutate the run state in place and append `SimulationEvent`s to the
 * run's event log.
 */
import { isBank, isFundComplex } from '../domain/agents';
import type { Agent, BankAgent } from '../domain/agents';
import type { SimulationConfig } from '../domain/config';
import { ConfigurationError, InvariantViolationError, SimulationStateError } from '../domain/errors';
import type { SimulationEvent } from '../domain/events';
import type { MarketLevels, MarketState } from '../domain/market';
import type { DaySnapshot, SimulationRunResult } from '../domain/results';
import type { Scenario } from '../domain/scenario';
import { formatMm, formatPct } from '../utils/formatters';
import { absorbSellingPressure, tightenRepoProvision } from './agents/bank';
import { inboundRedemptionDemand } from './agents/fundComplex';
import {
  applyInboundRedemptions,
  closeWithoutFeedback,
  computeInitialBuffer,
  computeStage1,
  computeStage2,
  realiseActions,
  resetDaily,
  snapshotAgent,
  stressRatio,
} from './agents/lifecycle';
import type { ReactionContext, StageContext } from './agents/waterfall';
import { clonePopulation } from './clone';
import { createEventLog } from './events';
import type { EventLog } from './events';
import { runFeedbackIteration } from './feedback';
import { checkInvariants } from './invariants';
import { applyExogenousScenario, createMarketState, registerActionsToMarket, scenarioLevels, snapshotMarket } from './market';
import { computeAmplification, dailySystemAmplification, summariseRun } from './metrics';
import type { RelationshipNetwork } from './network';
import { normaliseConfig, normaliseScenario, validatePopulation } from './normalise';

const EXHAUSTED = 1e-9;

export interface SimulationInput {
  population: readonly Agent[];
  network: RelationshipNetwork;
  scenario: Scenario;
  config?: SimulationConfig;
  /** Feedback iterations per day; defaults to `config.feedback.iterationsPerDay`. Zero disables stage 3. */
  feedbackIterations?: number;
}

export type SimulationPhase = 'ready' | 'running' | 'complete';

export interface SimulationStepOutput {
  snapshot: DaySnapshot;
  events: SimulationEvent[];
}

export interface SimulationEngine {
  phase: () => SimulationPhase;
  /** Day the next `step` will simulate. */
  nextDay: () => number;
  agents: () => readonly Agent[];
  step: () => SimulationStepOutput;
  run: () => SimulationRunResult;
  result: () => SimulationRunResult;
}

interface RunState {
  scenario: Scenario;
  config: SimulationConfig;
  network: RelationshipNetwork;
  iterations: number;
  agents: Agent[];
  agentsById: Map<string, Agent>;
  banks: BankAgent[];
  market: MarketState;
  log: EventLog;
  previousLevels: MarketLevels | null;
  days: DaySnapshot[];
}

const checkNetworkCoverage = (population: readonly Agent[], network: RelationshipNetwork): string[] => {
  const ids = new Set(population.map((a) => a.id));
  const issues = population
    .filter((agent) => !network.hasNode(agent.id))
    .map((agent) => `agent ${agent.id} is missing from the network`);
  network.nodeIds
    .filter((id) => !ids.has(id))
    .forEach((id) => issues.push(`network node ${id} is not in the population`));
  return issues;
};

/** Validates every input before day 0 and builds the mutable run state. */
const prepareRun = (input: SimulationInput): RunState => {
  const scenario = normaliseScenario(input.scenario);
  const config = normaliseConfig(input.config ?? {});
  validatePopulation(input.population);

  const networkIssues = checkNetworkCoverage(input.population, input.network);
  if (networkIssues.length > 0) {
    throw new ConfigurationError('Network does not match population', networkIssues);
  }

  const iterations = input.feedbackIterations ?? config.feedback.iterationsPerDay;
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new ConfigurationError('Invalid feedback iterations', [`expected a non-negative integer, got ${iterations}`]);
  }

  const agents = clonePopulation(input.population);
  return {
    scenario,
    config,
    network: input.network,
    iterations,
    agents,
    agentsById: new Map(agents.map((agent) => [agent.id, agent])),
    banks: agents.filter(isBank),
    market: createMarketState(config.market),
    log: createEventLog(),
    previousLevels: null,
    days: [],
  };
};

/**
 * Stage 1 in two passes. Fund-complex redemption demand is formed from every redeemer's stress
 * before any redemption is added, so fund-to-fund redemptions are simultaneous.
 */
const runStage1 = (run: RunState, ctx: StageContext): void => {
  run.agents.forEach((agent) => {
    resetDaily(agent);
    computeInitialBuffer(agent, run.config.buffers);
    computeStage1(agent, ctx);
  });

  const preRedemptionStress = new Map(run.agents.map((agent) => [agent.id, stressRatio(agent)]));
  const stressOf = (agent: Agent) => preRedemptionStress.get(agent.id) ?? 0;
  const inbound = run.agents.filter(isFundComplex).map((fund) => {
    const redeemers = run.network.redeemersOf(fund.id).flatMap((id) => {
      const redeemer = run.agentsById.get(id);
      return redeemer ? [redeemer] : [];
    });
    return { fund, amount: inboundRedemptionDemand(fund, redeemers, stressOf, run.config.redemption) };
  });
  inbound.forEach(({ fund, amount }) => applyInboundRedemptions(fund, amount));
};

const runStage2 = (run: RunState, ctx: ReactionContext): void => {
  run.agents.forEach((agent) => {
    computeStage2(agent, ctx);
    if (!agent.hasReacted) return;
    run.log.emit(
      ctx.day,
      'info',
      `${agent.name} reacted to a loss of ${formatMm(agent.liquidity.e1)} (${formatPct(stressRatio(agent), 1)} of buffer) with ${
        agent.reactions.length
      } action(s)`,
      agent.id
    );
    if (agent.unmetShortfall > 0) {
      run.log.emit(ctx.day, 'warning', `${agent.name}: ${formatMm(agent.unmetShortfall)} of shortfall left unmet`, agent.id);
    }
  });
};

const absorbAndTighten = (run: RunState, day: number): void => {
  run.agents.forEach((agent) => registerActionsToMarket(run.market, agent));

  const before = run.banks.map((bank) => ({ bank, gilt: bank.marketMaking.giltRemaining, corp: bank.marketMaking.corpRemaining }));
  absorbSellingPressure(run.banks, run.market);
  before.forEach(({ bank, gilt, corp }) => {
    if (gilt > EXHAUSTED && bank.marketMaking.giltRemaining <= EXHAUSTED) {
      run.log.emit(day, 'warning', `${bank.name}: gilt market-making capacity exhausted`, bank.id);
    }
    if (corp > EXHAUSTED && bank.marketMaking.corpRemaining <= EXHAUSTED) {
      run.log.emit(day, 'warning', `${bank.name}: corporate bond market-making capacity exhausted`, bank.id);
    }
  });

  run.banks.forEach((bank) => tightenRepoProvision(bank, run.config.bank));
};

const runStage3 = (run: RunState): void => {
  if (run.iterations === 0) {
    run.agents.forEach(closeWithoutFeedback);
    return;
  }
  const ctx = {
    agents: run.agents,
    agentsById: run.agentsById,
    network: run.network,
    market: run.market,
    config: run.config,
  };
  for (let i = 0; i < run.iterations; i += 1) {
    runFeedbackIteration(ctx);
  }
};

const stepDay = (run: RunState, day: number): DaySnapshot => {
  const { config, market } = run;
  const levels = scenarioLevels(run.scenario, day, config.market);
  applyExogenousScenario(market, day, levels, run.previousLevels, config.market);

  const stageCtx: StageContext = { day, market, config };
  runStage1(run, stageCtx);
  runStage2(run, { ...stageCtx, network: run.network, agentsById: run.agentsById, log: run.log });
  absorbAndTighten(run, day);
  runStage3(run);

  const violations = checkInvariants(run.agents);
  if (violations.length > 0) {
    throw new InvariantViolationError(violations.map((v) => `day ${day}: ${v}`));
  }

  const agents = run.agents.map((agent) => snapshotAgent(agent, day));
  const snapshot: DaySnapshot = {
    day,
    agents,
    market: snapshotMarket(market),
    systemAmplification: dailySystemAmplification(agents, config.amplificationEpsilon),
  };
  run.days.push(snapshot);

  run.agents.forEach(realiseActions);
  run.previousLevels = levels;
  return snapshot;
};

const buildResult = (run: RunState): SimulationRunResult => {
  const lastDay = run.days[run.days.length - 1];
  return {
    scenarioId: run.scenario.id,
    days: run.days,
    events: [...run.log.events],
    amplification: computeAmplification(run.days, run.config.amplificationEpsilon),
    summary: summariseRun(run.agents, run.days, lastDay ? lastDay.market : snapshotMarket(run.market)),
  };
};

/**
 * Creates a stepping engine over one run. All inputs are validated here, so a
 * `ConfigurationError` surfaces before any day is simulated.
 */
export const createSimulationEngine = (input: SimulationInput): SimulationEngine => {
  const run = prepareRun(input);
  let day = 0;
  let phase: SimulationPhase = 'ready';

  const step = (): SimulationStepOutput => {
    if (phase === 'complete') {
      throw new SimulationStateError(`Run already complete after ${run.scenario.horizonDays} day(s)`);
    }
    phase = 'running';
    const firstEvent = run.log.events.length;
    const snapshot = stepDay(run, day);
    day += 1;
    if (day >= run.scenario.horizonDays) phase = 'complete';
    return { snapshot, events: run.log.events.slice(firstEvent) };
  };

  const result = (): SimulationRunResult => {
    if (phase !== 'complete') {
      throw new SimulationStateError(`Run is not complete: ${day} of ${run.scenario.horizonDays} day(s) simulated`);
    }
    return buildResult(run);
  };

  const runToEnd = (): SimulationRunResult => {
    while (phase !== 'complete') step();
    return buildResult(run);
  };

  return {
    phase: () => phase,
    nextDay: () => day,
    agents: () => run.agents,
    step,
    run: runToEnd,
    result,
  };
};

export const runSimulation = (input: SimulationInput): SimulationRunResult => createSimulationEngine(input).run();
