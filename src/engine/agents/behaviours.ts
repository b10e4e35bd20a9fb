import type { Agent, AgentOfType } from '../../domain/agents';
import { AgentType } from '../../domain/enums';
import { bankBehaviour } from './bank';
import { fundComplexBehaviour } from './fundComplex';
import { hedgeFundBehaviour } from './hedgeFund';
import { insurerBehaviour } from './insurer';
import { ldiPensionBehaviour } from './ldiPension';
import type { AgentBehaviour } from './waterfall';

type BehaviourMap = {
  [K in Agent['type']]: AgentBehaviour<AgentOfType<K>>;
};

export const AGENT_BEHAVIOURS: BehaviourMap = {
  [AgentType.Bank]: bankBehaviour,
  [AgentType.HedgeFund]: hedgeFundBehaviour,
  [AgentType.LdiPension]: ldiPensionBehaviour,
  [AgentType.Insurer]: insurerBehaviour,
  [AgentType.FundComplex]: fundComplexBehaviour,
};

/**
 * Runs `fn` with the agent narrowed to its variant and paired with that variant's behaviour.
 */
export const withBehaviour = <R>(agent: Agent, fn: <A extends Agent>(agent: A, behaviour: AgentBehaviour<A>) => R): R => {
  switch (agent.type) {
    case AgentType.Bank:
      return fn(agent, AGENT_BEHAVIOURS[AgentType.Bank]);
    case AgentType.HedgeFund:
      return fn(agent, AGENT_BEHAVIOURS[AgentType.HedgeFund]);
    case AgentType.LdiPension:
      return fn(agent, AGENT_BEHAVIOURS[AgentType.LdiPension]);
    case AgentType.Insurer:
      return fn(agent, AGENT_BEHAVIOURS[AgentType.Insurer]);
    case AgentType.FundComplex:
      return fn(agent, AGENT_BEHAVIOURS[AgentType.FundComplex]);
  }
};
