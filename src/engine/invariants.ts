import type { Agent } from '../domain/agents';

const TOLERANCE = 1e-9;

/**
 * Returns human-readable violations for one agent after a completed day. An empty list means
 * the agent is consistent.
 */
export function checkAgentInvariants(agent: Agent): string[] {
  const errors: string[] = [];
  const { b0, b1, b2, b3, e1, e2 } = agent.liquidity;

  if (!(b0 > 0)) {
    errors.push(`${agent.id}: B0 must be positive (${b0})`);
  }
  [
    { name: 'E1', value: e1 },
    { name: 'E2', value: e2 },
  ].forEach((loss) => {
    if (!Number.isFinite(loss.value) || loss.value < 0) {
      errors.push(`${agent.id}: ${loss.name} must be non-negative (${loss.value})`);
    }
  });
  [
    { name: 'B1', value: b1 },
    { name: 'B2', value: b2 },
    { name: 'B3', value: b3 },
  ].forEach((level) => {
    if (Number.isNaN(level.value) || !Number.isFinite(level.value)) {
      errors.push(`${agent.id}: ${level.name} is invalid (${level.value})`);
    }
  });

  if (Math.abs(b0 - e1 - b1) > TOLERANCE * Math.max(1, Math.abs(b0))) {
    errors.push(`${agent.id}: B1 ${b1} does not equal B0 - E1 (${b0 - e1})`);
  }
  if (Math.abs(b2 - e2 - b3) > TOLERANCE * Math.max(1, Math.abs(b2))) {
    errors.push(`${agent.id}: B3 ${b3} does not equal B2 - E2 (${b2 - e2})`);
  }

  const executed = agent.reactions.reduce((sum, reaction) => sum + reaction.amount, 0);
  agent.reactions.forEach((reaction) => {
    if (!Number.isFinite(reaction.amount) || reaction.amount < 0) {
      errors.push(`${agent.id}: ${reaction.action} amount is invalid (${reaction.amount})`);
    }
  });
  if (!agent.hasReacted && executed > 0) {
    errors.push(`${agent.id}: recorded ${agent.reactions.length} action(s) without reacting`);
  }

  agent.balanceSheet.items
    .filter((item) => !Number.isFinite(item.amount) || item.amount < 0)
    .forEach((item) => {
      errors.push(`${agent.id}: negative or invalid holding ${item.key} (${item.amount})`);
    });

  return errors;
}

export function checkInvariants(agents: readonly Agent[]): string[] {
  return agents.flatMap(checkAgentInvariants);
}
