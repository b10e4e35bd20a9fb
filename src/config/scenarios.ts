// Built-in scenario library, validated on load.
import type { Scenario } from '../domain/scenario';
import { normaliseScenario } from '../engine/normalise';
import scenarioData from './scenarios.json';

export const scenarios: Scenario[] = scenarioData.map((raw) => normaliseScenario(raw));

export const getScenarioById = (scenarioId: string): Scenario | undefined =>
  scenarios.find((scenario) => scenario.id === scenarioId);
