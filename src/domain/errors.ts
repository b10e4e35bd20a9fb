/** Malformed or missing input detected before the first simulated day. */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** A derived quantity went negative or non-finite; indicates a calibration or logic bug. */
export class InvariantViolationError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Invariant violations: ${violations.join('; ')}`);
    this.name = 'InvariantViolationError';
    this.violations = violations;
  }
}

export class SimulationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationStateError';
  }
}
