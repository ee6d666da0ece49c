/**
 * Raised when the strategy configuration breaks a rule. Thrown while the config is resolved,
 * before any stage of the pipeline runs.
 */
export class ConfigurationViolationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid strategy config: ${issues.join("; ")}`);
    this.name = "ConfigurationViolationError";
    this.issues = issues;
  }
}

/** Raised at a call boundary that received a value it cannot compute with. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}
