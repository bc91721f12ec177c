/**
 * Thrown when span scoping is misused: ending a span that still has open
 * children, opening a child under a completed span, or popping an empty
 * context stack.
 */
export class SpanLifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpanLifecycleError";
  }
}

/**
 * Thrown when configuration values fail validation.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
