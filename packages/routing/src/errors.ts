/**
 * Error types raised by the routing package.
 *
 * Errors that can reach an HTTP caller carry a `status`.
 */

/** A query the planner refuses to run (empty, identical or unknown stations) */
export class InvalidQueryError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

/** Network data that breaks the model's invariants. Raised at load time. */
export class NetworkConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], source?: string) {
    super(`Invalid network${source ? ` (${source})` : ""}: ${issues.join("; ")}`);
    this.name = "NetworkConfigError";
    this.issues = issues;
  }
}

/** A planner config or profile file that cannot be used */
export class PlannerConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "PlannerConfigError";
    this.issues = issues;
  }
}
