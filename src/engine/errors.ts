// ── Engine Errors ───────────────────────────────────────────────────
// Typed failures surfaced unmodified to callers. Outer layers map them
// to transport status codes.

/**
 * A recurring series (or other caller-supplied configuration) failed
 * validation. Raised at creation time, never during expansion.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** The external transaction/series store failed. Never retried. */
export class DataSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataSourceError";
  }
}

/** Lowest-point analysis was asked to scan an empty balance series. */
export class EmptyInputError extends Error {
  constructor(message = "Cannot find the lowest point of an empty forecast") {
    super(message);
    this.name = "EmptyInputError";
  }
}
