import { PacksmithError } from "./base.js";

/**
 * Fallback for failures that carry no more specific code.
 */
export class InternalError extends PacksmithError {
  readonly code = "INTERNAL_ERROR" as const;
}

/**
 * Thrown when an awaited operation outlives its deadline.
 */
export class OperationTimeoutError extends PacksmithError {
  readonly code = "INTERNAL_TIMEOUT" as const;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs: String(timeoutMs),
    });
  }
}

/**
 * Thrown when a configuration object fails schema validation.
 * `issues` holds one `path: message` line per violation.
 */
export class ConfigurationError extends PacksmithError {
  readonly code = "CONFIG_INVALID" as const;

  constructor(
    readonly section: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid ${section} configuration: ${issues.join("; ")}`, { section });
  }
}
