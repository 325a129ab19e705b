import { PacksmithError } from "./base.js";

// ---------------------------------------------------------------------------
// Base class for all language-server errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for LSP client errors.
 *
 * Enables generic catch: `if (e instanceof LspError)`
 * while specific subclasses allow precise handling.
 */
export abstract class LspError extends PacksmithError {
  abstract readonly languageId: string;
}

/**
 * Thrown when no configured command for a language can be executed.
 */
export class LspServerNotFoundError extends LspError {
  readonly code = "LSP_SERVER_NOT_FOUND" as const;

  constructor(
    readonly languageId: string,
    readonly tried: readonly string[] = [],
  ) {
    super(
      tried.length > 0
        ? `No language server executable found for '${languageId}' (tried: ${tried.join(" | ")})`
        : `No language server configured for '${languageId}'`,
      { languageId },
    );
  }
}

/**
 * Thrown when the server process could not be started or the
 * initialize handshake was answered with an error.
 */
export class LspInitializationError extends LspError {
  readonly code = "LSP_INITIALIZATION_FAILED" as const;

  constructor(
    readonly languageId: string,
    cause?: Error,
  ) {
    super(
      `Language server '${languageId}' failed to initialize: ${cause?.message ?? "unknown error"}`,
      { languageId },
      cause ? { cause } : undefined,
    );
  }
}

/**
 * Thrown when the initialize handshake does not finish within the deadline.
 */
export class LspInitializationTimeoutError extends LspError {
  readonly code = "LSP_INITIALIZATION_TIMEOUT" as const;

  constructor(
    readonly languageId: string,
    readonly timeoutMs: number,
  ) {
    super(`Language server '${languageId}' did not initialize within ${timeoutMs}ms`, {
      languageId,
      timeoutMs: String(timeoutMs),
    });
  }
}

/**
 * Thrown when the server process exits while the client still needs it.
 */
export class LspServerCrashedError extends LspError {
  readonly code = "LSP_SERVER_CRASHED" as const;

  constructor(
    readonly languageId: string,
    readonly exitCode: number | null,
    readonly signal: string | null,
  ) {
    super(
      `Language server '${languageId}' exited unexpectedly ` +
        `(code=${exitCode ?? "none"}, signal=${signal ?? "none"})`,
      { languageId },
    );
  }
}

/**
 * Thrown when a stopped connection is asked to do work.
 */
export class LspConnectionClosedError extends LspError {
  readonly code = "LSP_CONNECTION_CLOSED" as const;

  constructor(readonly languageId: string) {
    super(`Connection to language server '${languageId}' is closed`, { languageId });
  }
}

/**
 * Thrown when a connection is released without a matching acquire.
 * Always a lifecycle bug in the caller.
 */
export class ConnectionReleaseError extends LspError {
  readonly code = "LSP_RELEASE_UNBALANCED" as const;

  constructor(
    readonly languageId: string,
    readonly projectId: string,
  ) {
    super(
      `release('${projectId}', '${languageId}') has no matching acquire`,
      { languageId, projectId },
    );
  }
}
