/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the editor tooling packages is declared here.
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, config, lsp, queue
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    isExpected: false,
    title: "Operation timeout",
    description: "The operation exceeded its deadline",
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    isExpected: true,
    title: "Invalid configuration",
    description: "A configuration object failed schema validation",
  },

  // ============================================================================
  // LSP ERRORS — Language Server Protocol client
  // ============================================================================
  LSP_SERVER_NOT_FOUND: {
    domain: "lsp",
    isExpected: true,
    title: "LSP server not found",
    description: "No executable language server is configured for the requested language",
  },
  LSP_INITIALIZATION_FAILED: {
    domain: "lsp",
    isExpected: false,
    title: "LSP initialization failed",
    description: "The language server could not be started or the LSP handshake failed",
  },
  LSP_INITIALIZATION_TIMEOUT: {
    domain: "lsp",
    isExpected: false,
    title: "LSP initialization timeout",
    description: "The language server did not answer the initialize request in time",
  },
  LSP_SERVER_CRASHED: {
    domain: "lsp",
    isExpected: false,
    title: "LSP server crashed",
    description: "The language server process exited unexpectedly",
  },
  LSP_CONNECTION_CLOSED: {
    domain: "lsp",
    isExpected: true,
    title: "LSP connection closed",
    description: "The connection to the language server was stopped",
  },
  LSP_RELEASE_UNBALANCED: {
    domain: "lsp",
    isExpected: false,
    title: "Unbalanced LSP connection release",
    description: "A connection was released more times than it was acquired",
  },

  // ============================================================================
  // QUEUE ERRORS — Background task queue
  // ============================================================================
  TASK_QUEUE_FULL: {
    domain: "queue",
    isExpected: true,
    title: "Task queue full",
    description: "The background task queue is at capacity and rejects new tasks",
  },
  TASK_QUEUE_CLOSED: {
    domain: "queue",
    isExpected: true,
    title: "Task queue closed",
    description: "The background task queue is shutting down and accepts no new tasks",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];
