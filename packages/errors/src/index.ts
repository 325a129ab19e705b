/**
 * @packsmith/errors
 *
 * Shared error taxonomy for the editor tooling packages.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific condition. Use `error.code === "XXX"` for fine-grained
 * matching, or `instanceof LspError` / `instanceof TaskQueueError`
 * for category matching.
 */

export { type ErrorJSON, isPacksmithError, PacksmithError } from "./base.js";
export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";
export { ConfigurationError, InternalError, OperationTimeoutError } from "./common.js";
export {
  ConnectionReleaseError,
  LspConnectionClosedError,
  LspError,
  LspInitializationError,
  LspInitializationTimeoutError,
  LspServerCrashedError,
  LspServerNotFoundError,
} from "./lsp.js";
export { TaskQueueClosedError, TaskQueueError, TaskQueueFullError } from "./task-queue.js";
export { getCatalogEntry, getErrorMessage, isValidErrorCode, toError } from "./utils.js";
