/**
 * @packsmith/lsp
 *
 * Language Server Protocol client layer for the Packsmith editor.
 * Shares one server connection per project and language between open
 * documents, keeps each document in sync, and routes diagnostics back to it.
 */

// Config
export {
  type DiagnosticColors,
  DiagnosticColorsSchema,
  type LanguageServerConfig,
  LanguageServerConfigSchema,
  type LSPConfig,
  type LSPConfigInput,
  LSPConfigSchema,
  parseLSPConfig,
  resolveLanguage,
} from "./config.js";

// Connections
export {
  type FailureListener,
  type LanguageServerConnection,
  LSPConnection,
  type LSPConnectionOptions,
} from "./connection.js";
export {
  type CommandResolver,
  type ConnectionFactory,
  ConnectionManager,
  type ConnectionManagerOptions,
  createProcessTransportOpener,
} from "./connection-manager.js";
export { ReadySignal, type SignalStatus } from "./signal.js";

// Diagnostics fan-out
export {
  DiagnosticsBus,
  type DiagnosticsBusOptions,
  type DiagnosticsListener,
} from "./diagnostics-bus.js";

// Documents
export {
  DocumentSession,
  type DocumentSessionOptions,
  type OpenDocumentOptions,
  openDocumentSession,
} from "./document-session.js";
export {
  buildRenderDirectives,
  lineStartOffsets,
  positionToOffset,
  severityColor,
} from "./offsets.js";
export { EventLoopUiExecutor, type UiAction, type UiExecutor } from "./ui-executor.js";

// Process management
export {
  isExecutableOnPath,
  LSPProcessHandle,
  type ResolveCommandOptions,
  resolveServerCommand,
  type ServerCommand,
  spawnLanguageServer,
} from "./process.js";

export {
  connectionKey,
  type CrashCallback,
  type DiagnosticsNotification,
  type EditorDocument,
  type LSPTransport,
  type ProjectRef,
  type RenderDirective,
  type SessionState,
  type TransportOpener,
  type UnderlineStyle,
} from "./types.js";

// Package metadata
export const PACKAGE_NAME = "@packsmith/lsp";
export const PACKAGE_VERSION = "0.0.0";
