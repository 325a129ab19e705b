import { pathToFileURL } from "node:url";
import { createConsoleLogger, type Logger } from "@packsmith/core";
import { getErrorMessage } from "@packsmith/errors";
import type { Diagnostic } from "vscode-languageserver-protocol";
import type { DiagnosticsBus } from "./diagnostics-bus.js";
import type { LanguageServerConnection } from "./connection.js";
import type { ConnectionManager } from "./connection-manager.js";
import { buildRenderDirectives } from "./offsets.js";
import type { EditorDocument, ProjectRef, SessionState } from "./types.js";
import type { UiExecutor } from "./ui-executor.js";

export interface DocumentSessionOptions {
  readonly manager: ConnectionManager;
  /** A connection already acquired from `manager`; the session owns that reference. */
  readonly connection: LanguageServerConnection;
  readonly uri: string;
  readonly document: EditorDocument;
  readonly ui: UiExecutor;
  readonly logger?: Logger;
}

/**
 * Keeps one open editor document in sync with its shared language server
 * and draws the diagnostics published for it.
 *
 * Lifecycle: `initializing` until the connection is ready, then `ready`
 * (or `failed` if it never becomes ready or its server dies), and `closed` after
 * {@link close}. Every open/change sent carries a fresh version, and sends
 * leave in the order their versions were assigned.
 */
export class DocumentSession {
  readonly uri: string;
  readonly languageId: string;

  private readonly manager: ConnectionManager;
  private readonly connection: LanguageServerConnection;
  private readonly document: EditorDocument;
  private readonly ui: UiExecutor;
  private readonly bus: DiagnosticsBus;
  private readonly logger: Logger;
  private readonly subscriptionId: number;
  private readonly disposeTextListener: () => void;
  private readonly disposeFailureListener: () => void;

  private currentState: SessionState = "initializing";
  private version = 0;
  private sendChain: Promise<void> = Promise.resolve();
  private closing: Promise<void> | undefined;

  constructor(options: DocumentSessionOptions) {
    this.manager = options.manager;
    this.connection = options.connection;
    this.uri = options.uri;
    this.languageId = options.connection.languageId;
    this.document = options.document;
    this.ui = options.ui;
    this.bus = options.manager.bus;
    this.logger = options.logger ?? createConsoleLogger(`session:${this.languageId}`);

    this.subscriptionId = this.bus.subscribe((notification) => {
      if (notification.uri === this.uri) {
        this.applyDiagnostics(notification.diagnostics);
      }
    });
    this.disposeTextListener = this.document.onDidChangeText(() => this.handleTextChanged());
    this.disposeFailureListener = this.connection.onFailure((error) => this.handleFailure(error));

    // Last: runs synchronously when the connection is already ready
    this.connection.ready.whenReady(
      () => this.handleReady(),
      (error) => this.handleFailure(error),
    );
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Version the next open/change notification will carry. */
  get nextVersionNumber(): number {
    return this.version;
  }

  /**
   * Map diagnostics onto the current text and hand one render batch to the
   * UI executor. Ignored once closed.
   */
  applyDiagnostics(diagnostics: readonly Diagnostic[]): void {
    if (this.currentState === "closed") return;
    this.ui.post(() => {
      if (this.currentState === "closed") return;
      const directives = buildRenderDirectives(
        this.document.getText(),
        diagnostics,
        this.manager.config.diagnosticColors,
      );
      this.document.render(directives);
    });
  }

  /**
   * Send `didClose` if the document had been opened on the server, clear
   * the rendering, detach from editor and bus, and release the connection.
   * Later calls return the same promise.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const wasReady = this.currentState === "ready";
    this.currentState = "closed";

    if (wasReady) {
      this.enqueueSend("didClose", () =>
        this.connection.didClose({ textDocument: { uri: this.uri } }),
      );
    }
    this.ui.post(() => this.document.render([]));
    this.disposeTextListener();
    this.disposeFailureListener();
    this.bus.unsubscribe(this.subscriptionId);

    await this.sendChain;
    await this.manager.release(this.connection.project, this.languageId, this.connection);
  }

  private handleReady(): void {
    if (this.currentState !== "initializing") return;
    this.currentState = "ready";

    const text = this.document.getText();
    const version = this.nextVersion();
    this.enqueueSend("didOpen", () =>
      this.connection.didOpen({
        textDocument: { uri: this.uri, languageId: this.languageId, version, text },
      }),
    );
  }

  private handleFailure(error: Error): void {
    if (this.currentState !== "initializing" && this.currentState !== "ready") return;
    this.currentState = "failed";
    this.logger.warn(`Language features unavailable for ${this.uri}: ${error.message}`);
  }

  private handleTextChanged(): void {
    if (this.currentState !== "ready") return;

    const text = this.document.getText();
    const version = this.nextVersion();
    this.enqueueSend("didChange", () =>
      this.connection.didChange({
        textDocument: { uri: this.uri, version },
        contentChanges: [{ text }],
      }),
    );
  }

  private nextVersion(): number {
    return this.version++;
  }

  private enqueueSend(label: string, send: () => Promise<void>): void {
    this.sendChain = this.sendChain.then(send).catch((err: unknown) => {
      this.logger.warn(`${label} failed for ${this.uri}: ${getErrorMessage(err)}`);
    });
  }
}

export interface OpenDocumentOptions {
  readonly project: ProjectRef;
  readonly filePath: string;
  readonly document: EditorDocument;
  readonly ui: UiExecutor;
  readonly logger?: Logger;
}

/**
 * Start a session for a file the editor just opened. Returns `undefined`
 * when no installed language server handles the file.
 */
export function openDocumentSession(
  manager: ConnectionManager,
  options: OpenDocumentOptions,
): DocumentSession | undefined {
  const connection = manager.acquireForFile(options.project, options.filePath);
  if (connection === undefined) return undefined;

  return new DocumentSession({
    manager,
    connection,
    uri: pathToFileURL(options.filePath).href,
    document: options.document,
    ui: options.ui,
    logger: options.logger,
  });
}
