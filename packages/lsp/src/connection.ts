import { pathToFileURL } from "node:url";
import { createConsoleLogger, type Logger, withTimeout } from "@packsmith/core";
import {
  getErrorMessage,
  isPacksmithError,
  LspConnectionClosedError,
  LspInitializationError,
  LspInitializationTimeoutError,
  LspServerCrashedError,
  toError,
} from "@packsmith/errors";
import {
  createMessageConnection,
  type MessageConnection,
  StreamMessageReader,
  StreamMessageWriter,
} from "vscode-jsonrpc/node.js";
import type {
  DidChangeTextDocumentParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  InitializeParams,
  InitializeResult,
  LogMessageParams,
  MessageActionItem,
  PublishDiagnosticsParams,
  ServerCapabilities,
  ShowMessageParams,
  ShowMessageRequestParams,
} from "vscode-languageserver-protocol";
import type { DiagnosticsBus } from "./diagnostics-bus.js";
import { ReadySignal } from "./signal.js";
import {
  connectionKey,
  type LSPTransport,
  type ProjectRef,
  type TransportOpener,
} from "./types.js";

/** Called once when the handshake fails or the server goes away unasked. */
export type FailureListener = (error: Error) => void;

/**
 * What a document session needs from a shared connection. Implemented by
 * {@link LSPConnection}; tests substitute their own.
 */
export interface LanguageServerConnection {
  readonly key: string;
  readonly project: ProjectRef;
  readonly languageId: string;
  readonly ready: ReadySignal<ServerCapabilities>;
  start(): void;
  stop(): Promise<void>;
  /**
   * Registers a listener for the connection becoming unusable; returns a
   * disposer. Runs immediately when that already happened. Never fires
   * because of {@link stop}.
   */
  onFailure(listener: FailureListener): () => void;
  didOpen(params: DidOpenTextDocumentParams): Promise<void>;
  didChange(params: DidChangeTextDocumentParams): Promise<void>;
  didClose(params: DidCloseTextDocumentParams): Promise<void>;
}

export interface LSPConnectionOptions {
  readonly project: ProjectRef;
  readonly languageId: string;
  readonly bus: DiagnosticsBus;
  readonly openTransport: TransportOpener;
  readonly initializationOptions?: Record<string, unknown>;
  readonly initTimeoutMs: number;
  readonly shutdownTimeoutMs: number;
  readonly logger?: Logger;
}

// window/showMessage and window/logMessage severities
const MESSAGE_TYPE_ERROR = 1;
const MESSAGE_TYPE_WARNING = 2;
const MESSAGE_TYPE_INFO = 3;

type ClientInitializeParams = Omit<InitializeParams, "initializationOptions"> & {
  initializationOptions?: Record<string, unknown>;
};

/**
 * One JSON-RPC link to a language server for a (project, language) pair.
 *
 * The handshake runs in the background after {@link start}; its outcome
 * settles {@link ready} exactly once. Document-sync calls are plain
 * delegations and assume the caller waited for readiness.
 */
export class LSPConnection implements LanguageServerConnection {
  readonly key: string;
  readonly project: ProjectRef;
  readonly languageId: string;
  readonly ready: ReadySignal<ServerCapabilities>;

  private readonly logger: Logger;
  private connection: MessageConnection | undefined;
  private transport: LSPTransport | undefined;
  private started = false;
  private stopped = false;
  private stopping: Promise<void> | undefined;
  private failure: Error | undefined;
  private readonly failureListeners = new Set<FailureListener>();

  constructor(private readonly options: LSPConnectionOptions) {
    this.project = options.project;
    this.languageId = options.languageId;
    this.key = connectionKey(options.project, options.languageId);
    this.logger = options.logger ?? createConsoleLogger(`lsp:${this.key}`);
    this.ready = new ReadySignal<ServerCapabilities>(this.logger);
  }

  /** Begin the handshake. Later calls are ignored. */
  start(): void {
    if (this.started) return;
    this.started = true;

    void this.handshake().then(
      (capabilities) => {
        if (this.ready.resolve(capabilities)) {
          this.logger.info(`Language server ready for project '${this.project.name}'`);
        }
      },
      (err: unknown) => {
        const error = isPacksmithError(err)
          ? err
          : new LspInitializationError(this.languageId, toError(err));
        if (this.ready.fail(error)) {
          this.logger.warn(error.message);
        }
        this.markFailed(error);
      },
    );
  }

  onFailure(listener: FailureListener): () => void {
    if (this.failure !== undefined) {
      listener(this.failure);
      return () => {};
    }
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  async didOpen(params: DidOpenTextDocumentParams): Promise<void> {
    await this.requireConnection().sendNotification("textDocument/didOpen", params);
  }

  async didChange(params: DidChangeTextDocumentParams): Promise<void> {
    await this.requireConnection().sendNotification("textDocument/didChange", params);
  }

  async didClose(params: DidCloseTextDocumentParams): Promise<void> {
    await this.requireConnection().sendNotification("textDocument/didClose", params);
  }

  /**
   * Shut the server down: `shutdown` then `exit` when the handshake had
   * completed and the server is still alive, then dispose the connection and close the transport.
   * Safe to call repeatedly; a pending readiness is failed.
   */
  stop(): Promise<void> {
    this.stopping ??= this.teardown();
    return this.stopping;
  }

  private async handshake(): Promise<ServerCapabilities> {
    const transport = await this.options.openTransport(this.languageId, this.project);
    this.transport = transport;
    if (this.stopped) {
      await transport.close?.(this.options.shutdownTimeoutMs);
      throw new LspConnectionClosedError(this.languageId);
    }

    transport.onCrash?.((code, signal) => this.handleCrash(code, signal));

    const connection = createMessageConnection(
      new StreamMessageReader(transport.readable),
      new StreamMessageWriter(transport.writable),
    );
    this.connection = connection;
    this.registerHandlers(connection);
    connection.listen();

    const result = await withTimeout(
      connection.sendRequest<InitializeResult>("initialize", this.initializeParams()),
      this.options.initTimeoutMs,
      () => new LspInitializationTimeoutError(this.languageId, this.options.initTimeoutMs),
    );

    await connection.sendNotification("initialized", {});
    return result.capabilities;
  }

  private initializeParams(): ClientInitializeParams {
    const rootUri = pathToFileURL(this.project.rootDir).href;
    const params: ClientInitializeParams = {
      processId: process.pid,
      clientInfo: { name: "packsmith" },
      rootUri,
      rootPath: this.project.rootDir,
      workspaceFolders: [{ uri: rootUri, name: this.project.name }],
      capabilities: {
        textDocument: {
          synchronization: { didSave: false, willSave: false },
          completion: { completionItem: { snippetSupport: false } },
          hover: { contentFormat: ["markdown", "plaintext"] },
          publishDiagnostics: { relatedInformation: true },
        },
        workspace: { workspaceFolders: true },
      },
    };
    if (this.options.initializationOptions) {
      params.initializationOptions = this.options.initializationOptions;
    }
    return params;
  }

  private registerHandlers(connection: MessageConnection): void {
    connection.onNotification(
      "textDocument/publishDiagnostics",
      (params: PublishDiagnosticsParams) => {
        this.options.bus.publish(params);
      },
    );

    connection.onNotification("window/showMessage", (params: ShowMessageParams) => {
      const text = `Server: ${params.message}`;
      switch (params.type) {
        case MESSAGE_TYPE_ERROR:
          this.logger.error(text);
          break;
        case MESSAGE_TYPE_WARNING:
          this.logger.warn(text);
          break;
        case MESSAGE_TYPE_INFO:
          this.logger.info(text);
          break;
        default:
          this.logger.debug(text);
      }
    });

    connection.onNotification("window/logMessage", (params: LogMessageParams) => {
      this.logger.debug(`Server log: ${params.message}`);
    });

    connection.onNotification("telemetry/event", (params: unknown) => {
      this.logger.debug("Server telemetry", params);
    });

    connection.onRequest(
      "window/showMessageRequest",
      (params: ShowMessageRequestParams): MessageActionItem | null => {
        this.logger.info(`Server request: ${params.message}`);
        return params.actions?.[0] ?? null;
      },
    );

    connection.onClose(() => {
      if (this.stopped) return;
      const error = new LspConnectionClosedError(this.languageId);
      if (this.ready.fail(error)) {
        this.logger.warn("Connection closed before the handshake completed");
      }
      this.markFailed(error);
    });
  }

  private handleCrash(code: number | null, signal: string | null): void {
    if (this.stopped) return;
    const error = new LspServerCrashedError(this.languageId, code, signal);
    this.logger.error(error.message);
    this.ready.fail(error);
    this.markFailed(error);
  }

  private markFailed(error: Error): void {
    if (this.stopped || this.failure !== undefined) return;
    this.failure = error;

    const listeners = [...this.failureListeners];
    this.failureListeners.clear();
    for (const listener of listeners) {
      try {
        listener(error);
      } catch (err) {
        this.logger.warn(`Failure listener threw: ${getErrorMessage(err)}`);
      }
    }
  }

  private requireConnection(): MessageConnection {
    if (this.stopped || this.connection === undefined) {
      throw new LspConnectionClosedError(this.languageId);
    }
    return this.connection;
  }

  private async teardown(): Promise<void> {
    // A dead server cannot answer `shutdown`
    const graceful = this.ready.status === "resolved" && this.failure === undefined;
    this.stopped = true;
    this.failureListeners.clear();
    this.ready.fail(new LspConnectionClosedError(this.languageId));

    const connection = this.connection;
    this.connection = undefined;
    if (connection) {
      if (graceful) {
        try {
          await withTimeout(
            connection.sendRequest("shutdown"),
            this.options.shutdownTimeoutMs,
          );
          await connection.sendNotification("exit");
        } catch (err) {
          this.logger.warn(`Graceful shutdown failed: ${getErrorMessage(err)}`);
        }
      }
      connection.dispose();
    }

    await this.transport?.close?.(this.options.shutdownTimeoutMs);
    this.logger.debug("Connection stopped");
  }
}
