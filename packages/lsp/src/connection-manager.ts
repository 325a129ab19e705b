import { createConsoleLogger, type Logger } from "@packsmith/core";
import {
  ConnectionReleaseError,
  getErrorMessage,
  LspServerNotFoundError,
} from "@packsmith/errors";
import { type LanguageServerConfig, type LSPConfig, resolveLanguage } from "./config.js";
import { type LanguageServerConnection, LSPConnection } from "./connection.js";
import { DiagnosticsBus } from "./diagnostics-bus.js";
import { resolveServerCommand, type ServerCommand, spawnLanguageServer } from "./process.js";
import { connectionKey, type ProjectRef, type TransportOpener } from "./types.js";

export type ConnectionFactory = (
  project: ProjectRef,
  languageId: string,
) => LanguageServerConnection;

export type CommandResolver = (serverConfig: LanguageServerConfig) => ServerCommand | undefined;

export interface ConnectionManagerOptions {
  readonly config: LSPConfig;
  readonly bus?: DiagnosticsBus;
  readonly logger?: Logger;
  /** Builds connections; defaults to {@link LSPConnection} over {@link openTransport}. */
  readonly createConnection?: ConnectionFactory;
  /** Opens the byte streams for a new connection; defaults to spawning the server. */
  readonly openTransport?: TransportOpener;
  readonly resolveCommand?: CommandResolver;
}

interface ConnectionEntry {
  readonly key: string;
  readonly connection: LanguageServerConnection;
  refs: number;
}

/**
 * Reference-counted registry of shared language-server connections,
 * keyed by (project, language).
 *
 * `acquire` and the map bookkeeping in `release` are synchronous, so
 * callers on the event loop never interleave inside them.
 *
 * A connection that fails (handshake error, crash, unexpected close) is
 * stopped and detached from its key at once, so the next `acquire` starts
 * a fresh server. Holders of the old connection still release it by
 * passing it to {@link release}.
 */
export class ConnectionManager {
  readonly bus: DiagnosticsBus;
  readonly config: LSPConfig;

  private readonly entries = new Map<string, ConnectionEntry>();
  /** Failed connections that still have holders, by connection */
  private readonly detached = new Map<LanguageServerConnection, ConnectionEntry>();
  private readonly logger: Logger;
  private readonly createConnection: ConnectionFactory;
  private readonly resolveCommand: CommandResolver;

  constructor(options: ConnectionManagerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createConsoleLogger("lsp");
    this.bus = options.bus ?? new DiagnosticsBus({ logger: this.logger });
    this.resolveCommand =
      options.resolveCommand ?? ((serverConfig) => resolveServerCommand(serverConfig));

    const openTransport =
      options.openTransport ??
      createProcessTransportOpener(this.config, this.resolveCommand, this.logger);
    this.createConnection =
      options.createConnection ??
      ((project, languageId) =>
        new LSPConnection({
          project,
          languageId,
          bus: this.bus,
          openTransport,
          initializationOptions: this.config.servers[languageId]?.initializationOptions,
          initTimeoutMs: this.config.initTimeoutMs,
          shutdownTimeoutMs: this.config.shutdownTimeoutMs,
          logger: this.logger,
        }));
  }

  /**
   * Take a reference on the connection for (project, language), creating
   * and starting it on first use. The handshake continues in the
   * background; wait on `connection.ready`.
   */
  acquire(project: ProjectRef, languageId: string): LanguageServerConnection {
    const key = connectionKey(project, languageId);
    const existing = this.entries.get(key);
    if (existing) {
      existing.refs++;
      return existing.connection;
    }

    const connection = this.createConnection(project, languageId);
    const entry: ConnectionEntry = { key, connection, refs: 1 };
    this.entries.set(key, entry);
    this.logger.debug(`Created connection ${key}`);
    connection.onFailure((error) => this.detach(entry, error));
    connection.start();
    return connection;
  }

  /**
   * Like {@link acquire}, but picks the language from the file extension.
   * Returns `undefined` when no configured server handles the file or none
   * of its commands is installed.
   */
  acquireForFile(project: ProjectRef, filePath: string): LanguageServerConnection | undefined {
    const languageId = resolveLanguage(filePath, this.config);
    if (languageId === undefined) {
      this.logger.info(`No language server handles ${filePath}`);
      return undefined;
    }

    if (!this.entries.has(connectionKey(project, languageId))) {
      const serverConfig = this.config.servers[languageId];
      if (serverConfig === undefined || this.resolveCommand(serverConfig) === undefined) {
        this.logger.info(
          `Language server for '${languageId}' is not installed; skipping ${filePath}`,
        );
        return undefined;
      }
    }

    return this.acquire(project, languageId);
  }

  /**
   * Drop a reference. The last release removes the entry and stops the
   * connection. Pass the connection that `acquire` returned to release it
   * even after it failed and was replaced under the same key.
   *
   * @throws ConnectionReleaseError when there is no matching acquire
   */
  async release(
    project: ProjectRef,
    languageId: string,
    connection?: LanguageServerConnection,
  ): Promise<void> {
    const key = connectionKey(project, languageId);
    const current = this.entries.get(key);
    const entry =
      connection === undefined || current?.connection === connection
        ? current
        : this.detached.get(connection);
    if (!entry) {
      const error = new ConnectionReleaseError(languageId, project.id);
      this.logger.error(error.message);
      throw error;
    }

    entry.refs--;
    if (entry.refs > 0) return;

    if (entry === current) {
      this.entries.delete(key);
      this.logger.debug(`Stopping connection ${key}`);
      await entry.connection.stop();
    } else {
      // Already stopped when it was detached
      this.detached.delete(entry.connection);
    }
  }

  refCount(project: ProjectRef, languageId: string): number {
    return this.entries.get(connectionKey(project, languageId))?.refs ?? 0;
  }

  has(project: ProjectRef, languageId: string): boolean {
    return this.entries.has(connectionKey(project, languageId));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Stop every connection regardless of reference counts (application exit). */
  async shutdownAll(): Promise<void> {
    const entries = [...this.entries.entries()];
    this.entries.clear();
    this.detached.clear();

    const results = await Promise.allSettled(entries.map(([, entry]) => entry.connection.stop()));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const key = entries[index]?.[0] ?? "unknown";
        this.logger.warn(`Failed to stop ${key}: ${getErrorMessage(result.reason)}`);
      }
    });
  }

  private detach(entry: ConnectionEntry, error: Error): void {
    if (this.entries.get(entry.key) !== entry) return;
    this.entries.delete(entry.key);
    this.detached.set(entry.connection, entry);
    this.logger.warn(`Dropping connection ${entry.key}: ${error.message}`);
    void this.stopDetached(entry);
  }

  private async stopDetached(entry: ConnectionEntry): Promise<void> {
    try {
      await entry.connection.stop();
    } catch (err) {
      this.logger.warn(`Failed to stop ${entry.key}: ${getErrorMessage(err)}`);
    }
  }
}

/**
 * Default transport: spawn the first installed command for the language,
 * in the project's root directory.
 */
export function createProcessTransportOpener(
  config: LSPConfig,
  resolveCommand: CommandResolver,
  logger: Logger,
): TransportOpener {
  return (languageId, project) => {
    const serverConfig = config.servers[languageId];
    if (serverConfig === undefined) {
      throw new LspServerNotFoundError(languageId);
    }
    const command = resolveCommand(serverConfig);
    if (command === undefined) {
      throw new LspServerNotFoundError(
        languageId,
        serverConfig.commands.map((candidate) => candidate.join(" ")),
      );
    }
    logger.info(`Starting ${languageId} server for '${project.name}': ${command.command}`);
    return spawnLanguageServer(languageId, command, {
      cwd: project.rootDir,
      env: serverConfig.env,
      logger,
    });
  };
}
