import type { Readable, Writable } from "node:stream";
import type { PublishDiagnosticsParams } from "vscode-languageserver-protocol";

/**
 * Identity of an open project. `id` keys shared connections;
 * `rootDir` is where the server runs and what it is told to analyze.
 */
export interface ProjectRef {
  readonly id: string;
  readonly name: string;
  readonly rootDir: string;
}

/** Inbound `textDocument/publishDiagnostics` payload, passed through untouched. */
export type DiagnosticsNotification = PublishDiagnosticsParams;

export type UnderlineStyle = "wave" | "straight";

/**
 * One diagnostic as the editor widget draws it: a character range in the
 * plain text, an underline color and style.
 */
export interface RenderDirective {
  readonly startOffset: number;
  readonly endOffset: number;
  readonly color: string;
  readonly underlineStyle: UnderlineStyle;
}

/**
 * The editor widget behind one open document. Implemented by the GUI layer.
 */
export interface EditorDocument {
  /** Current plain-text content. */
  getText(): string;
  /** Registers a text-changed listener; returns a disposer. */
  onDidChangeText(listener: () => void): () => void;
  /** Replaces the previous diagnostic rendering. An empty batch clears it. */
  render(directives: readonly RenderDirective[]): void;
}

export type SessionState = "initializing" | "ready" | "failed" | "closed";

export type CrashCallback = (code: number | null, signal: string | null) => void;

/**
 * Byte streams to one language server, plus its lifecycle hooks.
 * A spawned process in production, a pair of PassThrough streams in tests.
 */
export interface LSPTransport {
  readonly readable: Readable;
  readonly writable: Writable;
  onCrash?(callback: CrashCallback): void;
  /** Terminate the server side; resolves once it is gone or the timeout passed. */
  close?(timeoutMs: number): Promise<void>;
}

export type TransportOpener = (
  languageId: string,
  project: ProjectRef,
) => LSPTransport | Promise<LSPTransport>;

/**
 * Composite key for a shared connection. Language ids are never mixed,
 * even within one project.
 */
export function connectionKey(project: ProjectRef, languageId: string): string {
  return `${languageId}:${project.id}`;
}
