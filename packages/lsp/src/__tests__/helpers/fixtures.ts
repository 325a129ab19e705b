import type { Logger } from "@packsmith/core";
import { vi } from "vitest";
import type { Diagnostic } from "vscode-languageserver-protocol";
import { type LSPConfig, type LSPConfigInput, parseLSPConfig } from "../../config.js";
import type { EditorDocument, ProjectRef, RenderDirective } from "../../types.js";
import type { UiAction, UiExecutor } from "../../ui-executor.js";

export const TEST_PROJECT: ProjectRef = {
  id: "proj-1",
  name: "Test Pack",
  rootDir: "/workspace/test-pack",
};

export const OTHER_PROJECT: ProjectRef = {
  id: "proj-2",
  name: "Other Pack",
  rootDir: "/workspace/other-pack",
};

/** Minimal LSP config for testing: JSON and JavaScript servers */
export function createTestLSPConfig(overrides: Partial<LSPConfigInput> = {}): LSPConfig {
  return parseLSPConfig({
    servers: {
      json: {
        extensions: ["json", "mcmeta"],
        commands: [["vscode-json-languageserver", "--stdio"]],
      },
      javascript: {
        extensions: ["js"],
        commands: [["typescript-language-server", "--stdio"]],
      },
    },
    ...overrides,
  });
}

export function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/** UI executor that holds actions until the test flushes them. */
export class ManualUiExecutor implements UiExecutor {
  readonly pending: UiAction[] = [];

  post(action: UiAction): void {
    this.pending.push(action);
  }

  flush(): void {
    while (this.pending.length > 0) {
      const action = this.pending.shift();
      action?.();
    }
  }
}

/** Runs every action immediately. */
export const inlineUi: UiExecutor = {
  post(action) {
    action();
  },
};

/** In-memory editor document with a controllable text and a render log. */
export class FakeEditorDocument implements EditorDocument {
  readonly renders: (readonly RenderDirective[])[] = [];
  private readonly listeners = new Set<() => void>();

  constructor(private text: string) {}

  getText(): string {
    return this.text;
  }

  onDidChangeText(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  render(directives: readonly RenderDirective[]): void {
    this.renders.push(directives);
  }

  /** Replace the text and fire the change listeners, as a keystroke would. */
  edit(text: string): void {
    this.text = text;
    for (const listener of [...this.listeners]) listener();
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

export function diagnostic(
  severity: Diagnostic["severity"],
  start: [number, number],
  end: [number, number],
  message = "problem",
): Diagnostic {
  return {
    severity,
    message,
    range: {
      start: { line: start[0], character: start[1] },
      end: { line: end[0], character: end[1] },
    },
  };
}
