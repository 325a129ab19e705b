import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  ConnectionReleaseError,
  getErrorMessage,
  InternalError,
  isPacksmithError,
  LspError,
  LspInitializationError,
  LspInitializationTimeoutError,
  LspServerCrashedError,
  LspServerNotFoundError,
  OperationTimeoutError,
  PacksmithError,
  TaskQueueClosedError,
  TaskQueueError,
  TaskQueueFullError,
  toError,
} from "../../index.js";

describe("PacksmithError base class", () => {
  it("should create error with catalog-backed properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(PacksmithError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
  });

  it("should preserve stack traces", () => {
    const error = new InternalError("Stack test");
    expect(error.stack).toContain("InternalError");
  });

  it("should serialize to JSON with metadata and cause", () => {
    const error = new LspInitializationError("json", new Error("spawn ENOENT"));

    expect(error.toJSON()).toEqual({
      name: "LspInitializationError",
      code: "LSP_INITIALIZATION_FAILED",
      domain: "lsp",
      message: "Language server 'json' failed to initialize: spawn ENOENT",
      isExpected: false,
      metadata: { languageId: "json" },
      cause: "spawn ENOENT",
    });
  });

  it("isPacksmithError narrows only library errors", () => {
    expect(isPacksmithError(new TaskQueueClosedError("q"))).toBe(true);
    expect(isPacksmithError(new Error("plain"))).toBe(false);
    expect(isPacksmithError("nope")).toBe(false);
  });
});

describe("LSP errors", () => {
  it("share the LspError base", () => {
    const errors: LspError[] = [
      new LspServerNotFoundError("python"),
      new LspInitializationTimeoutError("python", 100),
      new LspServerCrashedError("python", 1, null),
      new ConnectionReleaseError("python", "proj"),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(LspError);
      expect(error.languageId).toBe("python");
      expect(error.domain).toBe("lsp");
    }
  });

  it("lists tried commands when no executable was found", () => {
    const error = new LspServerNotFoundError("python", ["pyright-langserver --stdio", "pylsp"]);
    expect(error.message).toBe(
      "No language server executable found for 'python' " +
        "(tried: pyright-langserver --stdio | pylsp)",
    );
  });

  it("describes crashes with exit code and signal", () => {
    const error = new LspServerCrashedError("json", null, "SIGKILL");
    expect(error.message).toBe(
      "Language server 'json' exited unexpectedly (code=none, signal=SIGKILL)",
    );
  });

  it("names the key of an unbalanced release", () => {
    const error = new ConnectionReleaseError("json", "pack-1");
    expect(error.code).toBe("LSP_RELEASE_UNBALANCED");
    expect(error.message).toBe("release('pack-1', 'json') has no matching acquire");
    expect(error.metadata).toEqual({ languageId: "json", projectId: "pack-1" });
  });
});

describe("queue and config errors", () => {
  it("TaskQueueFullError carries capacity", () => {
    const error = new TaskQueueFullError("bg", 4);
    expect(error).toBeInstanceOf(TaskQueueError);
    expect(error.capacity).toBe(4);
    expect(error.message).toBe("Task queue 'bg' is full (capacity 4)");
    expect(error.isExpected).toBe(true);
  });

  it("ConfigurationError joins issues", () => {
    const error = new ConfigurationError("lsp", [
      "servers.json.commands: Required",
      "initTimeoutMs: bad",
    ]);
    expect(error.message).toBe(
      "Invalid lsp configuration: servers.json.commands: Required; initTimeoutMs: bad",
    );
    expect(error.issues).toHaveLength(2);
  });

  it("OperationTimeoutError names the operation", () => {
    const error = new OperationTimeoutError("shutdown", 50);
    expect(error.message).toBe("shutdown timed out after 50ms");
    expect(error.code).toBe("INTERNAL_TIMEOUT");
  });
});

describe("error helpers", () => {
  it("getErrorMessage handles errors, strings and unknown values", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("text")).toBe("text");
    expect(getErrorMessage(42)).toBe("An unknown error occurred");
  });

  it("toError keeps Error instances and wraps the rest", () => {
    const original = new Error("keep");
    expect(toError(original)).toBe(original);
    expect(toError("wrapped").message).toBe("wrapped");
  });
});
