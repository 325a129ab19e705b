import { once } from "node:events";
import { chmod, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, delimiter, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LanguageServerConfigSchema } from "../../config.js";
import {
  isExecutableOnPath,
  type LSPProcessHandle,
  resolveServerCommand,
  spawnLanguageServer,
} from "../../process.js";
import { createMockLogger } from "../helpers/fixtures.js";

describe.skipIf(process.platform === "win32")("resolveServerCommand", () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await mkdtemp(join(tmpdir(), "lsp-bin-"));
    await writeFile(join(binDir, "json-server"), "#!/bin/sh\n");
    await chmod(join(binDir, "json-server"), 0o755);
    await writeFile(join(binDir, "not-executable"), "#!/bin/sh\n");
    await chmod(join(binDir, "not-executable"), 0o644);
  });

  afterEach(async () => {
    await rm(binDir, { recursive: true, force: true });
  });

  function serverWith(commands: string[][]) {
    return LanguageServerConfigSchema.parse({ extensions: ["json"], commands });
  }

  it("picks the first command found on PATH", () => {
    const resolved = resolveServerCommand(
      serverWith([["missing-server"], ["not-executable"], ["json-server", "--stdio"]]),
      { pathEnv: ["/nonexistent-dir", binDir].join(delimiter) },
    );

    expect(resolved).toEqual({ command: join(binDir, "json-server"), args: ["--stdio"] });
  });

  it("accepts an explicit path", () => {
    const resolved = resolveServerCommand(serverWith([[join(binDir, "json-server")]]), {
      pathEnv: "",
    });
    expect(resolved).toEqual({ command: join(binDir, "json-server"), args: [] });
  });

  it("resolves relative paths against cwd", () => {
    const resolved = resolveServerCommand(serverWith([["./json-server", "--stdio"]]), {
      cwd: binDir,
      pathEnv: "",
    });
    expect(resolved?.command).toBe(join(binDir, "json-server"));
  });

  it("returns undefined when nothing is installed", () => {
    expect(
      resolveServerCommand(serverWith([["missing-server"]]), { pathEnv: binDir }),
    ).toBeUndefined();
  });

  it("ignores directories", () => {
    expect(isExecutableOnPath(basename(binDir), tmpdir())).toBe(false);
    expect(isExecutableOnPath("json-server", binDir)).toBe(true);
  });
});

describe.skipIf(process.platform === "win32")("LSPProcessHandle", () => {
  function spawnScript(script: string) {
    const logger = createMockLogger();
    const crashes: Array<[number | null, string | null]> = [];
    const handle = spawnLanguageServer(
      "json",
      { command: process.execPath, args: ["-e", script] },
      { cwd: tmpdir(), logger },
    );
    handle.onCrash((code, signal) => crashes.push([code, signal]));
    return { handle, logger, crashes };
  }

  async function waitForLine(handle: LSPProcessHandle): Promise<void> {
    await once(handle.readable, "data");
  }

  it("reports a non-zero exit as a crash", async () => {
    const { crashes } = spawnScript("process.exit(3)");

    await vi.waitFor(() => {
      expect(crashes).toEqual([[3, null]]);
    });
  });

  it("logs stderr output at debug", async () => {
    const { logger } = spawnScript("process.stderr.write('schema cache cold\\n')");

    await vi.waitFor(() => {
      expect(logger.debug).toHaveBeenCalledWith("stderr: schema cache cold");
    });
  });

  it("terminates a running server with SIGTERM on close", async () => {
    const { handle, crashes } = spawnScript(
      "process.stdout.write('up\\n'); setInterval(() => {}, 1000)",
    );
    await waitForLine(handle);

    await handle.close(5_000);

    expect(crashes).toEqual([[null, "SIGTERM"]]);
  });

  it("escalates to SIGKILL when the server ignores SIGTERM", async () => {
    const { handle, crashes } = spawnScript(
      "process.on('SIGTERM', () => {}); process.stdout.write('up\\n'); setInterval(() => {}, 1000)",
    );
    await waitForLine(handle);

    await handle.close(100);

    await vi.waitFor(() => {
      expect(crashes).toEqual([[null, "SIGKILL"]]);
    });
  });

  it("treats a failed spawn as a crash and logs it", async () => {
    const missing = join(tmpdir(), "packsmith-missing-server");
    const logger = createMockLogger();
    const crashes: Array<[number | null, string | null]> = [];
    const handle = spawnLanguageServer(
      "json",
      { command: missing, args: [] },
      { cwd: tmpdir(), logger },
    );
    handle.onCrash((code, signal) => crashes.push([code, signal]));

    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledWith(`Server process error: spawn ${missing} ENOENT`);
    });
    expect(crashes.length).toBeGreaterThan(0);
  });
});
