import { type ChildProcessByStdio, spawn } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { delimiter, extname, isAbsolute, join, resolve } from "node:path";
import type { Readable, Writable } from "node:stream";
import { createConsoleLogger, type Logger } from "@packsmith/core";
import type { LanguageServerConfig } from "./config.js";
import type { CrashCallback, LSPTransport } from "./types.js";

type ServerProcess = ChildProcessByStdio<Writable, Readable, Readable>;

/**
 * Wraps a spawned LSP child process with lifecycle management.
 */
export class LSPProcessHandle implements LSPTransport {
  private readonly crashCallbacks: CrashCallback[] = [];
  private exited = false;

  constructor(
    private readonly proc: ServerProcess,
    readonly languageId: string,
    logger: Logger = createConsoleLogger(`lsp:${languageId}`),
  ) {
    proc.on("exit", (code, signal) => {
      this.exited = true;
      // Non-zero exit or signal = crash
      if ((code !== 0 && code !== null) || signal !== null) {
        for (const cb of this.crashCallbacks) cb(code, signal);
      }
    });

    proc.on("error", (err) => {
      logger.warn(`Server process error: ${err.message}`);
      if (!this.exited) {
        this.exited = true;
        for (const cb of this.crashCallbacks) cb(null, null);
      }
    });

    // Drained so a chatty server never blocks on a full stderr pipe
    proc.stderr.setEncoding("utf-8");
    proc.stderr.on("data", (chunk: string) => {
      const text = chunk.trimEnd();
      if (text !== "") logger.debug(`stderr: ${text}`);
    });
  }

  get readable(): Readable {
    return this.proc.stdout;
  }

  get writable(): Writable {
    return this.proc.stdin;
  }

  onCrash(callback: CrashCallback): void {
    this.crashCallbacks.push(callback);
  }

  /**
   * Send SIGTERM, then force-kill after timeout.
   */
  async close(timeoutMs = 5000): Promise<void> {
    if (this.exited) return;

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        if (!this.exited) {
          this.proc.kill("SIGKILL");
        }
        resolve();
      }, timeoutMs);

      this.proc.once("exit", () => {
        clearTimeout(timer);
        resolve();
      });

      this.proc.kill("SIGTERM");
    });
  }
}

export interface ServerCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export interface ResolveCommandOptions {
  /** Defaults to `process.env.PATH` */
  readonly pathEnv?: string;
  /** Base for relative executables; defaults to `process.cwd()` */
  readonly cwd?: string;
}

/**
 * Picks the first configured command line whose executable exists.
 * Bare names are looked up on PATH; anything with a path separator is
 * taken relative to `cwd`.
 */
export function resolveServerCommand(
  serverConfig: LanguageServerConfig,
  options: ResolveCommandOptions = {},
): ServerCommand | undefined {
  for (const [command, ...args] of serverConfig.commands) {
    if (command === undefined) continue;
    const resolved = locateExecutable(command, options);
    if (resolved !== undefined) {
      return { command: resolved, args };
    }
  }
  return undefined;
}

export function isExecutableOnPath(name: string, pathEnv = process.env.PATH ?? ""): boolean {
  return locateExecutable(name, { pathEnv }) !== undefined;
}

function locateExecutable(command: string, options: ResolveCommandOptions): string | undefined {
  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    const candidate = resolve(options.cwd ?? process.cwd(), command);
    return isExecutableFile(candidate) ? candidate : undefined;
  }

  const pathEnv = options.pathEnv ?? process.env.PATH ?? "";
  const suffixes = executableSuffixes(command);
  for (const dir of pathEnv.split(delimiter)) {
    if (dir === "") continue;
    for (const suffix of suffixes) {
      const candidate = join(dir, command + suffix);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return undefined;
}

function executableSuffixes(command: string): readonly string[] {
  if (process.platform !== "win32" || extname(command) !== "") return [""];
  const pathExt = process.env.PATHEXT ?? ".EXE;.CMD;.BAT";
  return ["", ...pathExt.split(";").filter((ext) => ext !== "")];
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Spawn an LSP server child process in the project directory.
 */
export function spawnLanguageServer(
  languageId: string,
  command: ServerCommand,
  options: { cwd: string; env?: Record<string, string>; logger?: Logger },
): LSPProcessHandle {
  const proc = spawn(command.command, [...command.args], {
    stdio: ["pipe", "pipe", "pipe"],
    cwd: options.cwd,
    env: options.env ? { ...process.env, ...options.env } : process.env,
  });

  return new LSPProcessHandle(proc, languageId, options.logger);
}
