import { extname } from "node:path";
import { ConfigurationError } from "@packsmith/errors";
import { z } from "zod";

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected a #rrggbb color");

/** Configuration for a single language server */
export const LanguageServerConfigSchema = z.object({
  /** File extensions this server handles, without the dot (e.g., ["json", "mcmeta"]) */
  extensions: z.array(z.string().min(1)).min(1),
  /**
   * Candidate command lines, tried in order. The first whose executable
   * exists is spawned (e.g., [["vscode-json-languageserver", "--stdio"]])
   */
  commands: z.array(z.array(z.string().min(1)).min(1)).min(1),
  /** Environment variables passed to the server process */
  env: z.record(z.string()).optional(),
  /** LSP initialization options (server-specific) */
  initializationOptions: z.record(z.unknown()).optional(),
});

/** Underline colors keyed by diagnostic severity */
export const DiagnosticColorsSchema = z.object({
  error: HexColorSchema.default("#f14c4c"),
  warning: HexColorSchema.default("#cca700"),
  information: HexColorSchema.default("#3794ff"),
  hint: HexColorSchema.default("#808080"),
});

/** Top-level LSP configuration */
export const LSPConfigSchema = z.object({
  /** Server configurations keyed by language ID */
  servers: z.record(LanguageServerConfigSchema).default({}),
  /** Initialization handshake timeout in ms (default: 30000) */
  initTimeoutMs: z.number().int().positive().default(30_000),
  /** Bound on the shutdown request and on process termination (default: 5000) */
  shutdownTimeoutMs: z.number().int().positive().default(5_000),
  diagnosticColors: DiagnosticColorsSchema.default({}),
});

export type LanguageServerConfig = z.infer<typeof LanguageServerConfigSchema>;
export type DiagnosticColors = z.infer<typeof DiagnosticColorsSchema>;
export type LSPConfig = z.infer<typeof LSPConfigSchema>;
export type LSPConfigInput = z.input<typeof LSPConfigSchema>;

/**
 * Validate raw configuration and apply defaults.
 *
 * @throws ConfigurationError listing every zod issue as `path: message`
 */
export function parseLSPConfig(raw: unknown): LSPConfig {
  const result = LSPConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError("lsp", issues);
  }
  return result.data;
}

/**
 * Maps a file path to a language ID based on configured extensions.
 * Extension matching is case-insensitive.
 * Returns `undefined` if no language server handles this extension.
 */
export function resolveLanguage(filePath: string, config: LSPConfig): string | undefined {
  const ext = extname(filePath).replace(/^\./, "").toLowerCase();
  if (ext === "") return undefined;

  for (const [languageId, serverConfig] of Object.entries(config.servers)) {
    if (serverConfig.extensions.some((candidate) => candidate.toLowerCase() === ext)) {
      return languageId;
    }
  }
  return undefined;
}
