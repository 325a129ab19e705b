import type { Diagnostic, Position } from "vscode-languageserver-protocol";
import type { DiagnosticColors } from "./config.js";
import type { RenderDirective } from "./types.js";

/** Start offset of every line in `text`. Any of CRLF, CR or LF ends a line. */
export function lineStartOffsets(text: string): number[] {
  const starts = [0];
  const breaks = /\r\n|\r|\n/g;
  for (let match = breaks.exec(text); match !== null; match = breaks.exec(text)) {
    starts.push(match.index + match[0].length);
  }
  return starts;
}

/**
 * Plain-text offset of an LSP position. A line past the end maps to 0;
 * otherwise line start plus character, clamped to `[0, text.length]`.
 */
export function positionToOffset(
  text: string,
  position: Position,
  starts: readonly number[] = lineStartOffsets(text),
): number {
  const lineStart = starts[position.line];
  if (lineStart === undefined || position.line < 0) return 0;
  return Math.min(Math.max(lineStart + position.character, 0), text.length);
}

export function severityColor(
  severity: Diagnostic["severity"],
  colors: DiagnosticColors,
): string {
  switch (severity) {
    case 1:
      return colors.error;
    case 2:
      return colors.warning;
    case 3:
      return colors.information;
    default:
      return colors.hint;
  }
}

export function buildRenderDirectives(
  text: string,
  diagnostics: readonly Diagnostic[],
  colors: DiagnosticColors,
): RenderDirective[] {
  const starts = lineStartOffsets(text);
  return diagnostics.map((diagnostic) => ({
    startOffset: positionToOffset(text, diagnostic.range.start, starts),
    endOffset: positionToOffset(text, diagnostic.range.end, starts),
    color: severityColor(diagnostic.severity, colors),
    underlineStyle: "wave",
  }));
}
