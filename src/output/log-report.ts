import type { Diagnostic } from "../core/types.js";

const INDENT = "    ";

export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  add(file: string, nodeId: string | null, message: string): void {
    this.entries.push({ file, nodeId, message });
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Groups diagnostics under their file header in discovery order. Each entry is
 * prefixed with its node's label when the label is known.
 */
export const renderLogReport = (
  diagnostics: readonly Diagnostic[],
  labelOf: (nodeId: string) => string | undefined = () => undefined
): string => {
  const byFile = new Map<string, string[]>();
  for (const diagnostic of diagnostics) {
    const label = diagnostic.nodeId === null ? undefined : labelOf(diagnostic.nodeId);
    const line = label ? `${label} ${diagnostic.message}` : diagnostic.message;
    const lines = byFile.get(diagnostic.file);
    if (lines) {
      lines.push(line);
    } else {
      byFile.set(diagnostic.file, [line]);
    }
  }

  const output: string[] = [];
  for (const [file, lines] of byFile) {
    output.push(file);
    for (const line of lines) {
      output.push(`${INDENT}${line}`);
    }
  }
  return output.length > 0 ? `${output.join("\n")}\n` : "";
};
