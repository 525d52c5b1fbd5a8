export type DiagnosticSeverity = "error" | "warning" | "info";

/**
 * Where in a case list a diagnostic points, e.g. `cases[2].pattern.alternatives[0]`.
 */
export type PatternPath = string;

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  path?: PatternPath;
  data?: Record<string, unknown>;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === "error");
}
