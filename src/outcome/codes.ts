import type { Diagnostic, DiagnosticSeverity, PatternPath } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0700: { code: "E0700", severity: "error", category: "Pattern", template: "Alternatives bind different names: {expected} vs {actual}" },
  E0701: { code: "E0701", severity: "error", category: "Pattern", template: "Name bound more than once: {name}" },
  E0702: { code: "E0702", severity: "error", category: "Pattern", template: "{type} accepts {expected} positional sub-patterns, got {actual}" },
  E0703: { code: "E0703", severity: "error", category: "Pattern", template: "Field matched more than once: {field}" },
  E0704: { code: "E0704", severity: "error", category: "Pattern", template: "Duplicate mapping key: {key}" },
  E0705: { code: "E0705", severity: "error", category: "Pattern", template: "Star index {index} out of range 0..{max}" },
  E0706: { code: "E0706", severity: "error", category: "Pattern", template: "Irrefutable alternative makes remaining alternatives unreachable" },
  E0707: { code: "E0707", severity: "error", category: "Pattern", template: "Invalid binding name: {name}" },
  E0708: { code: "E0708", severity: "error", category: "Pattern", template: "Or-pattern has no alternatives" },

  W0700: { code: "W0700", severity: "warning", category: "Coverage", template: "Unreachable case: arm {shadowedBy} already matches every value" },
  W0701: { code: "W0701", severity: "warning", category: "Coverage", template: "Non-exhaustive match on {type}: missing {missing}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  path?: PatternPath
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    message,
  };
  if (path !== undefined) diag.path = path;
  if (params) diag.data = { ...params };
  return diag;
}
