import type { Case } from "../core/cases/types";
import type { Diagnostic } from "../outcome/diagnostic";
import type { ClosedType } from "./analysis/exhaustiveness";

/** A case list plus what is statically known about its subject. */
export interface CaseBundle {
  cases: readonly Case<unknown>[];
  subject?: ClosedType;
  allowShadowing?: boolean;
}

export interface PassResult {
  diagnostics: Diagnostic[];
  metadata?: Record<string, unknown>;
}

export type PassPhase = "validate" | "analyze";

export interface Pass {
  id: string;
  name: string;
  phase: PassPhase;
  dependencies?: string[];
  run(bundle: CaseBundle): PassResult;
}

export interface PassConfig {
  enabled: boolean;
  severityOverride?: "error" | "warning" | "info" | "off";
}

export interface LintConfig {
  passes: Record<string, PassConfig>;
}
