import type { Diagnostic } from "./diagnostic";
import { allDiagnostics, failure, type Failure, type FailureReason } from "./failure";

export class PatternError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly failure?: Failure
  ) {
    super(message);
    this.name = "PatternError";
  }
}

export class MalformedPatternError extends PatternError {
  readonly diagnostics: readonly Diagnostic[];

  constructor(message: string, diagnostics: readonly Diagnostic[]) {
    const f = failure("malformed-pattern", message, { diagnostics });
    super(message, errorCodeFor(f.reason), f);
    this.name = "MalformedPatternError";
    this.diagnostics = allDiagnostics(f);
  }
}

/** Raised for cyclic pattern graphs or runaway recursion. */
export class InvariantViolation extends PatternError {
  constructor(message: string, context?: Record<string, unknown>) {
    const f = failure("invariant-violated", message, { context });
    super(message, errorCodeFor(f.reason), f);
    this.name = "InvariantViolation";
  }
}

export class MatchFallthroughError extends PatternError {
  constructor(
    message: string,
    public readonly subject: unknown
  ) {
    super(message, errorCodeFor("fell-through"), failure("fell-through", message));
    this.name = "MatchFallthroughError";
  }
}

/** `"conflicting-binding"` becomes `CONFLICTING_BINDING`. */
export function errorCodeFor(reason: FailureReason): string {
  return reason.replace(/[-:]/g, "_").toUpperCase();
}
