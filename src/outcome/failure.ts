// src/outcome/failure.ts
// Why a match or a selection produced no value

import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "no-match"
  | "conflicting-binding"
  | "malformed-pattern"
  | "fell-through"
  | "invariant-violated"
  | `custom:${string}`;

/** Only an ordinary mismatch lets the caller move on to another arm. */
const RECOVERABLE_REASONS: ReadonlySet<FailureReason> = new Set<FailureReason>(["no-match"]);

export interface Failure {
  readonly reason: FailureReason;
  readonly message: string;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly diagnostics: readonly Diagnostic[];
  readonly cause?: Failure;
  readonly recoverable: boolean;
}

export type FailureInit = Partial<Omit<Failure, "reason" | "message">>;

export function failure(reason: FailureReason, message: string, init: FailureInit = {}): Failure {
  return {
    reason,
    message,
    context: init.context,
    diagnostics: init.diagnostics ?? [],
    cause: init.cause,
    recoverable: init.recoverable ?? RECOVERABLE_REASONS.has(reason),
  };
}

/** Restates `inner` for an outer context; `inner` stays reachable as `cause`. */
export function wrapFailure(inner: Failure, message: string, context?: Record<string, unknown>): Failure {
  return {
    ...inner,
    message,
    context: context === undefined ? inner.context : { ...inner.context, ...context },
    cause: inner,
  };
}

/** Diagnostics along the cause chain, outermost first, each once. */
export function allDiagnostics(f: Failure): Diagnostic[] {
  const seen = new Set<Diagnostic>();
  for (let at: Failure | undefined = f; at; at = at.cause) {
    for (const diag of at.diagnostics) seen.add(diag);
  }
  return [...seen];
}
