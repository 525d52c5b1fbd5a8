// src/outcome/constructors.ts
// Outcome constructors, including the two failures the matcher produces

import { makeDiagnostic } from "./codes";
import type { Done, Fail } from "./outcome";
import type { Failure, FailureInit, FailureReason } from "./failure";
import { failure } from "./failure";

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export const ok = done;

export function fail(f: Failure): Fail {
  return { tag: "Fail", failure: f };
}

export function err(failureOrReason: Failure | FailureReason, message = "", init?: FailureInit): Fail {
  return fail(typeof failureOrReason === "string" ? failure(failureOrReason, message, init) : failureOrReason);
}

/** An ordinary structural mismatch; the caller may try the next arm. */
export function noMatch(message: string, context?: Record<string, unknown>): Fail {
  return fail(failure("no-match", message, { context, recoverable: true }));
}

/** Two sub-patterns bound `name`; only reachable for patterns that skipped validation. */
export function conflictingBinding(name: string): Fail {
  const diagnostic = makeDiagnostic("E0701", { name });
  return fail(
    failure("conflicting-binding", diagnostic.message, {
      context: { name },
      diagnostics: [diagnostic],
      recoverable: false,
    })
  );
}
