// src/outcome/matchers.ts
// Folding and chaining outcomes

import { PatternError, errorCodeFor } from "./errors";
import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";

export function matchOutcome<A, R>(o: Outcome<A>, on: { done: (d: Done<A>) => R; fail: (f: Fail) => R }): R {
  return isDone(o) ? on.done(o) : on.fail(o);
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  return isDone(o) ? { ...o, value: fn(o.value) } : o;
}

export function flatMapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => Outcome<B>): Outcome<B> {
  return isDone(o) ? fn(o.value) : o;
}

/** The value of a `Done`; a `Fail` is thrown as a `PatternError` carrying its failure. */
export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) return o.value;
  throw new PatternError(o.failure.message, errorCodeFor(o.failure.reason), o.failure);
}

export function unwrapOr<A>(o: Outcome<A>, fallback: A): A {
  return isDone(o) ? o.value : fallback;
}
