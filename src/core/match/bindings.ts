// src/core/match/bindings.ts
// Insertion-ordered capture environments

import type { Value } from "../value/value";
import type { Outcome } from "../../outcome/outcome";
import { conflictingBinding, ok } from "../../outcome/constructors";

export type Bindings = ReadonlyMap<string, Value>;

/** "reject" fails on a name present on both sides; "shadow" lets the right side win. */
export type DuplicatePolicy = "reject" | "shadow";

const EMPTY: Bindings = new Map();

export function emptyBindings(): Bindings {
  return EMPTY;
}

export function singleBinding(name: string, value: Value): Bindings {
  return new Map([[name, value]]);
}

export function mergeBindings(a: Bindings, b: Bindings, policy: DuplicatePolicy = "reject"): Outcome<Bindings> {
  if (b.size === 0) return ok(a);
  if (a.size === 0) return ok(b);

  const out = new Map(a);
  for (const [name, value] of b) {
    if (out.has(name)) {
      if (policy === "reject") return conflictingBinding(name);
      // re-insert so iteration order follows the binding that won
      out.delete(name);
    }
    out.set(name, value);
  }
  return ok(out);
}

export function bindingsToObject(b: Bindings): Record<string, Value> {
  return Object.fromEntries(b);
}
