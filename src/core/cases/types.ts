import type { Bindings } from "../match/bindings";
import type { Pattern } from "../pattern/pattern";

/** Runs after a structural match, with that match's bindings in view. */
export type Guard = (bindings: Bindings) => boolean;

export interface Case<T> {
  readonly pattern: Pattern;
  readonly guard?: Guard;
  /** Opaque token handed back when this arm wins. */
  readonly action: T;
}

export interface Selection<T> {
  readonly bindings: Bindings;
  readonly action: T;
  /** Position of the winning arm in the case list. */
  readonly index: number;
}

export function arm<T>(pattern: Pattern, action: T, guard?: Guard): Case<T> {
  return guard ? { pattern, guard, action } : { pattern, action };
}
