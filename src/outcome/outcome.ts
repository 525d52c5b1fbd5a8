import type { Failure } from "./failure";

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
}

export type Outcome<A> = Done<A> | Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}

export function isNoMatch<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail" && o.failure.reason === "no-match";
}
