// src/core/match/matcher.ts
// Structural matching of one pattern against one value

import type { Outcome } from "../../outcome/outcome";
import { isDone } from "../../outcome/outcome";
import { noMatch, ok } from "../../outcome/constructors";
import { InvariantViolation } from "../../outcome/errors";
import { DEFAULT_MATCH_CONFIG } from "../config/config";
import type { Pattern, SequencePattern, MappingPattern, ObjectPattern } from "../pattern/pattern";
import { showPattern } from "../pattern/show";
import { showScalar } from "../value/show";
import {
  isSubtype,
  keyId,
  mapping,
  mappingGet,
  scalarEquals,
  seq,
  type ScalarLiteral,
  type Value,
} from "../value/value";
import { emptyBindings, mergeBindings, singleBinding, type Bindings, type DuplicatePolicy } from "./bindings";
import { FieldReader } from "./fieldReader";

export type MatchResult = Outcome<Bindings>;

export interface MatchOptions {
  /** How bindings from sibling sub-patterns combine. Defaults to "reject". */
  policy?: DuplicatePolicy;
  /** Nesting limit; exceeding it means the pattern graph does not terminate. */
  maxDepth?: number;
}

interface MatchContext {
  readonly policy: DuplicatePolicy;
  readonly maxDepth: number;
  readonly reader: FieldReader;
}

/**
 * Matches `value` against `pattern`. A mismatch is a `Fail` with reason
 * `"no-match"`; nothing is thrown for an ordinary mismatch.
 */
export function match(pattern: Pattern, value: Value, options: MatchOptions = {}): MatchResult {
  const ctx: MatchContext = {
    policy: options.policy ?? (DEFAULT_MATCH_CONFIG.allowShadowing ? "shadow" : "reject"),
    maxDepth: options.maxDepth ?? DEFAULT_MATCH_CONFIG.maxDepth,
    reader: new FieldReader(),
  };
  return matchAt(pattern, value, ctx, 0);
}

function matchAt(p: Pattern, v: Value, ctx: MatchContext, depth: number): MatchResult {
  if (depth > ctx.maxDepth) {
    throw new InvariantViolation(`Pattern nesting exceeds ${ctx.maxDepth}; is the pattern graph cyclic?`);
  }

  switch (p.kind) {
    case "Literal":
      if (v.tag === "Scalar" && scalarEquals(p.value, v.value)) return ok(emptyBindings());
      return noMatch(`expected ${showScalar(p.value)}, got ${describe(v)}`);

    case "Wildcard":
      return ok(emptyBindings());

    case "Capture":
      return ok(singleBinding(p.name, v));

    case "As": {
      const inner = matchAt(p.inner, v, ctx, depth + 1);
      if (!isDone(inner)) return inner;
      return mergeBindings(inner.value, singleBinding(p.name, v), ctx.policy);
    }

    case "Or":
      for (const alt of p.alternatives) {
        const r = matchAt(alt, v, ctx, depth + 1);
        if (isDone(r) || r.failure.reason !== "no-match") return r;
      }
      return noMatch(`no alternative of ${showPattern(p)} matched ${describe(v)}`);

    case "Sequence":
      return matchSequence(p, v, ctx, depth);

    case "Mapping":
      return matchMapping(p, v, ctx, depth);

    case "Object":
      return matchObject(p, v, ctx, depth);
  }
}

function matchSequence(p: SequencePattern, v: Value, ctx: MatchContext, depth: number): MatchResult {
  if (v.tag !== "Sequence") {
    return noMatch(`expected a sequence, got ${describe(v)}`);
  }
  const items = v.items;
  const n = p.elements.length;

  if (!p.star) {
    if (items.length !== n) {
      return noMatch(`expected a sequence of length ${n}, got length ${items.length}`);
    }
    return matchAll(
      p.elements.map((el, i) => [el, items[i]] as const),
      ctx,
      depth
    );
  }

  if (items.length < n) {
    return noMatch(`expected a sequence of at least ${n} items, got length ${items.length}`);
  }
  const { index, name } = p.star;
  const suffixLen = n - index;
  const middleEnd = items.length - suffixLen;

  const prefix = p.elements.slice(0, index).map((el, i) => [el, items[i]] as const);
  const suffix = p.elements.slice(index).map((el, i) => [el, items[middleEnd + i]] as const);
  const middle = name === undefined ? undefined : singleBinding(name, seq(items.slice(index, middleEnd)));

  const head = matchAll(prefix, ctx, depth);
  if (!isDone(head)) return head;
  let env = head.value;
  if (middle) {
    const merged = mergeBindings(env, middle, ctx.policy);
    if (!isDone(merged)) return merged;
    env = merged.value;
  }
  const tail = matchAll(suffix, ctx, depth);
  if (!isDone(tail)) return tail;
  return mergeBindings(env, tail.value, ctx.policy);
}

function matchMapping(p: MappingPattern, v: Value, ctx: MatchContext, depth: number): MatchResult {
  if (v.tag !== "Mapping") {
    return noMatch(`expected a mapping, got ${describe(v)}`);
  }
  const pairs: (readonly [Pattern, Value])[] = [];
  const consumed = new Set<string>();
  for (const [key, sub] of p.entries) {
    const item = mappingGet(v, key);
    if (item === undefined) {
      return noMatch(`missing key ${showScalar(key)}`);
    }
    consumed.add(keyId(key));
    pairs.push([sub, item]);
  }

  const r = matchAll(pairs, ctx, depth);
  if (!isDone(r) || p.rest === undefined) return r;

  const leftover: (readonly [ScalarLiteral, Value])[] = v.entries.filter(([k]) => !consumed.has(keyId(k)));
  return mergeBindings(r.value, singleBinding(p.rest, mapping(leftover)), ctx.policy);
}

function matchObject(p: ObjectPattern, v: Value, ctx: MatchContext, depth: number): MatchResult {
  if (v.tag !== "Record" || !isSubtype(v.type, p.type)) {
    return noMatch(`expected an instance of ${p.type.name}, got ${describe(v)}`);
  }
  const fields: (readonly [string, Pattern])[] = [];
  p.positional.forEach((sub, i) => {
    const field = p.type.matchArgs[i];
    if (field === undefined) {
      throw new InvariantViolation(`${p.type.name} has no positional field ${i}; validate patterns before matching`);
    }
    fields.push([field, sub]);
  });
  fields.push(...p.named);

  let env = emptyBindings();
  for (const [field, sub] of fields) {
    const item = ctx.reader.read(v, field);
    if (item === undefined) {
      return noMatch(`${v.type.name} has no field ${field}`);
    }
    const r = matchAt(sub, item, ctx, depth + 1);
    if (!isDone(r)) return r;
    const merged = mergeBindings(env, r.value, ctx.policy);
    if (!isDone(merged)) return merged;
    env = merged.value;
  }
  return ok(env);
}

/** Matches pairs left to right, stopping at the first failure. */
function matchAll(pairs: readonly (readonly [Pattern, Value | undefined])[], ctx: MatchContext, depth: number): MatchResult {
  let env = emptyBindings();
  for (const [sub, item] of pairs) {
    if (item === undefined) return noMatch("sequence ended early");
    const r = matchAt(sub, item, ctx, depth + 1);
    if (!isDone(r)) return r;
    const merged = mergeBindings(env, r.value, ctx.policy);
    if (!isDone(merged)) return merged;
    env = merged.value;
  }
  return ok(env);
}

function describe(v: Value): string {
  switch (v.tag) {
    case "Scalar":
      return showScalar(v.value);
    case "Sequence":
      return `a sequence of length ${v.items.length}`;
    case "Mapping":
      return "a mapping";
    case "Record":
      return `an instance of ${v.type.name}`;
  }
}
