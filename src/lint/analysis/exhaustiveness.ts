/**
 * Exhaustiveness analysis for case lists over a closed set of variants.
 *
 * Conservative: a guarded arm never counts as covering anything, since its
 * guard may reject at run time.
 */

import type { Case } from "../../core/cases/types";
import { isIrrefutable } from "../../core/pattern/names";
import type { Pattern } from "../../core/pattern/pattern";
import { showScalar } from "../../core/value/show";
import { declaredFields, isSubtype, scalarEquals, type RecordType, type ScalarLiteral } from "../../core/value/value";

export type VariantId = string;

export type Variant =
  | { readonly kind: "record"; readonly id: VariantId; readonly type: RecordType }
  | { readonly kind: "literal"; readonly id: VariantId; readonly value: ScalarLiteral };

/** A subject type declared as a fixed set of named variants. */
export interface ClosedType {
  readonly name: string;
  readonly variants: readonly Variant[];
}

export function recordVariant(type: RecordType, id: VariantId = type.name): Variant {
  return { kind: "record", id, type };
}

export function literalVariant(value: ScalarLiteral, id: VariantId = showScalar(value)): Variant {
  return { kind: "literal", id, value };
}

export function closedType(name: string, variants: readonly Variant[]): ClosedType {
  const ids = new Set<VariantId>();
  for (const v of variants) {
    if (ids.has(v.id)) throw new Error(`Closed type ${name} lists variant ${v.id} twice`);
    ids.add(v.id);
  }
  return { name, variants };
}

/**
 * Returns the variants of `subject` that no unguarded arm covers.
 */
export function checkExhaustiveness(subject: ClosedType, cases: readonly Case<unknown>[]): Set<VariantId> {
  const remaining = new Map(subject.variants.map(v => [v.id, v] as const));

  for (const c of cases) {
    if (remaining.size === 0) break;
    if (c.guard) continue;
    for (const [id, variant] of remaining) {
      if (coversVariant(c.pattern, variant)) remaining.delete(id);
    }
  }

  return new Set(remaining.keys());
}

/** True when every value of `variant` matches `p`. */
export function coversVariant(p: Pattern, variant: Variant): boolean {
  switch (p.kind) {
    case "Wildcard":
    case "Capture":
      return true;
    case "As":
      return coversVariant(p.inner, variant);
    case "Or":
      return p.alternatives.some(alt => coversVariant(alt, variant));
    case "Literal":
      return variant.kind === "literal" && scalarEquals(p.value, variant.value);
    case "Object": {
      if (variant.kind !== "record" || !isSubtype(variant.type, p.type)) return false;
      const fields = declaredFields(variant.type);
      const matchArgs = p.type.matchArgs;
      const positionalOk = p.positional.every((sub, i) => {
        const field = matchArgs[i];
        return field !== undefined && fields.includes(field) && isIrrefutable(sub);
      });
      return positionalOk && p.named.every(([field, sub]) => fields.includes(field) && isIrrefutable(sub));
    }
    case "Sequence":
    case "Mapping":
      return false;
  }
}
