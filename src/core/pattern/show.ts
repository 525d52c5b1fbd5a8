import { InvariantViolation } from "../../outcome/errors";
import { showScalar } from "../value/show";
import type { Pattern } from "./pattern";

/** Throws `InvariantViolation` on a cyclic pattern graph instead of recursing without end. */
export function showPattern(p: Pattern): string {
  return show(p, new Set());
}

function show(p: Pattern, active: Set<Pattern>): string {
  if (active.has(p)) {
    throw new InvariantViolation(`Cannot print a cyclic ${p.kind} pattern`);
  }
  active.add(p);
  try {
    return render(p, sub => show(sub, active));
  } finally {
    active.delete(p);
  }
}

function render(p: Pattern, sub: (q: Pattern) => string): string {
  switch (p.kind) {
    case "Literal":
      return showScalar(p.value);
    case "Wildcard":
      return "_";
    case "Capture":
      return p.name;
    case "Or":
      return p.alternatives.map(sub).join(" | ");
    case "As":
      return `${p.inner.kind === "Or" ? `(${sub(p.inner)})` : sub(p.inner)} as ${p.name}`;
    case "Sequence": {
      const parts = p.elements.map(sub);
      if (p.star) parts.splice(p.star.index, 0, `*${p.star.name ?? "_"}`);
      return `[${parts.join(", ")}]`;
    }
    case "Mapping": {
      const parts = p.entries.map(([k, q]) => `${showScalar(k)}: ${sub(q)}`);
      if (p.rest !== undefined) parts.push(`**${p.rest}`);
      return `{${parts.join(", ")}}`;
    }
    case "Object": {
      const parts = [...p.positional.map(sub), ...p.named.map(([field, q]) => `${field}=${sub(q)}`)];
      return `${p.type.name}(${parts.join(", ")})`;
    }
  }
}
