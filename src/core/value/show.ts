import type { ScalarLiteral, Value } from "./value";

export function showScalar(v: ScalarLiteral): string {
  if (v === null) return "null";
  if (typeof v === "string") return JSON.stringify(v);
  return String(v);
}

/**
 * Renders a value for messages and traces. Computed record fields are shown as
 * `<computed>` so printing never runs an accessor.
 */
export function showValue(v: Value): string {
  switch (v.tag) {
    case "Scalar":
      return showScalar(v.value);
    case "Sequence":
      return `[${v.items.map(showValue).join(", ")}]`;
    case "Mapping":
      return `{${v.entries.map(([k, x]) => `${showScalar(k)}: ${showValue(x)}`).join(", ")}}`;
    case "Record": {
      const parts: string[] = [];
      for (const [name, source] of v.fields) {
        parts.push(`${name}=${typeof source === "function" ? "<computed>" : showValue(source)}`);
      }
      return `${v.type.name}(${parts.join(", ")})`;
    }
  }
}
