// Conversion between plain JavaScript data and Values

import { InvariantViolation } from "../../outcome/errors";
import { mapping, readField, scalar, seq, type ScalarLiteral, type Value } from "./value";

/**
 * Converts JSON-like host data: primitives become scalars (`undefined` becomes
 * null), arrays become sequences, `Map`s and plain objects become mappings.
 */
export function fromHost(input: unknown): Value {
  return convert(input, new Set());
}

function convert(input: unknown, active: Set<object>): Value {
  if (input === null || input === undefined) return scalar(null);
  if (typeof input === "boolean" || typeof input === "number" || typeof input === "string") {
    return scalar(input);
  }
  if (typeof input !== "object") {
    throw new TypeError(`Cannot convert ${typeof input} to a value`);
  }

  if (active.has(input)) {
    throw new InvariantViolation("Cyclic input cannot be converted to a value");
  }
  active.add(input);
  try {
    if (Array.isArray(input)) {
      return seq(input.map(item => convert(item, active)));
    }
    if (input instanceof Map) {
      const entries: [ScalarLiteral, Value][] = [];
      for (const [key, value] of input) {
        entries.push([toKey(key), convert(value, active)]);
      }
      return mapping(entries);
    }
    return mapping(Object.entries(input).map(([key, value]) => [key, convert(value, active)] as const));
  } finally {
    active.delete(input);
  }
}

function toKey(key: unknown): ScalarLiteral {
  if (key === null || typeof key === "boolean" || typeof key === "number" || typeof key === "string") {
    return key;
  }
  throw new TypeError(`Mapping keys must be scalars, got ${typeof key}`);
}

export type HostValue = ScalarLiteral | HostValue[] | { [key: string]: HostValue };

/**
 * Converts back to plain data. Mapping keys are stringified; records become
 * objects of their fields, running computed accessors.
 */
export function toHost(v: Value): HostValue {
  switch (v.tag) {
    case "Scalar":
      return v.value;
    case "Sequence":
      return v.items.map(toHost);
    case "Mapping": {
      const out: { [key: string]: HostValue } = {};
      for (const [k, x] of v.entries) out[String(k)] = toHost(x);
      return out;
    }
    case "Record": {
      const out: { [key: string]: HostValue } = {};
      for (const name of v.fields.keys()) {
        const field = readField(v, name);
        if (field !== undefined) out[name] = toHost(field);
      }
      return out;
    }
  }
}
