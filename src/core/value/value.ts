// src/core/value/value.ts
// Runtime values the matcher inspects: scalars, sequences, mappings, records

export type ScalarLiteral = null | boolean | number | string;

export interface ScalarValue {
  readonly tag: "Scalar";
  readonly value: ScalarLiteral;
}

export interface SequenceValue {
  readonly tag: "Sequence";
  readonly items: readonly Value[];
}

export interface MappingValue {
  readonly tag: "Mapping";
  readonly entries: readonly (readonly [ScalarLiteral, Value])[];
}

/** A stored field value, or an accessor computed on demand. */
export type FieldSource = Value | (() => Value);

export interface RecordValue {
  readonly tag: "Record";
  readonly type: RecordType;
  readonly fields: ReadonlyMap<string, FieldSource>;
}

export type Value = ScalarValue | SequenceValue | MappingValue | RecordValue;

/**
 * Nominal record type. `matchArgs` is the positional destructuring order and is
 * fixed when the type is defined.
 */
export interface RecordType {
  readonly name: string;
  readonly fields: readonly string[];
  readonly matchArgs: readonly string[];
  readonly parent?: RecordType;
}

// =========================================================================
// Constructors
// =========================================================================

export const NULL: ScalarValue = { tag: "Scalar", value: null };

export function scalar(value: ScalarLiteral): ScalarValue {
  return { tag: "Scalar", value };
}

export function seq(items: readonly Value[]): SequenceValue {
  return { tag: "Sequence", items };
}

/** Later entries replace earlier ones with an equal key. Throws `TypeError` on a `NaN` key. */
export function mapping(entries: Iterable<readonly [ScalarLiteral, Value]>): MappingValue {
  const out: (readonly [ScalarLiteral, Value])[] = [];
  const index = new Map<string, number>();
  for (const [key, value] of entries) {
    if (typeof key === "number" && Number.isNaN(key)) {
      // NaN equals no key, so an entry under it could never be looked up
      throw new TypeError("Mapping keys must not be NaN");
    }
    const k = keyId(key);
    const at = index.get(k);
    if (at === undefined) {
      index.set(k, out.length);
      out.push([key, value]);
    } else {
      // later entries replace earlier ones in place
      out[at] = [key, value];
    }
  }
  return { tag: "Mapping", entries: out };
}

export function defineRecordType(
  name: string,
  fields: readonly string[],
  opts: { parent?: RecordType; matchArgs?: readonly string[] } = {}
): RecordType {
  const all = [...(opts.parent ? declaredFields(opts.parent) : []), ...fields];
  if (new Set(all).size !== all.length) {
    throw new Error(`Record type ${name} declares a field twice`);
  }
  const matchArgs = opts.matchArgs ?? all;
  for (const arg of matchArgs) {
    if (!all.includes(arg)) {
      throw new Error(`Record type ${name} has no field ${arg} to match positionally`);
    }
  }
  return { name, fields: [...fields], matchArgs: [...matchArgs], parent: opts.parent };
}

export function record(type: RecordType, fields: Record<string, FieldSource>): RecordValue {
  const out = new Map<string, FieldSource>();
  for (const name of declaredFields(type)) {
    const source = fields[name];
    if (source === undefined) {
      throw new Error(`Record ${type.name} is missing field ${name}`);
    }
    out.set(name, source);
  }
  for (const [name, source] of Object.entries(fields)) {
    if (!out.has(name)) out.set(name, source);
  }
  return { tag: "Record", type, fields: out };
}

// =========================================================================
// Queries
// =========================================================================

/** Every field a type declares, inherited ones first. */
export function declaredFields(type: RecordType): string[] {
  const chain: RecordType[] = [];
  for (let t: RecordType | undefined = type; t; t = t.parent) chain.unshift(t);
  return chain.flatMap(t => t.fields);
}

export function isSubtype(sub: RecordType, sup: RecordType): boolean {
  for (let t: RecordType | undefined = sub; t; t = t.parent) {
    if (t === sup) return true;
  }
  return false;
}

/** No coercion across scalar kinds; `NaN` equals nothing. */
export function scalarEquals(a: ScalarLiteral, b: ScalarLiteral): boolean {
  return typeof a === typeof b && a === b;
}

export function mappingGet(m: MappingValue, key: ScalarLiteral): Value | undefined {
  for (const [k, v] of m.entries) {
    if (scalarEquals(k, key)) return v;
  }
  return undefined;
}

/** Reads a record field, running its accessor if it has one. */
export function readField(r: RecordValue, name: string): Value | undefined {
  const source = r.fields.get(name);
  if (source === undefined) return undefined;
  return typeof source === "function" ? source() : source;
}

export function valueEquals(a: Value, b: Value): boolean {
  switch (a.tag) {
    case "Scalar":
      return b.tag === "Scalar" && scalarEquals(a.value, b.value);
    case "Sequence": {
      if (b.tag !== "Sequence" || a.items.length !== b.items.length) return false;
      const other = b.items;
      return a.items.every((item, i) => {
        const peer = other[i];
        return peer !== undefined && valueEquals(item, peer);
      });
    }
    case "Mapping": {
      if (b.tag !== "Mapping" || a.entries.length !== b.entries.length) return false;
      const other = b;
      return a.entries.every(([k, v]) => {
        const peer = mappingGet(other, k);
        return peer !== undefined && valueEquals(v, peer);
      });
    }
    case "Record":
      return b === a;
  }
}

export function keyId(key: ScalarLiteral): string {
  return key === null ? "null" : `${typeof key}:${String(key)}`;
}
