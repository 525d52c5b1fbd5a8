import { readField, type RecordValue, type Value } from "../value/value";

/**
 * Read-through cache for record fields, scoped to one match attempt: each
 * field is read at most once however many sub-patterns refer to it.
 */
export class FieldReader {
  private cache = new Map<RecordValue, Map<string, Value | undefined>>();

  read(r: RecordValue, field: string): Value | undefined {
    let fields = this.cache.get(r);
    if (!fields) {
      fields = new Map();
      this.cache.set(r, fields);
    }
    if (fields.has(field)) return fields.get(field);
    const value = readField(r, field);
    fields.set(field, value);
    return value;
  }
}
