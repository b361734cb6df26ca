import type { Dict } from "./type-utils.js";

/**
 * Maps document property names to the field names stored in MongoDB.
 *
 * Only the first segment of a dotted path is mapped: with `{ id: "_id" }`,
 * `id.sub` becomes `_id.sub`.
 */
export class FieldNames {
  private readonly mapping: ReadonlyMap<string, string>;

  constructor(mapping: Readonly<Dict<string>> = {}) {
    this.mapping = new Map(Object.entries(mapping));
  }

  prepare = (name: string): string => {
    const [head, ...rest] = name.split(".");
    return [this.mapping.get(head) ?? head, ...rest].join(".");
  };

  // `$field` references are mapped, `$$variables` and plain strings are not
  prepareReference = (value: string): string =>
    value.startsWith("$") && !value.startsWith("$$") ? `$${this.prepare(value.slice(1))}` : value;
}
