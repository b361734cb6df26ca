import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import { Stage } from "../stage.js";

/**
 * `$unwind` stage. Uses the short `{ $unwind: "$path" }` form unless one of the
 * options is set.
 */
export class Unwind extends Stage {
  private readonly path: string;
  private arrayIndex: string | undefined;
  private preserveEmpty: boolean | undefined;

  constructor(builder: Builder, fieldName: string) {
    super(builder);
    const name = fieldName.startsWith("$") ? fieldName.slice(1) : fieldName;
    this.path = `$${builder.fieldNames.prepare(name)}`;
  }

  /** Name of a new field holding the array index of the element. */
  includeArrayIndex(includeArrayIndex: string): this {
    this.arrayIndex = includeArrayIndex;
    return this;
  }

  preserveNullAndEmptyArrays(preserveNullAndEmptyArrays = true): this {
    this.preserveEmpty = preserveNullAndEmptyArrays;
    return this;
  }

  getExpression(): Document {
    if (this.arrayIndex === undefined && this.preserveEmpty === undefined) {
      return { $unwind: this.path };
    }

    return {
      $unwind: {
        path: this.path,
        ...(this.arrayIndex === undefined ? {} : { includeArrayIndex: this.arrayIndex }),
        ...(this.preserveEmpty === undefined
          ? {}
          : { preserveNullAndEmptyArrays: this.preserveEmpty }),
      },
    };
  }
}
