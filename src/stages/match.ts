import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import { Stage } from "../stage.js";

export class Match extends Stage {
  private filter: Document;

  constructor(builder: Builder, filter: Document = {}) {
    super(builder);
    this.filter = filter;
  }

  /** Merges more conditions into the filter; later keys win. */
  where(filter: Document): this {
    this.filter = { ...this.filter, ...filter };
    return this;
  }

  getExpression(): Document {
    return { $match: this.builder.expr()._resolve(this.filter) };
  }
}
