import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import { Stage } from "../stage.js";

export class Count extends Stage {
  constructor(
    builder: Builder,
    private readonly fieldName: string,
  ) {
    super(builder);
  }

  getExpression(): Document {
    return { $count: this.fieldName };
  }
}
