import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import { Stage } from "../stage.js";

export class Skip extends Stage {
  constructor(
    builder: Builder,
    private readonly value: number,
  ) {
    super(builder);
  }

  getExpression(): Document {
    return { $skip: this.value };
  }
}
