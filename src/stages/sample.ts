import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import { Stage } from "../stage.js";

export class Sample extends Stage {
  constructor(
    builder: Builder,
    private readonly size: number,
  ) {
    super(builder);
  }

  getExpression(): Document {
    return { $sample: { size: this.size } };
  }
}
