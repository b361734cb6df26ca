import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import { Stage } from "../stage.js";

export class Out extends Stage {
  constructor(
    builder: Builder,
    private readonly collection: string,
  ) {
    super(builder);
  }

  getExpression(): Document {
    return { $out: this.collection };
  }
}
