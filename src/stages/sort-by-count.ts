import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import type { Operand } from "../expr.js";
import { Stage } from "../stage.js";

export class SortByCount extends Stage {
  constructor(
    builder: Builder,
    private readonly expression: Operand,
  ) {
    super(builder);
  }

  getExpression(): Document {
    return { $sortByCount: this.builder.expr()._resolve(this.expression) };
  }
}
