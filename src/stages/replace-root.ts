import type { Document } from "mongodb";

import type { Builder } from "../builder.js";
import type { Operand } from "../expr.js";
import { Operator } from "./operator.js";

/**
 * `$replaceRoot` stage. The new root is either the expression given when the
 * stage was created, or the document built through the operator methods.
 */
export class ReplaceRoot extends Operator {
  constructor(
    builder: Builder,
    private readonly newRoot?: Operand,
  ) {
    super(builder);
  }

  getExpression(): Document {
    return {
      $replaceRoot: {
        newRoot:
          this.newRoot === undefined ? this.expr.getExpression() : this.expr._resolve(this.newRoot),
      },
    };
  }
}
