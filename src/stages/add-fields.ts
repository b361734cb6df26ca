import type { Document } from "mongodb";

import { Operator } from "./operator.js";

export class AddFields extends Operator {
  getExpression(): Document {
    return { $addFields: this.expr.getExpression() };
  }
}
