import type { Document } from "mongodb";

import { Operator } from "./operator.js";

// Usually built as a $cond or $switch resolving to $$DESCEND, $$PRUNE or $$KEEP
export class Redact extends Operator {
  getExpression(): Document {
    return { $redact: this.expr.getExpression() };
  }
}
