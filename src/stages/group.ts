import type { Document } from "mongodb";

import { Operator } from "./operator.js";

/**
 * `$group` stage. The group key is set through `field("_id")`, accumulated
 * fields through the accumulator methods:
 *
 * @example
 * ```ts
 * builder.group().field("_id").expression("$category").field("total").sum("$amount");
 * ```
 */
export class Group extends Operator {
  getExpression(): Document {
    return { $group: this.expr.getExpression() };
  }

  // ==========================================
  // Accumulators
  // ==========================================

  addToSet = this.forward("addToSet");
  avg = this.forward("avg");
  first = this.forward("first");
  last = this.forward("last");
  max = this.forward("max");
  min = this.forward("min");
  push = this.forward("push");
  stdDevPop = this.forward("stdDevPop");
  stdDevSamp = this.forward("stdDevSamp");
  sum = this.forward("sum");
}
