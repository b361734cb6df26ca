import type { Document } from "mongodb";

import { Operator } from "./operator.js";

/**
 * `$project` stage. Besides the expression operators, fields can be included or
 * excluded by name.
 */
export class Project extends Operator {
  getExpression(): Document {
    return { $project: this.expr.getExpression() };
  }

  includeFields(fields: readonly string[]): this {
    fields.forEach(field => this.expr.field(field).expression(true));
    return this;
  }

  excludeFields(fields: readonly string[]): this {
    fields.forEach(field => this.expr.field(field).expression(false));
    return this;
  }

  /** Shorthand for `excludeFields(["_id"])`. */
  excludeIdField(): this {
    return this.excludeFields(["_id"]);
  }

  // $project accepts these with one argument or with a list of expressions
  avg = this.forward("avg");
  max = this.forward("max");
  min = this.forward("min");
  stdDevPop = this.forward("stdDevPop");
  stdDevSamp = this.forward("stdDevSamp");
  sum = this.forward("sum");
}
