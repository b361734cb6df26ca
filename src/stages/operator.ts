import type { Builder } from "../builder.js";
import { UnknownOperatorError } from "../common-errors.js";
import type { Expr, ExprArgs, ExprMethod } from "../expr.js";
import { Stage } from "../stage.js";

/**
 * Fluent interface for adding operators to aggregation stages.
 *
 * Every operator method forwards its arguments, unchanged, to the stage's
 * {@link Expr} and returns the stage, so `$project`, `$group` and friends can be
 * written as one chain:
 *
 * @example
 * ```ts
 * builder
 *   .project()
 *   .field("total")
 *   .add("$price", "$tax")
 *   .field("label")
 *   .concat("$first", " ", "$last");
 * ```
 *
 * A `$switch` branch is closed with `invoke("then", value)`, since a `then`
 * method would make the stage awaitable.
 *
 * Errors thrown by the expression are never caught here.
 */
export abstract class Operator extends Stage {
  protected readonly expr: Expr;

  constructor(builder: Builder) {
    super(builder);
    this.expr = builder.expr();
  }

  // Forwarder for one expression method; the signature is the expression's own
  protected forward =
    <K extends ExprMethod>(method: K) =>
    (...args: ExprArgs<K>): this => {
      const target: unknown = this.expr[method];
      if (typeof target !== "function") {
        throw new UnknownOperatorError({
          method,
          message: `Expression has no operator method "${method}"`,
        });
      }
      Reflect.apply(target, this.expr, args);
      return this;
    };

  /**
   * Forwards any chainable expression method by name, including the ones this
   * stage does not declare (e.g. accumulators on a `$project`).
   */
  invoke = <K extends ExprMethod>(method: K, ...args: ExprArgs<K>): this =>
    this.forward(method)(...args);

  // ==========================================
  // Field & Composition
  // ==========================================

  /** Set the current field for building the expression. */
  field = this.forward("field");
  /** Use an expression as the value of the current field. */
  expression = this.forward("expression");
  addAnd = this.forward("addAnd");
  addOr = this.forward("addOr");

  // ==========================================
  // Arithmetic
  // ==========================================

  abs = this.forward("abs");
  /** Adds numbers, or numbers (as milliseconds) and a date. */
  add = this.forward("add");
  ceil = this.forward("ceil");
  divide = this.forward("divide");
  /** Raises Euler's number to the given exponent. */
  exp = this.forward("exp");
  floor = this.forward("floor");
  ln = this.forward("ln");
  log = this.forward("log");
  log10 = this.forward("log10");
  mod = this.forward("mod");
  multiply = this.forward("multiply");
  pow = this.forward("pow");
  sqrt = this.forward("sqrt");
  /** Subtracts the second argument from the first; works on numbers and dates. */
  subtract = this.forward("subtract");
  trunc = this.forward("trunc");

  // ==========================================
  // Array
  // ==========================================

  arrayElemAt = this.forward("arrayElemAt");
  concatArrays = this.forward("concatArrays");
  /** Keeps the elements of `input` matching `cond`, in their original order. */
  filter = this.forward("filter");
  in = this.forward("in");
  indexOfArray = this.forward("indexOfArray");
  isArray = this.forward("isArray");
  map = this.forward("map");
  /** Sequence from `start` up to, not including, `end`. `step` defaults to 1. */
  range = this.forward("range");
  reduce = this.forward("reduce");
  reverseArray = this.forward("reverseArray");
  size = this.forward("size");
  slice = this.forward("slice");
  zip = this.forward("zip");

  // ==========================================
  // Boolean & Set
  // ==========================================

  allElementsTrue = this.forward("allElementsTrue");
  anyElementTrue = this.forward("anyElementTrue");
  not = this.forward("not");
  setDifference = this.forward("setDifference");
  setEquals = this.forward("setEquals");
  setIntersection = this.forward("setIntersection");
  setIsSubset = this.forward("setIsSubset");
  setUnion = this.forward("setUnion");

  // ==========================================
  // Comparison
  // ==========================================

  cmp = this.forward("cmp");
  eq = this.forward("eq");
  gt = this.forward("gt");
  gte = this.forward("gte");
  lt = this.forward("lt");
  lte = this.forward("lte");
  ne = this.forward("ne");

  // ==========================================
  // Conditional
  // ==========================================

  cond = this.forward("cond");
  ifNull = this.forward("ifNull");
  switch = this.forward("switch");
  case = this.forward("case");
  // No `then` field: it would make every stage a thenable. Use invoke("then", value).
  default = this.forward("default");

  // ==========================================
  // Date
  // ==========================================

  dateToString = this.forward("dateToString");
  dayOfMonth = this.forward("dayOfMonth");
  /** 1 (Sunday) to 7 (Saturday). */
  dayOfWeek = this.forward("dayOfWeek");
  dayOfYear = this.forward("dayOfYear");
  hour = this.forward("hour");
  /** ISO 8601 weekday, 1 (Monday) to 7 (Sunday). */
  isoDayOfWeek = this.forward("isoDayOfWeek");
  isoWeek = this.forward("isoWeek");
  isoWeekYear = this.forward("isoWeekYear");
  millisecond = this.forward("millisecond");
  minute = this.forward("minute");
  month = this.forward("month");
  second = this.forward("second");
  week = this.forward("week");
  year = this.forward("year");

  // ==========================================
  // String
  // ==========================================

  concat = this.forward("concat");
  indexOfBytes = this.forward("indexOfBytes");
  indexOfCP = this.forward("indexOfCP");
  split = this.forward("split");
  /** Case-insensitive comparison: 1, 0 or -1. */
  strcasecmp = this.forward("strcasecmp");
  strLenBytes = this.forward("strLenBytes");
  strLenCP = this.forward("strLenCP");
  substr = this.forward("substr");
  substrBytes = this.forward("substrBytes");
  substrCP = this.forward("substrCP");
  toLower = this.forward("toLower");
  toUpper = this.forward("toUpper");

  // ==========================================
  // Variables, Literals & Misc
  // ==========================================

  let = this.forward("let");
  literal = this.forward("literal");
  meta = this.forward("meta");
  /** BSON type name of the argument. */
  type = this.forward("type");
}
