import { BSONValue } from "bson";
import type { Document } from "mongodb";

import { FieldRequiredError, SwitchStatementError } from "./common-errors.js";
import { FieldNames } from "./field-names.js";
import type { ChainableArgs, ChainableKeys, Dict } from "./type-utils.js";

// ==========================================
// Operand Types
// ==========================================

/**
 * Anything an aggregation operator accepts: literals, `$field` references,
 * `$$variables`, nested expressions, or arrays and documents of those.
 */
export type Operand =
  | number
  | string
  | boolean
  | null
  | Date
  | RegExp
  | BSONValue
  | Expr
  | readonly Operand[]
  | { readonly [key: string]: Operand };

type SwitchBranch = { case: unknown };

const isPlainObject = (value: unknown): value is Dict<unknown> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date) &&
  !(value instanceof RegExp) &&
  !(value instanceof BSONValue);

// ==========================================
// Base Expression State & Operator Factories
// ==========================================

export class BaseExpr {
  protected expr: Dict<unknown> = {};
  protected currentField: string | undefined;
  protected switchBranch: SwitchBranch | undefined;

  constructor(protected readonly fieldNames: FieldNames = new FieldNames()) {}

  // Helper to convert nested expressions and values, mapping `$field` references
  _resolve = (value: unknown): unknown => {
    if (value instanceof BaseExpr) return BaseExpr.convertExpression(value.getExpression());
    if (typeof value === "string") return this.fieldNames.prepareReference(value);
    if (Array.isArray(value)) return value.map(this._resolve);
    if (!isPlainObject(value)) return value;

    return Object.entries(value).reduce((acc, [k, v]) => ({ ...acc, [k]: this._resolve(v) }), {});
  };

  // Document the next operator writes into: the current field, or the root
  protected target = (): Dict<unknown> => {
    if (this.currentField === undefined) return this.expr;

    const existing = Object.hasOwn(this.expr, this.currentField)
      ? this.expr[this.currentField]
      : undefined;
    if (isPlainObject(existing)) return existing;

    const created: Dict<unknown> = {};
    this.expr[this.currentField] = created;
    return created;
  };

  protected operator = (op: string, args: unknown): this => {
    this.target()[`$${op}`] = this._resolve(args);
    return this;
  };

  protected requiresSwitchStatement = (method: string): Dict<unknown> => {
    const $switch = this.target().$switch;
    if (!isPlainObject($switch)) {
      throw new SwitchStatementError({
        method,
        message: `${method} requires a valid switch statement (call switch() first).`,
      });
    }
    return $switch;
  };

  // Identity: single argument passed through
  protected id =
    (op: string) =>
    (arg: Operand): this =>
      this.operator(op, arg);

  // Varargs: multiple arguments as array
  protected varargs =
    (op: string) =>
    (...args: Operand[]): this =>
      this.operator(op, args);

  // Flexible: 1 arg -> raw value, >1 args -> array (accumulators that double as expressions)
  protected flexible =
    (op: string) =>
    (...args: Operand[]): this =>
      this.operator(op, args.length === 1 ? args[0] : args);

  // Trailing: argument list ends at the first omitted optional argument
  protected trailing =
    (op: string) =>
    (...args: (Operand | undefined)[]): this => {
      const end = args.indexOf(undefined);
      return this.operator(op, end === -1 ? args : args.slice(0, end));
    };

  // Named: positional arguments become an options document, omitted ones are left out
  protected named =
    (op: string, keys: readonly string[]) =>
    (...args: (Operand | undefined)[]): this =>
      this.operator(
        op,
        keys.reduce<Dict<unknown>>(
          (acc, key, i) => (args[i] === undefined ? acc : { ...acc, [key]: args[i] }),
          {},
        ),
      );

  /** The expression document built so far. */
  getExpression = (): Document => this.expr;

  /**
   * Converts a value containing nested expressions into a plain document, without
   * any field name mapping. Arrays and documents are copied.
   */
  static convertExpression(value: unknown): unknown {
    if (value instanceof BaseExpr) return BaseExpr.convertExpression(value.getExpression());
    if (Array.isArray(value)) return value.map(item => BaseExpr.convertExpression(item));
    if (!isPlainObject(value)) return value;

    return Object.entries(value).reduce(
      (acc, [k, v]) => ({ ...acc, [k]: BaseExpr.convertExpression(v) }),
      {},
    );
  }
}

// ==========================================
// Aggregation Expression Builder
// ==========================================

/**
 * Fluent builder for aggregation expressions.
 *
 * Operators write into the field selected with {@link Expr.field}, or into the
 * root of the expression when no field is selected:
 *
 * @example
 * ```ts
 * new Expr().field("total").add("$price", "$tax").getExpression();
 * // { total: { $add: ["$price", "$tax"] } }
 * ```
 */
export class Expr extends BaseExpr {
  // ------------------------------------------
  // Field & Composition
  // ------------------------------------------

  /** Selects the field the following operators write into. */
  field = (fieldName: string): this => {
    this.currentField = fieldName;
    return this;
  };

  /** Uses an arbitrary expression as the value of the current field. */
  expression = (value: Operand): this => {
    if (this.currentField === undefined) {
      throw new FieldRequiredError({
        method: "expression",
        message: "expression requires you set a current field using field().",
      });
    }
    this.expr[this.currentField] = this._resolve(value);
    return this;
  };

  /** Appends one or more `$and` clauses. */
  addAnd = (expression: Operand, ...expressions: Operand[]): this =>
    this.append("and", [expression, ...expressions]);

  /** Appends one or more `$or` clauses. */
  addOr = (expression: Operand, ...expressions: Operand[]): this =>
    this.append("or", [expression, ...expressions]);

  private append = (op: "and" | "or", clauses: Operand[]): this => {
    const target = this.target();
    const existing = target[`$${op}`];
    target[`$${op}`] = [
      ...(Array.isArray(existing) ? existing : []),
      ...clauses.map(this._resolve),
    ];
    return this;
  };

  // ------------------------------------------
  // Arithmetic
  // ------------------------------------------

  abs: (number: Operand) => this = this.id("abs");
  add: (expression1: Operand, expression2: Operand, ...expressions: Operand[]) => this =
    this.varargs("add");
  ceil: (number: Operand) => this = this.id("ceil");
  divide: (expression1: Operand, expression2: Operand) => this = this.varargs("divide");
  exp: (exponent: Operand) => this = this.id("exp");
  floor: (number: Operand) => this = this.id("floor");
  ln: (number: Operand) => this = this.id("ln");
  log: (number: Operand, base: Operand) => this = this.varargs("log");
  log10: (number: Operand) => this = this.id("log10");
  mod: (expression1: Operand, expression2: Operand) => this = this.varargs("mod");
  multiply: (expression1: Operand, expression2: Operand, ...expressions: Operand[]) => this =
    this.varargs("multiply");
  pow: (number: Operand, exponent: Operand) => this = this.varargs("pow");
  sqrt: (expression: Operand) => this = this.id("sqrt");
  subtract: (expression1: Operand, expression2: Operand) => this = this.varargs("subtract");
  trunc: (number: Operand) => this = this.id("trunc");

  // ------------------------------------------
  // Array
  // ------------------------------------------

  arrayElemAt: (array: Operand, index: Operand) => this = this.varargs("arrayElemAt");
  concatArrays: (array1: Operand, array2: Operand, ...arrays: Operand[]) => this =
    this.varargs("concatArrays");
  filter: (input: Operand, as: Operand, cond: Operand) => this = this.named("filter", [
    "input",
    "as",
    "cond",
  ]);
  in: (expression: Operand, arrayExpression: Operand) => this = this.varargs("in");
  indexOfArray: (
    arrayExpression: Operand,
    searchExpression: Operand,
    start?: Operand,
    end?: Operand,
  ) => this = this.trailing("indexOfArray");
  isArray: (expression: Operand) => this = this.id("isArray");
  map: (input: Operand, as: string, inExpression: Operand) => this = this.named("map", [
    "input",
    "as",
    "in",
  ]);
  range: (start: Operand, end: Operand, step?: Operand) => this = (start, end, step = 1) =>
    this.operator("range", [start, end, step]);
  reduce: (input: Operand, initialValue: Operand, inExpression: Operand) => this = this.named(
    "reduce",
    ["input", "initialValue", "in"],
  );
  reverseArray: (expression: Operand) => this = this.id("reverseArray");
  size: (expression: Operand) => this = this.id("size");
  slice: (array: Operand, n: Operand, position?: Operand) => this = (array, n, position) =>
    this.operator("slice", position === undefined ? [array, n] : [array, position, n]);
  zip: (inputs: Operand, useLongestLength?: boolean, defaults?: Operand) => this = this.named(
    "zip",
    ["inputs", "useLongestLength", "defaults"],
  );

  // ------------------------------------------
  // Boolean & Set
  // ------------------------------------------

  allElementsTrue: (expression: Operand) => this = this.id("allElementsTrue");
  anyElementTrue: (expression: Operand) => this = this.id("anyElementTrue");
  not: (expression: Operand) => this = this.id("not");
  setDifference: (expression1: Operand, expression2: Operand) => this =
    this.varargs("setDifference");
  setEquals: (expression1: Operand, expression2: Operand, ...expressions: Operand[]) => this =
    this.varargs("setEquals");
  setIntersection: (
    expression1: Operand,
    expression2: Operand,
    ...expressions: Operand[]
  ) => this = this.varargs("setIntersection");
  setIsSubset: (expression1: Operand, expression2: Operand) => this = this.varargs("setIsSubset");
  setUnion: (expression1: Operand, expression2: Operand, ...expressions: Operand[]) => this =
    this.varargs("setUnion");

  // ------------------------------------------
  // Comparison
  // ------------------------------------------

  cmp: (expression1: Operand, expression2: Operand) => this = this.varargs("cmp");
  eq: (expression1: Operand, expression2: Operand) => this = this.varargs("eq");
  gt: (expression1: Operand, expression2: Operand) => this = this.varargs("gt");
  gte: (expression1: Operand, expression2: Operand) => this = this.varargs("gte");
  lt: (expression1: Operand, expression2: Operand) => this = this.varargs("lt");
  lte: (expression1: Operand, expression2: Operand) => this = this.varargs("lte");
  ne: (expression1: Operand, expression2: Operand) => this = this.varargs("ne");

  // ------------------------------------------
  // Conditional
  // ------------------------------------------

  cond: (condition: Operand, then: Operand, otherwise: Operand) => this = this.named("cond", [
    "if",
    "then",
    "else",
  ]);
  ifNull: (expression: Operand, replacementExpression: Operand) => this = this.varargs("ifNull");

  /** Starts a `$switch` on the current target. */
  switch = (): this => this.operator("switch", {});

  /** Opens a branch of the current `$switch`; close it with {@link Expr.then}. */
  case = (expression: Operand): this => {
    this.requiresSwitchStatement("case");
    this.switchBranch = { case: this._resolve(expression) };
    return this;
  };

  then = (expression: Operand): this => {
    const $switch = this.requiresSwitchStatement("then");
    if (this.switchBranch === undefined) {
      throw new SwitchStatementError({
        method: "then",
        message: "then requires a valid case statement (call case() first).",
      });
    }

    const branches = Array.isArray($switch.branches) ? $switch.branches : [];
    $switch.branches = [...branches, { ...this.switchBranch, then: this._resolve(expression) }];
    this.switchBranch = undefined;
    return this;
  };

  default = (expression: Operand): this => {
    this.requiresSwitchStatement("default").default = this._resolve(expression);
    return this;
  };

  // ------------------------------------------
  // Date
  // ------------------------------------------

  dateToString: (format: string, expression: Operand) => this = this.named("dateToString", [
    "format",
    "date",
  ]);
  dayOfMonth: (expression: Operand) => this = this.id("dayOfMonth");
  dayOfWeek: (expression: Operand) => this = this.id("dayOfWeek");
  dayOfYear: (expression: Operand) => this = this.id("dayOfYear");
  hour: (expression: Operand) => this = this.id("hour");
  isoDayOfWeek: (expression: Operand) => this = this.id("isoDayOfWeek");
  isoWeek: (expression: Operand) => this = this.id("isoWeek");
  isoWeekYear: (expression: Operand) => this = this.id("isoWeekYear");
  millisecond: (expression: Operand) => this = this.id("millisecond");
  minute: (expression: Operand) => this = this.id("minute");
  month: (expression: Operand) => this = this.id("month");
  second: (expression: Operand) => this = this.id("second");
  week: (expression: Operand) => this = this.id("week");
  year: (expression: Operand) => this = this.id("year");

  // ------------------------------------------
  // String
  // ------------------------------------------

  concat: (expression1: Operand, expression2: Operand, ...expressions: Operand[]) => this =
    this.varargs("concat");
  indexOfBytes: (
    stringExpression: Operand,
    substringExpression: Operand,
    start?: Operand,
    end?: Operand,
  ) => this = this.trailing("indexOfBytes");
  indexOfCP: (
    stringExpression: Operand,
    substringExpression: Operand,
    start?: Operand,
    end?: Operand,
  ) => this = this.trailing("indexOfCP");
  split: (string: Operand, delimiter: Operand) => this = this.varargs("split");
  strcasecmp: (expression1: Operand, expression2: Operand) => this = this.varargs("strcasecmp");
  strLenBytes: (string: Operand) => this = this.id("strLenBytes");
  strLenCP: (string: Operand) => this = this.id("strLenCP");
  substr: (string: Operand, start: Operand, length: Operand) => this = this.varargs("substr");
  substrBytes: (string: Operand, start: Operand, count: Operand) => this =
    this.varargs("substrBytes");
  substrCP: (string: Operand, start: Operand, count: Operand) => this = this.varargs("substrCP");
  toLower: (expression: Operand) => this = this.id("toLower");
  toUpper: (expression: Operand) => this = this.id("toUpper");

  // ------------------------------------------
  // Variables, Literals & Misc
  // ------------------------------------------

  let: (vars: Operand, inExpression: Operand) => this = this.named("let", ["vars", "in"]);

  /** Returns a value without parsing; `$`-prefixed strings are kept as they are. */
  literal = (value: Operand): this => {
    this.target().$literal = BaseExpr.convertExpression(value);
    return this;
  };

  meta: (metaDataKeyword: string) => this = this.id("meta");
  type: (expression: Operand) => this = this.id("type");

  // ------------------------------------------
  // Accumulators
  // ------------------------------------------

  addToSet: (expression: Operand) => this = this.id("addToSet");
  avg: (expression: Operand, ...expressions: Operand[]) => this = this.flexible("avg");
  first: (expression: Operand) => this = this.id("first");
  last: (expression: Operand) => this = this.id("last");
  max: (expression: Operand, ...expressions: Operand[]) => this = this.flexible("max");
  min: (expression: Operand, ...expressions: Operand[]) => this = this.flexible("min");
  push: (expression: Operand) => this = this.id("push");
  stdDevPop: (expression: Operand, ...expressions: Operand[]) => this = this.flexible("stdDevPop");
  stdDevSamp: (expression: Operand, ...expressions: Operand[]) => this =
    this.flexible("stdDevSamp");
  sum: (expression: Operand, ...expressions: Operand[]) => this = this.flexible("sum");
}

// ==========================================
// Chainable Surface
// ==========================================

/** Every chainable `Expr` method, i.e. what an operator wrapper can forward to. */
export type ExprMethod = ChainableKeys<Expr>;

export type ExprArgs<K extends ExprMethod> = ChainableArgs<Expr, K>;
