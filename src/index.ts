// ==========================================
// Curated Public API — only intentional exports, no internal leakage
// ==========================================

// --- Pipeline builder ---
export type { SortOrder } from "./builder.js";
export { Builder } from "./builder.js";
export type { BuilderOptions } from "./options.js";
export { BuilderOptionsSchema } from "./options.js";
export { FieldNames } from "./field-names.js";

// --- Expression builder ---
export type { ExprArgs, ExprMethod, Operand } from "./expr.js";
export { BaseExpr, Expr } from "./expr.js";

// --- Errors ---
export {
  FieldRequiredError,
  InvalidOptionsError,
  StageNotFoundError,
  SwitchStatementError,
  UnknownOperatorError,
} from "./common-errors.js";

// --- Stages ---
export { Stage } from "./stage.js";
export { AddFields } from "./stages/add-fields.js";
export { Count } from "./stages/count.js";
export { Group } from "./stages/group.js";
export { Limit } from "./stages/limit.js";
export { Match } from "./stages/match.js";
export { Operator } from "./stages/operator.js";
export { Out } from "./stages/out.js";
export { Project } from "./stages/project.js";
export { Redact } from "./stages/redact.js";
export { ReplaceRoot } from "./stages/replace-root.js";
export { Sample } from "./stages/sample.js";
export { Skip } from "./stages/skip.js";
export { Sort } from "./stages/sort.js";
export { SortByCount } from "./stages/sort-by-count.js";
export { Unwind } from "./stages/unwind.js";
