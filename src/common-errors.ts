/**
 * Common error types for the expression builder, the stages and the pipeline
 * builder. All of them are thrown synchronously.
 */
import { Data } from "effect";

// ==========================================
// Expression Errors
// ==========================================

export class FieldRequiredError extends Data.TaggedError("FieldRequiredError")<{
  readonly method: string;
  readonly message: string;
}> {}

export class SwitchStatementError extends Data.TaggedError("SwitchStatementError")<{
  readonly method: string;
  readonly message: string;
}> {}

export class UnknownOperatorError extends Data.TaggedError("UnknownOperatorError")<{
  readonly method: string;
  readonly message: string;
}> {}

// ==========================================
// Pipeline Errors
// ==========================================

export class StageNotFoundError extends Data.TaggedError("StageNotFoundError")<{
  readonly index: number;
  readonly message: string;
}> {}

export class InvalidOptionsError extends Data.TaggedError("InvalidOptionsError")<{
  readonly message: string;
}> {}
