// ==========================================
// Builder Options
// ==========================================
import { Schema as S } from "@effect/schema";
import { Either } from "effect";

import { InvalidOptionsError } from "./common-errors.js";

export const BuilderOptionsSchema = S.Struct({
  /** Property name → stored field name, applied to `$field` references and stage paths */
  fieldNames: S.optional(S.Record({ key: S.String, value: S.String })),
});

export type BuilderOptions = typeof BuilderOptionsSchema.Type;

export const decodeBuilderOptions = (input: unknown): BuilderOptions => {
  const result = S.decodeUnknownEither(BuilderOptionsSchema)(input, { onExcessProperty: "error" });
  if (Either.isLeft(result)) throw new InvalidOptionsError({ message: result.left.message });
  return result.right;
};
