import type { Document } from "mongodb";

import { StageNotFoundError } from "./common-errors.js";
import { Expr, type Operand } from "./expr.js";
import { FieldNames } from "./field-names.js";
import { type BuilderOptions, decodeBuilderOptions } from "./options.js";
import type { Stage } from "./stage.js";
import { AddFields } from "./stages/add-fields.js";
import { Count } from "./stages/count.js";
import { Group } from "./stages/group.js";
import { Limit } from "./stages/limit.js";
import { Match } from "./stages/match.js";
import { Out } from "./stages/out.js";
import { Project } from "./stages/project.js";
import { Redact } from "./stages/redact.js";
import { ReplaceRoot } from "./stages/replace-root.js";
import { Sample } from "./stages/sample.js";
import { Skip } from "./stages/skip.js";
import { Sort } from "./stages/sort.js";
import { SortByCount } from "./stages/sort-by-count.js";
import { Unwind } from "./stages/unwind.js";
import type { Dict } from "./type-utils.js";

export type SortOrder = 1 | -1 | "asc" | "desc" | "textScore";

// ==========================================
// Aggregation Pipeline Builder
// ==========================================

/**
 * Collects pipeline stages in order. Each stage method appends a new stage and
 * returns it; {@link Builder.getPipeline} produces the documents to pass to
 * `collection.aggregate()`.
 *
 * @example
 * ```ts
 * const pipeline = new Builder({ fieldNames: { id: "_id" } })
 *   .match({ status: "A" })
 *   .group()
 *   .field("_id")
 *   .expression("$customer")
 *   .field("total")
 *   .sum("$amount")
 *   .sort("total", "desc")
 *   .getPipeline();
 * ```
 */
export class Builder {
  readonly fieldNames: FieldNames;
  private readonly stages: Stage[] = [];

  constructor(options: BuilderOptions = {}) {
    const { fieldNames } = decodeBuilderOptions(options);
    this.fieldNames = new FieldNames(fieldNames);
  }

  /** A fresh expression bound to this builder's field names. */
  expr(): Expr {
    return new Expr(this.fieldNames);
  }

  addStage<S extends Stage>(stage: S): S {
    this.stages.push(stage);
    return stage;
  }

  getStage(index: number): Stage {
    const stage = this.stages[index];
    if (stage === undefined) {
      throw new StageNotFoundError({ index, message: `Could not find stage with index ${index}.` });
    }
    return stage;
  }

  getPipeline(): Document[] {
    return this.stages.map(stage => stage.getExpression());
  }

  // ==========================================
  // Operator Stages
  // ==========================================

  addFields(): AddFields {
    return this.addStage(new AddFields(this));
  }

  group(): Group {
    return this.addStage(new Group(this));
  }

  project(): Project {
    return this.addStage(new Project(this));
  }

  redact(): Redact {
    return this.addStage(new Redact(this));
  }

  replaceRoot(expression?: Operand): ReplaceRoot {
    return this.addStage(new ReplaceRoot(this, expression));
  }

  // ==========================================
  // Plain Stages
  // ==========================================

  count(fieldName: string): Count {
    return this.addStage(new Count(this, fieldName));
  }

  limit(limit: number): Limit {
    return this.addStage(new Limit(this, limit));
  }

  match(filter?: Document): Match {
    return this.addStage(new Match(this, filter));
  }

  out(collection: string): Out {
    return this.addStage(new Out(this, collection));
  }

  sample(size: number): Sample {
    return this.addStage(new Sample(this, size));
  }

  skip(skip: number): Skip {
    return this.addStage(new Skip(this, skip));
  }

  sort(fieldName: string | Dict<SortOrder>, order?: SortOrder): Sort {
    return this.addStage(new Sort(this, fieldName, order));
  }

  sortByCount(expression: Operand): SortByCount {
    return this.addStage(new SortByCount(this, expression));
  }

  unwind(fieldName: string): Unwind {
    return this.addStage(new Unwind(this, fieldName));
  }
}
