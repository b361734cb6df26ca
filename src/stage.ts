import type { Document } from "mongodb";

import type { Builder, SortOrder } from "./builder.js";
import type { Operand } from "./expr.js";
import type { AddFields } from "./stages/add-fields.js";
import type { Count } from "./stages/count.js";
import type { Group } from "./stages/group.js";
import type { Limit } from "./stages/limit.js";
import type { Match } from "./stages/match.js";
import type { Out } from "./stages/out.js";
import type { Project } from "./stages/project.js";
import type { Redact } from "./stages/redact.js";
import type { ReplaceRoot } from "./stages/replace-root.js";
import type { Sample } from "./stages/sample.js";
import type { Skip } from "./stages/skip.js";
import type { Sort } from "./stages/sort.js";
import type { SortByCount } from "./stages/sort-by-count.js";
import type { Unwind } from "./stages/unwind.js";
import type { Dict } from "./type-utils.js";

/**
 * A single pipeline stage.
 *
 * Stages keep a reference to their builder so a chain can move on to the next
 * stage: `builder.match(filter).group().field("_id")...`.
 */
export abstract class Stage {
  constructor(protected readonly builder: Builder) {}

  /** The stage document, e.g. `{ $limit: 10 }`. */
  abstract getExpression(): Document;

  getPipeline(): Document[] {
    return this.builder.getPipeline();
  }

  // ==========================================
  // Next Stage
  // ==========================================

  addFields(): AddFields {
    return this.builder.addFields();
  }

  count(fieldName: string): Count {
    return this.builder.count(fieldName);
  }

  group(): Group {
    return this.builder.group();
  }

  limit(limit: number): Limit {
    return this.builder.limit(limit);
  }

  match(filter?: Document): Match {
    return this.builder.match(filter);
  }

  out(collection: string): Out {
    return this.builder.out(collection);
  }

  project(): Project {
    return this.builder.project();
  }

  redact(): Redact {
    return this.builder.redact();
  }

  replaceRoot(expression?: Operand): ReplaceRoot {
    return this.builder.replaceRoot(expression);
  }

  sample(size: number): Sample {
    return this.builder.sample(size);
  }

  skip(skip: number): Skip {
    return this.builder.skip(skip);
  }

  sort(fieldName: string | Dict<SortOrder>, order?: SortOrder): Sort {
    return this.builder.sort(fieldName, order);
  }

  sortByCount(expression: Operand): SortByCount {
    return this.builder.sortByCount(expression);
  }

  unwind(fieldName: string): Unwind {
    return this.builder.unwind(fieldName);
  }
}
