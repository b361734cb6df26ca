import type { Document } from "mongodb";

import type { Builder, SortOrder } from "../builder.js";
import { Stage } from "../stage.js";
import type { Dict } from "../type-utils.js";

type SortValue = 1 | -1 | { $meta: "textScore" };

const toSortValue = (order: SortOrder): SortValue => {
  if (order === "textScore") return { $meta: order };
  if (order === "asc") return 1;
  if (order === "desc") return -1;
  return order;
};

export class Sort extends Stage {
  private readonly fields: Dict<SortValue>;

  constructor(builder: Builder, fieldName: string | Dict<SortOrder>, order: SortOrder = 1) {
    super(builder);
    const fields = typeof fieldName === "string" ? { [fieldName]: order } : fieldName;
    this.fields = Object.entries(fields).reduce<Dict<SortValue>>(
      (acc, [field, value]) => ({
        ...acc,
        [builder.fieldNames.prepare(field)]: toSortValue(value),
      }),
      {},
    );
  }

  getExpression(): Document {
    return { $sort: this.fields };
  }
}
