import { Builder } from "@pipewright/pipewright";
import { describe, expect, it } from "vitest";

describe("$sortByCount", () => {
  it("should group by a field reference", () => {
    expect(new Builder().sortByCount("$tags").getExpression()).toEqual({ $sortByCount: "$tags" });
  });

  it("should group by an expression", () => {
    const builder = new Builder();

    expect(builder.sortByCount(builder.expr().toLower("$tag")).getExpression()).toEqual({
      $sortByCount: { $toLower: "$tag" },
    });
  });
});
