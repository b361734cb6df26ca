import { Builder } from "@pipewright/pipewright";
import { describe, expect, it } from "vitest";

describe("$match", () => {
  it("should default to an empty filter", () => {
    expect(new Builder().match().getExpression()).toEqual({ $match: {} });
  });

  it("should merge conditions added with where()", () => {
    const match = new Builder().match({ status: "A" }).where({ qty: { $gt: 2 } });

    expect(match.getExpression()).toEqual({ $match: { status: "A", qty: { $gt: 2 } } });
  });

  it("should inline aggregation expressions under $expr", () => {
    const builder = new Builder();
    const match = builder.match({ $expr: builder.expr().gt("$spent", "$budget") });

    expect(match.getExpression()).toEqual({ $match: { $expr: { $gt: ["$spent", "$budget"] } } });
  });
});
