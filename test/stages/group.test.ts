import { Builder } from "@pipewright/pipewright";
import { describe, expect, it } from "vitest";

describe("$group", () => {
  it("should build the group key and accumulators", () => {
    const group = new Builder()
      .group()
      .field("_id")
      .expression("$category")
      .field("total")
      .sum("$amount")
      .field("count")
      .sum(1)
      .field("names")
      .addToSet("$name");

    expect(group.getExpression()).toEqual({
      $group: {
        _id: "$category",
        total: { $sum: "$amount" },
        count: { $sum: 1 },
        names: { $addToSet: "$name" },
      },
    });
  });

  it("should accept a computed group key", () => {
    const builder = new Builder();
    const group = builder
      .group()
      .field("_id")
      .expression({ year: builder.expr().year("$date"), month: builder.expr().month("$date") })
      .field("first")
      .first("$date")
      .field("last")
      .last("$date")
      .field("items")
      .push({ item: "$item", qty: "$qty" });

    expect(group.getExpression()).toEqual({
      $group: {
        _id: { year: { $year: "$date" }, month: { $month: "$date" } },
        first: { $first: "$date" },
        last: { $last: "$date" },
        items: { $push: { item: "$item", qty: "$qty" } },
      },
    });
  });

  it("should forward the statistical accumulators", () => {
    const group = new Builder()
      .group()
      .field("_id")
      .expression(null)
      .field("avg")
      .avg("$score")
      .field("min")
      .min("$score")
      .field("max")
      .max("$score")
      .field("pop")
      .stdDevPop("$score")
      .field("samp")
      .stdDevSamp("$score");

    expect(group.getExpression()).toEqual({
      $group: {
        _id: null,
        avg: { $avg: "$score" },
        min: { $min: "$score" },
        max: { $max: "$score" },
        pop: { $stdDevPop: "$score" },
        samp: { $stdDevSamp: "$score" },
      },
    });
  });

  it("should map the group key through the builder's field names", () => {
    const group = new Builder({ fieldNames: { category: "cat" } })
      .group()
      .field("_id")
      .expression("$category");

    expect(group.getExpression()).toEqual({ $group: { _id: "$cat" } });
  });
});
