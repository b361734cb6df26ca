import { FieldNames } from "@pipewright/pipewright";
import { describe, expect, it } from "vitest";

describe("FieldNames", () => {
  const fieldNames = new FieldNames({ id: "_id" });

  it("should map the first path segment only", () => {
    expect(fieldNames.prepare("id")).toBe("_id");
    expect(fieldNames.prepare("id.sub")).toBe("_id.sub");
    expect(fieldNames.prepare("parent.id")).toBe("parent.id");
  });

  it("should map field references", () => {
    expect(fieldNames.prepareReference("$id")).toBe("$_id");
    expect(fieldNames.prepareReference("$name")).toBe("$name");
  });

  it("should leave variables and plain strings alone", () => {
    expect(fieldNames.prepareReference("$$ROOT")).toBe("$$ROOT");
    expect(fieldNames.prepareReference("id")).toBe("id");
  });

  it("should map nothing by default", () => {
    expect(new FieldNames().prepareReference("$id")).toBe("$id");
  });

  it("should ignore names inherited from Object.prototype", () => {
    const defaults = new FieldNames();

    expect(defaults.prepare("constructor")).toBe("constructor");
    expect(defaults.prepare("toString.length")).toBe("toString.length");
    expect(defaults.prepareReference("$valueOf")).toBe("$valueOf");
    expect(fieldNames.prepareReference("$hasOwnProperty")).toBe("$hasOwnProperty");
  });

  it("should map names that are also Object.prototype keys when configured", () => {
    expect(new FieldNames({ constructor: "ctor" }).prepareReference("$constructor")).toBe("$ctor");
  });
});
