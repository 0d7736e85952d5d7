import { describe, test, expect } from "vitest";

import { MappingTable } from "../../src/mapping/table.js";
import { HeaderMapStateError } from "../../src/model/errors.js";

describe("MappingTable", () => {
  test("last write wins and records the latest provenance", () => {
    const table = new MappingTable();
    table.set("com.x.Y", "X1.h", { kind: "source", resource: "a.properties" });
    table.set("com.x.Y", "X2.h");

    expect(table.get("com.x.Y")).toBe("X2.h");
    expect(table.getEntry("com.x.Y")?.provenance).toEqual({ kind: "programmatic" });
    expect(table.size).toBe(1);
  });

  test("merge applies pairs in order", () => {
    const table = new MappingTable();
    const count = table.merge(
      [
        ["a.B", "first.h"],
        ["a.C", "c.h"],
        ["a.B", "second.h"],
      ],
      { kind: "default", resource: "mappings.j2objc" },
    );

    expect(count).toBe(3);
    expect(table.toRecord()).toEqual({ "a.B": "second.h", "a.C": "c.h" });
  });

  test("entries are sorted by key in code-unit order", () => {
    const table = new MappingTable();
    table.set("org.b.Z", "z.h");
    table.set("com.a.b", "b.h");
    table.set("com.a.B", "B.h");

    expect(table.entries().map((e) => e.qualifiedName)).toEqual(["com.a.B", "com.a.b", "org.b.Z"]);
  });

  test("frozen table rejects writes but still answers reads", () => {
    const table = new MappingTable();
    table.set("a.B", "b.h");
    table.freeze();

    expect(table.isFrozen).toBe(true);
    expect(() => table.set("a.C", "c.h")).toThrow(HeaderMapStateError);
    expect(table.get("a.B")).toBe("b.h");
    expect(table.has("a.C")).toBe(false);
  });
});
