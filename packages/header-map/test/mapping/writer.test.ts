import { describe, test, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { loadMappings } from "../../src/mapping/loader.js";
import { createNodeResourceLoader } from "../../src/mapping/resources.js";
import { MappingTable } from "../../src/mapping/table.js";
import { renderMappings, writeMappings } from "../../src/mapping/writer.js";
import { createDiagnosticCollector } from "../../src/shared/diagnostics.js";

function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "header-map-writer-"));
  try {
    return fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

function sampleTable(): MappingTable {
  const table = new MappingTable();
  table.set("org.b.Z", "org/b/Z.h");
  table.set("com.a.Y", "Y.h", { kind: "source", resource: "a.properties" });
  table.set("com.a.X", "include/X.h");
  return table;
}

describe("writeMappings", () => {
  test("no destination is a silent no-op", () => {
    const reporter = createDiagnosticCollector();
    expect(writeMappings({ outputMappingDestination: undefined }, sampleTable(), { reporter })).toBe(false);
    expect(reporter.diagnostics).toHaveLength(0);
  });

  test("creates parent directories and writes sorted key=value lines", () => {
    withTempDir((dir) => {
      const file = path.join(dir, "nested", "out", "mappings.j2objc");
      const reporter = createDiagnosticCollector();

      expect(writeMappings({ outputMappingDestination: file }, sampleTable(), { reporter })).toBe(true);
      expect(fs.readFileSync(file, "utf8")).toBe(
        "com.a.X=include/X.h\ncom.a.Y=Y.h\norg.b.Z=org/b/Z.h\n",
      );
      expect(reporter.diagnostics).toHaveLength(0);
    });
  });

  test("overwrites an existing file", () => {
    withTempDir((dir) => {
      const file = path.join(dir, "mappings.j2objc");
      fs.writeFileSync(file, "stale.Entry=old.h\n", "utf8");
      const table = new MappingTable();
      table.set("fresh.Entry", "new.h");

      writeMappings({ outputMappingDestination: file }, table, { reporter: createDiagnosticCollector() });
      expect(fs.readFileSync(file, "utf8")).toBe("fresh.Entry=new.h\n");
    });
  });

  test("I/O failure is reported and does not throw", () => {
    withTempDir((dir) => {
      const blocker = path.join(dir, "blocker");
      fs.writeFileSync(blocker, "", "utf8");
      const file = path.join(blocker, "out", "mappings.j2objc");
      const reporter = createDiagnosticCollector();

      expect(writeMappings({ outputMappingDestination: file }, sampleTable(), { reporter })).toBe(false);
      expect(reporter.diagnostics).toHaveLength(1);
      expect(reporter.diagnostics[0]?.code).toBe("header-map/mapping-write-failed");
      expect(reporter.diagnostics[0]?.stage).toBe("mapping-write");
      expect(reporter.diagnostics[0]?.data).toEqual({ file });
    });
  });

  test("written file reloads into an identical table", () => {
    withTempDir((dir) => {
      const file = path.join(dir, "mappings.j2objc");
      const original = sampleTable();
      original.set("com.a.Spaced", " C:\\headers\\Spaced.h");
      writeMappings({ outputMappingDestination: file }, original, { reporter: createDiagnosticCollector() });

      const reloaded = new MappingTable();
      const reporter = createDiagnosticCollector();
      loadMappings({ inputMappingSources: [file] }, reloaded, {
        resources: createNodeResourceLoader({ cwd: dir }),
        reporter,
      });

      expect(reporter.diagnostics).toHaveLength(0);
      expect(reloaded.toRecord()).toEqual(original.toRecord());
    });
  });
});

describe("renderMappings", () => {
  test("renders only explicit entries", () => {
    expect(renderMappings(new MappingTable())).toBe("");
    expect(renderMappings(sampleTable()).split("\n")).toHaveLength(4);
  });
});
