import { describe, test, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { createNodeResourceLoader } from "../../src/mapping/resources.js";
import { MappingResourceNotFoundError } from "../../src/model/errors.js";

function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "header-map-resources-"));
  try {
    return fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

describe("createNodeResourceLoader", () => {
  test("reads relative names against cwd before the roots", () => {
    withTempDir((dir) => {
      const cwd = path.join(dir, "cwd");
      const root = path.join(dir, "root");
      fs.mkdirSync(cwd);
      fs.mkdirSync(root);
      fs.writeFileSync(path.join(cwd, "m.properties"), "from=cwd\n", "utf8");
      fs.writeFileSync(path.join(root, "m.properties"), "from=root\n", "utf8");
      fs.writeFileSync(path.join(root, "only-root.properties"), "from=root\n", "utf8");

      const loader = createNodeResourceLoader({ cwd, roots: [root] });
      expect(loader.read("m.properties")).toBe("from=cwd\n");
      expect(loader.read("only-root.properties")).toBe("from=root\n");
    });
  });

  test("reads absolute names as-is", () => {
    withTempDir((dir) => {
      const file = path.join(dir, "abs.properties");
      fs.writeFileSync(file, "a.B=b.h\n", "utf8");
      expect(createNodeResourceLoader({ cwd: os.tmpdir() }).read(file)).toBe("a.B=b.h\n");
    });
  });

  test("throws not-found when no candidate exists", () => {
    withTempDir((dir) => {
      const loader = createNodeResourceLoader({ cwd: dir, roots: [path.join(dir, "nope")] });
      expect(() => loader.read("mappings.j2objc")).toThrow(MappingResourceNotFoundError);
    });
  });

  test("other read errors propagate", () => {
    withTempDir((dir) => {
      fs.mkdirSync(path.join(dir, "folder.properties"));
      const loader = createNodeResourceLoader({ cwd: dir });
      let caught: unknown;
      try {
        loader.read("folder.properties");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(Error);
      expect(caught).not.toBeInstanceOf(MappingResourceNotFoundError);
    });
  });
});
