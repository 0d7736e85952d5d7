/**
 * Mapping Resource Access
 *
 * Abstract access to named mapping resources. Hosts implement this for their
 * environment; a Node.js file-system loader and an in-memory loader ship here.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { MappingResourceNotFoundError } from "../model/errors.js";

export interface MappingResourceLoader {
  /**
   * Read a resource as UTF-8 text.
   *
   * @throws MappingResourceNotFoundError when the resource does not exist
   */
  read(name: string): string;
}

export interface NodeResourceLoaderOptions {
  /** Base for relative names. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Extra directories searched, in order, after `cwd`. */
  roots?: readonly string[];
}

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

function isMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    MISSING_CODES.has(error.code)
  );
}

/**
 * Create a file-system resource loader.
 *
 * @example
 * ```typescript
 * const resources = createNodeResourceLoader({ roots: ["/opt/translator/lib"] });
 * resources.read("mappings.j2objc");
 * ```
 */
export function createNodeResourceLoader(options?: NodeResourceLoaderOptions): MappingResourceLoader {
  const cwd = options?.cwd ?? process.cwd();
  const roots = options?.roots ?? [];

  return {
    read(name: string): string {
      const candidates = nodePath.isAbsolute(name)
        ? [name]
        : [nodePath.resolve(cwd, name), ...roots.map((root) => nodePath.resolve(root, name))];
      for (const candidate of candidates) {
        try {
          return fs.readFileSync(candidate, "utf-8");
        } catch (error) {
          if (isMissing(error)) continue;
          throw error;
        }
      }
      throw new MappingResourceNotFoundError(name);
    },
  };
}

/** In-memory resources keyed by name. */
export function createMemoryResourceLoader(
  resources: Readonly<Record<string, string>>,
): MappingResourceLoader {
  const map = new Map(Object.entries(resources));
  return {
    read(name: string): string {
      const text = map.get(name);
      if (text === undefined) {
        throw new MappingResourceNotFoundError(name);
      }
      return text;
    },
  };
}
