import path from "node:path";
import { HeaderMapError, HeaderMapErrorCode } from "../model/errors.js";
import { parseOutputStyle, type OutputStyle, type ResolverConfig } from "../model/types.js";

export interface HeaderPathResolverOptions {
  outputStyle?: OutputStyle | string;
  combineJars?: boolean;
  includeGeneratedSources?: boolean;
  /** Array of resource names, or a comma-separated list (`""` loads nothing). */
  mappingSources?: readonly string[] | string;
  outputMappingFile?: string;
  /** Defaults to the platform separator. */
  pathSeparator?: string;
}

export function defaultResolverConfig(): ResolverConfig {
  return {
    outputStyle: "package",
    combineJars: false,
    includeGeneratedSources: false,
    inputMappingSources: undefined,
    outputMappingDestination: undefined,
    pathSeparator: path.sep,
  };
}

/** `""` → `[]`; otherwise comma-split, trimmed, blanks dropped. */
export function parseMappingSourceList(list: string): string[] {
  if (list.trim() === "") return [];
  return list
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function resolveOutputStyleOption(value: OutputStyle | string): OutputStyle {
  const style = parseOutputStyle(value);
  if (style === undefined) {
    throw new HeaderMapError(
      `Unknown output style '${value}' (expected package, source or none)`,
      HeaderMapErrorCode.INVALID_OUTPUT_STYLE,
    );
  }
  return style;
}
