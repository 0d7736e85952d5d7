/* =======================================================================================
 * HEADER MAP MODEL
 * ---------------------------------------------------------------------------------------
 * Output styles, type/unit descriptors handed over by the translator front end,
 * and the resolver configuration value.
 * ======================================================================================= */

/**
 * Where generated files are placed below the output directory.
 *
 * - `package`: the type's package, like javac
 * - `source`: the relative directory of the input file
 * - `none`: no relative directory
 */
export type OutputStyle = "package" | "source" | "none";

export const OutputStyle = {
  PACKAGE: "package",
  SOURCE: "source",
  NONE: "none",
} as const satisfies Record<string, OutputStyle>;

export const OUTPUT_STYLES: readonly OutputStyle[] = ["package", "source", "none"];

export function parseOutputStyle(text: string): OutputStyle | undefined {
  const normalized = text.trim().toLowerCase();
  return OUTPUT_STYLES.find((style) => style === normalized);
}

/** A package as seen by the translator; `name === ""` is the unnamed package. */
export interface PackageDescriptor {
  readonly name: string;
}

export interface TypeIdentifier {
  /** Dotted name with generic arguments erased, e.g. `java.util.List`. */
  readonly qualifiedName: string;
  /** Erased simple name, e.g. `List`. */
  readonly simpleName: string;
  readonly package: PackageDescriptor | null;
}

export interface CompilationUnitDescriptor {
  readonly package: PackageDescriptor | null;
  readonly mainTypeName: string;
}

/** Author-declared per-type header, attached to the source element. */
export type ExplicitHeaderLookup = (type: TypeIdentifier) => string | null | undefined;

export interface ResolverConfig {
  outputStyle: OutputStyle;
  /** Variant of `source`: sources from jars are combined into one header and source file. */
  combineJars: boolean;
  /** Variant of `source`: annotation-generated sources share the output of their origin. */
  includeGeneratedSources: boolean;
  /** `undefined` loads the default resource; `[]` loads nothing. */
  inputMappingSources: readonly string[] | undefined;
  /** `undefined` skips persistence. */
  outputMappingDestination: string | undefined;
  pathSeparator: string;
}
