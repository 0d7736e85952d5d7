/**
 * Header Path Resolver
 *
 * Single source of truth for where a translated type's header, and a
 * compilation unit's generated files, are written. One instance is created per
 * translation run: configure and load first, then query.
 */

import { HeaderMapStateError } from "../model/errors.js";
import type { DiagnosticReporter } from "../model/diagnostics.js";
import type {
  CompilationUnitDescriptor,
  ExplicitHeaderLookup,
  OutputStyle,
  PackageDescriptor,
  ResolverConfig,
  TypeIdentifier,
} from "../model/types.js";
import { loadMappings, type MappingLoadResult } from "../mapping/loader.js";
import type { MappingResourceLoader } from "../mapping/resources.js";
import { MappingTable, type MappingEntry } from "../mapping/table.js";
import { writeMappings } from "../mapping/writer.js";
import { isPlatformPackage } from "../platform/platform-packages.js";
import { debug } from "../shared/debug.js";
import {
  defaultResolverConfig,
  parseMappingSourceList,
  resolveOutputStyleOption,
  type HeaderPathResolverOptions,
} from "./config.js";

function assertUnreachable(_x: never): never {
  throw new Error("unreachable");
}

export class HeaderPathResolver {
  #config: ResolverConfig = defaultResolverConfig();
  #table = new MappingTable();
  #sealed = false;

  constructor(options: HeaderPathResolverOptions = {}) {
    if (options.pathSeparator !== undefined) this.#config.pathSeparator = options.pathSeparator;
    if (options.outputStyle !== undefined) this.configure(resolveOutputStyleOption(options.outputStyle));
    if (options.combineJars) this.enableCombineJars();
    if (options.includeGeneratedSources) this.enableIncludeGeneratedSources();
    if (options.mappingSources !== undefined) {
      if (typeof options.mappingSources === "string") {
        this.setMappingSourceList(options.mappingSources);
      } else {
        this.setInputMappingSources(options.mappingSources);
      }
    }
    if (options.outputMappingFile !== undefined) this.setOutputMappingDestination(options.outputMappingFile);
  }

  // === Configuration phase ===

  configure(style: OutputStyle): void {
    this.#assertMutable("set output style");
    this.#config.outputStyle = style;
    debug.config("output-style", { style });
  }

  enableCombineJars(): void {
    this.#assertMutable("combine jars");
    this.#config.outputStyle = "source";
    this.#config.combineJars = true;
    debug.config("combine-jars");
  }

  enableIncludeGeneratedSources(): void {
    this.#assertMutable("include generated sources");
    this.#config.outputStyle = "source";
    this.#config.includeGeneratedSources = true;
    debug.config("include-generated-sources");
  }

  /** `undefined` selects the default resource; `[]` loads nothing. */
  setInputMappingSources(sources: readonly string[] | undefined): void {
    this.#assertMutable("set mapping sources");
    this.#config.inputMappingSources = sources === undefined ? undefined : [...sources];
    debug.config("mapping-sources", { sources: this.#config.inputMappingSources });
  }

  /** Comma-separated form; an empty string loads nothing. */
  setMappingSourceList(list: string): void {
    this.setInputMappingSources(parseMappingSourceList(list));
  }

  setOutputMappingDestination(file: string | undefined): void {
    this.#assertMutable("set output mapping file");
    this.#config.outputMappingDestination = file;
    debug.config("output-mapping-file", { file });
  }

  addOverride(qualifiedName: string, header: string): void {
    this.#assertMutable(`map ${qualifiedName}`);
    this.#table.set(qualifiedName, header);
  }

  loadMappings(resources: MappingResourceLoader, reporter: DiagnosticReporter): MappingLoadResult {
    this.#assertMutable("load mappings");
    return loadMappings(this.#config, this.#table, { resources, reporter });
  }

  /** Enter the query phase: later configuration or override changes throw. */
  seal(): void {
    this.#sealed = true;
    this.#table.freeze();
  }

  get isSealed(): boolean {
    return this.#sealed;
  }

  // === Layout policy ===

  get outputStyle(): OutputStyle {
    return this.#config.outputStyle;
  }

  /** Output locations follow the input file's location rather than its package. */
  usesSourceDirectories(): boolean {
    return this.#config.outputStyle === "source";
  }

  usesCombinedSourceJars(): boolean {
    return this.usesSourceDirectories() && this.#config.combineJars;
  }

  usesGeneratedSourceInclusion(): boolean {
    return this.usesSourceDirectories() && this.#config.includeGeneratedSources;
  }

  snapshotConfig(): Readonly<ResolverConfig> {
    return Object.freeze({ ...this.#config });
  }

  // === Query phase ===

  resolveHeaderPath(type: TypeIdentifier, explicitHeaderLookup?: ExplicitHeaderLookup): string {
    const explicit = explicitHeaderLookup?.(type);
    if (explicit !== undefined && explicit !== null) {
      debug.resolve("header.explicit", { type: type.qualifiedName, header: explicit });
      return explicit;
    }

    const mapped = this.#table.get(type.qualifiedName);
    if (mapped !== undefined) {
      debug.resolve("header.mapped", { type: type.qualifiedName, header: mapped });
      return mapped;
    }

    const header = `${this.directoryPrefix(type.package)}${type.simpleName}.h`;
    debug.resolve("header.computed", { type: type.qualifiedName, header });
    return header;
  }

  lookupOverride(qualifiedName: string): string | undefined {
    return this.#table.get(qualifiedName);
  }

  lookupOverrideEntry(qualifiedName: string): MappingEntry | undefined {
    return this.#table.getEntry(qualifiedName);
  }

  /** Extension-less path of the unit's primary generated file. */
  resolveOutputPath(unit: CompilationUnitDescriptor): string {
    return this.directoryPrefix(unit.package) + unit.mainTypeName;
  }

  directoryPrefix(pkg: PackageDescriptor | null | undefined): string {
    if (!pkg || pkg.name === "") {
      return "";
    }
    // Platform headers keep package directories whatever the project's style.
    const style: OutputStyle = isPlatformPackage(pkg.name) ? "package" : this.#config.outputStyle;
    switch (style) {
      case "package": {
        const sep = this.#config.pathSeparator;
        return pkg.name.split(".").join(sep) + sep;
      }
      case "source":
      case "none":
        return "";
      default:
        return assertUnreachable(style);
    }
  }

  // === Persistence ===

  writeMappings(reporter: DiagnosticReporter): boolean {
    return writeMappings(this.#config, this.#table, { reporter });
  }

  #assertMutable(operation: string): void {
    if (this.#sealed) {
      throw new HeaderMapStateError(operation);
    }
  }
}

export function createHeaderPathResolver(options?: HeaderPathResolverOptions): HeaderPathResolver {
  return new HeaderPathResolver(options);
}
