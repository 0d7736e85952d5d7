// Header map package public API
//
// Resolves header and output paths for translated types and manages the
// override mapping table. Import from here rather than deep paths.

// === Model ===
export { OutputStyle, OUTPUT_STYLES, parseOutputStyle } from "./model/types.js";
export type {
  CompilationUnitDescriptor,
  ExplicitHeaderLookup,
  PackageDescriptor,
  ResolverConfig,
  TypeIdentifier,
} from "./model/types.js";
export { createCompilationUnit, createTypeIdentifier, eraseTypeName, packageDescriptor } from "./model/identity.js";
export {
  HeaderMapError,
  HeaderMapErrorCode,
  HeaderMapStateError,
  MappingResourceNotFoundError,
  PropertiesSyntaxError,
} from "./model/errors.js";
export type { HeaderMapErrorCodeType } from "./model/errors.js";

// === Diagnostics ===
export { HeaderMapDiagnosticCode } from "./model/diagnostics.js";
export type { HeaderMapDiagnosticCodeType } from "./model/diagnostics.js";
export {
  buildDiagnostic,
  createConsoleReporter,
  createDiagnosticCollector,
} from "./shared/diagnostics.js";
export type {
  BuildDiagnosticInput,
  DiagnosticCollector,
  DiagnosticReporter,
  DiagnosticSeverity,
  DiagnosticStage,
  HeaderMapDiagnostic,
} from "./shared/diagnostics.js";

// === Debug ===
export { configureDebug, debug, getDebugChannel, isDebugEnabled, refreshDebugChannels } from "./shared/debug.js";
export type { DebugChannel, DebugConfig, DebugData } from "./shared/debug.js";

// === Platform packages ===
export { PLATFORM_PACKAGES, isPlatformPackage } from "./platform/platform-packages.js";

// === Mapping table ===
export { MappingTable } from "./mapping/table.js";
export type { MappingEntry, MappingProvenance } from "./mapping/table.js";
export { parseProperties, serializeProperties } from "./mapping/properties.js";
export type { PropertyPair } from "./mapping/properties.js";
export { createMemoryResourceLoader, createNodeResourceLoader } from "./mapping/resources.js";
export type { MappingResourceLoader, NodeResourceLoaderOptions } from "./mapping/resources.js";
export { DEFAULT_MAPPING_RESOURCE, loadMappings } from "./mapping/loader.js";
export type { LoadMappingsOptions, MappingLoadResult } from "./mapping/loader.js";
export { renderMappings, writeMappings } from "./mapping/writer.js";
export type { WriteMappingsOptions } from "./mapping/writer.js";

// === Resolver ===
export { HeaderPathResolver, createHeaderPathResolver } from "./resolver/header-path-resolver.js";
export { defaultResolverConfig, parseMappingSourceList } from "./resolver/config.js";
export type { HeaderPathResolverOptions } from "./resolver/config.js";
