import type { DiagnosticReporter, HeaderMapDiagnostic } from "../model/diagnostics.js";
import { HeaderMapDiagnosticCode } from "../model/diagnostics.js";
import { MappingResourceNotFoundError } from "../model/errors.js";
import type { ResolverConfig } from "../model/types.js";
import { debug } from "../shared/debug.js";
import { buildDiagnostic, errorMessage } from "../shared/diagnostics.js";
import { parseProperties } from "./properties.js";
import type { MappingResourceLoader } from "./resources.js";
import type { MappingProvenance, MappingTable } from "./table.js";

/** Resource read when no mapping sources are configured. */
export const DEFAULT_MAPPING_RESOURCE = "mappings.j2objc";

export interface LoadMappingsOptions {
  resources: MappingResourceLoader;
  reporter: DiagnosticReporter;
}

export interface MappingLoadResult {
  /** Resources merged into the table, in load order. */
  loaded: string[];
  /** True when the default resource was absent. */
  skippedDefault: boolean;
  failure?: HeaderMapDiagnostic;
}

interface LoadStep {
  name: string;
  provenance: MappingProvenance;
}

function loadOne(
  name: string,
  provenance: MappingProvenance,
  table: MappingTable,
  resources: MappingResourceLoader,
): number {
  // Parse fully before merging so a malformed resource contributes nothing.
  const pairs = parseProperties(resources.read(name));
  return table.merge(pairs, provenance);
}

/**
 * Populate `table` from the configured mapping sources.
 *
 * A missing default resource is normal and stays silent. The first failure on
 * any resource is reported once and ends loading; entries merged before it stay.
 */
export function loadMappings(
  config: Pick<ResolverConfig, "inputMappingSources">,
  table: MappingTable,
  options: LoadMappingsOptions,
): MappingLoadResult {
  const { resources, reporter } = options;
  const result: MappingLoadResult = { loaded: [], skippedDefault: false };
  const sources = config.inputMappingSources;

  const plan: LoadStep[] = sources === undefined
    ? [{ name: DEFAULT_MAPPING_RESOURCE, provenance: { kind: "default", resource: DEFAULT_MAPPING_RESOURCE } }]
    : sources.map((name): LoadStep => ({ name, provenance: { kind: "source", resource: name } }));

  for (const { name, provenance } of plan) {
    try {
      const count = loadOne(name, provenance, table, resources);
      result.loaded.push(name);
      debug.load("resource.merged", { resource: name, entries: count, kind: provenance.kind });
    } catch (error) {
      if (provenance.kind === "default" && error instanceof MappingResourceNotFoundError) {
        result.skippedDefault = true;
        debug.load("default.absent", { resource: name });
        break;
      }
      const failure = buildDiagnostic({
        code: HeaderMapDiagnosticCode.MAPPING_LOAD_FAILED,
        message: errorMessage(error),
        stage: "mapping-load",
        data: { resource: name },
      });
      reporter.report(failure);
      result.failure = failure;
      debug.load("resource.failed", { resource: name, message: failure.message });
      break;
    }
  }

  return result;
}
