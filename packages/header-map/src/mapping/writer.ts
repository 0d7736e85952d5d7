import fs from "node:fs";
import path from "node:path";
import type { DiagnosticReporter } from "../model/diagnostics.js";
import { HeaderMapDiagnosticCode } from "../model/diagnostics.js";
import type { ResolverConfig } from "../model/types.js";
import { debug } from "../shared/debug.js";
import { buildDiagnostic, errorMessage } from "../shared/diagnostics.js";
import { serializeProperties } from "./properties.js";
import type { MappingTable } from "./table.js";

export interface WriteMappingsOptions {
  reporter: DiagnosticReporter;
}

/** Render the table's explicit entries, sorted by key. */
export function renderMappings(table: MappingTable): string {
  return serializeProperties(table.entries().map((e) => [e.qualifiedName, e.header] as const));
}

/**
 * Persist the table to the configured destination.
 *
 * Returns false when no destination is configured or writing failed; failures
 * are reported, never thrown.
 */
export function writeMappings(
  config: Pick<ResolverConfig, "outputMappingDestination">,
  table: MappingTable,
  options: WriteMappingsOptions,
): boolean {
  const file = config.outputMappingDestination;
  if (file === undefined) {
    return false;
  }
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, renderMappings(table), "utf8");
    debug.write("mappings.written", { file, entries: table.size });
    return true;
  } catch (error) {
    options.reporter.report(
      buildDiagnostic({
        code: HeaderMapDiagnosticCode.MAPPING_WRITE_FAILED,
        message: errorMessage(error),
        stage: "mapping-write",
        data: { file },
      }),
    );
    return false;
  }
}
