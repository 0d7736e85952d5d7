/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions with no external dependencies.
 * Builder and reporter helpers live in shared/diagnostics.ts.
 * ======================================================================================= */

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Phase that produced the diagnostic. */
export type DiagnosticStage = "mapping-load" | "mapping-write";

export const HeaderMapDiagnosticCode = {
  MAPPING_LOAD_FAILED: "header-map/mapping-load-failed",
  MAPPING_WRITE_FAILED: "header-map/mapping-write-failed",
} as const;

export type HeaderMapDiagnosticCodeType =
  (typeof HeaderMapDiagnosticCode)[keyof typeof HeaderMapDiagnosticCode];

/** Unified diagnostic envelope handed to the pipeline's error channel. */
export interface HeaderMapDiagnostic<
  TCode extends string = HeaderMapDiagnosticCodeType,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  data?: Readonly<TData>;
}

/** External error channel. Implementations must not throw. */
export interface DiagnosticReporter {
  report(diagnostic: HeaderMapDiagnostic<string>): void;
}
