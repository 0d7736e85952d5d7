import type {
  DiagnosticReporter,
  DiagnosticSeverity,
  DiagnosticStage,
  HeaderMapDiagnostic,
  HeaderMapDiagnosticCodeType,
} from "../model/diagnostics.js";

export type {
  DiagnosticReporter,
  DiagnosticSeverity,
  DiagnosticStage,
  HeaderMapDiagnostic,
} from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = HeaderMapDiagnosticCodeType,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder; severity defaults to "error". */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): HeaderMapDiagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    ...(input.data ? { data: input.data } : {}),
  };
}

/** Best-effort message extraction for anything thrown by fs or a loader. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export interface DiagnosticCollector extends DiagnosticReporter {
  readonly diagnostics: readonly HeaderMapDiagnostic<string>[];
  hasErrors(): boolean;
}

/** Reporter that keeps every diagnostic in memory. */
export function createDiagnosticCollector(): DiagnosticCollector {
  const diagnostics: HeaderMapDiagnostic<string>[] = [];
  return {
    diagnostics,
    report(diagnostic) {
      diagnostics.push(diagnostic);
    },
    hasErrors() {
      return diagnostics.some((d) => d.severity === "error");
    },
  };
}

/** Reporter that prints `[severity] code: message` lines. */
export function createConsoleReporter(
  output: (message: string) => void = console.error,
): DiagnosticReporter {
  return {
    report(diagnostic) {
      output(`[${diagnostic.severity}] ${diagnostic.code}: ${diagnostic.message}`);
    },
  };
}
