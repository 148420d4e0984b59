import type { SourcePosition, SourceRange } from "./ast.ts";

export type DiagnosticCode = "PARSE_INCORRECT_SYMBOL_COUNT" | "PARSE_INVALID_DIRECTION";

export type DiagnosticSeverity = "error";

export interface DiagnosticSpan {
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  severity: DiagnosticSeverity;
  span: DiagnosticSpan;
}

export const DEFAULT_DIAGNOSTIC_FILE = "<input>";

const DIAGNOSTIC_SEVERITY_BY_CODE: Record<DiagnosticCode, DiagnosticSeverity> = {
  PARSE_INCORRECT_SYMBOL_COUNT: "error",
  PARSE_INVALID_DIRECTION: "error"
};

function clonePosition(position: SourcePosition): SourcePosition {
  return {
    offset: position.offset,
    line: position.line,
    column: position.column
  };
}

export function createDiagnosticSpanFromRange(
  range: SourceRange,
  file = DEFAULT_DIAGNOSTIC_FILE
): DiagnosticSpan {
  return {
    file,
    start: clonePosition(range.start),
    end: clonePosition(range.end)
  };
}

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  span: DiagnosticSpan
): Diagnostic {
  return {
    code,
    message,
    severity: DIAGNOSTIC_SEVERITY_BY_CODE[code],
    span
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { file, start } = diagnostic.span;
  return `${file}:${start.line}:${start.column}: ${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
}
