import type { SourcePosition } from "./structural-model.ts";

export type DiagnosticCode =
  | "SCAN_UNEXPECTED_CHARACTER"
  | "SCAN_UNTERMINATED_STRING"
  | "SCAN_UNBALANCED_BRACKET"
  | "SCAN_INCONSISTENT_DEDENT"
  | "PARSE_EXPECTED_TOKEN"
  | "PARSE_UNEXPECTED_TOKEN"
  | "PARSE_UNEXPECTED_INDENT"
  | "PARSE_EXPECTED_BLOCK"
  | "PARSE_INCOMPLETE_STATEMENT"
  | "PARSE_ORPHAN_CLAUSE"
  | "PARSE_INTERNAL_ERROR"
  | "RECOVERY_TOKEN_SCAN"
  | "RECOVERY_TOKEN_SCAN_FAILED"
  | "RECOVERY_PATTERN_SCAN"
  | "PATTERN_HEADER_INCOMPLETE";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  severity: DiagnosticSeverity;
  line: number;
  column: number;
}

const DIAGNOSTIC_SEVERITY_BY_CODE: Record<DiagnosticCode, DiagnosticSeverity> = {
  SCAN_UNEXPECTED_CHARACTER: "error",
  SCAN_UNTERMINATED_STRING: "error",
  SCAN_UNBALANCED_BRACKET: "error",
  SCAN_INCONSISTENT_DEDENT: "error",
  PARSE_EXPECTED_TOKEN: "error",
  PARSE_UNEXPECTED_TOKEN: "error",
  PARSE_UNEXPECTED_INDENT: "error",
  PARSE_EXPECTED_BLOCK: "error",
  PARSE_INCOMPLETE_STATEMENT: "error",
  PARSE_ORPHAN_CLAUSE: "error",
  PARSE_INTERNAL_ERROR: "error",
  RECOVERY_TOKEN_SCAN: "info",
  RECOVERY_TOKEN_SCAN_FAILED: "warning",
  RECOVERY_PATTERN_SCAN: "info",
  PATTERN_HEADER_INCOMPLETE: "warning"
};

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  position: Pick<SourcePosition, "line" | "column">
): Diagnostic {
  return {
    code,
    message,
    severity: DIAGNOSTIC_SEVERITY_BY_CODE[code],
    line: position.line,
    column: position.column
  };
}

function diagnosticKey(diagnostic: Diagnostic): string {
  return `${diagnostic.code}:${diagnostic.line}:${diagnostic.column}:${diagnostic.message}`;
}

/**
 * Concatenates diagnostic lists in order, dropping exact repeats. Used by the
 * parser chain so a fallback stage never loses what an earlier stage reported.
 */
export function mergeDiagnostics(...groups: Diagnostic[][]): Diagnostic[] {
  const seen = new Set<string>();
  const merged: Diagnostic[] = [];
  for (const group of groups) {
    for (const diagnostic of group) {
      const key = diagnosticKey(diagnostic);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      merged.push(diagnostic);
    }
  }
  return merged;
}

export class ScanError extends Error {
  readonly code: "SCAN_UNTERMINATED_STRING";
  readonly line: number;
  readonly column: number;

  constructor(message: string, position: Pick<SourcePosition, "line" | "column">) {
    super(message);
    this.name = "ScanError";
    this.code = "SCAN_UNTERMINATED_STRING";
    this.line = position.line;
    this.column = position.column;
  }

  toDiagnostic(): Diagnostic {
    return createDiagnostic(this.code, this.message, { line: this.line, column: this.column });
  }
}
