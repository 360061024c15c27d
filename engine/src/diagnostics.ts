import type { Diagnostic } from "../../parser/src/index.ts";

export const RECOVERY_DIAGNOSTIC_CODES = [
  "HISTORY_UNAVAILABLE",
  "REVISION_FETCH_FAILED",
  "WORKSPACE_FAILURE",
  "WORKSPACE_RELEASE_FAILED",
  "DROPPED_ELEMENT",
  "OMITTED_TEMPLATE_ELEMENT",
  "AMBIGUOUS_MERGE",
  "TEMPLATE_UNRELATED",
  "PLAN_FALLBACK",
  "ADVISOR_FAILED",
  "ADVISOR_PREFERRED_CURRENT",
  "EXPECTED_ELEMENT_MISSING",
  "HARNESS_FAILED",
  "PARSE_DEGRADED"
] as const;

export type RecoveryDiagnosticCode = (typeof RECOVERY_DIAGNOSTIC_CODES)[number] | Diagnostic["code"];

export type RecoveryDiagnosticSeverity = "error" | "warning" | "info";

export interface RecoveryDiagnostic {
  code: RecoveryDiagnosticCode;
  severity: RecoveryDiagnosticSeverity;
  message: string;
  line?: number;
  element?: string;
  ordinal?: number;
}

export function createRecoveryDiagnostic(
  code: RecoveryDiagnosticCode,
  severity: RecoveryDiagnosticSeverity,
  message: string,
  details: Pick<RecoveryDiagnostic, "line" | "element" | "ordinal"> = {}
): RecoveryDiagnostic {
  const diagnostic: RecoveryDiagnostic = { code, severity, message };
  if (details.line !== undefined) {
    diagnostic.line = details.line;
  }
  if (details.element !== undefined) {
    diagnostic.element = details.element;
  }
  if (details.ordinal !== undefined) {
    diagnostic.ordinal = details.ordinal;
  }
  return diagnostic;
}

export function fromParserDiagnostic(diagnostic: Diagnostic): RecoveryDiagnostic {
  return createRecoveryDiagnostic(diagnostic.code, diagnostic.severity, diagnostic.message, {
    line: diagnostic.line
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type RecoveryInputErrorCode =
  | "INVALID_ARTIFACT_ID"
  | "INVALID_CURRENT_TEXT"
  | "INVALID_MAX_DEPTH"
  | "INVALID_OPTIONS";

export class RecoveryInputError extends Error {
  readonly code: RecoveryInputErrorCode;

  constructor(message: string, code: RecoveryInputErrorCode) {
    super(message);
    this.name = "RecoveryInputError";
    this.code = code;
  }
}

export function normalizeOptionalNonEmptyString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
