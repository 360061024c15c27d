import { ScanError, createDiagnostic, mergeDiagnostics, type Diagnostic } from "./diagnostics.ts";
import { parseStrict, type StrictParseResult } from "./parser.ts";
import { scanPatterns } from "./pattern-scanner.ts";
import { createEmptyElements, createStructuralModel, type StructuralModel } from "./structural-model.ts";
import { scanTokens, type ScanResult } from "./token-scanner.ts";

/**
 * The three extraction stages, most precise first. Swapping this out is how a
 * different grammar plugs into the chain.
 */
export interface StructuralParser {
  parseStrict(text: string): StrictParseResult;
  scanTokens(text: string): ScanResult;
  scanPatterns(text: string): ScanResult;
}

export interface ParseStructureOptions {
  parser?: StructuralParser;
}

export const defaultStructuralParser: StructuralParser = {
  parseStrict,
  scanTokens,
  scanPatterns
};

const CHAIN_POSITION = { line: 1, column: 1 };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failureDiagnostic(error: unknown, stage: string): Diagnostic {
  if (error instanceof ScanError) {
    return error.toDiagnostic();
  }

  return createDiagnostic("PARSE_INTERNAL_ERROR", `${stage} failed: ${describeError(error)}`, CHAIN_POSITION);
}

function runStrict(parser: StructuralParser, text: string): StrictParseResult {
  try {
    const result = parser.parseStrict(text);
    if (result.elements === null && result.diagnostics.length === 0) {
      return {
        elements: null,
        diagnostics: [createDiagnostic("PARSE_INTERNAL_ERROR", "Strict parse failed without diagnostics", CHAIN_POSITION)]
      };
    }
    return result;
  } catch (error) {
    return {
      elements: null,
      diagnostics: [failureDiagnostic(error, "Strict parse")]
    };
  }
}

/**
 * Extracts a structural model, degrading from strict parse to token scan to
 * line patterns. Never throws. Each fallback keeps every diagnostic reported by
 * the stages before it.
 */
export function parseStructure(text: string, options: ParseStructureOptions = {}): StructuralModel {
  const parser = options.parser ?? defaultStructuralParser;

  const strict = runStrict(parser, text);
  if (strict.elements !== null && strict.diagnostics.length === 0) {
    return createStructuralModel({
      fidelity: "exact",
      sourceText: text,
      elements: strict.elements,
      diagnostics: []
    });
  }

  try {
    const scanned = parser.scanTokens(text);
    return createStructuralModel({
      fidelity: "token_recovered",
      sourceText: text,
      elements: scanned.elements,
      diagnostics: mergeDiagnostics(strict.diagnostics, scanned.diagnostics, [
        createDiagnostic(
          "RECOVERY_TOKEN_SCAN",
          "Strict parse failed; structure recovered from a token scan",
          CHAIN_POSITION
        )
      ])
    });
  } catch (error) {
    return recoverFromPatterns(parser, text, strict.diagnostics, failureDiagnostic(error, "Token scan"));
  }
}

function recoverFromPatterns(
  parser: StructuralParser,
  text: string,
  strictDiagnostics: Diagnostic[],
  tokenFailure: Diagnostic
): StructuralModel {
  const fallbackNotes = [
    tokenFailure,
    createDiagnostic(
      "RECOVERY_TOKEN_SCAN_FAILED",
      "Token scan failed; falling back to line patterns",
      CHAIN_POSITION
    )
  ];

  try {
    const scanned = parser.scanPatterns(text);
    return createStructuralModel({
      fidelity: "pattern_recovered",
      sourceText: text,
      elements: scanned.elements,
      diagnostics: mergeDiagnostics(strictDiagnostics, fallbackNotes, scanned.diagnostics, [
        createDiagnostic(
          "RECOVERY_PATTERN_SCAN",
          "Structure recovered from line patterns; element ranges are approximate",
          CHAIN_POSITION
        )
      ])
    });
  } catch (error) {
    return createStructuralModel({
      fidelity: "pattern_recovered",
      sourceText: text,
      elements: createEmptyElements(),
      diagnostics: mergeDiagnostics(strictDiagnostics, fallbackNotes, [failureDiagnostic(error, "Pattern scan")])
    });
  }
}
