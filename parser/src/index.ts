export { lex, KEYWORDS } from "./lexer.ts";
export { parseStrict } from "./parser.ts";
export { scanTokens } from "./token-scanner.ts";
export { scanPatterns } from "./pattern-scanner.ts";
export { defaultStructuralParser, parseStructure } from "./parser-chain.ts";
export { ScanError, createDiagnostic, mergeDiagnostics } from "./diagnostics.ts";
export {
  FIDELITY_LEVELS,
  collectElementNames,
  countSourceLines,
  createEmptyElements,
  createStructuralModel
} from "./structural-model.ts";
export type { Diagnostic, DiagnosticCode, DiagnosticSeverity } from "./diagnostics.ts";
export type { LexResult, Token, TokenKind } from "./lexer.ts";
export type { StrictParseResult } from "./parser.ts";
export type { ScanResult } from "./token-scanner.ts";
export type { ParseStructureOptions, StructuralParser } from "./parser-chain.ts";
export type {
  Fidelity,
  FunctionElement,
  ImportBinding,
  LineRange,
  ModuleBinding,
  SourcePosition,
  SourceRange,
  StructuralElements,
  StructuralModel,
  TypeElement
} from "./structural-model.ts";
