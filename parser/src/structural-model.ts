import type { Diagnostic } from "./diagnostics.ts";

export const FIDELITY_LEVELS = ["exact", "token_recovered", "pattern_recovered"] as const;

export type Fidelity = (typeof FIDELITY_LEVELS)[number];

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export interface SourceRange {
  start: SourcePosition;
  end: SourcePosition;
}

export interface LineRange {
  readonly startLine: number;
  readonly endLine: number;
}

export interface ImportBinding {
  readonly sourcePath: string;
  readonly boundName: string;
  readonly line: number;
}

export interface FunctionElement {
  readonly name: string;
  readonly qualifiedName: string;
  readonly parameters: readonly string[];
  readonly range: LineRange;
  readonly headerLine: number;
  readonly nestingDepth: number;
  readonly isAsync: boolean;
}

export interface TypeElement {
  readonly name: string;
  readonly qualifiedName: string;
  readonly memberFunctions: readonly string[];
  readonly range: LineRange;
  readonly headerLine: number;
  readonly nestingDepth: number;
}

export interface ModuleBinding {
  readonly name: string;
  readonly line: number;
}

/**
 * Elements extracted by one parser stage, before the chain stamps fidelity and
 * source text onto them.
 */
export interface StructuralElements {
  imports: ImportBinding[];
  functions: FunctionElement[];
  types: TypeElement[];
  moduleBindings: ModuleBinding[];
}

export interface StructuralModel {
  readonly fidelity: Fidelity;
  readonly sourceText: string;
  readonly lineCount: number;
  readonly imports: readonly ImportBinding[];
  readonly functions: readonly FunctionElement[];
  readonly types: readonly TypeElement[];
  readonly moduleBindings: readonly ModuleBinding[];
  readonly diagnostics: readonly Diagnostic[];
}

export function createEmptyElements(): StructuralElements {
  return {
    imports: [],
    functions: [],
    types: [],
    moduleBindings: []
  };
}

export function countSourceLines(text: string): number {
  if (text.length === 0) {
    return 0;
  }

  const lines = text.split(/\r\n|\n/);
  return lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
}

function dedupeImports(imports: ImportBinding[]): ImportBinding[] {
  const seen = new Set<string>();
  const result: ImportBinding[] = [];
  for (const binding of imports) {
    const key = `${binding.sourcePath}\u0000${binding.boundName}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(binding);
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function createStructuralModel(params: {
  fidelity: Fidelity;
  sourceText: string;
  elements: StructuralElements;
  diagnostics: Diagnostic[];
}): StructuralModel {
  const model: StructuralModel = {
    fidelity: params.fidelity,
    sourceText: params.sourceText,
    lineCount: countSourceLines(params.sourceText),
    imports: dedupeImports(params.elements.imports).map((binding) => ({ ...binding })),
    functions: params.elements.functions.map((element) => ({
      ...element,
      parameters: [...element.parameters],
      range: { ...element.range }
    })),
    types: params.elements.types.map((element) => ({
      ...element,
      memberFunctions: [...element.memberFunctions],
      range: { ...element.range }
    })),
    moduleBindings: params.elements.moduleBindings.map((binding) => ({ ...binding })),
    diagnostics: params.diagnostics.map((diagnostic) => ({ ...diagnostic }))
  };

  return deepFreeze(model);
}

export function collectElementNames(model: StructuralModel): {
  functions: Set<string>;
  types: Set<string>;
} {
  return {
    functions: new Set(model.functions.map((element) => element.qualifiedName)),
    types: new Set(model.types.map((element) => element.qualifiedName))
  };
}
