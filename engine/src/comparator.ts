import type { StructuralModel } from "../../parser/src/index.ts";

export interface ElementDiff {
  /** Keys present in both models. */
  common: string[];
  /** Keys present only in the first model. */
  added: string[];
  /** Keys present only in the second model. */
  removed: string[];
  /** Common keys whose signature differs between the models. */
  modified: string[];
}

export interface ModelComparison {
  similarity: number;
  functions: ElementDiff;
  types: ElementDiff;
  imports: ElementDiff;
}

function compareKeyed(left: Map<string, string>, right: Map<string, string>): ElementDiff {
  const common: string[] = [];
  const added: string[] = [];
  const modified: string[] = [];

  for (const [key, signature] of left) {
    const other = right.get(key);
    if (other === undefined) {
      added.push(key);
      continue;
    }
    common.push(key);
    if (other !== signature) {
      modified.push(key);
    }
  }

  const removed = [...right.keys()].filter((key) => !left.has(key));

  return {
    common: common.sort(),
    added: added.sort(),
    removed: removed.sort(),
    modified: modified.sort()
  };
}

function keyFunctions(model: StructuralModel): Map<string, string> {
  const keyed = new Map<string, string>();
  for (const element of model.functions) {
    if (!keyed.has(element.qualifiedName)) {
      keyed.set(element.qualifiedName, element.parameters.join(","));
    }
  }
  return keyed;
}

function keyTypes(model: StructuralModel): Map<string, string> {
  const keyed = new Map<string, string>();
  for (const element of model.types) {
    if (!keyed.has(element.qualifiedName)) {
      keyed.set(element.qualifiedName, [...element.memberFunctions].sort().join(","));
    }
  }
  return keyed;
}

function keyImports(model: StructuralModel): Map<string, string> {
  const keyed = new Map<string, string>();
  for (const binding of model.imports) {
    if (!keyed.has(binding.boundName)) {
      keyed.set(binding.boundName, binding.sourcePath);
    }
  }
  return keyed;
}

function unionSize(diff: ElementDiff): number {
  return diff.common.length + diff.added.length + diff.removed.length;
}

/**
 * Jaccard similarity over function names, type names and import bindings,
 * with the per-category differences. Two models with no elements are
 * identical.
 */
export function compareModels(left: StructuralModel, right: StructuralModel): ModelComparison {
  const functions = compareKeyed(keyFunctions(left), keyFunctions(right));
  const types = compareKeyed(keyTypes(left), keyTypes(right));
  const imports = compareKeyed(keyImports(left), keyImports(right));

  const union = unionSize(functions) + unionSize(types) + unionSize(imports);
  const common = functions.common.length + types.common.length + imports.common.length;

  return {
    similarity: union === 0 ? 1 : common / union,
    functions,
    types,
    imports
  };
}
