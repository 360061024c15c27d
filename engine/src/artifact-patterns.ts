export interface ArtifactPattern {
  /** Glob over artifact identifiers: `*` stays within a path segment, `**` spans segments. */
  pattern: string;
  expectedFunctions: string[];
  expectedTypes: string[];
}

export interface ExpectedStructure {
  functions: string[];
  types: string[];
  /** Patterns that contributed, in registry order. */
  patterns: string[];
}

function escapeRegexCharacter(character: string): string {
  return /[\\^$.*+?()[\]{}|]/.test(character) ? `\\${character}` : character;
}

export function globPatternToRegex(pattern: string): RegExp {
  let expression = "^";
  for (let index = 0; index < pattern.length; index += 1) {
    const character = pattern[index] ?? "";
    if (character === "*") {
      const next = pattern[index + 1];
      if (next === "*") {
        expression += ".*";
        index += 1;
      } else {
        expression += "[^/]*";
      }
      continue;
    }
    if (character === "?") {
      expression += "[^/]";
      continue;
    }

    expression += escapeRegexCharacter(character);
  }
  expression += "$";

  return new RegExp(expression);
}

/**
 * Unions the expected names of every pattern matching `artifactId`. Returns
 * null when no pattern applies.
 */
export function resolveExpectedStructure(
  artifactId: string,
  patterns: readonly ArtifactPattern[]
): ExpectedStructure | null {
  const normalizedId = artifactId.replace(/\\/g, "/");
  const matching = patterns.filter((entry) => globPatternToRegex(entry.pattern).test(normalizedId));
  if (matching.length === 0) {
    return null;
  }

  const functions = new Set<string>();
  const types = new Set<string>();
  for (const entry of matching) {
    entry.expectedFunctions.forEach((name) => functions.add(name));
    entry.expectedTypes.forEach((name) => types.add(name));
  }

  return {
    functions: [...functions],
    types: [...types],
    patterns: matching.map((entry) => entry.pattern)
  };
}
