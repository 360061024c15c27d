import assert from "node:assert/strict";
import test from "node:test";

import { ScanError, scanTokens } from "../src/index.ts";

const REPOSITORY_SOURCE = [
  "import json",
  "from pkg.sub import (",
  "    alpha,",
  "    beta as b,",
  ")",
  "",
  "class Repo:",
  "    def load(self, path):",
  "        return json.loads(path",
  "",
  "    def save(self, data):",
  "        pass",
  "",
  'VERSION = "1"',
  ""
].join("\n");

test("scanTokens recovers definitions after an unclosed bracket", () => {
  const result = scanTokens(REPOSITORY_SOURCE);

  assert.deepEqual(result.diagnostics, [
    {
      code: "SCAN_UNBALANCED_BRACKET",
      message: 'Unclosed "("',
      severity: "error",
      line: 9,
      column: 26
    }
  ]);

  assert.deepEqual(result.elements.imports, [
    { sourcePath: "json", boundName: "json", line: 1 },
    { sourcePath: "pkg.sub", boundName: "alpha", line: 3 },
    { sourcePath: "pkg.sub", boundName: "b", line: 4 }
  ]);

  assert.deepEqual(
    result.elements.functions.map((element) => ({
      qualifiedName: element.qualifiedName,
      parameters: element.parameters,
      range: element.range,
      nestingDepth: element.nestingDepth
    })),
    [
      {
        qualifiedName: "Repo.load",
        parameters: ["self", "path"],
        range: { startLine: 8, endLine: 9 },
        nestingDepth: 1
      },
      {
        qualifiedName: "Repo.save",
        parameters: ["self", "data"],
        range: { startLine: 11, endLine: 12 },
        nestingDepth: 1
      }
    ]
  );

  assert.deepEqual(result.elements.types, [
    {
      name: "Repo",
      qualifiedName: "Repo",
      memberFunctions: ["load", "save"],
      range: { startLine: 7, endLine: 12 },
      headerLine: 7,
      nestingDepth: 0
    }
  ]);

  assert.deepEqual(result.elements.moduleBindings, [{ name: "VERSION", line: 14 }]);
});

test("scanTokens extends a decorated definition to its decorator line", () => {
  const result = scanTokens("@cached\nasync def fetch(url, *, retries=3):\n    return url\n");

  assert.deepEqual(result.elements.functions, [
    {
      name: "fetch",
      qualifiedName: "fetch",
      parameters: ["url", "retries"],
      range: { startLine: 1, endLine: 3 },
      headerLine: 2,
      nestingDepth: 0,
      isAsync: true
    }
  ]);
});

test("scanTokens propagates ScanError for an unterminated string", () => {
  assert.throws(
    () => scanTokens('x = """never closed\n'),
    (error: unknown) => error instanceof ScanError && error.message === "Unterminated triple-quoted string literal"
  );
});
