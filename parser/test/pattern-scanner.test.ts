import assert from "node:assert/strict";
import test from "node:test";

import { scanPatterns } from "../src/index.ts";

const DAMAGED_SOURCE = [
  '@route("/x")',
  "def handler(request, *args, **kw)",
  "    return request",
  "",
  "class Widget(Base):",
  "    def render(self):",
  "        pass",
  "",
  "from .models import User, Group as G",
  "import os.path, sys as system",
  "COUNT: int = 3",
  "value == 2",
  ""
].join("\n");

test("scanPatterns extracts elements from line cues", () => {
  const result = scanPatterns(DAMAGED_SOURCE);

  assert.deepEqual(result.elements.functions, [
    {
      name: "handler",
      qualifiedName: "handler",
      parameters: ["request", "*args", "**kw"],
      range: { startLine: 1, endLine: 3 },
      headerLine: 2,
      nestingDepth: 0,
      isAsync: false
    },
    {
      name: "render",
      qualifiedName: "Widget.render",
      parameters: ["self"],
      range: { startLine: 6, endLine: 7 },
      headerLine: 6,
      nestingDepth: 1,
      isAsync: false
    }
  ]);

  assert.deepEqual(result.elements.types, [
    {
      name: "Widget",
      qualifiedName: "Widget",
      memberFunctions: ["render"],
      range: { startLine: 5, endLine: 7 },
      headerLine: 5,
      nestingDepth: 0
    }
  ]);

  assert.deepEqual(result.elements.imports, [
    { sourcePath: ".models", boundName: "User", line: 9 },
    { sourcePath: ".models", boundName: "G", line: 9 },
    { sourcePath: "os.path", boundName: "os", line: 10 },
    { sourcePath: "sys", boundName: "system", line: 10 }
  ]);

  assert.deepEqual(result.elements.moduleBindings, [{ name: "COUNT", line: 11 }]);
});

test("scanPatterns warns about headers that do not end with a colon", () => {
  const result = scanPatterns(DAMAGED_SOURCE);

  assert.deepEqual(result.diagnostics, [
    {
      code: "PATTERN_HEADER_INCOMPLETE",
      message: "Function header does not end with ':'",
      severity: "warning",
      line: 2,
      column: 1
    }
  ]);
});

test("scanPatterns never throws on arbitrary text", () => {
  const result = scanPatterns('\u0000((((\n  """\n\tdef\n');
  assert.deepEqual(result.elements.functions, []);
  assert.deepEqual(scanPatterns("").elements, { imports: [], functions: [], types: [], moduleBindings: [] });
});
