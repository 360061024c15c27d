import assert from "node:assert/strict";
import test from "node:test";

import {
  createDiagnostic,
  createEmptyElements,
  parseStructure,
  type StructuralParser
} from "../src/index.ts";

const VALID_SOURCE = [
  "import json",
  "",
  "def foo(a):",
  "    return json.dumps(a)",
  "",
  "class Box:",
  "    def open(self):",
  "        return True",
  ""
].join("\n");

test("parseStructure returns an exact model with no diagnostics for valid text", () => {
  const model = parseStructure(VALID_SOURCE);

  assert.equal(model.fidelity, "exact");
  assert.deepEqual(model.diagnostics, []);
  assert.equal(model.lineCount, 8);
  assert.equal(model.sourceText, VALID_SOURCE);
  assert.deepEqual(
    model.functions.map((element) => element.qualifiedName),
    ["foo", "Box.open"]
  );
  assert.equal(Object.isFrozen(model), true);
  assert.equal(Object.isFrozen(model.functions[0]?.parameters), true);
});

test("parseStructure never labels damaged expressions as exact", () => {
  for (const source of ["x = 1 + * 2\n", "f() = 1\n", "x = [1,,2]\n", "x = a..b\n", "x = (,)\n"]) {
    assert.notEqual(parseStructure(source).fidelity, "exact", source);
  }
  assert.equal(parseStructure("type Alias = int\n").fidelity, "exact");
});

test("parseStructure is idempotent over the recoverable text of an exact model", () => {
  const model = parseStructure(VALID_SOURCE);
  assert.deepEqual(parseStructure(model.sourceText), model);
});

test("parseStructure falls back to the token scan and keeps strict diagnostics", () => {
  const source = ["def foo(a, b:", "    return a", "", "", "def bar():", "    return 2", ""].join("\n");
  const model = parseStructure(source);

  assert.equal(model.fidelity, "token_recovered");
  assert.deepEqual(
    model.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.line, diagnostic.column]),
    [
      ["SCAN_UNBALANCED_BRACKET", 1, 8],
      ["RECOVERY_TOKEN_SCAN", 1, 1]
    ]
  );
  assert.deepEqual(
    model.functions.map((element) => [element.name, element.parameters, element.range]),
    [
      ["foo", ["a", "b"], { startLine: 1, endLine: 2 }],
      ["bar", [], { startLine: 5, endLine: 6 }]
    ]
  );
});

test("parseStructure falls back to line patterns when the token scan raises", () => {
  const source = ["def foo(a):", '    return "oops', "", "def bar(x, y):", "    return x", ""].join("\n");
  const model = parseStructure(source);

  assert.equal(model.fidelity, "pattern_recovered");
  assert.deepEqual(
    model.diagnostics.map((diagnostic) => diagnostic.code),
    ["SCAN_UNTERMINATED_STRING", "RECOVERY_TOKEN_SCAN_FAILED", "RECOVERY_PATTERN_SCAN"]
  );
  assert.equal(model.diagnostics[0]?.line, 2);
  assert.equal(model.diagnostics[0]?.column, 12);
  assert.deepEqual(
    model.functions.map((element) => [element.name, element.parameters, element.range]),
    [
      ["foo", ["a"], { startLine: 1, endLine: 2 }],
      ["bar", ["x", "y"], { startLine: 4, endLine: 5 }]
    ]
  );
});

test("parseStructure attempts every stage in order and never drops earlier diagnostics", () => {
  const calls: string[] = [];
  const strictDiagnostic = createDiagnostic("PARSE_EXPECTED_TOKEN", "Expected ':'", { line: 3, column: 9 });
  const patternDiagnostic = createDiagnostic("PATTERN_HEADER_INCOMPLETE", "Class header does not end with ':'", {
    line: 3,
    column: 1
  });

  const parser: StructuralParser = {
    parseStrict: () => {
      calls.push("strict");
      return { elements: null, diagnostics: [strictDiagnostic] };
    },
    scanTokens: () => {
      calls.push("tokens");
      throw new Error("boom");
    },
    scanPatterns: () => {
      calls.push("patterns");
      return { elements: createEmptyElements(), diagnostics: [patternDiagnostic] };
    }
  };

  const model = parseStructure("class Broken\n", { parser });

  assert.deepEqual(calls, ["strict", "tokens", "patterns"]);
  assert.equal(model.fidelity, "pattern_recovered");
  assert.deepEqual(
    model.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.message]),
    [
      ["PARSE_EXPECTED_TOKEN", "Expected ':'"],
      ["PARSE_INTERNAL_ERROR", "Token scan failed: boom"],
      ["RECOVERY_TOKEN_SCAN_FAILED", "Token scan failed; falling back to line patterns"],
      ["PATTERN_HEADER_INCOMPLETE", "Class header does not end with ':'"],
      ["RECOVERY_PATTERN_SCAN", "Structure recovered from line patterns; element ranges are approximate"]
    ]
  );
});

test("parseStructure never throws even when every stage fails", () => {
  const failing: StructuralParser = {
    parseStrict: () => {
      throw new Error("strict exploded");
    },
    scanTokens: () => {
      throw new Error("tokens exploded");
    },
    scanPatterns: () => {
      throw new Error("patterns exploded");
    }
  };

  const model = parseStructure("anything", { parser: failing });
  assert.equal(model.fidelity, "pattern_recovered");
  assert.deepEqual(model.functions, []);
  assert.deepEqual(
    model.diagnostics.map((diagnostic) => diagnostic.message),
    [
      "Strict parse failed: strict exploded",
      "Token scan failed: tokens exploded",
      "Token scan failed; falling back to line patterns",
      "Pattern scan failed: patterns exploded"
    ]
  );
});

test("parseStructure gives empty text an exact empty model", () => {
  const model = parseStructure("");
  assert.equal(model.fidelity, "exact");
  assert.equal(model.lineCount, 0);
  assert.deepEqual(model.imports, []);
});
