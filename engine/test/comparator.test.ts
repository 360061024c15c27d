import assert from "node:assert/strict";
import test from "node:test";

import { parseStructure } from "../../parser/src/index.ts";
import { compareModels } from "../src/index.ts";

const LEFT = [
  "import os",
  "from lib import c",
  "",
  "def foo(a, b):",
  "    return a",
  "",
  "class K:",
  "    def run(self):",
  "        pass",
  ""
].join("\n");

const RIGHT = [
  "import os",
  "from other import c",
  "",
  "def foo(a):",
  "    return a",
  "",
  "def bar():",
  "    pass",
  ""
].join("\n");

test("compareModels reports per-category differences and Jaccard similarity", () => {
  const comparison = compareModels(parseStructure(LEFT), parseStructure(RIGHT));

  assert.equal(comparison.similarity, 0.5);
  assert.deepEqual(comparison.functions, {
    common: ["foo"],
    added: ["K.run"],
    removed: ["bar"],
    modified: ["foo"]
  });
  assert.deepEqual(comparison.types, { common: [], added: ["K"], removed: [], modified: [] });
  assert.deepEqual(comparison.imports, { common: ["c", "os"], added: [], removed: [], modified: ["c"] });
});

test("compareModels is symmetric in similarity and mirrors added and removed", () => {
  const left = parseStructure(LEFT);
  const right = parseStructure(RIGHT);
  const forward = compareModels(left, right);
  const backward = compareModels(right, left);

  assert.equal(backward.similarity, forward.similarity);
  assert.deepEqual(backward.functions.added, forward.functions.removed);
  assert.deepEqual(backward.functions.removed, forward.functions.added);
  assert.deepEqual(backward.types.removed, ["K"]);
});

test("two models without elements are identical", () => {
  const comparison = compareModels(parseStructure("x = 1\n"), parseStructure(""));
  assert.equal(comparison.similarity, 1);
});

test("a type's signature is its sorted member list", () => {
  const left = parseStructure("class A:\n    def b(self):\n        pass\n\n    def a(self):\n        pass\n");
  const right = parseStructure("class A:\n    def a(self):\n        pass\n\n    def b(self):\n        pass\n");
  const comparison = compareModels(left, right);

  assert.deepEqual(comparison.types.modified, []);
  assert.equal(comparison.similarity, 1);
});
