import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { RECOVERY_TRACE_SCHEMA_VERSION, emitRecoveryTraceEntry, type RecoveryTraceEntryV1 } from "../src/index.ts";

const ENTRY: RecoveryTraceEntryV1 = {
  schema_version: RECOVERY_TRACE_SCHEMA_VERSION,
  run_id: "run-1",
  artifact_id: "src/app.py",
  started_at: "2024-05-01T00:00:00.000Z",
  completed_at: "2024-05-01T00:00:01.000Z",
  outcome: {
    status: "success",
    strategy: "selective_patch",
    similarity: 0.5,
    template_ordinal: 0,
    revisions_considered: 2,
    revisions_valid: 1,
    verdict: null,
    diagnostic_codes: ["OMITTED_TEMPLATE_ELEMENT"]
  }
};

test("emitRecoveryTraceEntry appends one JSON line per entry", () => {
  const root = mkdtempSync(join(tmpdir(), "stratum-ledger-test-"));
  try {
    const outputPath = join(root, "ledger.jsonl");
    assert.equal(emitRecoveryTraceEntry(ENTRY, { outputPath }), true);
    assert.equal(
      emitRecoveryTraceEntry({ ...ENTRY, run_id: "run-2", outcome: { status: "failure", error: { name: "Error", message: "x" } } }, { outputPath }),
      true
    );

    const lines = readFileSync(outputPath, "utf8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.deepEqual(JSON.parse(lines[0]), ENTRY);
    assert.equal(JSON.parse(lines[1]).run_id, "run-2");
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test("emitRecoveryTraceEntry reports when nothing was written", () => {
  const root = mkdtempSync(join(tmpdir(), "stratum-ledger-test-"));
  try {
    assert.equal(emitRecoveryTraceEntry(ENTRY), false);
    assert.equal(emitRecoveryTraceEntry(ENTRY, { outputPath: "" }), false);
    assert.equal(emitRecoveryTraceEntry(ENTRY, { outputPath: join(root, "missing", "ledger.jsonl") }), false);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
