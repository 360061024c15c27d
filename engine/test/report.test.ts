import assert from "node:assert/strict";
import test from "node:test";

import { formatRecoveryReport, isReconstructionAccepted, recoverArtifact } from "../src/index.ts";
import { createInMemoryHistory } from "./helpers/in-memory-history.ts";

test("formatRecoveryReport renders a run without history", async () => {
  const result = await recoverArtifact(
    { artifactId: "a.py", currentText: "def foo():\n    return 1\n", history: createInMemoryHistory([]) },
    { runIdFactory: () => "run-report-1" }
  );

  assert.equal(
    formatRecoveryReport(result),
    [
      "[Recovery Report]",
      "Run ID: run-report-1",
      "Artifact: a.py",
      "Current Fidelity: exact",
      "Revisions: 0 restored, 0 valid",
      "Stability Score: 0.00",
      "Size Trend: stable",
      "Template: n/a",
      "Strategy: no_history_fallback",
      "Similarity: n/a",
      "Verdict: n/a",
      "Recommendations:",
      "  - NO_VALID_TEMPLATE: No prior revisions are available",
      "Diagnostics:",
      "  - [warning] HISTORY_UNAVAILABLE: No prior revisions of a.py were found",
      "Trace Ledger Emitted: no",
      ""
    ].join("\n")
  );
  assert.equal(isReconstructionAccepted(result), true);
});

test("formatRecoveryReport includes the failure diff and diagnostic locations", async () => {
  const current = "import os\n\ndef foo(a):\n    return a\n\ndef extra():\n    return 0\n\nx = 1\n";
  const template = "import os\n\ndef foo(a):\n    return a * 2\n\ndef legacy():\n    return 1\n";
  const result = await recoverArtifact(
    {
      artifactId: "pkg/app.py",
      currentText: current,
      history: createInMemoryHistory([template]),
      harness: {
        run: async (text) => ({ T1: text.includes("a * 2") ? "pass" : "fail" })
      }
    },
    { runIdFactory: () => "run-report-2" }
  );

  assert.equal(
    formatRecoveryReport(result),
    [
      "[Recovery Report]",
      "Run ID: run-report-2",
      "Artifact: pkg/app.py",
      "Current Fidelity: exact",
      "Revisions: 1 restored, 1 valid",
      "Stability Score: 1.00",
      "Size Trend: stable",
      "Template: revision 0 (rev-0)",
      "Strategy: selective_patch",
      "Similarity: 0.50",
      "Verdict: divergent",
      "Failure Diff:",
      "  - T1: fail",
      "Recommendations: none",
      "Diagnostics:",
      "  - [info] OMITTED_TEMPLATE_ELEMENT: Template element legacy is absent from the current text and was not reintroduced (legacy, line 6)",
      "Trace Ledger Emitted: no",
      ""
    ].join("\n")
  );
  assert.equal(isReconstructionAccepted(result), false);
});
