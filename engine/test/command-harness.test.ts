import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import test from "node:test";

import { ARTIFACT_PLACEHOLDER, HarnessError, createCommandTestHarness } from "../src/index.ts";

const signal = new AbortController().signal;

function nodeHarnessArgs(script: string): string[] {
  return ["-e", script, ARTIFACT_PLACEHOLDER];
}

const READ_ARTIFACT = 'const text = require("node:fs").readFileSync(process.argv[1], "utf8");';

function withTmpRoot(run: (root: string) => Promise<void>): () => Promise<void> {
  return async () => {
    const root = mkdtempSync(join(tmpdir(), "stratum-harness-test-"));
    try {
      await run(root);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  };
}

test(
  "command harness runs against a private copy of the text",
  withTmpRoot(async (tmpRoot) => {
    const harness = createCommandTestHarness({
      command: process.execPath,
      args: nodeHarnessArgs(
        `${READ_ARTIFACT} console.log(JSON.stringify({ has_total: text.includes("total") ? "pass" : "fail" }));`
      ),
      tmpRoot
    });

    assert.equal(harness.reentrant, false);
    assert.deepEqual(await harness.run("def total():\n    return 1\n", { signal }), {
      has_total: { status: "pass" }
    });
    assert.deepEqual(await harness.run("def other():\n    return 1\n", { signal }), {
      has_total: { status: "fail" }
    });
    assert.deepEqual(readdirSync(tmpRoot), []);
  })
);

test(
  "the artifact copy uses the configured file name and is removed afterwards",
  withTmpRoot(async (tmpRoot) => {
    const harness = createCommandTestHarness({
      command: process.execPath,
      args: nodeHarnessArgs('console.log(JSON.stringify({ path: { status: "pass", message: process.argv[1] } }));'),
      fileName: "app.py",
      reentrant: true,
      tmpRoot
    });

    const outcomes = await harness.run("x = 1\n", { signal });
    const artifactPath = outcomes.path;
    if (typeof artifactPath !== "object" || artifactPath.message === undefined) {
      assert.fail("Expected the harness to report the artifact path");
    }

    assert.equal(harness.reentrant, true);
    assert.equal(basename(artifactPath.message), "app.py");
    assert.equal(dirname(dirname(artifactPath.message)), tmpRoot);
    assert.equal(existsSync(dirname(artifactPath.message)), false);
  })
);

test(
  "a non-zero exit that still prints a report is a run with failures",
  withTmpRoot(async (tmpRoot) => {
    const harness = createCommandTestHarness({
      command: process.execPath,
      args: nodeHarnessArgs(
        'console.log(JSON.stringify({ t: { status: "fail", message: "bad" } })); process.exitCode = 1;'
      ),
      tmpRoot
    });

    assert.deepEqual(await harness.run("x = 1\n", { signal }), { t: { status: "fail", message: "bad" } });
  })
);

test(
  "output that is not a report is rejected",
  withTmpRoot(async (tmpRoot) => {
    const notJson = createCommandTestHarness({
      command: process.execPath,
      args: nodeHarnessArgs('console.log("not json");'),
      tmpRoot
    });
    await assert.rejects(
      notJson.run("x = 1\n", { signal }),
      (error) =>
        error instanceof HarnessError &&
        error.code === "HARNESS_OUTPUT_INVALID" &&
        error.message.startsWith(`Harness command ${process.execPath} did not print JSON: `)
    );

    const wrongShape = createCommandTestHarness({
      command: process.execPath,
      args: nodeHarnessArgs('console.log(JSON.stringify(["pass"]));'),
      tmpRoot
    });
    await assert.rejects(
      wrongShape.run("x = 1\n", { signal }),
      (error) =>
        error instanceof HarnessError &&
        error.message ===
          `Harness command ${process.execPath} printed an invalid report: Harness result must be an object keyed by test id`
    );
    assert.deepEqual(readdirSync(tmpRoot), []);
  })
);

test(
  "a command that cannot be launched is a launch failure",
  withTmpRoot(async (tmpRoot) => {
    const harness = createCommandTestHarness({ command: "stratum-missing-harness-command", tmpRoot });

    await assert.rejects(
      harness.run("x = 1\n", { signal }),
      (error) =>
        error instanceof HarnessError &&
        error.code === "HARNESS_LAUNCH_FAILED" &&
        error.message.startsWith("Harness command stratum-missing-harness-command failed: ")
    );
    assert.deepEqual(readdirSync(tmpRoot), []);
  })
);

test(
  "a command that outlives its timeout is a launch failure",
  withTmpRoot(async (tmpRoot) => {
    const harness = createCommandTestHarness({
      command: process.execPath,
      args: nodeHarnessArgs("setTimeout(() => {}, 10000);"),
      timeoutMs: 50,
      tmpRoot
    });

    await assert.rejects(
      harness.run("x = 1\n", { signal }),
      (error) => error instanceof HarnessError && error.code === "HARNESS_LAUNCH_FAILED"
    );
  })
);
