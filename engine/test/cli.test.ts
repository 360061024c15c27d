import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { CLI_EXIT_ACCEPTED, CLI_EXIT_NEEDS_REVIEW, CLI_EXIT_USAGE, runRecoveryCli } from "../src/index.ts";
import { createFixtureRepo } from "./helpers/git-fixture.ts";

const VALID = readFileSync(new URL("../../examples/inventory.src", import.meta.url), "utf8");
const BROKEN = readFileSync(new URL("../../examples/inventory-broken.src", import.meta.url), "utf8");

interface CapturedIo {
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  out: string[];
  err: string[];
}

function captureIo(cwd: string): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    out,
    err
  };
}

function withTmpDir(run: (root: string) => Promise<void>): () => Promise<void> {
  return async () => {
    const root = mkdtempSync(join(tmpdir(), "stratum-cli-test-"));
    try {
      await run(root);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  };
}

test(
  "usage errors exit with status 1",
  withTmpDir(async (root) => {
    writeFileSync(join(root, "a.py"), "x = 1\n", "utf8");

    const missing = captureIo(root);
    assert.equal(await runRecoveryCli([], missing), CLI_EXIT_USAGE);
    assert.deepEqual(missing.err, ["error: --artifact is required\n"]);

    const unknown = captureIo(root);
    assert.equal(await runRecoveryCli(["--bogus"], unknown), CLI_EXIT_USAGE);
    assert.equal(unknown.err.length, 1);
    assert.match(unknown.err[0], /--bogus/);
    assert.match(unknown.err[0], /Usage: stratum-recover --artifact <path>/);

    const depth = captureIo(root);
    assert.equal(await runRecoveryCli(["--artifact", "a.py", "--depth", "two"], depth), CLI_EXIT_USAGE);
    assert.deepEqual(depth.err, ['error: --depth must be a non-negative integer, received "two"\n']);

    const outside = captureIo(root);
    assert.equal(await runRecoveryCli(["--artifact", "../a.py"], outside), CLI_EXIT_USAGE);
    assert.deepEqual(outside.err, [`error: --artifact must be inside the repository ${root}\n`]);

    const sameOut = captureIo(root);
    assert.equal(await runRecoveryCli(["--artifact", "a.py", "--out", "a.py"], sameOut), CLI_EXIT_USAGE);
    assert.deepEqual(sameOut.err, ["error: --out must not point at the artifact itself\n"]);

    const unreadable = captureIo(root);
    assert.equal(await runRecoveryCli(["--artifact", "missing.py"], unreadable), CLI_EXIT_USAGE);
    assert.match(unreadable.err[0], /^error: Unable to read artifact /);

    const badProfile = captureIo(root);
    writeFileSync(join(root, "profile.json"), JSON.stringify({ schema_version: "9.9.9" }), "utf8");
    assert.equal(await runRecoveryCli(["--artifact", "a.py", "--profile", "profile.json"], badProfile), CLI_EXIT_USAGE);
    assert.deepEqual(badProfile.err, [
      'error: RecoveryProfile schema_version "9.9.9" is incompatible; expected "1.0.0"\n'
    ]);
  })
);

test("--help prints usage", async () => {
  const io = captureIo(tmpdir());
  assert.equal(await runRecoveryCli(["--help"], io), CLI_EXIT_ACCEPTED);
  assert.match(io.out.join(""), /^Usage: stratum-recover/);
});

test("the CLI restores a damaged file from git history", async () => {
  const repo = createFixtureRepo("stratum-cli-repo-");
  try {
    repo.commit("inventory.py", VALID, "add inventory");
    writeFileSync(join(repo.root, "inventory.py"), BROKEN, "utf8");
    const outPath = join(repo.root, "inventory.recovered.py");
    const ledgerPath = join(repo.root, "ledger.jsonl");

    const io = captureIo(repo.root);
    const exitCode = await runRecoveryCli(
      ["--artifact", "inventory.py", "--json", "--out", "inventory.recovered.py", "--trace-ledger", "ledger.jsonl"],
      io
    );

    assert.equal(exitCode, CLI_EXIT_ACCEPTED);
    const summary: unknown = JSON.parse(io.out.join(""));
    if (typeof summary !== "object" || summary === null) {
      assert.fail("Expected a JSON object summary");
    }
    const { run_id: runId, diagnostics, ...fields } = Object.fromEntries(Object.entries(summary));
    assert.equal(typeof runId, "string");
    assert.equal(Array.isArray(diagnostics), true);
    assert.deepEqual(fields, {
      artifact_id: "inventory.py",
      current_fidelity: "token_recovered",
      strategy: "template_substitution",
      similarity: 1,
      template_ordinal: 0,
      stability_score: 1,
      verdict: null,
      accepted: true,
      output_path: outPath,
      trace_ledger_written: true
    });
    assert.equal(readFileSync(outPath, "utf8"), VALID);
    assert.equal(readFileSync(join(repo.root, "inventory.py"), "utf8"), BROKEN);
    assert.equal(readFileSync(ledgerPath, "utf8").trimEnd().split("\n").length, 1);
  } finally {
    repo.cleanup();
  }
});

test("a divergent harness verdict asks for review", async () => {
  const repo = createFixtureRepo("stratum-cli-repo-");
  try {
    repo.commit("inventory.py", VALID, "add inventory");
    writeFileSync(join(repo.root, "inventory.py"), BROKEN, "utf8");
    const script = [
      'const text = require("node:fs").readFileSync(process.argv[1], "utf8");',
      'console.log(JSON.stringify({ add_signature: text.includes("quantity):") ? "pass" : "fail" }));'
    ].join(" ");

    const io = captureIo(repo.root);
    const exitCode = await runRecoveryCli(
      [
        "--artifact",
        "inventory.py",
        "--harness-command",
        process.execPath,
        "--harness-arg=-e",
        `--harness-arg=${script}`,
        "--harness-arg={artifact}"
      ],
      io
    );

    assert.equal(exitCode, CLI_EXIT_NEEDS_REVIEW);
    const report = io.out.join("");
    assert.match(report, /^Verdict: divergent$/m);
    assert.match(report, /^ {2}- add_signature: fail$/m);
    assert.match(report, /^Strategy: template_substitution$/m);
  } finally {
    repo.cleanup();
  }
});
