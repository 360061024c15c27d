import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import test from "node:test";

import {
  DEFAULT_RECOVERY_PROFILE,
  ProfileValidationError,
  loadRecoveryProfile,
  readRecoveryProfileFile,
  type ProfileValidationCode
} from "../src/index.ts";

function rejectsWith(code: ProfileValidationCode, message: string) {
  return (error: unknown): boolean =>
    error instanceof ProfileValidationError && error.code === code && error.message === message;
}

test("a minimal profile takes every default", () => {
  assert.deepEqual(loadRecoveryProfile({ schema_version: "1.0.0" }), {
    schemaVersion: "1.0.0",
    history: { maxDepth: 5, timeoutMs: 10_000 },
    ranking: { parseConcurrency: 4 },
    planning: { substitutionThreshold: 0.9 },
    harness: { timeoutMs: 60_000, reentrant: false },
    artifactPatterns: []
  });
  assert.equal(Object.isFrozen(DEFAULT_RECOVERY_PROFILE), true);
});

test("a full profile is normalized to camelCase", () => {
  const profile = loadRecoveryProfile({
    schema_version: "1.0.0",
    history: { max_depth: 0, timeout_ms: 500 },
    ranking: { parse_concurrency: 8 },
    planning: { substitution_threshold: 1 },
    harness: { timeout_ms: 1000, reentrant: true },
    artifact_patterns: [{ pattern: "src/*.py", expected_functions: ["main"] }]
  });

  assert.deepEqual(profile, {
    schemaVersion: "1.0.0",
    history: { maxDepth: 0, timeoutMs: 500 },
    ranking: { parseConcurrency: 8 },
    planning: { substitutionThreshold: 1 },
    harness: { timeoutMs: 1000, reentrant: true },
    artifactPatterns: [{ pattern: "src/*.py", expectedFunctions: ["main"], expectedTypes: [] }]
  });
});

test("schema_version is checked before the schema", () => {
  assert.throws(
    () => loadRecoveryProfile({ schema_version: "2.0.0", history: { max_depth: 500 } }),
    rejectsWith("VERSION_INCOMPATIBLE", 'RecoveryProfile schema_version "2.0.0" is incompatible; expected "1.0.0"')
  );
  assert.throws(
    () => loadRecoveryProfile({ history: {} }),
    rejectsWith("SCHEMA_VALIDATION_FAILED", "RecoveryProfile schema_version is required")
  );
});

test("schema violations report the first failing path", () => {
  assert.throws(
    () => loadRecoveryProfile({ schema_version: "1.0.0", history: { max_depth: 51 } }),
    rejectsWith("SCHEMA_VALIDATION_FAILED", "RecoveryProfile validation failed at /history/max_depth: must be <= 50")
  );
  assert.throws(
    () => loadRecoveryProfile({ schema_version: "1.0.0", planning: { substitution_threshold: 0 } }),
    rejectsWith(
      "SCHEMA_VALIDATION_FAILED",
      "RecoveryProfile validation failed at /planning/substitution_threshold: must be > 0"
    )
  );

  try {
    loadRecoveryProfile({ schema_version: "1.0.0", verbose: true });
    assert.fail("Expected the unknown property to be rejected");
  } catch (error) {
    if (!(error instanceof ProfileValidationError)) {
      throw error;
    }
    assert.equal(error.message, "RecoveryProfile validation failed at /: must NOT have additional properties");
    assert.deepEqual(error.issues, [
      { instancePath: "", keyword: "additionalProperties", message: "must NOT have additional properties" }
    ]);
  }
});

test("non-object input is rejected", () => {
  for (const input of [null, "1.0.0", [], 5]) {
    assert.throws(
      () => loadRecoveryProfile(input),
      rejectsWith("INVALID_INPUT", "RecoveryProfile input must be an object")
    );
  }
});

test("readRecoveryProfileFile loads the bundled example profile", () => {
  const profile = readRecoveryProfileFile(fileURLToPath(new URL("../../examples/recovery-profile.json", import.meta.url)));

  assert.equal(profile.history.maxDepth, 10);
  assert.equal(profile.planning.substitutionThreshold, 0.85);
  assert.deepEqual(profile.artifactPatterns, [
    {
      pattern: "**/inventory*.py",
      expectedFunctions: ["load_inventory", "Inventory.add", "Inventory.total"],
      expectedTypes: ["Inventory"]
    }
  ]);
});

test("readRecoveryProfileFile reports unreadable and malformed files", () => {
  const root = mkdtempSync(join(tmpdir(), "stratum-profile-test-"));
  try {
    const missing = join(root, "missing.json");
    assert.throws(
      () => readRecoveryProfileFile(missing),
      (error) =>
        error instanceof ProfileValidationError &&
        error.code === "INVALID_INPUT" &&
        error.message.startsWith(`Unable to read recovery profile at ${missing}: `)
    );

    const malformed = join(root, "malformed.json");
    writeFileSync(malformed, "{ not json", "utf8");
    assert.throws(
      () => readRecoveryProfileFile(malformed),
      (error) =>
        error instanceof ProfileValidationError &&
        error.code === "INVALID_INPUT" &&
        error.message.startsWith(`Recovery profile at ${malformed} is not valid JSON: `)
    );
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
