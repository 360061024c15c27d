import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { GitHistoryError, createGitHistoryBackend, enumerateRevisions, parseGitLog } from "../src/index.ts";
import { createFixtureRepo } from "./helpers/git-fixture.ts";

const signal = new AbortController().signal;

test("parseGitLog assigns ordinals in listing order and keeps each commit's path", () => {
  const output = [
    "\x1eaaa\t2024-03-01T10:00:00+00:00\tfix\tparser",
    "",
    "src/new.py",
    "\x1ebbb\t\t",
    "\x1eccc\t2024-01-01T00:00:00Z\tinitial",
    "",
    "src/old.py",
    ""
  ].join("\n");

  assert.deepEqual(parseGitLog(output), [
    { ordinal: 0, identifier: "aaa", committedAt: "2024-03-01T10:00:00+00:00", summary: "fix\tparser", path: "src/new.py" },
    { ordinal: 1, identifier: "bbb" },
    { ordinal: 2, identifier: "ccc", committedAt: "2024-01-01T00:00:00Z", summary: "initial", path: "src/old.py" }
  ]);
});

test("git backend lists commits newest first and fetches their contents", async () => {
  const repo = createFixtureRepo();
  try {
    const first = repo.commit("app.py", "a = 1\n", "first");
    const second = repo.commit("app.py", "a = 2\n", "second");
    const third = repo.commit("app.py", "a = 3\n", "third");
    const backend = createGitHistoryBackend({ repositoryRoot: repo.root, timeoutMs: 10_000 });

    const entries = await backend.listRevisions("./app.py", { signal });
    assert.deepEqual(
      entries.map((entry) => [entry.ordinal, entry.identifier, entry.summary]),
      [
        [0, third, "third"],
        [1, second, "second"],
        [2, first, "first"]
      ]
    );
    assert.equal(typeof entries[0].committedAt, "string");

    assert.equal(await backend.fetchRevision("app.py", entries[1], { signal }), "a = 2\n");
  } finally {
    repo.cleanup();
  }
});

test("git backend reports failures with typed errors", async () => {
  const notARepo = mkdtempSync(join(tmpdir(), "stratum-not-a-repo-"));
  const repo = createFixtureRepo();
  try {
    await assert.rejects(
      createGitHistoryBackend({ repositoryRoot: notARepo }).listRevisions("app.py", { signal }),
      (error) =>
        error instanceof GitHistoryError && error.code === "GIT_COMMAND_FAILED" && error.message.startsWith("git log failed: ")
    );

    repo.commit("app.py", "a = 1\n", "first");
    await assert.rejects(
      createGitHistoryBackend({ repositoryRoot: repo.root }).fetchRevision(
        "app.py",
        { ordinal: 0, identifier: "0000000000000000000000000000000000000000" },
        { signal }
      ),
      (error) =>
        error instanceof GitHistoryError &&
        error.code === "GIT_REVISION_UNAVAILABLE" &&
        error.message.startsWith("git show failed: ")
    );
  } finally {
    repo.cleanup();
    rmSync(notARepo, { recursive: true, force: true });
  }
});

test("enumerateRevisions restores git history through the backend", async () => {
  const repo = createFixtureRepo();
  try {
    repo.commit("app.py", "def one():\n    return 1\n", "first");
    repo.commit("app.py", "def one():\n    return 1\n\ndef two():\n    return 2\n", "second");
    repo.commit("other.py", "x = 1\n", "unrelated");

    const result = await enumerateRevisions("app.py", createGitHistoryBackend({ repositoryRoot: repo.root }), {
      maxDepth: 5
    });

    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(
      result.revisions.map((revision) => [revision.ordinal, revision.summary, revision.model.functions.length]),
      [
        [0, "second", 2],
        [1, "first", 1]
      ]
    );
  } finally {
    repo.cleanup();
  }
});

test("git backend restores revisions from before a rename", async () => {
  const repo = createFixtureRepo();
  try {
    repo.commit("old.py", "def one():\n    return 1\n", "first");
    repo.rename("old.py", "new.py", "rename");
    repo.commit("new.py", "def one():\n    return 1\n\ndef two():\n    return 2\n", "grow");

    const result = await enumerateRevisions("new.py", createGitHistoryBackend({ repositoryRoot: repo.root }), {
      maxDepth: 5
    });

    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(
      result.revisions.map((revision) => [revision.ordinal, revision.summary, revision.path, revision.model.functions.length]),
      [
        [0, "grow", "new.py", 2],
        [1, "rename", "new.py", 1],
        [2, "first", "old.py", 1]
      ]
    );
  } finally {
    repo.cleanup();
  }
});
