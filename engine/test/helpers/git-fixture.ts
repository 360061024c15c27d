import assert from "node:assert/strict";
import { spawnSync } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export function runGit(cwd: string, args: string[]): string {
  const result = spawnSync("git", args, { cwd, encoding: "utf8" });
  if (result.status !== 0) {
    assert.fail(`git ${args.join(" ")} failed: ${result.stderr}`);
  }
  return result.stdout.trim();
}

export interface FixtureRepo {
  root: string;
  commit(fileName: string, contents: string, message: string): string;
  rename(fromName: string, toName: string, message: string): string;
  cleanup(): void;
}

export function createFixtureRepo(prefix = "stratum-git-fixture-"): FixtureRepo {
  const root = mkdtempSync(join(tmpdir(), prefix));
  runGit(root, ["init", "-q"]);
  runGit(root, ["config", "user.email", "tests@example.com"]);
  runGit(root, ["config", "user.name", "Stratum Tests"]);
  runGit(root, ["config", "commit.gpgsign", "false"]);

  return {
    root,
    commit(fileName, contents, message) {
      writeFileSync(join(root, fileName), contents, "utf8");
      runGit(root, ["add", fileName]);
      runGit(root, ["commit", "-q", "-m", message]);
      return runGit(root, ["rev-parse", "HEAD"]);
    },
    rename(fromName, toName, message) {
      runGit(root, ["mv", fromName, toName]);
      runGit(root, ["commit", "-q", "-m", message]);
      return runGit(root, ["rev-parse", "HEAD"]);
    },
    cleanup() {
      rmSync(root, { recursive: true, force: true });
    }
  };
}
