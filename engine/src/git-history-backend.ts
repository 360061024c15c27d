import { execFile } from "node:child_process";
import { resolve } from "node:path";

import type { HistoryBackend, HistoryCallOptions, HistoryEntry } from "./history-miner.ts";
import { normalizeOptionalNonEmptyString } from "./diagnostics.ts";

const GIT_MAX_BUFFER_BYTES = 32 * 1024 * 1024;
const RECORD_SEPARATOR = "\x1e";
const LOG_FORMAT = "%x1e%H%x09%cI%x09%s";

export type GitHistoryErrorCode = "GIT_COMMAND_FAILED" | "GIT_REVISION_UNAVAILABLE";

export class GitHistoryError extends Error {
  readonly code: GitHistoryErrorCode;
  readonly repositoryRoot: string;

  constructor(message: string, code: GitHistoryErrorCode, repositoryRoot: string) {
    super(message);
    this.name = "GitHistoryError";
    this.code = code;
    this.repositoryRoot = repositoryRoot;
  }
}

export interface GitHistoryBackendOptions {
  repositoryRoot: string;
  /** Per-command limit enforced by the child process itself. */
  timeoutMs?: number;
}

function toRepositoryPath(artifactId: string): string {
  return artifactId.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

function runGit(
  repositoryRoot: string,
  args: string[],
  code: GitHistoryErrorCode,
  options: { signal: AbortSignal; timeoutMs?: number }
): Promise<string> {
  return new Promise((resolveOutput, reject) => {
    execFile(
      "git",
      ["-C", repositoryRoot, "-c", "core.quotePath=false", ...args],
      {
        encoding: "utf8",
        maxBuffer: GIT_MAX_BUFFER_BYTES,
        timeout: options.timeoutMs ?? 0,
        signal: options.signal,
        windowsHide: true
      },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim().length > 0 ? stderr.trim() : error.message;
          reject(new GitHistoryError(`git ${args[0]} failed: ${detail}`, code, repositoryRoot));
          return;
        }
        resolveOutput(stdout);
      }
    );
  });
}

/**
 * Parses `git log --name-only` output written with {@link LOG_FORMAT}. Each
 * record is a header line followed by the path the artifact had in that
 * commit, which differs from the requested path before a rename.
 */
export function parseGitLog(output: string): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const record of output.split(RECORD_SEPARATOR)) {
    const [header = "", ...pathLines] = record.split("\n");
    if (header.trim().length === 0) {
      continue;
    }

    const [identifier, committedAt, ...subject] = header.split("\t");
    if (!identifier) {
      continue;
    }

    const entry: HistoryEntry = { ordinal: entries.length, identifier };
    const normalizedDate = normalizeOptionalNonEmptyString(committedAt);
    if (normalizedDate) {
      entry.committedAt = normalizedDate;
    }
    const summary = normalizeOptionalNonEmptyString(subject.join("\t"));
    if (summary) {
      entry.summary = summary;
    }
    const path = pathLines.map((line) => line.trim()).find((line) => line.length > 0);
    if (path) {
      entry.path = path;
    }
    entries.push(entry);
  }
  return entries;
}

/**
 * History backend over a local git repository. Artifact identifiers are paths
 * relative to the repository root; ordinal 0 is the newest commit touching
 * the path, following renames.
 */
export function createGitHistoryBackend(options: GitHistoryBackendOptions): HistoryBackend {
  const repositoryRoot = resolve(options.repositoryRoot);

  return {
    async listRevisions(artifactId: string, callOptions: HistoryCallOptions): Promise<HistoryEntry[]> {
      const output = await runGit(
        repositoryRoot,
        ["log", "--follow", "--name-only", `--format=${LOG_FORMAT}`, "--", toRepositoryPath(artifactId)],
        "GIT_COMMAND_FAILED",
        { signal: callOptions.signal, timeoutMs: options.timeoutMs }
      );
      return parseGitLog(output);
    },
    fetchRevision(artifactId: string, entry: HistoryEntry, callOptions: HistoryCallOptions): Promise<string> {
      return runGit(
        repositoryRoot,
        ["show", `${entry.identifier}:${entry.path ?? toRepositoryPath(artifactId)}`],
        "GIT_REVISION_UNAVAILABLE",
        { signal: callOptions.signal, timeoutMs: options.timeoutMs }
      );
    }
  };
}
