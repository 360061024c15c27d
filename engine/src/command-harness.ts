import { execFile } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { normalizeTestOutcomes, type TestHarness, type TestHarnessRunOptions, type TestOutcome } from "./equivalence-oracle.ts";

export const ARTIFACT_PLACEHOLDER = "{artifact}";
export const DEFAULT_HARNESS_FILE_NAME = "artifact.src";
const HARNESS_MAX_BUFFER_BYTES = 16 * 1024 * 1024;

export type HarnessErrorCode = "HARNESS_LAUNCH_FAILED" | "HARNESS_OUTPUT_INVALID";

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;

  constructor(message: string, code: HarnessErrorCode) {
    super(message);
    this.name = "HarnessError";
    this.code = code;
  }
}

export interface CommandTestHarnessOptions {
  command: string;
  /** `{artifact}` is replaced with the path of the materialized text. */
  args?: string[];
  fileName?: string;
  timeoutMs?: number;
  reentrant?: boolean;
  tmpRoot?: string;
}

interface CommandOutput {
  stdout: string;
  failure: string | null;
}

function runCommand(
  command: string,
  args: string[],
  cwd: string,
  options: { signal: AbortSignal; timeoutMs?: number }
): Promise<CommandOutput> {
  return new Promise((resolveOutput) => {
    execFile(
      command,
      args,
      {
        cwd,
        encoding: "utf8",
        maxBuffer: HARNESS_MAX_BUFFER_BYTES,
        timeout: options.timeoutMs ?? 0,
        signal: options.signal,
        windowsHide: true
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolveOutput({ stdout, failure: null });
          return;
        }
        const detail = stderr.trim().length > 0 ? stderr.trim() : error.message;
        // A non-zero exit that still printed a report is a run with failing tests.
        resolveOutput({ stdout, failure: error.killed || stdout.trim().length === 0 ? detail : null });
      }
    );
  });
}

function parseReport(command: string, stdout: string): Record<string, TestOutcome> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new HarnessError(
      `Harness command ${command} did not print JSON: ${error instanceof Error ? error.message : String(error)}`,
      "HARNESS_OUTPUT_INVALID"
    );
  }

  try {
    return normalizeTestOutcomes(parsed);
  } catch (error) {
    throw new HarnessError(
      `Harness command ${command} printed an invalid report: ${error instanceof Error ? error.message : String(error)}`,
      "HARNESS_OUTPUT_INVALID"
    );
  }
}

/**
 * Test harness that runs an external command against a private copy of the
 * text. The command prints a JSON object mapping test ids to outcomes.
 */
export function createCommandTestHarness(options: CommandTestHarnessOptions): TestHarness {
  const fileName = options.fileName ?? DEFAULT_HARNESS_FILE_NAME;

  return {
    reentrant: options.reentrant === true,
    async run(text: string, runOptions: TestHarnessRunOptions): Promise<Record<string, TestOutcome>> {
      const directory = mkdtempSync(join(options.tmpRoot ?? tmpdir(), "stratum-harness-"));
      try {
        const artifactPath = join(directory, fileName);
        writeFileSync(artifactPath, text, "utf8");
        const args = (options.args ?? [ARTIFACT_PLACEHOLDER]).map((arg) =>
          arg.split(ARTIFACT_PLACEHOLDER).join(artifactPath)
        );

        const output = await runCommand(options.command, args, directory, {
          signal: runOptions.signal,
          timeoutMs: options.timeoutMs
        });
        if (output.failure !== null) {
          throw new HarnessError(
            `Harness command ${options.command} failed: ${output.failure}`,
            "HARNESS_LAUNCH_FAILED"
          );
        }
        return parseReport(options.command, output.stdout);
      } finally {
        rmSync(directory, { recursive: true, force: true });
      }
    }
  };
}
