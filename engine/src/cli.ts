import { readFileSync, realpathSync, writeFileSync } from "node:fs";
import { basename, relative, resolve, sep } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { ARTIFACT_PLACEHOLDER, createCommandTestHarness } from "./command-harness.ts";
import {
  DEFAULT_RECOVERY_PROFILE,
  ProfileValidationError,
  readRecoveryProfileFile,
  type RecoveryProfile
} from "./contracts.ts";
import { RecoveryInputError, describeError } from "./diagnostics.ts";
import { createGitHistoryBackend } from "./git-history-backend.ts";
import { formatRecoveryReport, isReconstructionAccepted } from "./report.ts";
import { recoverArtifact, type RecoveryResult } from "./recovery-session.ts";

export const CLI_EXIT_ACCEPTED = 0;
export const CLI_EXIT_USAGE = 1;
export const CLI_EXIT_NEEDS_REVIEW = 2;

export interface CliIo {
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const USAGE = [
  "Usage: stratum-recover --artifact <path> [options]",
  "",
  "Options:",
  "  --artifact <path>         artifact to recover, relative to --repo",
  "  --repo <dir>              git repository root (default: current directory)",
  "  --depth <n>               number of prior revisions to inspect (0-50)",
  "  --profile <file>          recovery profile JSON",
  "  --harness-command <cmd>   test command printing a JSON outcome map",
  "  --harness-arg <arg>       harness argument, repeatable; {artifact} is the text's path",
  "  --out <file>              write the reconstructed text here",
  "  --trace-ledger <file>     append a JSON-lines trace entry",
  "  --json                    print a JSON summary instead of the text report",
  ""
].join("\n");

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function samePath(left: string, right: string): boolean {
  if (left === right) {
    return true;
  }
  try {
    return realpathSync(left) === realpathSync(right);
  } catch {
    return false;
  }
}

function parseDepth(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new CliUsageError(`--depth must be a non-negative integer, received "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function toJsonSummary(result: RecoveryResult, outputPath: string | undefined): Record<string, unknown> {
  return {
    run_id: result.runId,
    artifact_id: result.artifactId,
    current_fidelity: result.currentModel.fidelity,
    strategy: result.plan.strategy,
    similarity: result.plan.similarity,
    template_ordinal: result.plan.templateOrdinal,
    stability_score: result.stabilityProfile.stabilityScore,
    verdict: result.verdict?.classification ?? null,
    accepted: isReconstructionAccepted(result),
    output_path: outputPath ?? null,
    trace_ledger_written: result.traceLedgerWritten,
    diagnostics: result.diagnostics
  };
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      artifact: { type: "string" },
      repo: { type: "string" },
      depth: { type: "string" },
      profile: { type: "string" },
      "harness-command": { type: "string" },
      "harness-arg": { type: "string", multiple: true },
      out: { type: "string" },
      "trace-ledger": { type: "string" },
      json: { type: "boolean" },
      help: { type: "boolean" }
    }
  });
}

export async function runRecoveryCli(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${describeError(error)}\n${USAGE}`);
    return CLI_EXIT_USAGE;
  }

  const values = parsed.values;
  if (values.help) {
    io.stdout(USAGE);
    return CLI_EXIT_ACCEPTED;
  }

  try {
    if (!values.artifact) {
      throw new CliUsageError("--artifact is required");
    }

    const repositoryRoot = resolve(io.cwd, values.repo ?? ".");
    const artifactPath = resolve(repositoryRoot, values.artifact);
    const artifactId = relative(repositoryRoot, artifactPath).split(sep).join("/");
    if (artifactId.startsWith("../") || artifactId === "..") {
      throw new CliUsageError(`--artifact must be inside the repository ${repositoryRoot}`);
    }

    const outputPath = values.out ? resolve(io.cwd, values.out) : undefined;
    if (outputPath !== undefined && samePath(outputPath, artifactPath)) {
      throw new CliUsageError("--out must not point at the artifact itself");
    }

    let currentText: string;
    try {
      currentText = readFileSync(artifactPath, "utf8");
    } catch (error) {
      throw new CliUsageError(`Unable to read artifact ${artifactPath}: ${describeError(error)}`);
    }

    const profile: RecoveryProfile = values.profile
      ? readRecoveryProfileFile(resolve(io.cwd, values.profile))
      : DEFAULT_RECOVERY_PROFILE;
    const harnessCommand = values["harness-command"];
    const harness = harnessCommand
      ? createCommandTestHarness({
          command: harnessCommand,
          args: values["harness-arg"] ?? [ARTIFACT_PLACEHOLDER],
          fileName: basename(artifactPath),
          timeoutMs: profile.harness.timeoutMs,
          reentrant: profile.harness.reentrant
        })
      : undefined;

    const result = await recoverArtifact(
      {
        artifactId,
        currentText,
        maxHistoryDepth: parseDepth(values.depth),
        history: createGitHistoryBackend({ repositoryRoot, timeoutMs: profile.history.timeoutMs }),
        harness
      },
      {
        profile,
        traceLedgerPath: values["trace-ledger"] ? resolve(io.cwd, values["trace-ledger"]) : undefined
      }
    );

    if (outputPath !== undefined) {
      writeFileSync(outputPath, result.reconstructedText, "utf8");
    }

    if (values.json) {
      io.stdout(`${JSON.stringify(toJsonSummary(result, outputPath), null, 2)}\n`);
    } else {
      io.stdout(formatRecoveryReport(result));
    }

    return isReconstructionAccepted(result) ? CLI_EXIT_ACCEPTED : CLI_EXIT_NEEDS_REVIEW;
  } catch (error) {
    if (
      error instanceof CliUsageError ||
      error instanceof RecoveryInputError ||
      error instanceof ProfileValidationError
    ) {
      io.stderr(`error: ${error.message}\n`);
      return CLI_EXIT_USAGE;
    }
    throw error;
  }
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(resolve(process.argv[1])).href) {
  process.exitCode = await runRecoveryCli(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text)
  });
}
