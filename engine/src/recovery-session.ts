import { randomUUID } from "node:crypto";

import {
  defaultStructuralParser,
  parseStructure,
  type StructuralModel,
  type StructuralParser
} from "../../parser/src/index.ts";
import { DEFAULT_RECOVERY_PROFILE, type RecoveryProfile } from "./contracts.ts";
import {
  RecoveryInputError,
  createRecoveryDiagnostic,
  normalizeOptionalNonEmptyString,
  type RecoveryDiagnostic
} from "./diagnostics.ts";
import { evaluateEquivalence, type EquivalenceVerdict, type TestHarness } from "./equivalence-oracle.ts";
import { rankRevisions, type StabilityProfile } from "./generation-ranker.ts";
import { enumerateRevisions, requireHistoryDepth, type HistoryBackend } from "./history-miner.ts";
import { planReconstruction, type MergeAdvisor, type ReconstructionPlan } from "./reconstruction-planner.ts";
import {
  RECOVERY_TRACE_SCHEMA_VERSION,
  emitRecoveryTraceEntry,
  type RecoveryTraceEntryV1,
  type RecoveryTraceError
} from "./trace-ledger.ts";

export interface RecoveryRequest {
  artifactId: string;
  currentText: string;
  maxHistoryDepth?: number;
  history: HistoryBackend;
  harness?: TestHarness;
}

export interface RecoverArtifactOptions {
  profile?: RecoveryProfile;
  parser?: StructuralParser;
  advisor?: MergeAdvisor;
  signal?: AbortSignal;
  traceLedgerPath?: string;
  now?: () => Date;
  runIdFactory?: () => string;
  tmpRoot?: string;
}

export interface RecoveryResult {
  runId: string;
  artifactId: string;
  currentModel: StructuralModel;
  stabilityProfile: StabilityProfile;
  plan: ReconstructionPlan;
  reconstructedText: string;
  verdict: EquivalenceVerdict | null;
  diagnostics: RecoveryDiagnostic[];
  revisionCount: number;
  traceLedgerWritten: boolean;
}

export type RecoverySessionErrorCode = "SESSION_CANCELLED";

export class RecoverySessionError extends Error {
  readonly code: RecoverySessionErrorCode;

  constructor(message: string, code: RecoverySessionErrorCode) {
    super(message);
    this.name = "RecoverySessionError";
    this.code = code;
  }
}

function resolveRunId(runIdFactory: () => string): string {
  try {
    const generated = normalizeOptionalNonEmptyString(runIdFactory());
    if (generated !== undefined) {
      return generated;
    }
  } catch {
    return randomUUID();
  }
  return randomUUID();
}

function resolveTimestamp(now: () => Date): string {
  try {
    const candidate = now();
    if (candidate instanceof Date && Number.isFinite(candidate.getTime())) {
      return candidate.toISOString();
    }
  } catch {
    return new Date().toISOString();
  }
  return new Date().toISOString();
}

function toTraceError(error: unknown): RecoveryTraceError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}

function isHistoryBackend(value: unknown): value is HistoryBackend {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "listRevisions" in value &&
    typeof value.listRevisions === "function" &&
    "fetchRevision" in value &&
    typeof value.fetchRevision === "function"
  );
}

function validateRequest(request: RecoveryRequest, profile: RecoveryProfile): { artifactId: string; maxDepth: number } {
  const artifactId = normalizeOptionalNonEmptyString(request.artifactId);
  if (artifactId === undefined) {
    throw new RecoveryInputError("Recovery artifactId must be a non-empty string", "INVALID_ARTIFACT_ID");
  }
  if (typeof request.currentText !== "string") {
    throw new RecoveryInputError("Recovery currentText must be a string", "INVALID_CURRENT_TEXT");
  }
  if (!isHistoryBackend(request.history)) {
    throw new RecoveryInputError(
      "Recovery history must provide listRevisions and fetchRevision",
      "INVALID_OPTIONS"
    );
  }

  return {
    artifactId,
    maxDepth: requireHistoryDepth(request.maxHistoryDepth ?? profile.history.maxDepth)
  };
}

/**
 * Recovers one artifact: parses the current text while mining its history,
 * ranks the prior revisions, plans a reconstruction and, when a harness is
 * supplied, checks it for equivalence. One ledger line is written per call,
 * whether it succeeds or throws.
 */
export async function recoverArtifact(
  request: RecoveryRequest,
  options: RecoverArtifactOptions = {}
): Promise<RecoveryResult> {
  const now = options.now ?? (() => new Date());
  const runId = resolveRunId(options.runIdFactory ?? (() => randomUUID()));
  const startedAt = resolveTimestamp(now);
  const profile = options.profile ?? DEFAULT_RECOVERY_PROFILE;
  const parser = options.parser ?? defaultStructuralParser;
  const signal = options.signal;

  let result: RecoveryResult | undefined;
  let failure: RecoveryTraceError | undefined;
  let ledgerArtifactId = typeof request.artifactId === "string" ? request.artifactId : "";

  const checkpoint = (stage: string): void => {
    if (signal?.aborted) {
      throw new RecoverySessionError(`Recovery of ${ledgerArtifactId} was cancelled ${stage}`, "SESSION_CANCELLED");
    }
  };

  try {
    const { artifactId, maxDepth } = validateRequest(request, profile);
    ledgerArtifactId = artifactId;
    checkpoint("before history enumeration");

    const currentParse = new Promise<StructuralModel>((resolveModel) => {
      setImmediate(() => resolveModel(parseStructure(request.currentText, { parser })));
    });
    let mined: Awaited<ReturnType<typeof enumerateRevisions>>;
    let currentModel: StructuralModel;
    try {
      [mined, currentModel] = await Promise.all([
        enumerateRevisions(artifactId, request.history, {
          maxDepth,
          timeoutMs: profile.history.timeoutMs,
          signal,
          parser,
          tmpRoot: options.tmpRoot
        }),
        currentParse
      ]);
    } catch (error) {
      checkpoint("during history enumeration");
      throw error;
    }
    checkpoint("after history enumeration");

    let stabilityProfile: StabilityProfile;
    try {
      stabilityProfile = await rankRevisions(mined.revisions, {
        concurrency: profile.ranking.parseConcurrency,
        signal
      });
    } catch (error) {
      checkpoint("during ranking");
      throw error;
    }
    checkpoint("after ranking");

    const plan = planReconstruction(currentModel, stabilityProfile, {
      substitutionThreshold: profile.planning.substitutionThreshold,
      advisor: options.advisor,
      expectedStructure: profile.artifactPatterns,
      artifactId,
      parser
    });
    checkpoint("after planning");

    const diagnostics: RecoveryDiagnostic[] = [];
    if (currentModel.fidelity !== "exact") {
      diagnostics.push(
        createRecoveryDiagnostic(
          "PARSE_DEGRADED",
          "info",
          `Current text parsed with fidelity ${currentModel.fidelity} (${currentModel.diagnostics.length} parser diagnostics)`
        )
      );
    }
    diagnostics.push(...mined.diagnostics);
    const historyReported = mined.diagnostics.some((diagnostic) => diagnostic.code === "HISTORY_UNAVAILABLE");
    diagnostics.push(
      ...plan.diagnostics.filter((diagnostic) => !(historyReported && diagnostic.code === "HISTORY_UNAVAILABLE"))
    );

    let verdict: EquivalenceVerdict | null = null;
    if (request.harness) {
      try {
        verdict = await evaluateEquivalence(request.currentText, plan.reconstructedText, request.harness, {
          timeoutMs: profile.harness.timeoutMs,
          signal
        });
      } catch (error) {
        checkpoint("during equivalence checking");
        throw error;
      }
      for (const [label, run] of [
        ["original", verdict.evidence.original],
        ["reconstructed", verdict.evidence.reconstructed]
      ] as const) {
        if (run.error !== null) {
          diagnostics.push(
            createRecoveryDiagnostic("HARNESS_FAILED", "warning", `Harness run on the ${label} text: ${run.error}`)
          );
        }
      }
    }

    result = {
      runId,
      artifactId,
      currentModel,
      stabilityProfile,
      plan,
      reconstructedText: plan.reconstructedText,
      verdict,
      diagnostics,
      revisionCount: mined.revisions.length,
      traceLedgerWritten: false
    };
    return result;
  } catch (error) {
    failure = toTraceError(error);
    throw error;
  } finally {
    const entry: RecoveryTraceEntryV1 = {
      schema_version: RECOVERY_TRACE_SCHEMA_VERSION,
      run_id: runId,
      artifact_id: ledgerArtifactId,
      started_at: startedAt,
      completed_at: resolveTimestamp(now),
      outcome:
        result && failure === undefined
          ? {
              status: "success",
              strategy: result.plan.strategy,
              similarity: result.plan.similarity,
              template_ordinal: result.plan.templateOrdinal,
              revisions_considered: result.revisionCount,
              revisions_valid: result.stabilityProfile.candidates.filter((candidate) => candidate.valid).length,
              verdict: result.verdict?.classification ?? null,
              diagnostic_codes: result.diagnostics.map((diagnostic) => diagnostic.code)
            }
          : { status: "failure", error: failure ?? { name: "Error", message: "Recovery did not complete" } }
    };
    const written = emitRecoveryTraceEntry(entry, { outputPath: normalizeOptionalNonEmptyString(options.traceLedgerPath) });
    if (result) {
      result.traceLedgerWritten = written;
    }
  }
}
