import { appendFileSync } from "node:fs";

import type { EquivalenceClassification } from "./equivalence-oracle.ts";
import type { ReconstructionStrategy } from "./reconstruction-planner.ts";

export const RECOVERY_TRACE_SCHEMA_VERSION = "1.0.0";

export interface RecoveryTraceError {
  name: string;
  message: string;
}

export interface RecoveryTraceEntryV1 {
  schema_version: typeof RECOVERY_TRACE_SCHEMA_VERSION;
  run_id: string;
  artifact_id: string;
  started_at: string;
  completed_at: string;
  outcome:
    | {
        status: "success";
        strategy: ReconstructionStrategy;
        similarity: number | null;
        template_ordinal: number | null;
        revisions_considered: number;
        revisions_valid: number;
        verdict: EquivalenceClassification | null;
        diagnostic_codes: string[];
      }
    | {
        status: "failure";
        error: RecoveryTraceError;
      };
}

export interface EmitRecoveryTraceEntryOptions {
  outputPath?: string;
}

/**
 * Appends one JSON line to the ledger. Returns whether a line was written; a
 * missing path or an unwritable ledger yields false.
 */
export function emitRecoveryTraceEntry(
  entry: RecoveryTraceEntryV1,
  options: EmitRecoveryTraceEntryOptions = {}
): boolean {
  if (!options.outputPath) {
    return false;
  }

  try {
    appendFileSync(options.outputPath, `${JSON.stringify(entry)}\n`, "utf8");
    return true;
  } catch {
    return false;
  }
}
