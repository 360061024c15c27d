import type { RecoveryDiagnostic } from "./diagnostics.ts";
import type { RecoveryResult } from "./recovery-session.ts";

function formatOptionalField(value: string | number | null | undefined): string {
  return value === null || value === undefined || value === "" ? "n/a" : String(value);
}

function formatRatio(value: number | null): string {
  return value === null ? "n/a" : value.toFixed(2);
}

function formatDiagnostic(diagnostic: RecoveryDiagnostic): string {
  const location: string[] = [];
  if (diagnostic.element !== undefined) {
    location.push(diagnostic.element);
  }
  if (diagnostic.ordinal !== undefined) {
    location.push(`revision ${diagnostic.ordinal}`);
  }
  if (diagnostic.line !== undefined) {
    location.push(`line ${diagnostic.line}`);
  }
  const suffix = location.length > 0 ? ` (${location.join(", ")})` : "";
  return `  - [${diagnostic.severity}] ${diagnostic.code}: ${diagnostic.message}${suffix}`;
}

export function formatRecoveryReport(result: RecoveryResult): string {
  const { plan, stabilityProfile } = result;
  const validRevisions = stabilityProfile.candidates.filter((candidate) => candidate.valid).length;
  const lines: string[] = [
    "[Recovery Report]",
    `Run ID: ${result.runId}`,
    `Artifact: ${result.artifactId}`,
    `Current Fidelity: ${result.currentModel.fidelity}`,
    `Revisions: ${result.revisionCount} restored, ${validRevisions} valid`,
    `Stability Score: ${formatRatio(stabilityProfile.stabilityScore)}`,
    `Size Trend: ${stabilityProfile.sizeTrend}`,
    `Template: ${
      stabilityProfile.template
        ? `revision ${stabilityProfile.template.ordinal} (${stabilityProfile.template.identifier})`
        : "n/a"
    }`,
    `Strategy: ${plan.strategy}`,
    `Similarity: ${formatRatio(plan.similarity)}`,
    `Verdict: ${formatOptionalField(result.verdict?.classification)}`
  ];

  const failureDiff = result.verdict?.evidence.failureDiff ?? [];
  if (failureDiff.length > 0) {
    lines.push("Failure Diff:");
    lines.push(...failureDiff.map((line) => `  ${line}`));
  }

  if (stabilityProfile.recommendations.length === 0) {
    lines.push("Recommendations: none");
  } else {
    lines.push("Recommendations:");
    for (const recommendation of stabilityProfile.recommendations) {
      lines.push(`  - ${recommendation.code}: ${recommendation.message}`);
    }
  }

  if (result.diagnostics.length === 0) {
    lines.push("Diagnostics: none");
  } else {
    lines.push("Diagnostics:");
    lines.push(...result.diagnostics.map(formatDiagnostic));
  }

  lines.push(`Trace Ledger Emitted: ${result.traceLedgerWritten ? "yes" : "no"}`);
  return `${lines.join("\n")}\n`;
}

/** True when the reconstruction can be used without review. */
export function isReconstructionAccepted(result: RecoveryResult): boolean {
  const dropped = result.diagnostics.some((diagnostic) => diagnostic.code === "DROPPED_ELEMENT");
  return !dropped && result.verdict?.classification !== "divergent";
}
