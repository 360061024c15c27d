import { withTimeout } from "./async-utils.ts";
import { describeError } from "./diagnostics.ts";

export const EQUIVALENCE_CLASSIFICATIONS = [
  "success_equivalent",
  "failure_equivalent",
  "divergent",
  "inconclusive"
] as const;
export type EquivalenceClassification = (typeof EQUIVALENCE_CLASSIFICATIONS)[number];

export const TEST_STATUSES = ["pass", "fail", "error", "skip"] as const;
export type TestStatus = (typeof TEST_STATUSES)[number];

export type TestOutcome = "pass" | "fail" | { status: TestStatus; message?: string };

export interface NormalizedTestOutcome {
  status: TestStatus;
  message?: string;
}

export interface TestHarnessRunOptions {
  signal: AbortSignal;
}

export interface TestHarness {
  /** Both runs may execute concurrently only when this is true. */
  reentrant?: boolean;
  run(text: string, options: TestHarnessRunOptions): Promise<Record<string, TestOutcome>>;
}

export interface HarnessRunEvidence {
  outcomes: Record<string, NormalizedTestOutcome> | null;
  /** Sorted ids that failed, errored, or were not reported by this run. */
  failing: string[];
  error: string | null;
}

export interface EquivalenceEvidence {
  original: HarnessRunEvidence;
  reconstructed: HarnessRunEvidence;
  failureDiff: string[];
}

export interface EquivalenceVerdict {
  classification: EquivalenceClassification;
  evidence: EquivalenceEvidence;
}

export interface EvaluateEquivalenceOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

const MISSING_TEST_MESSAGE = "not reported by this run";

function isTestStatus(value: unknown): value is TestStatus {
  return TEST_STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validates a harness result at run time; harnesses are external code. */
export function normalizeTestOutcomes(value: unknown): Record<string, NormalizedTestOutcome> {
  if (!isRecord(value)) {
    throw new Error("Harness result must be an object keyed by test id");
  }

  const normalized = new Map<string, NormalizedTestOutcome>();
  for (const [testId, outcome] of Object.entries(value)) {
    if (outcome === "pass" || outcome === "fail") {
      normalized.set(testId, { status: outcome });
      continue;
    }
    if (isRecord(outcome) && isTestStatus(outcome.status)) {
      const entry: NormalizedTestOutcome = { status: outcome.status };
      if (typeof outcome.message === "string" && outcome.message.length > 0) {
        entry.message = outcome.message;
      }
      normalized.set(testId, entry);
      continue;
    }
    throw new Error(`Harness result for test "${testId}" is not a recognised outcome`);
  }
  // Object.fromEntries defines own properties, so "__proto__" stays a test id.
  return Object.fromEntries(normalized);
}

function outcomeFor(
  outcomes: Record<string, NormalizedTestOutcome>,
  testId: string
): NormalizedTestOutcome | undefined {
  return Object.hasOwn(outcomes, testId) ? outcomes[testId] : undefined;
}

function isFailing(outcome: NormalizedTestOutcome | undefined): boolean {
  return outcome === undefined || outcome.status === "fail" || outcome.status === "error";
}

function failureMessage(outcomes: Record<string, NormalizedTestOutcome>, testId: string): string {
  const outcome = outcomeFor(outcomes, testId);
  if (outcome === undefined) {
    return MISSING_TEST_MESSAGE;
  }
  return outcome.message ?? outcome.status;
}

async function runHarness(
  label: string,
  text: string,
  harness: TestHarness,
  options: EvaluateEquivalenceOptions
): Promise<HarnessRunEvidence> {
  try {
    const result = await withTimeout(
      `Harness run on the ${label} text`,
      options.timeoutMs,
      (signal) => harness.run(text, { signal }),
      options.signal
    );
    const outcomes = normalizeTestOutcomes(result);
    if (Object.keys(outcomes).length === 0) {
      return { outcomes, failing: [], error: "Harness reported no tests" };
    }
    return { outcomes, failing: [], error: null };
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    return { outcomes: null, failing: [], error: describeError(error) };
  }
}

function buildFailureDiff(
  original: Record<string, NormalizedTestOutcome>,
  reconstructed: Record<string, NormalizedTestOutcome>,
  originalFailing: Set<string>,
  reconstructedFailing: Set<string>
): string[] {
  const lines: string[] = [];
  const ids = [...new Set([...originalFailing, ...reconstructedFailing])].sort();
  for (const testId of ids) {
    const inOriginal = originalFailing.has(testId);
    const inReconstructed = reconstructedFailing.has(testId);
    const originalMessage = failureMessage(original, testId);
    const reconstructedMessage = failureMessage(reconstructed, testId);

    if (inOriginal && inReconstructed && originalMessage === reconstructedMessage) {
      lines.push(`  ${testId}: ${originalMessage}`);
      continue;
    }
    if (inOriginal) {
      lines.push(`- ${testId}: ${originalMessage}`);
    }
    if (inReconstructed) {
      lines.push(`+ ${testId}: ${reconstructedMessage}`);
    }
  }
  return lines;
}

function sameMembers(left: Set<string>, right: Set<string>): boolean {
  return left.size === right.size && [...left].every((testId) => right.has(testId));
}

/**
 * Runs the harness against both texts and classifies the pair by their
 * failure sets. A test id reported by only one run counts as failing in the
 * run that lacks it.
 */
export async function evaluateEquivalence(
  original: string,
  reconstructed: string,
  harness: TestHarness,
  options: EvaluateEquivalenceOptions = {}
): Promise<EquivalenceVerdict> {
  let originalRun: HarnessRunEvidence;
  let reconstructedRun: HarnessRunEvidence;
  if (harness.reentrant === true) {
    [originalRun, reconstructedRun] = await Promise.all([
      runHarness("original", original, harness, options),
      runHarness("reconstructed", reconstructed, harness, options)
    ]);
  } else {
    originalRun = await runHarness("original", original, harness, options);
    reconstructedRun = await runHarness("reconstructed", reconstructed, harness, options);
  }

  if (
    originalRun.outcomes === null ||
    reconstructedRun.outcomes === null ||
    originalRun.error !== null ||
    reconstructedRun.error !== null
  ) {
    return {
      classification: "inconclusive",
      evidence: { original: originalRun, reconstructed: reconstructedRun, failureDiff: [] }
    };
  }

  const originalOutcomes = originalRun.outcomes;
  const reconstructedOutcomes = reconstructedRun.outcomes;
  const allIds = [...new Set([...Object.keys(originalOutcomes), ...Object.keys(reconstructedOutcomes)])].sort();
  const originalFailing = new Set(allIds.filter((testId) => isFailing(outcomeFor(originalOutcomes, testId))));
  const reconstructedFailing = new Set(allIds.filter((testId) => isFailing(outcomeFor(reconstructedOutcomes, testId))));

  let classification: EquivalenceClassification;
  if (originalFailing.size === 0 && reconstructedFailing.size === 0) {
    classification = "success_equivalent";
  } else if (sameMembers(originalFailing, reconstructedFailing)) {
    classification = "failure_equivalent";
  } else {
    classification = "divergent";
  }

  return {
    classification,
    evidence: {
      original: { ...originalRun, failing: [...originalFailing] },
      reconstructed: { ...reconstructedRun, failing: [...reconstructedFailing] },
      failureDiff: buildFailureDiff(originalOutcomes, reconstructedOutcomes, originalFailing, reconstructedFailing)
    }
  };
}
