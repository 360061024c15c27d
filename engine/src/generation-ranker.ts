import type { Fidelity, StructuralModel } from "../../parser/src/index.ts";
import { mapWithConcurrency } from "./async-utils.ts";
import { compareModels } from "./comparator.ts";
import type { Revision } from "./history-miner.ts";

export const SIZE_TRENDS = ["growing", "shrinking", "stable"] as const;
export type SizeTrend = (typeof SIZE_TRENDS)[number];

export const DEFAULT_PARSE_CONCURRENCY = 4;
export const LOW_STABILITY_THRESHOLD = 0.7;
export const SIGNIFICANT_GROWTH_LINES = 50;

export type RankingRecommendationCode =
  | "NO_VALID_TEMPLATE"
  | "LOW_STABILITY"
  | "INVALID_REVISIONS_PRESENT"
  | "SIGNIFICANT_GROWTH";

export interface RankingRecommendation {
  code: RankingRecommendationCode;
  message: string;
}

export interface RankedCandidate {
  ordinal: number;
  identifier: string;
  fidelity: Fidelity;
  valid: boolean;
  lineCount: number;
  elementCount: number;
  /** Mean similarity to neighbouring valid revisions; null for invalid revisions. */
  localStability: number | null;
}

export interface TemplateSelection {
  ordinal: number;
  identifier: string;
  model: StructuralModel;
}

export interface StabilityProfile {
  sizeTrend: SizeTrend;
  stabilityScore: number;
  bestTemplateOrdinal: number | null;
  template: TemplateSelection | null;
  candidates: RankedCandidate[];
  recommendations: RankingRecommendation[];
}

export interface RankRevisionsOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

interface Evaluated {
  revision: Revision;
  model: StructuralModel;
}

function byOrdinalThenIdentifier(left: Evaluated, right: Evaluated): number {
  if (left.revision.ordinal !== right.revision.ordinal) {
    return left.revision.ordinal - right.revision.ordinal;
  }
  if (left.revision.identifier === right.revision.identifier) {
    return 0;
  }
  return left.revision.identifier < right.revision.identifier ? -1 : 1;
}

function sameNames(left: StructuralModel, right: StructuralModel): boolean {
  const comparison = compareModels(left, right);
  return (
    comparison.functions.added.length === 0 &&
    comparison.functions.removed.length === 0 &&
    comparison.types.added.length === 0 &&
    comparison.types.removed.length === 0
  );
}

function computeStabilityScore(valid: Evaluated[]): number {
  if (valid.length === 0) {
    return 0;
  }
  if (valid.length === 1) {
    return 1;
  }

  let stablePairs = 0;
  for (let index = 1; index < valid.length; index += 1) {
    if (sameNames(valid[index - 1].model, valid[index].model)) {
      stablePairs += 1;
    }
  }
  return stablePairs / (valid.length - 1);
}

function computeLocalStability(valid: Evaluated[], index: number): number {
  const neighbours = [valid[index - 1], valid[index + 1]].filter(
    (neighbour): neighbour is Evaluated => neighbour !== undefined
  );
  if (neighbours.length === 0) {
    return 1;
  }

  const total = neighbours.reduce(
    (sum, neighbour) => sum + compareModels(valid[index].model, neighbour.model).similarity,
    0
  );
  return total / neighbours.length;
}

function isMonotonic(series: number[], direction: 1 | -1): boolean {
  for (let index = 1; index < series.length; index += 1) {
    if ((series[index] - series[index - 1]) * direction < 0) {
      return false;
    }
  }
  return true;
}

function changes(series: number[]): boolean {
  return series.some((value, index) => index > 0 && value !== series[index - 1]);
}

/** Line and element counts ordered oldest to newest. */
export function classifySizeTrend(lineCounts: number[], elementCounts: number[]): SizeTrend {
  const moved = changes(lineCounts) || changes(elementCounts);
  if (!moved) {
    return "stable";
  }
  if (isMonotonic(lineCounts, 1) && isMonotonic(elementCounts, 1)) {
    return "growing";
  }
  if (isMonotonic(lineCounts, -1) && isMonotonic(elementCounts, -1)) {
    return "shrinking";
  }
  return "stable";
}

function countElements(model: StructuralModel): number {
  return model.functions.length + model.types.length;
}

/**
 * Parses every revision in a bounded pool and ranks them by validity, recency
 * and structural stability.
 */
export async function rankRevisions(
  revisions: readonly Revision[],
  options: RankRevisionsOptions = {}
): Promise<StabilityProfile> {
  const models = await mapWithConcurrency(
    revisions,
    options.concurrency ?? DEFAULT_PARSE_CONCURRENCY,
    (revision) => revision.model,
    options.signal
  );

  const evaluated: Evaluated[] = revisions
    .map((revision, index) => ({ revision, model: models[index] }))
    .sort(byOrdinalThenIdentifier);
  const valid = evaluated.filter((entry) => entry.model.fidelity === "exact");

  const localStability = new Map<Evaluated, number>();
  valid.forEach((entry, index) => {
    localStability.set(entry, computeLocalStability(valid, index));
  });

  const candidates: RankedCandidate[] = evaluated.map((entry) => ({
    ordinal: entry.revision.ordinal,
    identifier: entry.revision.identifier,
    fidelity: entry.model.fidelity,
    valid: entry.model.fidelity === "exact",
    lineCount: entry.model.lineCount,
    elementCount: countElements(entry.model),
    localStability: localStability.get(entry) ?? null
  }));

  let best: Evaluated | null = null;
  for (const entry of valid) {
    if (best === null) {
      best = entry;
      continue;
    }
    if (entry.revision.ordinal !== best.revision.ordinal) {
      break;
    }
    const entryStability = localStability.get(entry) ?? 0;
    const bestStability = localStability.get(best) ?? 0;
    if (
      entryStability > bestStability ||
      (entryStability === bestStability && entry.revision.identifier < best.revision.identifier)
    ) {
      best = entry;
    }
  }

  const oldestFirst = [...candidates].reverse();
  const sizeTrend = classifySizeTrend(
    oldestFirst.map((candidate) => candidate.lineCount),
    oldestFirst.map((candidate) => candidate.elementCount)
  );
  const stabilityScore = computeStabilityScore(valid);

  const recommendations: RankingRecommendation[] = [];
  if (valid.length === 0) {
    recommendations.push({
      code: "NO_VALID_TEMPLATE",
      message:
        candidates.length === 0
          ? "No prior revisions are available"
          : "No prior revision parses without errors"
    });
  }
  if (valid.length >= 2 && stabilityScore < LOW_STABILITY_THRESHOLD) {
    recommendations.push({
      code: "LOW_STABILITY",
      message: `Stability score ${stabilityScore.toFixed(2)} is below ${LOW_STABILITY_THRESHOLD}`
    });
  }
  const invalidOrdinals = candidates.filter((candidate) => !candidate.valid).map((candidate) => candidate.ordinal);
  if (invalidOrdinals.length > 0) {
    recommendations.push({
      code: "INVALID_REVISIONS_PRESENT",
      message: `Revisions ${invalidOrdinals.join(", ")} do not parse without errors`
    });
  }
  if (oldestFirst.length >= 2) {
    const growth = oldestFirst[oldestFirst.length - 1].lineCount - oldestFirst[0].lineCount;
    if (growth > SIGNIFICANT_GROWTH_LINES) {
      recommendations.push({
        code: "SIGNIFICANT_GROWTH",
        message: `Artifact grew by ${growth} lines across the inspected history`
      });
    }
  }

  return {
    sizeTrend,
    stabilityScore,
    bestTemplateOrdinal: best ? best.revision.ordinal : null,
    template: best
      ? { ordinal: best.revision.ordinal, identifier: best.revision.identifier, model: best.model }
      : null,
    candidates,
    recommendations
  };
}
