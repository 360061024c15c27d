import {
  defaultStructuralParser,
  parseStructure,
  type FunctionElement,
  type LineRange,
  type StructuralModel,
  type StructuralParser,
  type TypeElement
} from "../../parser/src/index.ts";
import { resolveExpectedStructure, type ArtifactPattern } from "./artifact-patterns.ts";
import { compareModels, type ModelComparison } from "./comparator.ts";
import {
  createRecoveryDiagnostic,
  describeError,
  fromParserDiagnostic,
  type RecoveryDiagnostic
} from "./diagnostics.ts";
import type { StabilityProfile, TemplateSelection } from "./generation-ranker.ts";

export const RECONSTRUCTION_STRATEGIES = [
  "template_substitution",
  "selective_patch",
  "no_history_fallback"
] as const;
export type ReconstructionStrategy = (typeof RECONSTRUCTION_STRATEGIES)[number];

export const DEFAULT_SUBSTITUTION_THRESHOLD = 0.9;

export type FragmentOrigin = "current" | "template";

export interface SourceFragment {
  /** Lines of the reconstructed text this fragment occupies. */
  outputRange: LineRange;
  /** Qualified name of the element the lines belong to; null for module-level lines. */
  target: string | null;
  origin: FragmentOrigin;
  /** Lines of the origin text the fragment was taken from. */
  sourceRange: LineRange;
}

export interface ReconstructionPlan {
  strategy: ReconstructionStrategy;
  sourceFragments: SourceFragment[];
  reconstructedText: string;
  similarity: number | null;
  templateOrdinal: number | null;
  comparison: ModelComparison | null;
  diagnostics: RecoveryDiagnostic[];
}

export type MergeAdvice = "prefer_current" | "prefer_template" | "no_opinion";

export interface MergeAdvisorContext {
  artifactId?: string;
  element: string;
  kind: "function" | "type";
  currentRegion: string;
  templateRegion: string;
}

/** Optional, non-deterministic consultant for element-level merge decisions. */
export interface MergeAdvisor {
  adviseMerge(context: MergeAdvisorContext): MergeAdvice;
}

export interface PlanReconstructionOptions {
  substitutionThreshold?: number;
  advisor?: MergeAdvisor;
  expectedStructure?: readonly ArtifactPattern[];
  artifactId?: string;
  parser?: StructuralParser;
}

type TopLevelElement =
  | { kind: "function"; element: FunctionElement }
  | { kind: "type"; element: TypeElement };

interface OutputLine {
  text: string;
  origin: FragmentOrigin;
  sourceLine: number;
  target: string | null;
}

class AmbiguousMergeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AmbiguousMergeError";
  }
}

function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r\n|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function leadingWhitespace(line: string): string {
  return line.match(/^[ \t]*/)?.[0] ?? "";
}

function clampRange(range: LineRange, lineCount: number): LineRange {
  const startLine = Math.min(Math.max(range.startLine, 1), Math.max(lineCount, 1));
  const endLine = Math.min(Math.max(range.endLine, startLine), lineCount);
  return { startLine, endLine };
}

function takeLines(
  lines: string[],
  range: LineRange,
  origin: FragmentOrigin,
  target: string | null
): OutputLine[] {
  const taken: OutputLine[] = [];
  for (let line = range.startLine; line <= range.endLine && line <= lines.length; line += 1) {
    taken.push({ text: lines[line - 1], origin, sourceLine: line, target });
  }
  return taken;
}

function buildFragments(output: OutputLine[]): SourceFragment[] {
  const fragments: SourceFragment[] = [];
  output.forEach((line, index) => {
    const outputLine = index + 1;
    const last = fragments[fragments.length - 1];
    if (
      last &&
      last.origin === line.origin &&
      last.target === line.target &&
      last.sourceRange.endLine + 1 === line.sourceLine
    ) {
      last.outputRange = { startLine: last.outputRange.startLine, endLine: outputLine };
      last.sourceRange = { startLine: last.sourceRange.startLine, endLine: line.sourceLine };
      return;
    }
    fragments.push({
      outputRange: { startLine: outputLine, endLine: outputLine },
      target: line.target,
      origin: line.origin,
      sourceRange: { startLine: line.sourceLine, endLine: line.sourceLine }
    });
  });
  return fragments;
}

function wholeTextFragments(text: string, origin: FragmentOrigin): SourceFragment[] {
  const lineCount = splitLines(text).length;
  if (lineCount === 0) {
    return [];
  }
  return [
    {
      outputRange: { startLine: 1, endLine: lineCount },
      target: null,
      origin,
      sourceRange: { startLine: 1, endLine: lineCount }
    }
  ];
}

function topLevelElements(model: StructuralModel): TopLevelElement[] {
  const elements: TopLevelElement[] = [
    ...model.functions
      .filter((element) => element.nestingDepth === 0)
      .map((element): TopLevelElement => ({ kind: "function", element })),
    ...model.types
      .filter((element) => element.nestingDepth === 0)
      .map((element): TopLevelElement => ({ kind: "type", element }))
  ];
  return elements.sort((left, right) => left.element.range.startLine - right.element.range.startLine);
}

function nestedNames(model: StructuralModel, qualifiedName: string): string[] {
  const prefix = `${qualifiedName}.`;
  return [...model.functions, ...model.types]
    .map((element) => element.qualifiedName)
    .filter((name) => name.startsWith(prefix));
}

function directMethods(model: StructuralModel, type: TypeElement): FunctionElement[] {
  return model.functions.filter(
    (element) =>
      element.qualifiedName === `${type.qualifiedName}.${element.name}` &&
      element.nestingDepth === type.nestingDepth + 1
  );
}

function findCounterpart(template: StructuralModel, entry: TopLevelElement): TopLevelElement | null {
  if (entry.kind === "function") {
    const match = template.functions.find(
      (element) => element.nestingDepth === 0 && element.qualifiedName === entry.element.qualifiedName
    );
    return match ? { kind: "function", element: match } : null;
  }

  const match = template.types.find(
    (element) => element.nestingDepth === 0 && element.qualifiedName === entry.element.qualifiedName
  );
  return match ? { kind: "type", element: match } : null;
}

/** Groups elements whose line ranges overlap; a group of one is mergeable. */
function clusterByOverlap(elements: TopLevelElement[], lineCount: number): TopLevelElement[][] {
  const clusters: TopLevelElement[][] = [];
  let clusterEnd = 0;
  for (const entry of elements) {
    const range = clampRange(entry.element.range, lineCount);
    const current = clusters[clusters.length - 1];
    if (current && range.startLine <= clusterEnd) {
      current.push(entry);
      clusterEnd = Math.max(clusterEnd, range.endLine);
      continue;
    }
    clusters.push([entry]);
    clusterEnd = range.endLine;
  }
  return clusters;
}

class SelectivePatchBuilder {
  private readonly current: StructuralModel;
  private readonly template: StructuralModel;
  private readonly options: PlanReconstructionOptions;
  private readonly currentLines: string[];
  private readonly templateLines: string[];
  readonly diagnostics: RecoveryDiagnostic[] = [];

  constructor(current: StructuralModel, template: StructuralModel, options: PlanReconstructionOptions) {
    this.current = current;
    this.template = template;
    this.options = options;
    this.currentLines = splitLines(current.sourceText);
    this.templateLines = splitLines(template.sourceText);
  }

  build(): OutputLine[] {
    const output: OutputLine[] = [];
    const lineCount = this.currentLines.length;
    let cursor = 1;

    for (const cluster of clusterByOverlap(topLevelElements(this.current), lineCount)) {
      const ranges = cluster.map((entry) => clampRange(entry.element.range, lineCount));
      const clusterStart = Math.min(...ranges.map((range) => range.startLine));
      const clusterEnd = Math.max(...ranges.map((range) => range.endLine));

      if (cursor < clusterStart) {
        output.push(...takeLines(this.currentLines, { startLine: cursor, endLine: clusterStart - 1 }, "current", null));
      }

      if (cluster.length > 1) {
        for (const entry of cluster) {
          this.warnAmbiguous(entry.element.qualifiedName, "its line range overlaps another element");
        }
        output.push(
          ...takeLines(this.currentLines, { startLine: clusterStart, endLine: clusterEnd }, "current", null)
        );
      } else {
        output.push(...this.mergeElement(cluster[0], ranges[0]));
      }
      cursor = Math.max(cursor, clusterEnd + 1);
    }

    if (cursor <= lineCount) {
      output.push(...takeLines(this.currentLines, { startLine: cursor, endLine: lineCount }, "current", null));
    }

    const currentNames = new Set(topLevelElements(this.current).map((entry) => entry.element.qualifiedName));
    for (const entry of topLevelElements(this.template)) {
      if (!currentNames.has(entry.element.qualifiedName)) {
        this.diagnostics.push(
          createRecoveryDiagnostic(
            "OMITTED_TEMPLATE_ELEMENT",
            "info",
            `Template element ${entry.element.qualifiedName} is absent from the current text and was not reintroduced`,
            { element: entry.element.qualifiedName, line: entry.element.range.startLine }
          )
        );
      }
    }

    return output;
  }

  private mergeElement(entry: TopLevelElement, currentRange: LineRange): OutputLine[] {
    const name = entry.element.qualifiedName;
    const keepCurrent = (): OutputLine[] => takeLines(this.currentLines, currentRange, "current", name);

    const counterpart = findCounterpart(this.template, entry);
    if (!counterpart) {
      return keepCurrent();
    }

    const templateRange = clampRange(counterpart.element.range, this.templateLines.length);
    if (this.advisorPrefersCurrent(entry, currentRange, templateRange)) {
      return keepCurrent();
    }

    try {
      if (entry.kind === "type" && counterpart.kind === "type") {
        return this.mergeType(entry.element, counterpart.element, templateRange);
      }
      return this.mergeFunction(name, templateRange);
    } catch (error) {
      if (!(error instanceof AmbiguousMergeError)) {
        throw error;
      }
      this.warnAmbiguous(name, error.message);
      return keepCurrent();
    }
  }

  private mergeFunction(name: string, templateRange: LineRange): OutputLine[] {
    const templateNames = new Set(nestedNames(this.template, name));
    const missing = nestedNames(this.current, name).filter((nested) => !templateNames.has(nested));
    if (missing.length > 0) {
      throw new AmbiguousMergeError(`template lacks nested elements ${missing.join(", ")}`);
    }
    return takeLines(this.templateLines, templateRange, "template", name);
  }

  private mergeType(current: TypeElement, template: TypeElement, templateRange: LineRange): OutputLine[] {
    const name = current.qualifiedName;
    const currentMethods = directMethods(this.current, current);
    const templateMethods = directMethods(this.template, template);
    const currentMethodNames = new Set(currentMethods.map((method) => method.qualifiedName));
    const templateMethodNames = new Set(templateMethods.map((method) => method.qualifiedName));

    const currentOnly = currentMethods.filter((method) => !templateMethodNames.has(method.qualifiedName));
    const templateOnly = templateMethods.filter((method) => !currentMethodNames.has(method.qualifiedName));

    const templateNames = new Set(nestedNames(this.template, name));
    const appendedPrefixes = currentOnly.map((method) => method.qualifiedName);
    const missing = nestedNames(this.current, name).filter(
      (nested) =>
        !templateNames.has(nested) &&
        !appendedPrefixes.some((prefix) => nested === prefix || nested.startsWith(`${prefix}.`))
    );
    if (missing.length > 0) {
      throw new AmbiguousMergeError(`template lacks nested elements ${missing.join(", ")}`);
    }

    const removed = templateOnly
      .map((method) => ({ method, range: method.range }))
      .sort((left, right) => left.range.startLine - right.range.startLine);
    let previousEnd = template.headerLine;
    for (const { range } of removed) {
      if (range.startLine <= previousEnd || range.endLine > templateRange.endLine) {
        throw new AmbiguousMergeError("template member regions overlap");
      }
      previousEnd = range.endLine;
    }

    const memberIndent = this.templateMemberIndent(template, templateMethods, templateRange);
    if (memberIndent === null && (currentOnly.length > 0 || removed.length > 0)) {
      throw new AmbiguousMergeError("template member indentation cannot be determined");
    }

    const output: OutputLine[] = [];
    for (const line of takeLines(this.templateLines, templateRange, "template", name)) {
      if (removed.some(({ range }) => line.sourceLine >= range.startLine && line.sourceLine <= range.endLine)) {
        continue;
      }
      output.push(line);
    }

    for (const method of currentOnly) {
      const methodRange = clampRange(method.range, this.currentLines.length);
      const currentIndent = leadingWhitespace(this.currentLines[methodRange.startLine - 1] ?? "");
      const targetIndent = memberIndent ?? currentIndent;
      const methodLines = takeLines(this.currentLines, methodRange, "current", method.qualifiedName).map(
        (line): OutputLine => ({
          ...line,
          text:
            line.text.trim().length === 0
              ? ""
              : line.text.startsWith(currentIndent)
                ? `${targetIndent}${line.text.slice(currentIndent.length)}`
                : line.text
        })
      );
      output.push(...methodLines);
    }

    const hasBody = output.some(
      (line) => line.origin === "current" || (line.sourceLine > template.headerLine && line.text.trim().length > 0)
    );
    if (!hasBody) {
      throw new AmbiguousMergeError("removing template members would leave an empty body");
    }

    for (const { method } of removed) {
      this.diagnostics.push(
        createRecoveryDiagnostic(
          "OMITTED_TEMPLATE_ELEMENT",
          "info",
          `Template method ${method.qualifiedName} is absent from the current text and was removed`,
          { element: method.qualifiedName, line: method.range.startLine }
        )
      );
    }
    return output;
  }

  private templateMemberIndent(
    template: TypeElement,
    templateMethods: FunctionElement[],
    templateRange: LineRange
  ): string | null {
    const headerIndent = leadingWhitespace(this.templateLines[template.headerLine - 1] ?? "");
    const firstMethod = [...templateMethods].sort((left, right) => left.range.startLine - right.range.startLine)[0];
    if (firstMethod) {
      const indent = leadingWhitespace(this.templateLines[firstMethod.range.startLine - 1] ?? "");
      if (indent.length > headerIndent.length) {
        return indent;
      }
    }

    for (let line = template.headerLine + 1; line <= templateRange.endLine; line += 1) {
      const text = this.templateLines[line - 1] ?? "";
      if (text.trim().length === 0) {
        continue;
      }
      const indent = leadingWhitespace(text);
      return indent.length > headerIndent.length ? indent : null;
    }
    return null;
  }

  private advisorPrefersCurrent(entry: TopLevelElement, currentRange: LineRange, templateRange: LineRange): boolean {
    const advisor = this.options.advisor;
    if (!advisor) {
      return false;
    }

    const name = entry.element.qualifiedName;
    let advice: MergeAdvice;
    try {
      advice = advisor.adviseMerge({
        artifactId: this.options.artifactId,
        element: name,
        kind: entry.kind,
        currentRegion: takeLines(this.currentLines, currentRange, "current", name)
          .map((line) => line.text)
          .join("\n"),
        templateRegion: takeLines(this.templateLines, templateRange, "template", name)
          .map((line) => line.text)
          .join("\n")
      });
    } catch (error) {
      this.diagnostics.push(
        createRecoveryDiagnostic("ADVISOR_FAILED", "warning", `Merge advisor failed for ${name}: ${describeError(error)}`, {
          element: name
        })
      );
      return false;
    }

    if (advice !== "prefer_current") {
      return false;
    }
    this.diagnostics.push(
      createRecoveryDiagnostic("ADVISOR_PREFERRED_CURRENT", "info", `Merge advisor kept the current region of ${name}`, {
        element: name,
        line: currentRange.startLine
      })
    );
    return true;
  }

  private warnAmbiguous(name: string, reason: string): void {
    this.diagnostics.push(
      createRecoveryDiagnostic("AMBIGUOUS_MERGE", "warning", `Kept the current region of ${name}: ${reason}`, {
        element: name
      })
    );
  }
}

function joinOutput(lines: OutputLine[], reference: string): string {
  if (lines.length === 0) {
    return "";
  }
  const eol = reference.includes("\r\n") ? "\r\n" : "\n";
  const trailing = /\r?\n$/.test(reference) ? eol : "";
  return `${lines.map((line) => line.text).join(eol)}${trailing}`;
}

function fallbackPlan(
  current: StructuralModel,
  diagnostic: RecoveryDiagnostic,
  details: { similarity: number | null; templateOrdinal: number | null; comparison: ModelComparison | null }
): ReconstructionPlan {
  return {
    strategy: "no_history_fallback",
    sourceFragments: wholeTextFragments(current.sourceText, "current"),
    reconstructedText: current.sourceText,
    similarity: details.similarity,
    templateOrdinal: details.templateOrdinal,
    comparison: details.comparison,
    diagnostics: [...current.diagnostics.map(fromParserDiagnostic), diagnostic]
  };
}

function selectStrategy(
  current: StructuralModel,
  template: TemplateSelection,
  options: PlanReconstructionOptions
): ReconstructionPlan {
  const comparison = compareModels(current, template.model);
  const details = {
    similarity: comparison.similarity,
    templateOrdinal: template.ordinal,
    comparison
  };

  if (comparison.similarity === 0) {
    return fallbackPlan(
      current,
      createRecoveryDiagnostic(
        "TEMPLATE_UNRELATED",
        "warning",
        `Template revision ${template.identifier} shares no elements with the current text`
      ),
      details
    );
  }

  if (comparison.similarity >= (options.substitutionThreshold ?? DEFAULT_SUBSTITUTION_THRESHOLD)) {
    return {
      strategy: "template_substitution",
      sourceFragments: wholeTextFragments(template.model.sourceText, "template"),
      reconstructedText: template.model.sourceText,
      ...details,
      diagnostics: []
    };
  }

  const builder = new SelectivePatchBuilder(current, template.model, options);
  const output = builder.build();
  return {
    strategy: "selective_patch",
    sourceFragments: buildFragments(output),
    reconstructedText: joinOutput(output, current.sourceText),
    ...details,
    diagnostics: builder.diagnostics
  };
}

function verifyReconstruction(
  current: StructuralModel,
  plan: ReconstructionPlan,
  options: PlanReconstructionOptions
): RecoveryDiagnostic[] {
  const reconstructed = parseStructure(plan.reconstructedText, {
    parser: options.parser ?? defaultStructuralParser
  });
  const diagnostics: RecoveryDiagnostic[] = [];

  if (reconstructed.fidelity !== "exact" && plan.strategy !== "no_history_fallback") {
    diagnostics.push(
      createRecoveryDiagnostic(
        "PARSE_DEGRADED",
        "warning",
        `Reconstructed text does not parse cleanly (fidelity ${reconstructed.fidelity})`
      )
    );
  }

  const functionNames = new Set(reconstructed.functions.map((element) => element.qualifiedName));
  const typeNames = new Set(reconstructed.types.map((element) => element.qualifiedName));
  const reported = new Set<string>();
  for (const element of [...current.functions, ...current.types]) {
    const present = functionNames.has(element.qualifiedName) || typeNames.has(element.qualifiedName);
    if (present || reported.has(element.qualifiedName)) {
      continue;
    }
    reported.add(element.qualifiedName);
    diagnostics.push(
      createRecoveryDiagnostic(
        "DROPPED_ELEMENT",
        "warning",
        `Element ${element.qualifiedName} is missing from the reconstructed text`,
        { element: element.qualifiedName, line: element.range.startLine }
      )
    );
  }

  const expected =
    options.artifactId !== undefined && options.expectedStructure
      ? resolveExpectedStructure(options.artifactId, options.expectedStructure)
      : null;
  if (expected) {
    const missing = [
      ...expected.functions.filter((name) => !functionNames.has(name)),
      ...expected.types.filter((name) => !typeNames.has(name))
    ];
    for (const name of missing) {
      diagnostics.push(
        createRecoveryDiagnostic(
          "EXPECTED_ELEMENT_MISSING",
          "warning",
          `Expected element ${name} (${expected.patterns.join(", ")}) is missing from the reconstructed text`,
          { element: name }
        )
      );
    }
  }

  return diagnostics;
}

/**
 * Chooses a reconstruction strategy for `current` against the profile's
 * template and produces the reconstructed text. Never throws: an internal
 * failure degrades to the current text with a PLAN_FALLBACK diagnostic.
 */
export function planReconstruction(
  current: StructuralModel,
  profile: StabilityProfile,
  options: PlanReconstructionOptions = {}
): ReconstructionPlan {
  let plan: ReconstructionPlan;
  try {
    plan = profile.template
      ? selectStrategy(current, profile.template, options)
      : fallbackPlan(
          current,
          createRecoveryDiagnostic(
            "HISTORY_UNAVAILABLE",
            "warning",
            "No valid prior revision is available; returning the current text"
          ),
          { similarity: null, templateOrdinal: null, comparison: null }
        );
  } catch (error) {
    plan = fallbackPlan(
      current,
      createRecoveryDiagnostic(
        "PLAN_FALLBACK",
        "warning",
        `Reconstruction planning failed: ${describeError(error)}; returning the current text`
      ),
      { similarity: null, templateOrdinal: profile.bestTemplateOrdinal, comparison: null }
    );
  }

  plan.diagnostics.push(...verifyReconstruction(current, plan, options));
  return plan;
}
