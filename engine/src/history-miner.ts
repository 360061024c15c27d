import {
  defaultStructuralParser,
  parseStructure,
  type StructuralModel,
  type StructuralParser
} from "../../parser/src/index.ts";
import { mapWithConcurrency, withTimeout } from "./async-utils.ts";
import {
  RecoveryInputError,
  createRecoveryDiagnostic,
  describeError,
  type RecoveryDiagnostic
} from "./diagnostics.ts";
import { withRevisionWorkspace, type RevisionWorkspace } from "./workspace.ts";

export const DEFAULT_MAX_HISTORY_DEPTH = 5;
export const MAX_HISTORY_DEPTH_LIMIT = 50;
export const DEFAULT_FETCH_CONCURRENCY = 4;

export interface HistoryEntry {
  /** 0 is the most recent prior revision. */
  ordinal: number;
  identifier: string;
  summary?: string;
  committedAt?: string;
  /** Where the artifact lived at this revision, when a backend tracks renames. */
  path?: string;
}

export interface HistoryCallOptions {
  signal: AbortSignal;
}

export interface HistoryBackend {
  listRevisions(artifactId: string, options: HistoryCallOptions): Promise<readonly HistoryEntry[]>;
  fetchRevision(artifactId: string, entry: HistoryEntry, options: HistoryCallOptions): Promise<string>;
}

export class Revision {
  readonly identifier: string;
  readonly ordinal: number;
  readonly restoredText: string;
  readonly summary?: string;
  readonly committedAt?: string;
  readonly path?: string;
  private readonly parser: StructuralParser;
  private cachedModel: StructuralModel | null = null;

  constructor(params: {
    entry: HistoryEntry;
    restoredText: string;
    parser?: StructuralParser;
  }) {
    this.identifier = params.entry.identifier;
    this.ordinal = params.entry.ordinal;
    this.summary = params.entry.summary;
    this.committedAt = params.entry.committedAt;
    this.path = params.entry.path;
    this.restoredText = params.restoredText;
    this.parser = params.parser ?? defaultStructuralParser;
  }

  get model(): StructuralModel {
    if (this.cachedModel === null) {
      this.cachedModel = parseStructure(this.restoredText, { parser: this.parser });
    }
    return this.cachedModel;
  }

  get hasComputedModel(): boolean {
    return this.cachedModel !== null;
  }
}

export interface EnumerateRevisionsOptions {
  maxDepth?: number;
  /** Caller-owned workspace. When omitted a scoped workspace is allocated and released here. */
  workspace?: RevisionWorkspace;
  tmpRoot?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  concurrency?: number;
  parser?: StructuralParser;
}

export interface EnumerateRevisionsResult {
  revisions: Revision[];
  diagnostics: RecoveryDiagnostic[];
}

export function requireHistoryDepth(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > MAX_HISTORY_DEPTH_LIMIT) {
    throw new RecoveryInputError(
      `History depth must be an integer between 0 and ${MAX_HISTORY_DEPTH_LIMIT}`,
      "INVALID_MAX_DEPTH"
    );
  }
  return value;
}

function selectEntries(entries: readonly HistoryEntry[], maxDepth: number): HistoryEntry[] {
  const byOrdinal = new Map<number, HistoryEntry>();
  for (const entry of entries) {
    if (!Number.isInteger(entry.ordinal) || entry.ordinal < 0 || entry.ordinal >= maxDepth) {
      continue;
    }
    if (!byOrdinal.has(entry.ordinal)) {
      byOrdinal.set(entry.ordinal, entry);
    }
  }

  return [...byOrdinal.values()].sort((left, right) => left.ordinal - right.ordinal);
}

interface FetchOutcome {
  revision: Revision | null;
  diagnostic: RecoveryDiagnostic | null;
}

async function restoreEntries(
  artifactId: string,
  backend: HistoryBackend,
  entries: HistoryEntry[],
  workspace: RevisionWorkspace,
  options: EnumerateRevisionsOptions
): Promise<FetchOutcome[]> {
  return mapWithConcurrency(
    entries,
    options.concurrency ?? DEFAULT_FETCH_CONCURRENCY,
    async (entry): Promise<FetchOutcome> => {
      let text: string;
      try {
        text = await withTimeout(
          `Fetch of revision ${entry.ordinal}`,
          options.timeoutMs,
          (signal) => backend.fetchRevision(artifactId, entry, { signal }),
          options.signal
        );
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        return {
          revision: null,
          diagnostic: createRecoveryDiagnostic(
            "REVISION_FETCH_FAILED",
            "warning",
            `Revision ${entry.identifier} could not be fetched: ${describeError(error)}`,
            { ordinal: entry.ordinal }
          )
        };
      }

      try {
        const restoredText = workspace.materialize({ artifactId, ordinal: entry.ordinal, text });
        return {
          revision: new Revision({ entry, restoredText, parser: options.parser }),
          diagnostic: null
        };
      } catch (error) {
        return {
          revision: null,
          diagnostic: createRecoveryDiagnostic(
            "WORKSPACE_FAILURE",
            "warning",
            `Revision ${entry.identifier} could not be restored: ${describeError(error)}`,
            { ordinal: entry.ordinal }
          )
        };
      }
    },
    options.signal
  );
}

/**
 * Lists up to `maxDepth` prior revisions of an artifact and restores each
 * through the revision workspace. Backend failures degrade to diagnostics;
 * only an invalid depth, a workspace that cannot be allocated, or
 * cancellation propagate.
 */
export async function enumerateRevisions(
  artifactId: string,
  backend: HistoryBackend,
  options: EnumerateRevisionsOptions = {}
): Promise<EnumerateRevisionsResult> {
  const maxDepth = requireHistoryDepth(options.maxDepth ?? DEFAULT_MAX_HISTORY_DEPTH);
  if (maxDepth === 0) {
    return { revisions: [], diagnostics: [] };
  }

  let listed: readonly HistoryEntry[];
  try {
    listed = await withTimeout(
      "History listing",
      options.timeoutMs,
      (signal) => backend.listRevisions(artifactId, { signal }),
      options.signal
    );
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    return {
      revisions: [],
      diagnostics: [
        createRecoveryDiagnostic(
          "HISTORY_UNAVAILABLE",
          "warning",
          `History for ${artifactId} is unavailable: ${describeError(error)}`
        )
      ]
    };
  }

  const entries = selectEntries(listed, maxDepth);
  if (entries.length === 0) {
    return {
      revisions: [],
      diagnostics: [
        createRecoveryDiagnostic("HISTORY_UNAVAILABLE", "warning", `No prior revisions of ${artifactId} were found`)
      ]
    };
  }

  const collect = (outcomes: FetchOutcome[]): EnumerateRevisionsResult => {
    const revisions: Revision[] = [];
    const diagnostics: RecoveryDiagnostic[] = [];
    for (const outcome of outcomes) {
      if (outcome.revision) {
        revisions.push(outcome.revision);
      }
      if (outcome.diagnostic) {
        diagnostics.push(outcome.diagnostic);
      }
    }
    return { revisions, diagnostics };
  };

  if (options.workspace) {
    return collect(await restoreEntries(artifactId, backend, entries, options.workspace, options));
  }

  const { result, released } = await withRevisionWorkspace({ tmpRoot: options.tmpRoot }, (workspace) =>
    restoreEntries(artifactId, backend, entries, workspace, options)
  );
  const collected = collect(result);
  if (!released) {
    collected.diagnostics.push(
      createRecoveryDiagnostic("WORKSPACE_RELEASE_FAILED", "warning", "Revision workspace could not be removed")
    );
  }
  return collected;
}
