import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export const DEFAULT_WORKSPACE_PREFIX = "stratum-revisions-";

export type WorkspaceErrorCode = "WORKSPACE_ALLOCATION_FAILED" | "WORKSPACE_WRITE_FAILED";

export class WorkspaceError extends Error {
  readonly code: WorkspaceErrorCode;
  readonly path?: string;

  constructor(message: string, code: WorkspaceErrorCode, path?: string) {
    super(message);
    this.name = "WorkspaceError";
    this.code = code;
    this.path = path;
  }
}

export interface MaterializeRevisionParams {
  artifactId: string;
  ordinal: number;
  text: string;
}

export interface RevisionWorkspace {
  readonly root: string;
  readonly released: boolean;
  /** Writes one revision into the workspace and returns the text read back from disk. */
  materialize(params: MaterializeRevisionParams): string;
  /** Removes the workspace directory. Safe to call more than once. */
  release(): boolean;
}

export interface CreateRevisionWorkspaceOptions {
  tmpRoot?: string;
  prefix?: string;
}

function sanitizeArtifactFileName(artifactId: string): string {
  const segments = artifactId.split(/[\\/]/).filter((segment) => segment.length > 0);
  const baseName = segments[segments.length - 1] ?? "";
  const sanitized = baseName.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "");
  return sanitized.length > 0 ? sanitized : "artifact";
}

export function revisionFileName(artifactId: string, ordinal: number): string {
  return `${String(ordinal).padStart(3, "0")}-${sanitizeArtifactFileName(artifactId)}`;
}

export function createRevisionWorkspace(options: CreateRevisionWorkspaceOptions = {}): RevisionWorkspace {
  const parent = options.tmpRoot ?? tmpdir();
  let root: string;
  try {
    root = mkdtempSync(join(parent, options.prefix ?? DEFAULT_WORKSPACE_PREFIX));
  } catch (error) {
    throw new WorkspaceError(
      `Unable to allocate revision workspace under ${parent}: ${error instanceof Error ? error.message : String(error)}`,
      "WORKSPACE_ALLOCATION_FAILED",
      parent
    );
  }

  let releaseResult: boolean | null = null;

  return {
    root,
    get released(): boolean {
      return releaseResult !== null;
    },
    materialize(params: MaterializeRevisionParams): string {
      if (releaseResult !== null) {
        throw new WorkspaceError("Revision workspace has already been released", "WORKSPACE_WRITE_FAILED", root);
      }

      const target = join(root, revisionFileName(params.artifactId, params.ordinal));
      try {
        writeFileSync(target, params.text, "utf8");
        return readFileSync(target, "utf8");
      } catch (error) {
        throw new WorkspaceError(
          `Unable to materialize revision ${params.ordinal}: ${error instanceof Error ? error.message : String(error)}`,
          "WORKSPACE_WRITE_FAILED",
          target
        );
      }
    },
    release(): boolean {
      if (releaseResult !== null) {
        return releaseResult;
      }

      try {
        rmSync(root, { recursive: true, force: true });
        releaseResult = true;
      } catch {
        releaseResult = false;
      }
      return releaseResult;
    }
  };
}

/**
 * Allocates a workspace for the duration of `task` and releases it on every
 * exit path. Allocation failure is fatal and propagates as a
 * {@link WorkspaceError}.
 */
export async function withRevisionWorkspace<T>(
  options: CreateRevisionWorkspaceOptions,
  task: (workspace: RevisionWorkspace) => Promise<T>
): Promise<{ result: T; released: boolean }> {
  const workspace = createRevisionWorkspace(options);
  try {
    const result = await task(workspace);
    return { result, released: workspace.release() };
  } finally {
    if (!workspace.released) {
      workspace.release();
    }
  }
}
