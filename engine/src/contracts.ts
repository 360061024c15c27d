import { readFileSync } from "node:fs";

import Ajv2020, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv/dist/2020.js";

import type { ArtifactPattern } from "./artifact-patterns.ts";

export const SUPPORTED_RECOVERY_PROFILE_SCHEMA_VERSION = "1.0.0";

export interface RecoveryProfileDocument {
  schema_version: string;
  history?: {
    max_depth?: number;
    timeout_ms?: number;
  };
  ranking?: {
    parse_concurrency?: number;
  };
  planning?: {
    substitution_threshold?: number;
  };
  harness?: {
    timeout_ms?: number;
    reentrant?: boolean;
  };
  artifact_patterns?: {
    pattern: string;
    expected_functions?: string[];
    expected_types?: string[];
  }[];
}

export interface RecoveryProfile {
  schemaVersion: string;
  history: {
    maxDepth: number;
    timeoutMs: number;
  };
  ranking: {
    parseConcurrency: number;
  };
  planning: {
    substitutionThreshold: number;
  };
  harness: {
    timeoutMs: number;
    reentrant: boolean;
  };
  artifactPatterns: ArtifactPattern[];
}

export const DEFAULT_RECOVERY_PROFILE: Readonly<RecoveryProfile> = Object.freeze({
  schemaVersion: SUPPORTED_RECOVERY_PROFILE_SCHEMA_VERSION,
  history: { maxDepth: 5, timeoutMs: 10_000 },
  ranking: { parseConcurrency: 4 },
  planning: { substitutionThreshold: 0.9 },
  harness: { timeoutMs: 60_000, reentrant: false },
  artifactPatterns: []
});

export type ProfileValidationCode = "INVALID_INPUT" | "VERSION_INCOMPATIBLE" | "SCHEMA_VALIDATION_FAILED";

export interface ProfileValidationIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export class ProfileValidationError extends Error {
  readonly code: ProfileValidationCode;
  readonly issues: ProfileValidationIssue[];

  constructor(params: { code: ProfileValidationCode; message: string; issues?: ProfileValidationIssue[] }) {
    super(params.message);
    this.name = "ProfileValidationError";
    this.code = params.code;
    this.issues = params.issues ?? [];
  }
}

let profileValidator: ValidateFunction<RecoveryProfileDocument> | null = null;

function loadSchema(relativePathFromContractsSource: string): SchemaObject {
  const fileContents = readFileSync(new URL(relativePathFromContractsSource, import.meta.url), "utf8");
  const schema: SchemaObject = JSON.parse(fileContents);
  return schema;
}

function getProfileValidator(): ValidateFunction<RecoveryProfileDocument> {
  if (profileValidator) {
    return profileValidator;
  }

  const ajv = new Ajv2020({ allErrors: true });
  profileValidator = ajv.compile<RecoveryProfileDocument>(
    loadSchema("../schemas/recovery-profile.schema.json")
  );
  return profileValidator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mapAjvIssues(errors: ErrorObject[] | null | undefined): ProfileValidationIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

function requireCompatibleSchemaVersion(value: Record<string, unknown>): void {
  const schemaVersion = value.schema_version;
  if (typeof schemaVersion !== "string" || schemaVersion.trim().length === 0) {
    throw new ProfileValidationError({
      code: "SCHEMA_VALIDATION_FAILED",
      message: "RecoveryProfile schema_version is required",
      issues: [
        {
          instancePath: "/schema_version",
          keyword: "required",
          message: "schema_version is required"
        }
      ]
    });
  }

  if (schemaVersion !== SUPPORTED_RECOVERY_PROFILE_SCHEMA_VERSION) {
    throw new ProfileValidationError({
      code: "VERSION_INCOMPATIBLE",
      message: `RecoveryProfile schema_version "${schemaVersion}" is incompatible; expected "${SUPPORTED_RECOVERY_PROFILE_SCHEMA_VERSION}"`,
      issues: [
        {
          instancePath: "/schema_version",
          keyword: "const",
          message: `expected "${SUPPORTED_RECOVERY_PROFILE_SCHEMA_VERSION}"`
        }
      ]
    });
  }
}

function normalizeProfile(document: RecoveryProfileDocument): RecoveryProfile {
  const defaults = DEFAULT_RECOVERY_PROFILE;
  return {
    schemaVersion: document.schema_version,
    history: {
      maxDepth: document.history?.max_depth ?? defaults.history.maxDepth,
      timeoutMs: document.history?.timeout_ms ?? defaults.history.timeoutMs
    },
    ranking: {
      parseConcurrency: document.ranking?.parse_concurrency ?? defaults.ranking.parseConcurrency
    },
    planning: {
      substitutionThreshold: document.planning?.substitution_threshold ?? defaults.planning.substitutionThreshold
    },
    harness: {
      timeoutMs: document.harness?.timeout_ms ?? defaults.harness.timeoutMs,
      reentrant: document.harness?.reentrant ?? defaults.harness.reentrant
    },
    artifactPatterns: (document.artifact_patterns ?? []).map((entry) => ({
      pattern: entry.pattern,
      expectedFunctions: [...(entry.expected_functions ?? [])],
      expectedTypes: [...(entry.expected_types ?? [])]
    }))
  };
}

/**
 * Validates a recovery profile document against the bundled JSON schema and
 * returns it in camelCase with defaults applied.
 */
export function loadRecoveryProfile(input: unknown): RecoveryProfile {
  if (!isRecord(input)) {
    throw new ProfileValidationError({
      code: "INVALID_INPUT",
      message: "RecoveryProfile input must be an object"
    });
  }

  requireCompatibleSchemaVersion(input);

  const validator = getProfileValidator();
  if (!validator(input)) {
    const issues = mapAjvIssues(validator.errors);
    const firstIssue = issues[0];
    const issuePath = firstIssue?.instancePath || "/";
    const issueMessage = firstIssue?.message ?? "validation failed";

    throw new ProfileValidationError({
      code: "SCHEMA_VALIDATION_FAILED",
      message: `RecoveryProfile validation failed at ${issuePath}: ${issueMessage}`,
      issues
    });
  }

  return normalizeProfile(input);
}

export function readRecoveryProfileFile(path: string): RecoveryProfile {
  let contents: string;
  try {
    contents = readFileSync(path, "utf8");
  } catch (error) {
    throw new ProfileValidationError({
      code: "INVALID_INPUT",
      message: `Unable to read recovery profile at ${path}: ${error instanceof Error ? error.message : String(error)}`
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new ProfileValidationError({
      code: "INVALID_INPUT",
      message: `Recovery profile at ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    });
  }

  return loadRecoveryProfile(parsed);
}
