export {
  RECOVERY_DIAGNOSTIC_CODES,
  RecoveryInputError,
  createRecoveryDiagnostic,
  fromParserDiagnostic,
  type RecoveryDiagnostic,
  type RecoveryDiagnosticCode,
  type RecoveryDiagnosticSeverity,
  type RecoveryInputErrorCode
} from "./diagnostics.ts";

export {
  OperationAbortedError,
  TimeoutError,
  mapWithConcurrency,
  throwIfAborted,
  withTimeout
} from "./async-utils.ts";

export {
  DEFAULT_WORKSPACE_PREFIX,
  WorkspaceError,
  createRevisionWorkspace,
  revisionFileName,
  withRevisionWorkspace,
  type CreateRevisionWorkspaceOptions,
  type MaterializeRevisionParams,
  type RevisionWorkspace,
  type WorkspaceErrorCode
} from "./workspace.ts";

export {
  DEFAULT_MAX_HISTORY_DEPTH,
  MAX_HISTORY_DEPTH_LIMIT,
  Revision,
  enumerateRevisions,
  requireHistoryDepth,
  type EnumerateRevisionsOptions,
  type EnumerateRevisionsResult,
  type HistoryBackend,
  type HistoryCallOptions,
  type HistoryEntry
} from "./history-miner.ts";

export {
  GitHistoryError,
  createGitHistoryBackend,
  parseGitLog,
  type GitHistoryBackendOptions,
  type GitHistoryErrorCode
} from "./git-history-backend.ts";

export { compareModels, type ElementDiff, type ModelComparison } from "./comparator.ts";

export {
  DEFAULT_PARSE_CONCURRENCY,
  LOW_STABILITY_THRESHOLD,
  SIGNIFICANT_GROWTH_LINES,
  SIZE_TRENDS,
  classifySizeTrend,
  rankRevisions,
  type RankRevisionsOptions,
  type RankedCandidate,
  type RankingRecommendation,
  type RankingRecommendationCode,
  type SizeTrend,
  type StabilityProfile,
  type TemplateSelection
} from "./generation-ranker.ts";

export {
  globPatternToRegex,
  resolveExpectedStructure,
  type ArtifactPattern,
  type ExpectedStructure
} from "./artifact-patterns.ts";

export {
  DEFAULT_SUBSTITUTION_THRESHOLD,
  RECONSTRUCTION_STRATEGIES,
  planReconstruction,
  type FragmentOrigin,
  type MergeAdvice,
  type MergeAdvisor,
  type MergeAdvisorContext,
  type PlanReconstructionOptions,
  type ReconstructionPlan,
  type ReconstructionStrategy,
  type SourceFragment
} from "./reconstruction-planner.ts";

export {
  EQUIVALENCE_CLASSIFICATIONS,
  TEST_STATUSES,
  evaluateEquivalence,
  normalizeTestOutcomes,
  type EquivalenceClassification,
  type EquivalenceEvidence,
  type EquivalenceVerdict,
  type EvaluateEquivalenceOptions,
  type HarnessRunEvidence,
  type NormalizedTestOutcome,
  type TestHarness,
  type TestHarnessRunOptions,
  type TestOutcome,
  type TestStatus
} from "./equivalence-oracle.ts";

export {
  ARTIFACT_PLACEHOLDER,
  DEFAULT_HARNESS_FILE_NAME,
  HarnessError,
  createCommandTestHarness,
  type CommandTestHarnessOptions,
  type HarnessErrorCode
} from "./command-harness.ts";

export {
  DEFAULT_RECOVERY_PROFILE,
  ProfileValidationError,
  SUPPORTED_RECOVERY_PROFILE_SCHEMA_VERSION,
  loadRecoveryProfile,
  readRecoveryProfileFile,
  type ProfileValidationCode,
  type ProfileValidationIssue,
  type RecoveryProfile,
  type RecoveryProfileDocument
} from "./contracts.ts";

export {
  RECOVERY_TRACE_SCHEMA_VERSION,
  emitRecoveryTraceEntry,
  type EmitRecoveryTraceEntryOptions,
  type RecoveryTraceEntryV1,
  type RecoveryTraceError
} from "./trace-ledger.ts";

export {
  RecoverySessionError,
  recoverArtifact,
  type RecoverArtifactOptions,
  type RecoveryRequest,
  type RecoveryResult,
  type RecoverySessionErrorCode
} from "./recovery-session.ts";

export { formatRecoveryReport, isReconstructionAccepted } from "./report.ts";

export {
  CLI_EXIT_ACCEPTED,
  CLI_EXIT_NEEDS_REVIEW,
  CLI_EXIT_USAGE,
  runRecoveryCli,
  type CliIo
} from "./cli.ts";
