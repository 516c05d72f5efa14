/**
 * Main entry point - exports all public APIs
 */

export { ReboundOrchestrator } from './rebound_orchestrator';
export type { SequenceRequest, SequenceOutcome, ReboundOrchestratorDeps, StateChangeHook } from './rebound_orchestrator';
export { ModelRouter, sanitizeErrorSnippet } from './model_router';
export type { ModelRouterConfig, ModelMessage, ModelRole } from './model_router';
export { parseResponse, stripCodeFence, decodeRecords, selectNextAction } from './response_parser';
export type { ParseResult } from './response_parser';
export { ArtifactSink, confineToDirectory } from './artifact_sink';
export type { SinkResult, ConfinedPath, ArtifactSinkDeps } from './artifact_sink';
export { SandboxRunner, SandboxViolation } from './sandbox_runner';
export type { SandboxRunResult, SandboxRunnerOptions, SandboxValidation, SandboxViolationCode } from './sandbox_runner';
export { Ledger, normalizeUsage, addUsage, parseTimeframe, ZERO_USAGE } from './ledger';
export type { CostReport, ReportTimeframe, TransactionInput } from './ledger';
export { SessionArtifactList, sha256File, manifestFileName } from './session_artifacts';
export type { ManifestResult } from './session_artifacts';
export { ContextBuilder, estimateTokens, withAttachments, CONTEXT_HEADER } from './context_builder';
export type { BuiltContext, AttachmentResult } from './context_builder';
export { InteractiveApplyPipeline, parseReviewAnswer, summarizeChange, collapseArtifacts } from './apply_pipeline';
export type { ReviewPrompter, ReviewAnswer, InteractiveApplyPipelineDeps } from './apply_pipeline';
export { ShellGitClient, isNothingToCommit } from './git_client';
export type { GitClient, GitResult, CommitResult } from './git_client';
export { FileTranscript, MemoryTranscript, TRANSCRIPT_PREFIX } from './transcript';
export type { Transcript } from './transcript';
export { EditorInstructionSource, StaticInstructionSource, resolveEditor } from './instruction_source';
export type { InstructionSource } from './instruction_source';
export { loadProjectConfig, resolveApiKey, estimateCostUsd, ConfigError } from './config';
export type { ProjectConfig, PricingRates } from './config';
export { ErrorFactory, createStructuredError, formatDiagnostic, diagnosticTag } from './structured_error';
export type { StructuredError, ErrorCode, Severity } from './structured_error';
export { sessionIdFor, newStepId, STEP_ID_PATTERN } from './ids';
export * from './prompts';
export type * from './rebound_types';
export { CONTEXT_SCOPES, isContextScope } from './rebound_types';
