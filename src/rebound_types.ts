import { StructuredError } from './structured_error';

export type ArtifactOperation = 'create' | 'edit';

export interface ArtifactSpec {
    path: string; // model-supplied, untrusted
    content: string;
    operation: ArtifactOperation; // advisory: both write full content
}

export interface NextAction {
    type: string;
    target: string; // script path relative to the sandbox root
    args: string[];
    continuation: string;
}

export type ResponseRecord =
    | { kind: 'thought'; text: string }
    | { kind: 'tool_mention'; name: string; args: unknown }
    | { kind: 'message'; text: string }
    | { kind: 'artifact_batch'; artifacts: ArtifactSpec[] }
    | { kind: 'next_action'; action: NextAction };

export interface UsageStats {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
}

export type Actor = 'user' | 'orchestrator' | 'model';

export interface LedgerEvent {
    event_uuid: string;
    timestamp_utc: string;
    actor: Actor;
    action_type: string;
    payload_ref: string | null;
    artifacts_links: string[];
}

export type TransactionStatus = 'success' | 'auto_stopped' | 'partial';

export interface Transaction {
    transaction_uuid: string;
    timestamp_utc: string;
    session_id: string;
    step_id: string;
    user_instruction: string;
    usage_stats: UsageStats;
    status: TransactionStatus;
}

export interface ManifestEntry {
    path: string;
    sha256: string;
}

export interface Manifest {
    session_id: string;
    timestamp: string;
    artifacts: ManifestEntry[];
}

export interface ArtifactSidecar {
    requested_path: string;
    operation: ArtifactOperation;
    local_path: string;
    step_id: string;
    sha256: string;
    bytes: number;
    written_utc: string;
}

export interface WrittenArtifact {
    stepId: string;
    requestedPath: string;
    /** absolute path inside the quarantine directory */
    localPath: string;
    /** path relative to its quarantine directory, i.e. the apply destination */
    relativePath: string;
    /** path relative to the project root, as recorded in the ledger */
    projectRelativePath: string;
    quarantineDir: string;
    sha256: string;
}

export interface Turn {
    readonly turnIndex: number;
    readonly stepId: string;
    readonly userPrompt: string;
    readonly rawText: string;
    readonly records: readonly ResponseRecord[];
    readonly nextAction: NextAction | null;
    readonly usage: UsageStats;
    readonly written: readonly WrittenArtifact[];
}

export type OrchestratorState =
    | 'AWAITING_INPUT'
    | 'CONTEXT_BUILT'
    | 'REQUESTING_MODEL'
    | 'RESPONSE_PARSED'
    | 'REBOUND_EXEC'
    | 'TERMINAL';

export type TerminationReason =
    | 'EMPTY_INSTRUCTION'
    | 'ATTACHMENT_ERROR'
    | 'LOCK_HELD'
    | 'MODEL_STOPPED'
    | 'LOOP_FUSE'
    | 'TRANSPORT_ERROR'
    | 'UNRECOVERABLE_ERROR';

export type ContextScope = 'full' | 'code' | 'specs' | 'minimal';

export const CONTEXT_SCOPES: readonly ContextScope[] = ['full', 'code', 'specs', 'minimal'];

export function isContextScope(v: string): v is ContextScope {
    return (CONTEXT_SCOPES as readonly string[]).includes(v);
}

/* -------------------------------------------------------------------------- */
/* Collaborator contracts                                                     */
/* -------------------------------------------------------------------------- */

export type BackendReply =
    | { ok: true; text: string; usage: UsageStats }
    | { ok: false; error: StructuredError };

export interface ModelBackend {
    send(systemPrompt: string, userPrompt: string): Promise<BackendReply>;
}

export interface ReviewHandoff {
    sessionId: string;
    stepId: string;
    instruction: string;
    /** union of every turn's written artifacts, in write order */
    artifacts: WrittenArtifact[];
    /** quarantine directory of the final turn */
    quarantineDir: string;
    termination: TerminationReason;
}

export type ApplyOutcome =
    | { status: 'COMMITTED'; appliedPaths: string[] }
    | { status: 'REJECTED'; reason: string }
    | { status: 'NO_CHANGES' }
    | { status: 'FAILED'; reason: string };

export interface ReviewApplyPipeline {
    reviewAndApply(handoff: ReviewHandoff): Promise<ApplyOutcome>;
}
