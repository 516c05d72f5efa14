/**
 * Structured Error Schema
 *
 * Machine-readable errors for every boundary the rebound loop crosses
 * (backend, parser, sink, sandbox, ledger). Each error carries a tag used to
 * prefix its transcript diagnostic line.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Model backend
    | 'TRANSPORT_ERROR'
    | 'AUTH_ERROR'
    | 'MODEL_ERROR'

    // Model output
    | 'PARSE_ERROR'

    // Path safety
    | 'PATH_VIOLATION'
    | 'SANDBOX_VIOLATION'

    // Infrastructure
    | 'IO_ERROR'
    | 'LOCK_HELD'
    | 'INVALID_CONFIG'
    | 'INTERNAL'

    // Designed terminal state
    | 'LOOP_FUSE';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RecoveryAction =
    | 'fix_credentials'
    | 'check_network'
    | 'inspect_quarantine'
    | 'review_artifacts'
    | 'wait_for_other_session'
    | 'fix_project_config'
    | 'escalate_to_human';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: recoveryOptions,
        human_intervention_required: requiresHuman(code, recoveryOptions),
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'TRANSPORT_ERROR',
        'AUTH_ERROR',
        'LOCK_HELD',
        'INVALID_CONFIG',
        'INTERNAL'
    ];

    const warningCodes: ErrorCode[] = [
        'PARSE_ERROR',
        'LOOP_FUSE'
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

function requiresHuman(code: ErrorCode, options: RecoveryOption[]): boolean {
    if (code === 'LOOP_FUSE') return true;
    return options.some(opt => opt.action === 'escalate_to_human' || opt.action === 'fix_credentials');
}

/** Transcript tag for a structured error, e.g. `[SECURITY-BLOCKED]`. */
export function diagnosticTag(code: ErrorCode): string {
    switch (code) {
        case 'PATH_VIOLATION': return '[SECURITY-BLOCKED]';
        case 'SANDBOX_VIOLATION': return '[SANDBOX-BLOCKED]';
        case 'IO_ERROR': return '[IO-ERROR]';
        case 'LOOP_FUSE': return '[FUSE]';
        case 'TRANSPORT_ERROR':
        case 'AUTH_ERROR': return '[TRANSPORT]';
        case 'MODEL_ERROR':
        case 'PARSE_ERROR': return '[MODEL]';
        case 'LOCK_HELD': return '[LOCK]';
        case 'INVALID_CONFIG': return '[CONFIG]';
        case 'INTERNAL': return '[INTERNAL]';
    }
}

export function formatDiagnostic(err: StructuredError): string {
    return `${diagnosticTag(err.code)} ${err.message}`;
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    fixCredentials: (): RecoveryOption => ({
        action: 'fix_credentials',
        description: 'Set OPENAI_API_KEY or write secrets/openai_key',
        risk_level: 'LOW'
    }),

    checkNetwork: (): RecoveryOption => ({
        action: 'check_network',
        description: 'Verify the model endpoint is reachable, then rerun the instruction',
        risk_level: 'LOW'
    }),

    inspectQuarantine: (dir: string): RecoveryOption => ({
        action: 'inspect_quarantine',
        description: `Inspect ${dir} and its raw_response_trace`,
        risk_level: 'LOW'
    }),

    reviewArtifacts: (): RecoveryOption => ({
        action: 'review_artifacts',
        description: 'Review accumulated artifacts before applying anything',
        risk_level: 'MEDIUM'
    }),

    waitForOtherSession: (): RecoveryOption => ({
        action: 'wait_for_other_session',
        description: 'Another session holds the ledger writer lock; retry once it finishes',
        risk_level: 'LOW'
    }),

    fixProjectConfig: (configPath: string): RecoveryOption => ({
        action: 'fix_project_config',
        description: `Fix or remove ${configPath}; a missing file means defaults`,
        risk_level: 'LOW'
    }),

    escalateToHuman: (reason: string): RecoveryOption => ({
        action: 'escalate_to_human',
        description: `Escalate to human: ${reason}`,
        risk_level: 'LOW'
    })
};

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static transportFailure(message: string, context: Record<string, unknown> = {}): StructuredError {
        const httpStatus = context.http_status;
        if (httpStatus === 401 || httpStatus === 403) {
            return createStructuredError('AUTH_ERROR', message, context, [CommonRecoveryOptions.fixCredentials()]);
        }
        return createStructuredError('TRANSPORT_ERROR', message, context, [CommonRecoveryOptions.checkNetwork()]);
    }

    static artifactPathBlocked(requestedPath: string, quarantineDir: string, reason: string): StructuredError {
        return createStructuredError(
            'PATH_VIOLATION',
            `Blocked unsafe artifact path: ${requestedPath} (${reason})`,
            { requested_path: requestedPath, quarantine_dir: quarantineDir, reason },
            [CommonRecoveryOptions.inspectQuarantine(quarantineDir)]
        );
    }

    static artifactWriteFailed(requestedPath: string, errno: string | undefined, message: string): StructuredError {
        return createStructuredError(
            'IO_ERROR',
            `Artifact not written: ${requestedPath} (${errno ?? 'UNKNOWN'}: ${message})`,
            { requested_path: requestedPath, errno: errno ?? null }
        );
    }

    static sandboxTargetBlocked(target: string, violationCode: string, message: string): StructuredError {
        return createStructuredError(
            'SANDBOX_VIOLATION',
            `Blocked sandbox target: ${target} (${violationCode}: ${message})`,
            { target, violation: violationCode }
        );
    }

    static loopFuseTripped(maxLoops: number, artifactCount: number): StructuredError {
        return createStructuredError(
            'LOOP_FUSE',
            `Auto-stopped: model still requested execution after ${maxLoops} turns`,
            { max_loops: maxLoops, artifact_count: artifactCount },
            [CommonRecoveryOptions.reviewArtifacts()]
        );
    }

    static writerLockHeld(lockPath: string, holderPid: number | null): StructuredError {
        return createStructuredError(
            'LOCK_HELD',
            `Ledger writer lock is held${holderPid ? ` by pid ${holderPid}` : ''}: ${lockPath}`,
            { lock_path: lockPath, holder_pid: holderPid },
            [CommonRecoveryOptions.waitForOtherSession()]
        );
    }

    static invalidConfig(message: string, configPath: string): StructuredError {
        return createStructuredError(
            'INVALID_CONFIG',
            message,
            { path: configPath },
            [CommonRecoveryOptions.fixProjectConfig(configPath)]
        );
    }

    static unexpected(stage: string, e: unknown): StructuredError {
        const message = e instanceof Error ? e.message : String(e);
        return createStructuredError(
            'INTERNAL',
            `Unrecoverable error during ${stage}: ${message}`,
            { stage },
            [CommonRecoveryOptions.escalateToHuman('unexpected failure inside the rebound loop')]
        );
    }
}
