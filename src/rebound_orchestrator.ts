/* Rebound Orchestrator: the autonomous loop behind `implement`
 *
 * AWAITING_INPUT -> CONTEXT_BUILT -> REQUESTING_MODEL -> RESPONSE_PARSED
 *   -> { REBOUND_EXEC -> REQUESTING_MODEL }* -> TERMINAL
 *
 * - zero waste: a blank instruction costs nothing (no context, no call, no ledger line)
 * - one writer: the ledger writer lock is held for the whole sequence
 * - the fuse counts model calls; a NextAction still pending at call MAX_LOOPS
 *   ends the sequence as LOOP_FUSE without executing it
 * - a blocked sandbox target is fed back to the model as a failed run
 * - nothing reaches the project tree without review; a transaction is
 *   recorded only when the pipeline reports COMMITTED
 */

import { ArtifactSink } from "./artifact_sink";
import { REBOUND, SANDBOX, PricingRates, DEFAULT_PRICING_RATES, estimateCostUsd } from "./config";
import { ContextBuilder, withAttachments } from "./context_builder";
import { newStepId, sessionIdFor } from "./ids";
import { Ledger, ZERO_USAGE, addUsage, normalizeUsage } from "./ledger";
import { createLogger, setCorrelation, clearCorrelation } from "./logger";
import { buildContinuationPrompt, buildInitialPrompt, getArchitectPrompt, ExecutionFeedback } from "./prompts";
import { parseResponse } from "./response_parser";
import {
    ApplyOutcome,
    ContextScope,
    ModelBackend,
    NextAction,
    OrchestratorState,
    ReviewApplyPipeline,
    TerminationReason,
    Turn,
    UsageStats,
    WrittenArtifact,
} from "./rebound_types";
import { SandboxRunResult, SandboxRunner, SandboxViolation } from "./sandbox_runner";
import { SessionArtifactList } from "./session_artifacts";
import { LockHeldError } from "./storage";
import { ErrorFactory, StructuredError, createStructuredError } from "./structured_error";
import { Transcript } from "./transcript";

const log = createLogger('orchestrator');

// ===========================
// Types
// ===========================

export interface SequenceRequest {
    instruction: string;
    scope?: ContextScope;
    /** `-f` attachments, resolved against attachmentCwd (default: project root) */
    attachments?: readonly string[];
    attachmentCwd?: string;
}

export interface SequenceOutcome {
    termination: TerminationReason;
    sessionId: string;
    /** final turn's step id, null when no turn ran */
    stepId: string | null;
    turns: Turn[];
    artifacts: WrittenArtifact[];
    usage: UsageStats;
    executions: number;
    apply: ApplyOutcome | null;
    transactionId: string | null;
    manifestPath: string | null;
    error: StructuredError | null;
}

export type StateChangeHook = (from: OrchestratorState, to: OrchestratorState, turn: number) => void;

export interface ReboundOrchestratorDeps {
    projectRoot: string;
    backend: ModelBackend;
    ledger: Ledger;
    sessionArtifacts: SessionArtifactList;
    contextBuilder: ContextBuilder;
    pipeline: ReviewApplyPipeline;
    transcript: Transcript;
    sandbox?: SandboxRunner;
    maxLoops?: number;
    pricingRates?: PricingRates;
    systemPrompt?: string;
    clock?: () => Date;
    onStateChange?: StateChangeHook;
}

const REVIEWABLE: ReadonlySet<TerminationReason> = new Set<TerminationReason>([
    "MODEL_STOPPED",
    "LOOP_FUSE",
    "UNRECOVERABLE_ERROR",
]);

function transactionStatusFor(t: TerminationReason): "success" | "auto_stopped" | "partial" {
    if (t === "LOOP_FUSE") return "auto_stopped";
    if (t === "UNRECOVERABLE_ERROR") return "partial";
    return "success";
}

// ===========================
// Orchestrator
// ===========================

export class ReboundOrchestrator {
    readonly maxLoops: number;

    private readonly sink: ArtifactSink;
    private readonly sandbox: SandboxRunner;
    private readonly systemPrompt: string;
    private readonly clock: () => Date;
    private state: OrchestratorState = "AWAITING_INPUT";
    private turn = 0;

    constructor(private readonly deps: ReboundOrchestratorDeps) {
        this.maxLoops = deps.maxLoops !== undefined && Number.isInteger(deps.maxLoops) && deps.maxLoops > 0
            ? deps.maxLoops
            : REBOUND.MAX_LOOPS;
        this.sink = new ArtifactSink({
            projectRoot: deps.projectRoot,
            ledger: deps.ledger,
            sessionArtifacts: deps.sessionArtifacts,
            transcript: deps.transcript,
        });
        this.sandbox = deps.sandbox ?? new SandboxRunner({ projectRoot: deps.projectRoot });
        this.systemPrompt = deps.systemPrompt ?? getArchitectPrompt(this.maxLoops, SANDBOX.SCRIPTS_DIR);
        this.clock = deps.clock ?? (() => new Date());
    }

    get currentState(): OrchestratorState {
        return this.state;
    }

    private transition(to: OrchestratorState): void {
        const from = this.state;
        this.state = to;
        log.debug(`State ${from} -> ${to}`, { turn: this.turn });
        this.deps.onStateChange?.(from, to, this.turn);
    }

    async runSequence(req: SequenceRequest): Promise<SequenceOutcome> {
        const { transcript, ledger } = this.deps;
        const sessionId = sessionIdFor(this.clock());

        this.state = "AWAITING_INPUT";
        this.turn = 0;

        const outcome: SequenceOutcome = {
            termination: "MODEL_STOPPED",
            sessionId,
            stepId: null,
            turns: [],
            artifacts: [],
            usage: { ...ZERO_USAGE },
            executions: 0,
            apply: null,
            transactionId: null,
            manifestPath: null,
            error: null,
        };

        // Zero waste: nothing happens for a blank instruction
        if (!req.instruction.trim()) {
            transcript.print("Action cancelled: Empty instruction.");
            outcome.termination = "EMPTY_INSTRUCTION";
            this.transition("TERMINAL");
            return outcome;
        }

        let instruction = req.instruction;
        if (req.attachments && req.attachments.length > 0) {
            const att = this.deps.contextBuilder.readAttachments(req.attachments, req.attachmentCwd);
            if (!att.ok) {
                transcript.error(att.message);
                transcript.print("Action cancelled: one or more attached files could not be read.");
                outcome.termination = "ATTACHMENT_ERROR";
                this.transition("TERMINAL");
                return outcome;
            }
            for (const a of att.attached) transcript.print(`Attached: ${a}`);
            instruction = withAttachments(instruction, att.text);
        }

        try {
            await ledger.acquireWriter();
        } catch (e) {
            const err = e instanceof LockHeldError
                ? ErrorFactory.writerLockHeld(e.lockPath, e.holder?.pid ?? null)
                : ErrorFactory.unexpected(this.state, e);
            if (err.code !== "LOCK_HELD") log.error("Writer lock unavailable", { message: err.message });
            transcript.diagnostic(err);
            outcome.termination = e instanceof LockHeldError ? "LOCK_HELD" : "UNRECOVERABLE_ERROR";
            outcome.error = err;
            this.transition("TERMINAL");
            return outcome;
        }

        setCorrelation({ sessionId });
        try {
            await this.loop(req, instruction, outcome);
            this.announce(outcome);
            await this.review(req.instruction.trim(), outcome);
            return outcome;
        } finally {
            outcome.manifestPath = this.deps.sessionArtifacts.generateManifest(sessionId).manifestPath;
            if (outcome.manifestPath) transcript.print(`Manifest saved: ${outcome.manifestPath}`);
            ledger.releaseWriter();
            this.transition("TERMINAL");
            clearCorrelation();
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Loop                                                                   */
    /* ---------------------------------------------------------------------- */

    private async loop(req: SequenceRequest, instruction: string, outcome: SequenceOutcome): Promise<void> {
        const { transcript, backend, ledger } = this.deps;

        try {
            const scope = req.scope ?? "full";
            transcript.print(`Building project context (Scope: ${scope})...`);
            const context = this.deps.contextBuilder.build(scope);
            transcript.print(`Context loaded: ${context.files.length} files (~${context.tokens} tokens)`);
            this.transition("CONTEXT_BUILT");

            let userPrompt = buildInitialPrompt(instruction, context.text);

            for (;;) {
                this.turn++;
                const stepId = newStepId(this.clock());
                outcome.stepId = stepId;
                setCorrelation({ stepId, turn: this.turn });

                this.transition("REQUESTING_MODEL");
                transcript.print(`Requesting model (turn ${this.turn}/${this.maxLoops})...`);
                const reply = await backend.send(this.systemPrompt, userPrompt);
                if (!reply.ok) {
                    transcript.diagnostic(reply.error);
                    outcome.termination = "TRANSPORT_ERROR";
                    outcome.error = reply.error;
                    return;
                }
                const usage = normalizeUsage(reply.usage);
                outcome.usage = addUsage(outcome.usage, usage);

                this.transition("RESPONSE_PARSED");
                transcript.modelEcho(reply.text);
                const parsed = parseResponse(reply.text);
                if (parsed.records.length === 0) {
                    transcript.diagnostic(createStructuredError("PARSE_ERROR", "No records decoded from model response", {
                        step_id: stepId,
                        skipped_chars: parsed.skippedChars,
                    }));
                }
                if (parsed.droppedArtifactSpecs > 0) {
                    log.warn("Dropped malformed artifact entries", { dropped: parsed.droppedArtifactSpecs });
                }

                const sunk = this.sink.apply(stepId, reply.text, parsed.records);
                outcome.artifacts.push(...sunk.written);
                outcome.turns.push({
                    turnIndex: this.turn,
                    stepId,
                    userPrompt,
                    rawText: reply.text,
                    records: parsed.records,
                    nextAction: sunk.nextAction,
                    usage,
                    written: sunk.written,
                });

                const action = sunk.nextAction;
                if (!action) {
                    outcome.termination = "MODEL_STOPPED";
                    return;
                }
                if (action.type !== REBOUND.CHAIN_ACTION_TYPE) {
                    log.info("Ignoring next_action of unsupported type", { type: action.type });
                    transcript.print(`Ignoring next_action of type '${action.type}'.`);
                    outcome.termination = "MODEL_STOPPED";
                    return;
                }
                if (this.turn >= this.maxLoops) {
                    const err = ErrorFactory.loopFuseTripped(this.maxLoops, outcome.artifacts.length);
                    transcript.diagnostic(err);
                    ledger.logEvent("orchestrator", "loop_fuse_tripped", JSON.stringify({
                        max_loops: this.maxLoops,
                        target: action.target,
                    }));
                    outcome.termination = "LOOP_FUSE";
                    outcome.error = err;
                    return;
                }

                this.transition("REBOUND_EXEC");
                const feedback = await this.execute(action);
                if (feedback.executed) outcome.executions++;
                userPrompt = buildContinuationPrompt(feedback, action.continuation);
            }
        } catch (e) {
            const err = ErrorFactory.unexpected(this.state, e);
            log.error("Sequence aborted", { state: this.state, message: err.message });
            transcript.diagnostic(err);
            outcome.termination = "UNRECOVERABLE_ERROR";
            outcome.error = err;
        }
    }

    private async execute(action: NextAction): Promise<ExecutionFeedback & { executed: boolean }> {
        const { transcript, ledger } = this.deps;

        const checked = this.sandbox.validate(action.target);
        if (!checked.ok) return this.blocked(action.target, checked.violation);

        transcript.print(`Executing ${action.target} ${action.args.join(" ")}`.trimEnd());
        let result: SandboxRunResult;
        try {
            result = await this.sandbox.run(action.target, action.args);
        } catch (e) {
            // the target changed between validate and run
            if (e instanceof SandboxViolation) return this.blocked(action.target, e);
            throw e;
        }

        ledger.logEvent("orchestrator", "rebound_exec", JSON.stringify({
            target: action.target,
            exit_code: result.exitCode,
        }));
        transcript.print(`Script exited with code ${result.exitCode}${result.timedOut ? " (timed out)" : ""}`);
        return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode, executed: true };
    }

    private blocked(target: string, violation: SandboxViolation): ExecutionFeedback & { executed: boolean } {
        const err = ErrorFactory.sandboxTargetBlocked(target, violation.code, violation.message);
        this.deps.transcript.diagnostic(err);
        this.deps.ledger.logEvent("orchestrator", "rebound_blocked", JSON.stringify({
            target,
            violation: violation.code,
        }));
        return { stdout: "", stderr: violation.message, exitCode: 1, executed: false };
    }

    /* ---------------------------------------------------------------------- */
    /* Terminal handling                                                      */
    /* ---------------------------------------------------------------------- */

    private announce(outcome: SequenceOutcome): void {
        const { transcript } = this.deps;
        const turns = outcome.turns.length;
        switch (outcome.termination) {
            case "MODEL_STOPPED":
                transcript.print(`Model stopped after ${turns} turn(s); ${outcome.artifacts.length} artifact(s) written.`);
                break;
            case "LOOP_FUSE":
                transcript.print(`Auto-stopped by the safety fuse after ${turns} turns; ${outcome.artifacts.length} artifact(s) written.`);
                break;
            case "TRANSPORT_ERROR":
                transcript.print("Sequence ended: model backend unavailable. Nothing to review.");
                break;
            case "UNRECOVERABLE_ERROR":
                transcript.print(`Sequence aborted after ${turns} turn(s).`);
                break;
            default:
                break;
        }
    }

    private async review(commitInstruction: string, outcome: SequenceOutcome): Promise<void> {
        const last = outcome.turns[outcome.turns.length - 1];
        if (!REVIEWABLE.has(outcome.termination) || outcome.artifacts.length === 0 || !last) return;

        const handoff = {
            sessionId: outcome.sessionId,
            stepId: last.stepId,
            instruction: commitInstruction,
            artifacts: [...outcome.artifacts],
            quarantineDir: this.sink.quarantineDirFor(last.stepId),
            termination: outcome.termination,
        };

        try {
            outcome.apply = await this.deps.pipeline.reviewAndApply(handoff);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            log.error("Review pipeline failed", { message });
            this.deps.transcript.error(`Review failed: ${message}`);
            outcome.apply = { status: "FAILED", reason: message };
        }

        if (outcome.apply.status !== "COMMITTED") return;

        outcome.transactionId = this.deps.ledger.logTransaction({
            sessionId: outcome.sessionId,
            stepId: last.stepId,
            instruction: commitInstruction,
            usage: outcome.usage,
            status: transactionStatusFor(outcome.termination),
        });

        const u = outcome.usage;
        const cost = estimateCostUsd(u.prompt_tokens, u.completion_tokens, this.deps.pricingRates ?? DEFAULT_PRICING_RATES);
        this.deps.transcript.print(`Token Usage: prompt=${u.prompt_tokens}, completion=${u.completion_tokens}, total=${u.total_tokens}`);
        this.deps.transcript.print(
            `Estimated Cost: input=$${cost.input.toFixed(6)}, output=$${cost.output.toFixed(6)}, total=$${cost.total.toFixed(6)}`
        );
    }
}
