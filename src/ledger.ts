/**
 * Audit Ledger: append-only JSONL trail
 *
 * Two files under <projectRoot>/ledger/:
 *   events.jsonl     every state transition worth attributing (who did what)
 *   audit_log.jsonl  one transaction per committed instruction, with usage
 *
 * Each write opens, appends one line and closes. Records are never rewritten.
 * A single-writer lock (ledger/.writer.lock) keeps two sessions on the same
 * project root from interleaving sequences.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

import { LAYOUT, PricingRates, TIMEOUTS, estimateCostUsd } from './config';
import { sessionIdFor } from './ids';
import { createLogger } from './logger';
import { acquireWriterLock, releaseWriterLock, LockHandle } from './storage';
import { Actor, LedgerEvent, Transaction, TransactionStatus, UsageStats } from './rebound_types';

const log = createLogger('ledger');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ReportTimeframe = 'session' | 'today' | 'all';

export interface CostReport {
    timeframe: ReportTimeframe;
    /** committed transactions in the timeframe */
    total_requests: number;
    total_input_tokens: number;
    total_output_tokens: number;
    /** USD */
    estimated_cost: number;
    pricing_rates: PricingRates;
    ledger_file: string;
}

export interface TransactionInput {
    sessionId: string;
    stepId: string;
    instruction: string;
    usage: unknown;
    status: TransactionStatus;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function tokenCount(v: unknown): number {
    let n: number;
    if (typeof v === 'number') n = v;
    else if (typeof v === 'string' && v.trim() !== '') n = Number(v);
    else return 0;
    if (!Number.isFinite(n) || n < 0) return 0;
    return Math.floor(n);
}

/**
 * Coerce anything usage-shaped into non-negative integer counters.
 * A missing total is derived from prompt + completion.
 */
export function normalizeUsage(raw: unknown): UsageStats {
    const src = isRecord(raw) ? raw : {};
    const prompt = tokenCount(src.prompt_tokens);
    const completion = tokenCount(src.completion_tokens);
    const hasTotal = src.total_tokens !== undefined && src.total_tokens !== null;
    return {
        prompt_tokens: prompt,
        completion_tokens: completion,
        total_tokens: hasTotal ? tokenCount(src.total_tokens) : prompt + completion,
    };
}

export function addUsage(a: UsageStats, b: UsageStats): UsageStats {
    return {
        prompt_tokens: a.prompt_tokens + b.prompt_tokens,
        completion_tokens: a.completion_tokens + b.completion_tokens,
        total_tokens: a.total_tokens + b.total_tokens,
    };
}

export const ZERO_USAGE: UsageStats = Object.freeze({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });

export function parseTimeframe(raw: string | undefined): ReportTimeframe {
    const tf = (raw || 'all').trim().toLowerCase();
    return tf === 'session' || tf === 'today' ? tf : 'all';
}

/** Non-blank lines that parse to JSON objects; everything else is skipped. */
function readJsonlObjects(filePath: string): Record<string, unknown>[] {
    if (!fs.existsSync(filePath)) return [];

    const out: Record<string, unknown>[] = [];
    let skipped = 0;
    for (const line of fs.readFileSync(filePath, 'utf8').split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) continue;
        try {
            const parsed: unknown = JSON.parse(trimmed);
            if (isRecord(parsed)) out.push(parsed);
            else skipped++;
        } catch {
            skipped++;
        }
    }
    if (skipped > 0) log.warn('Skipped malformed ledger lines', { file: filePath, skipped });
    return out;
}

function toLedgerEvent(raw: Record<string, unknown>): LedgerEvent | null {
    const actor = raw.actor;
    if (actor !== 'user' && actor !== 'orchestrator' && actor !== 'model') return null;
    if (typeof raw.event_uuid !== 'string' || typeof raw.action_type !== 'string') return null;

    return {
        event_uuid: raw.event_uuid,
        timestamp_utc: typeof raw.timestamp_utc === 'string' ? raw.timestamp_utc : '',
        actor,
        action_type: raw.action_type,
        payload_ref: typeof raw.payload_ref === 'string' ? raw.payload_ref : null,
        artifacts_links: Array.isArray(raw.artifacts_links)
            ? raw.artifacts_links.filter((l): l is string => typeof l === 'string')
            : [],
    };
}

/* -------------------------------------------------------------------------- */
/* Ledger                                                                     */
/* -------------------------------------------------------------------------- */

export class Ledger {
    readonly eventsFile: string;
    readonly transactionsFile: string;
    readonly lockFile: string;

    private writer: LockHandle | null = null;

    constructor(readonly projectRoot: string) {
        const dir = path.join(projectRoot, LAYOUT.LEDGER_DIR);
        this.eventsFile = path.join(dir, LAYOUT.EVENTS_FILE);
        this.transactionsFile = path.join(dir, LAYOUT.TRANSACTIONS_FILE);
        this.lockFile = path.join(dir, LAYOUT.WRITER_LOCK_FILE);
    }

    private append(filePath: string, record: object): void {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.appendFileSync(filePath, JSON.stringify(record) + '\n', 'utf8');
    }

    /**
     * Append one event. Returns its event_uuid.
     */
    logEvent(actor: Actor, actionType: string, payloadRef: string | null = null, artifacts: string[] = []): string {
        const event: LedgerEvent = {
            event_uuid: uuidv4(),
            timestamp_utc: new Date().toISOString(),
            actor,
            action_type: actionType,
            payload_ref: payloadRef,
            artifacts_links: [...artifacts],
        };
        this.append(this.eventsFile, event);
        log.debug('Event appended', { action_type: actionType, actor });
        return event.event_uuid;
    }

    logTransaction(input: TransactionInput): string {
        const tx: Transaction = {
            transaction_uuid: uuidv4(),
            timestamp_utc: new Date().toISOString(),
            session_id: input.sessionId,
            step_id: input.stepId,
            user_instruction: input.instruction,
            usage_stats: normalizeUsage(input.usage),
            status: input.status,
        };
        this.append(this.transactionsFile, tx);
        log.info('Transaction recorded', { step_id: input.stepId, status: input.status });
        return tx.transaction_uuid;
    }

    readEvents(): LedgerEvent[] {
        const events: LedgerEvent[] = [];
        for (const raw of readJsonlObjects(this.eventsFile)) {
            const ev = toLedgerEvent(raw);
            if (ev) events.push(ev);
        }
        return events;
    }

    /**
     * Aggregate committed transactions. `session` and `today` both select the
     * entries whose session_id equals `sessionId` (default: today's date).
     */
    generateReport(
        timeframe: string | undefined,
        rates: PricingRates,
        sessionId: string = sessionIdFor()
    ): CostReport {
        const tf = parseTimeframe(timeframe);
        const report: CostReport = {
            timeframe: tf,
            total_requests: 0,
            total_input_tokens: 0,
            total_output_tokens: 0,
            estimated_cost: 0,
            pricing_rates: { ...rates },
            ledger_file: this.transactionsFile,
        };

        for (const entry of readJsonlObjects(this.transactionsFile)) {
            if (tf !== 'all' && entry.session_id !== sessionId) continue;

            const usage = normalizeUsage(entry.usage_stats);
            report.total_requests += 1;
            report.total_input_tokens += usage.prompt_tokens;
            report.total_output_tokens += usage.completion_tokens;
        }

        report.estimated_cost = estimateCostUsd(
            report.total_input_tokens,
            report.total_output_tokens,
            rates
        ).total;
        return report;
    }

    /* ---------------------------------------------------------------------- */
    /* Single-writer lock                                                     */
    /* ---------------------------------------------------------------------- */

    /**
     * Take the writer lock for one sequence. Throws LockHeldError when another
     * live process holds it past the timeout.
     */
    async acquireWriter(timeoutMs: number = TIMEOUTS.WRITER_LOCK_MS): Promise<void> {
        if (this.writer) return;
        const warnings: string[] = [];
        this.writer = await acquireWriterLock({
            lockPath: this.lockFile,
            timeoutMs,
            warnings,
            identity: { tool: 'rebound-kernel' },
            staleTtlMs: TIMEOUTS.WRITER_LOCK_STALE_MS,
        });
        for (const w of warnings) log.debug(w);
    }

    releaseWriter(): void {
        if (!this.writer) return;
        const handle = this.writer;
        this.writer = null;
        releaseWriterLock(handle);
    }

    get holdsWriter(): boolean {
        return this.writer !== null;
    }
}
