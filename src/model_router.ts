// model_router.ts - OpenAI-compatible chat completions backend

import crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

import { DEFAULT_MODEL_ENDPOINT, LAYOUT, TIMEOUTS } from "./config";
import { sessionIdFor } from "./ids";
import { Ledger, normalizeUsage } from "./ledger";
import { createLogger } from "./logger";
import { withGovernance } from "./prompts";
import { BackendReply, ModelBackend, UsageStats } from "./rebound_types";
import { CommonRecoveryOptions, ErrorFactory, createStructuredError } from "./structured_error";

const log = createLogger('model-router');

// ============================================================================
// Types
// ============================================================================

export type ModelRole = "system" | "user" | "assistant";

export interface ModelMessage {
    role: ModelRole;
    content: string;
}

export interface ModelRouterConfig {
    apiKey: string;
    modelId: string;
    endpoint?: string;
    timeoutMs?: number;
    temperature?: number;
    maxTokens?: number;
    /** when set with `ledger`, raw exchanges are persisted under sessions/ */
    projectRoot?: string;
    ledger?: Ledger;
}

interface ChatPayload {
    model: string;
    messages: ModelMessage[];
    temperature: number;
    max_tokens: number;
    stream: false;
    response_format: { type: "json_object" };
}

// ============================================================================
// Frozen constants
// ============================================================================

const FROZEN = {
    MAX_COMPLETION_TOKENS: 16000,
    DEFAULT_TEMPERATURE: 0.2,

    SANITIZE: {
        ERROR_SNIPPET_MAX_CHARS: 500,
        STRIP_PATTERNS: [
            /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
            /[a-fA-F0-9]{32,}/g,
            /sk-[A-Za-z0-9_-]{10,}/g,
            /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        ],
    },
} as const;

// ============================================================================
// Helpers
// ============================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function sha256Hex(s: string): string {
    return crypto.createHash("sha256").update(s).digest("hex");
}

export function sanitizeErrorSnippet(input: string): string {
    let out = input || "";
    for (const re of FROZEN.SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, "[REDACTED]");
    }
    if (out.length > FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    out = out.replace(/[^\x20-\x7E]+/g, " ");
    return out;
}

function safeTemperature(x: number | undefined): number {
    if (x === undefined || !Number.isFinite(x)) return FROZEN.DEFAULT_TEMPERATURE;
    return Math.max(0, Math.min(2.0, x));
}

/** First choice's message content, or null when the body has none. */
function extractCompletion(data: Record<string, unknown>): string | null {
    const choices = data.choices;
    if (!Array.isArray(choices) || choices.length === 0) return null;
    const first: unknown = choices[0];
    if (!isRecord(first) || !isRecord(first.message)) return null;
    const content = first.message.content;
    return typeof content === "string" ? content : null;
}

// ============================================================================
// ModelRouter
// ============================================================================

/**
 * Single-attempt backend. There are no retries: a failed call ends the
 * sequence and the operator decides whether to rerun.
 */
export class ModelRouter implements ModelBackend {
    private readonly endpoint: string;
    private readonly timeoutMs: number;

    constructor(private readonly config: ModelRouterConfig) {
        if (!config.apiKey) {
            log.warn("No API key configured. Set OPENAI_API_KEY or write secrets/openai_key.");
        }
        this.endpoint = config.endpoint ?? DEFAULT_MODEL_ENDPOINT;
        this.timeoutMs = config.timeoutMs ?? TIMEOUTS.MODEL_CALL_MS;
    }

    get modelId(): string {
        return this.config.modelId;
    }

    async send(systemPrompt: string, userPrompt: string): Promise<BackendReply> {
        if (!this.config.apiKey) {
            return {
                ok: false,
                error: createStructuredError(
                    "AUTH_ERROR",
                    "No API key configured",
                    { model: this.config.modelId },
                    [CommonRecoveryOptions.fixCredentials()]
                ),
            };
        }

        const system = withGovernance(systemPrompt);
        const payload: ChatPayload = {
            model: this.config.modelId,
            messages: [
                { role: "system", content: system },
                { role: "user", content: userPrompt },
            ],
            temperature: safeTemperature(this.config.temperature),
            max_tokens: this.config.maxTokens || FROZEN.MAX_COMPLETION_TOKENS,
            stream: false,
            response_format: { type: "json_object" },
        };

        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), this.timeoutMs);
        const started = Date.now();

        log.debug("API call", { model: payload.model, prompt_chars: userPrompt.length + system.length });

        try {
            const resp = await fetch(this.endpoint, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "Authorization": `Bearer ${this.config.apiKey}`,
                },
                body: JSON.stringify(payload),
                signal: ac.signal,
            });

            const latencyMs = Date.now() - started;
            const bodyText = await resp.text();

            if (!resp.ok) {
                const snippet = sanitizeErrorSnippet(bodyText);
                log.error("Model endpoint rejected the call", { http_status: resp.status, latency_ms: latencyMs });
                return {
                    ok: false,
                    error: ErrorFactory.transportFailure(`Model endpoint error ${resp.status}`, {
                        http_status: resp.status,
                        body_snippet: snippet,
                        model: payload.model,
                    }),
                };
            }

            let data: unknown;
            try {
                data = JSON.parse(bodyText);
            } catch {
                return {
                    ok: false,
                    error: createStructuredError("MODEL_ERROR", "provider_response_not_json", {
                        http_status: resp.status,
                        body_snippet: sanitizeErrorSnippet(bodyText),
                    }),
                };
            }

            const completion = isRecord(data) ? extractCompletion(data) : null;
            if (completion === null || !isRecord(data)) {
                return {
                    ok: false,
                    error: createStructuredError("MODEL_ERROR", "provider_response_has_no_completion", {
                        http_status: resp.status,
                        body_snippet: sanitizeErrorSnippet(bodyText),
                    }),
                };
            }

            const usage = normalizeUsage(data.usage);
            this.recordExchange(payload, data, usage, latencyMs);

            log.debug("API success", { latency_ms: latencyMs, tokens: usage.total_tokens });
            return { ok: true, text: completion, usage };
        } catch (e) {
            const isTimeout = e instanceof Error && e.name === "AbortError";
            const msg = isTimeout
                ? `timeout after ${this.timeoutMs}ms`
                : `network_error: ${sanitizeErrorSnippet(e instanceof Error ? e.message : String(e))}`;
            log.error("Model call failed", { reason: msg });
            return { ok: false, error: ErrorFactory.transportFailure(msg, { model: payload.model, timeout: isTimeout }) };
        } finally {
            clearTimeout(tid);
        }
    }

    /**
     * Persist the exchange to sessions/<date>/raw_exchanges/<uuid>.json and
     * log `api_response` pointing at it. Failures here never fail the call.
     */
    private recordExchange(
        payload: ChatPayload,
        response: Record<string, unknown>,
        usage: UsageStats,
        latencyMs: number
    ): void {
        const { projectRoot, ledger } = this.config;
        if (!projectRoot || !ledger) return;

        const requestId = uuidv4();
        const payloadRef = [LAYOUT.SESSIONS_DIR, sessionIdFor(), "raw_exchanges", `${requestId}.json`].join("/");
        const exchange = {
            request_id: requestId,
            timestamp_utc: new Date().toISOString(),
            model: payload.model,
            latency_ms: latencyMs,
            prompt_hash: sha256Hex(JSON.stringify(payload.messages)),
            request: payload,
            response,
            usage,
        };

        try {
            const abs = path.join(projectRoot, ...payloadRef.split("/"));
            fs.mkdirSync(path.dirname(abs), { recursive: true });
            fs.writeFileSync(abs, JSON.stringify(exchange, null, 2), "utf8");
            ledger.logEvent("model", "api_response", payloadRef);
        } catch (e) {
            log.error("Raw exchange not persisted", { message: e instanceof Error ? e.message : String(e) });
        }
    }
}
