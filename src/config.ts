/**
 * Shared Configuration
 *
 * Centralized constants for the rebound kernel plus the project.json loader.
 * Values can be overridden via environment variables.
 */

import * as fs from 'fs';
import * as path from 'path';

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseFloat(raw);
    return Number.isFinite(n) && n >= 0 ? n : fallback;
}

// Default model when project.json has no policy.model_alias
export const DEFAULT_MODEL_ID = process.env.REBOUND_MODEL || 'gpt-4o';

// OpenAI-compatible chat completions endpoint
export const DEFAULT_MODEL_ENDPOINT =
    process.env.REBOUND_MODEL_ENDPOINT || 'https://api.openai.com/v1/chat/completions';

export interface PricingRates {
    /** USD per million prompt tokens */
    input_per_1m: number;
    /** USD per million completion tokens */
    output_per_1m: number;
}

// Fallback pricing when project.json carries no pricing_rates
export const DEFAULT_PRICING_RATES: PricingRates = {
    input_per_1m: envFloat('REBOUND_COST_INPUT_PER_M', 2.5),
    output_per_1m: envFloat('REBOUND_COST_OUTPUT_PER_M', 10.0),
};

// Rebound protocol
export const REBOUND = {
    MAX_LOOPS: envInt('REBOUND_MAX_LOOPS', 5),
    CHAIN_ACTION_TYPE: 'exec_and_chain',
};

// Sandbox gate: one root, one extension, one interpreter
export const SANDBOX = {
    SCRIPTS_DIR: path.join('workbench', 'scripts'),
    ALLOWED_EXTENSION: '.js',
    TIMEOUT_EXIT_CODE: 124,
    MAX_CAPTURE_BYTES: 1024 * 1024,
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    SANDBOX_MS: envInt('REBOUND_SANDBOX_TIMEOUT_MS', 60_000),
    MODEL_CALL_MS: envInt('REBOUND_MODEL_TIMEOUT_MS', 120_000),
    WRITER_LOCK_MS: envInt('REBOUND_WRITER_LOCK_MS', 2_000),
    WRITER_LOCK_STALE_MS: 600_000,
};

// Project-root relative layout
export const LAYOUT = {
    ARTIFACTS_DIR: 'artifacts',
    MANIFESTS_DIR: 'manifests',
    LEDGER_DIR: 'ledger',
    EVENTS_FILE: 'events.jsonl',
    TRANSACTIONS_FILE: 'audit_log.jsonl',
    WRITER_LOCK_FILE: '.writer.lock',
    SESSIONS_DIR: 'sessions',
    RAW_TRACE_FILE: 'raw_response_trace.txt',
    SIDECAR_SUFFIX: '.meta.json',
    PROJECT_FILE: 'project.json',
    API_KEY_FILE: path.join('secrets', 'openai_key'),
};

// Context builder
export const CONTEXT = {
    CODE_EXTENSIONS: ['.ts', '.tsx', '.js', '.mjs', '.cjs', '.py'],
    MAX_FILE_BYTES: 256 * 1024,
    CACHE_MAX_BYTES: 64 * 1024 * 1024,
};

/* -------------------------------------------------------------------------- */
/* project.json                                                               */
/* -------------------------------------------------------------------------- */

export interface ProjectConfig {
    projectRoot: string;
    projectName: string;
    slug: string;
    version: string;
    modelId: string;
    pricingRates: PricingRates;
    maxLoops: number;
    sandboxTimeoutMs: number;
}

export class ConfigError extends Error {
    readonly code = 'INVALID_CONFIG';

    constructor(message: string, public readonly configPath: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(v: unknown, fallback: string): string {
    return typeof v === 'string' && v.trim() !== '' ? v : fallback;
}

function positiveInt(v: unknown, fallback: number): number {
    return typeof v === 'number' && Number.isInteger(v) && v > 0 ? v : fallback;
}

function rate(v: unknown, fallback: number): number {
    return typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : fallback;
}

/**
 * Load project.json from the project root. A missing file yields defaults;
 * a file that is present but not a JSON object is a configuration error.
 */
export function loadProjectConfig(projectRoot: string): ProjectConfig {
    const root = path.resolve(projectRoot);
    const configPath = path.join(root, LAYOUT.PROJECT_FILE);

    let raw: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
        } catch (e) {
            throw new ConfigError(`project.json is invalid JSON: ${e instanceof Error ? e.message : String(e)}`, configPath);
        }
        if (!isRecord(parsed)) {
            throw new ConfigError('project.json must contain a JSON object', configPath);
        }
        raw = parsed;
    }

    const policy = isRecord(raw.policy) ? raw.policy : {};
    const pricing = isRecord(raw.pricing_rates) ? raw.pricing_rates : {};
    const rebound = isRecord(raw.rebound) ? raw.rebound : {};

    return {
        projectRoot: root,
        projectName: str(raw.project_name, 'Unknown Project'),
        slug: str(raw.slug, 'unknown-slug'),
        version: str(raw.version, '0.0.0'),
        modelId: process.env.REBOUND_MODEL || str(policy.model_alias, DEFAULT_MODEL_ID),
        pricingRates: {
            input_per_1m: rate(pricing.input_per_1m, DEFAULT_PRICING_RATES.input_per_1m),
            output_per_1m: rate(pricing.output_per_1m, DEFAULT_PRICING_RATES.output_per_1m),
        },
        maxLoops: process.env.REBOUND_MAX_LOOPS
            ? REBOUND.MAX_LOOPS
            : positiveInt(rebound.max_loops, REBOUND.MAX_LOOPS),
        sandboxTimeoutMs: process.env.REBOUND_SANDBOX_TIMEOUT_MS
            ? TIMEOUTS.SANDBOX_MS
            : positiveInt(rebound.sandbox_timeout_ms, TIMEOUTS.SANDBOX_MS),
    };
}

/**
 * API key from OPENAI_API_KEY, else from the untracked secrets/openai_key file.
 * Returns an empty string when neither is present.
 */
export function resolveApiKey(projectRoot: string): string {
    const fromEnv = process.env.OPENAI_API_KEY;
    if (fromEnv && fromEnv.trim()) return fromEnv.trim();

    const keyFile = path.join(projectRoot, LAYOUT.API_KEY_FILE);
    if (!fs.existsSync(keyFile)) return '';
    return fs.readFileSync(keyFile, 'utf8').trim();
}

/**
 * Estimate cost for a token count at per-million rates
 */
export function estimateCostUsd(
    promptTokens: number,
    completionTokens: number,
    rates: PricingRates
): { input: number; output: number; total: number } {
    const input = (promptTokens / 1_000_000) * rates.input_per_1m;
    const output = (completionTokens / 1_000_000) * rates.output_per_1m;
    return { input, output, total: input + output };
}
