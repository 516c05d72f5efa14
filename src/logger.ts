/**
 * Structured Logger: operational logging for the rebound kernel
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when REBOUND_LOG_JSON=1
 * - Optional file output via REBOUND_LOG_FILE
 * - Module context (component name) on every line
 * - Session / step / turn correlation propagated through all log entries
 *
 * This is the developer-facing log. The human-readable session record lives in
 * the Transcript (see transcript.ts).
 *
 * Environment:
 *   REBOUND_LOG_LEVEL  = debug|info|warn|error (default: warn)
 *   REBOUND_LOG_JSON   = 1 (default: text)
 *   REBOUND_LOG_FILE   = path (optional, appends)
 *   REBOUND_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'warn').toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'warn';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.REBOUND_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.REBOUND_DEBUG === '1' || process.env.REBOUND_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.REBOUND_LOG_JSON === '1';
const LOG_FILE = process.env.REBOUND_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Sequence Correlation Context                                               */
/* -------------------------------------------------------------------------- */

let _sessionId = '';
let _stepId = '';
let _turn = 0;

/** Set the active correlation context. Called by the orchestrator per turn. */
export function setCorrelation(opts: { sessionId?: string; stepId?: string; turn?: number }): void {
    if (opts.sessionId !== undefined) _sessionId = opts.sessionId;
    if (opts.stepId !== undefined) _stepId = opts.stepId;
    if (opts.turn !== undefined) _turn = opts.turn;
}

/** Clear correlation context. Called at sequence end. */
export function clearCorrelation(): void {
    _sessionId = '';
    _stepId = '';
    _turn = 0;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_sessionId) entry.session_id = _sessionId;
        if (_stepId) entry.step_id = _stepId;
        if (_turn) entry.turn = _turn;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _stepId ? ` [${_stepId}${_turn ? '#' + _turn : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    // the REPL owns stdout, so every level goes to stderr
    process.stderr.write(`${line}\n`);

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${String(e)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
