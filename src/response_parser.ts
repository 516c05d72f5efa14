/**
 * Response Parser: raw model text to an ordered list of ResponseRecords.
 *
 * Tolerates a single JSON object, several objects concatenated with no
 * separator, and prose or markdown interleaved between them. A segment that
 * fails to decode costs one character of progress and nothing else.
 *
 * Never throws; an unproductive reply yields zero records.
 */

import {
    ArtifactOperation,
    ArtifactSpec,
    NextAction,
    ResponseRecord
} from './rebound_types';

export interface ParseResult {
    records: ResponseRecord[];
    /** JSON objects successfully decoded (array elements count individually) */
    objectCount: number;
    /** characters stepped over while resynchronizing */
    skippedChars: number;
    /** artifact entries dropped for a missing path or non-string content */
    droppedArtifactSpecs: number;
}

const FENCE = '```';

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Strip one markdown fence when it wraps the entire payload. The opening
 * line's language tag (```json) goes with it.
 */
export function stripCodeFence(text: string): string {
    const t = text.trim();
    if (t.length < FENCE.length * 2 || !t.startsWith(FENCE) || !t.endsWith(FENCE)) {
        return text;
    }

    let inner = t.slice(FENCE.length, t.length - FENCE.length);
    const nl = inner.indexOf('\n');
    const firstLine = nl === -1 ? inner : inner.slice(0, nl);
    if (/^[A-Za-z0-9_+-]*\s*$/.test(firstLine)) {
        inner = nl === -1 ? '' : inner.slice(nl + 1);
    }
    return inner.trim();
}

/** What the last significant character outside a string was. */
type Prev = 'open_obj' | 'open_arr' | 'colon' | 'comma' | 'str' | 'close' | 'lit';

const AFTER: Record<'str' | 'open' | 'close_obj' | 'close_arr' | 'colon' | 'comma' | 'lit', ReadonlySet<Prev>> = {
    str: new Set<Prev>(['open_obj', 'open_arr', 'colon', 'comma']),
    open: new Set<Prev>(['open_arr', 'colon', 'comma']),
    close_obj: new Set<Prev>(['open_obj', 'str', 'close', 'lit']),
    close_arr: new Set<Prev>(['open_arr', 'str', 'close', 'lit']),
    colon: new Set<Prev>(['str']),
    comma: new Set<Prev>(['str', 'close', 'lit']),
    lit: new Set<Prev>(['open_arr', 'colon', 'comma', 'lit']),
};

/**
 * Index one past the bracket that closes the value opened at `start`, or -1
 * when the brackets never balance or a character appears where no JSON
 * value can have it. String contents are skipped.
 */
function findValueEnd(text: string, start: number): number {
    const expected: string[] = [];
    let inString = false;
    let escaped = false;
    let prev: Prev = text[start] === '{' ? 'open_obj' : 'open_arr';
    expected.push(prev === 'open_obj' ? '}' : ']');

    for (let i = start + 1; i < text.length; i++) {
        const ch = text[i];

        if (inString) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') {
                inString = false;
                prev = 'str';
            }
            continue;
        }
        if (ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t') continue;

        if (ch === '"') {
            if (!AFTER.str.has(prev)) return -1;
            inString = true;
        } else if (ch === '{' || ch === '[') {
            if (!AFTER.open.has(prev)) return -1;
            expected.push(ch === '{' ? '}' : ']');
            prev = ch === '{' ? 'open_obj' : 'open_arr';
        } else if (ch === '}' || ch === ']') {
            if (!(ch === '}' ? AFTER.close_obj : AFTER.close_arr).has(prev)) return -1;
            if (expected.pop() !== ch) return -1;
            if (expected.length === 0) return i + 1;
            prev = 'close';
        } else if (ch === ':') {
            if (!AFTER.colon.has(prev)) return -1;
            prev = 'colon';
        } else if (ch === ',') {
            if (!AFTER.comma.has(prev)) return -1;
            prev = 'comma';
        } else {
            if (!AFTER.lit.has(prev)) return -1;
            prev = 'lit';
        }
    }
    return -1;
}

function tryDecodeAt(text: string, start: number): { value: unknown; end: number } | null {
    const end = findValueEnd(text, start);
    if (end === -1) return null;
    try {
        return { value: JSON.parse(text.slice(start, end)), end };
    } catch {
        return null;
    }
}

/* -------------------------------------------------------------------------- */
/* Permissive record decoding                                                 */
/* -------------------------------------------------------------------------- */

function firstString(obj: Record<string, unknown>, keys: string[]): string | null {
    for (const k of keys) {
        const v = obj[k];
        if (typeof v === 'string') return v;
    }
    return null;
}

function decodeArtifactSpec(raw: unknown): ArtifactSpec | null {
    if (!isRecord(raw)) return null;
    const p = raw.path;
    const content = raw.content;
    if (typeof p !== 'string' || p.trim() === '' || typeof content !== 'string') return null;

    const operation: ArtifactOperation = raw.operation === 'edit' ? 'edit' : 'create';
    return { path: p, content, operation };
}

function decodeArgs(raw: unknown): string[] {
    if (!Array.isArray(raw)) return [];
    const out: string[] = [];
    for (const a of raw) {
        if (typeof a === 'string') out.push(a);
        else if (typeof a === 'number' || typeof a === 'boolean') out.push(String(a));
    }
    return out;
}

function decodeNextAction(raw: unknown): NextAction | null {
    if (!isRecord(raw)) return null;
    if (typeof raw.type !== 'string' || raw.type.trim() === '') return null;

    return {
        type: raw.type.trim(),
        target: firstString(raw, ['target', 'script']) ?? '',
        args: decodeArgs(raw.args),
        continuation: firstString(raw, ['continuation', 'continuation_prompt']) ?? '',
    };
}

/**
 * Variants carried by one decoded object, in fixed order:
 * thought, tool_mention, message, artifact_batch, next_action.
 */
export function decodeRecords(obj: Record<string, unknown>): { records: ResponseRecord[]; dropped: number } {
    const records: ResponseRecord[] = [];
    let dropped = 0;

    const thought = firstString(obj, ['thought_process', 'thought']);
    if (thought !== null) records.push({ kind: 'thought', text: thought });

    const tool = obj.tool_mention ?? obj.tool_call;
    if (isRecord(tool) && typeof tool.name === 'string' && tool.name.trim() !== '') {
        records.push({ kind: 'tool_mention', name: tool.name, args: tool.args ?? tool.arguments ?? null });
    }

    if (typeof obj.message === 'string') records.push({ kind: 'message', text: obj.message });

    if (Array.isArray(obj.artifacts)) {
        const artifacts: ArtifactSpec[] = [];
        for (const entry of obj.artifacts) {
            const spec = decodeArtifactSpec(entry);
            if (spec) artifacts.push(spec);
            else dropped++;
        }
        if (artifacts.length > 0) records.push({ kind: 'artifact_batch', artifacts });
    }

    const action = decodeNextAction(obj.next_action);
    if (action) records.push({ kind: 'next_action', action });

    return { records, dropped };
}

/* -------------------------------------------------------------------------- */
/* Scanner                                                                    */
/* -------------------------------------------------------------------------- */

export function parseResponse(raw: string): ParseResult {
    const result: ParseResult = { records: [], objectCount: 0, skippedChars: 0, droppedArtifactSpecs: 0 };
    if (typeof raw !== 'string' || raw.length === 0) return result;

    const text = stripCodeFence(raw);

    const take = (obj: Record<string, unknown>): void => {
        const decoded = decodeRecords(obj);
        result.objectCount++;
        result.records.push(...decoded.records);
        result.droppedArtifactSpecs += decoded.dropped;
    };

    let cursor = 0;
    while (cursor < text.length) {
        const ch = text[cursor];
        if (/\s/.test(ch)) {
            cursor++;
            continue;
        }

        if (ch === '{' || ch === '[') {
            const decoded = tryDecodeAt(text, cursor);
            if (decoded) {
                if (isRecord(decoded.value)) {
                    take(decoded.value);
                } else if (Array.isArray(decoded.value)) {
                    for (const el of decoded.value) {
                        if (isRecord(el)) take(el);
                    }
                }
                cursor = decoded.end;
                continue;
            }
        }

        result.skippedChars++;
        cursor++;
    }

    return result;
}

/** First next_action wins; later ones are reported by count only. */
export function selectNextAction(records: readonly ResponseRecord[]): { action: NextAction | null; ignored: number } {
    let action: NextAction | null = null;
    let ignored = 0;
    for (const r of records) {
        if (r.kind !== 'next_action') continue;
        if (action === null) action = r.action;
        else ignored++;
    }
    return { action, ignored };
}
