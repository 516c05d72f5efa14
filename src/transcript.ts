/**
 * Transcript: the human-readable session record.
 *
 * Everything shown to the operator is echoed to
 * sessions/<date>/transcript.log with a direction prefix, so a session can be
 * replayed from the file alone. Developer diagnostics go to the logger.
 */

import * as fs from 'fs';
import * as path from 'path';

import { LAYOUT } from './config';
import { sessionIdFor } from './ids';
import { createLogger } from './logger';
import { StructuredError, formatDiagnostic } from './structured_error';

const log = createLogger('transcript');

export const TRANSCRIPT_PREFIX = {
    WRAPPER: '[WRAPPER] >> ',
    PROMPT: '[PROMPT]  >> ',
    USER: '[USER]    << ',
    ERROR: '[ERROR]   !! ',
    MODEL: '[MODEL]   << ',
} as const;

export interface Transcript {
    print(message: string): void;
    error(message: string): void;
    diagnostic(err: StructuredError): void;
    /** record a question asked and the operator's answer */
    exchange(prompt: string, answer: string): void;
    modelEcho(text: string): void;
}

function hhmmss(d: Date): string {
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map(n => String(n).padStart(2, '0')).join(':');
}

export class FileTranscript implements Transcript {
    readonly filePath: string;

    constructor(
        projectRoot: string,
        private readonly out: NodeJS.WritableStream = process.stdout,
        private readonly err: NodeJS.WritableStream = process.stderr,
        sessionId: string = sessionIdFor()
    ) {
        const dir = path.join(projectRoot, LAYOUT.SESSIONS_DIR, sessionId);
        this.filePath = path.join(dir, 'transcript.log');
        fs.mkdirSync(dir, { recursive: true });
        if (!fs.existsSync(this.filePath)) {
            fs.writeFileSync(this.filePath, `=== SESSION STARTED: ${sessionId} ===\n`, 'utf8');
        }
    }

    private record(prefix: string, text: string): void {
        try {
            fs.appendFileSync(this.filePath, `[${hhmmss(new Date())}] ${prefix}${text}\n`, 'utf8');
        } catch (e) {
            log.error('Transcript append failed', { message: e instanceof Error ? e.message : String(e) });
        }
    }

    print(message: string): void {
        this.out.write(message + '\n');
        this.record(TRANSCRIPT_PREFIX.WRAPPER, message);
    }

    error(message: string): void {
        this.err.write(`ERROR: ${message}\n`);
        this.record(TRANSCRIPT_PREFIX.ERROR, message);
    }

    diagnostic(e: StructuredError): void {
        const line = formatDiagnostic(e);
        if (e.severity === 'WARNING') this.print(line);
        else this.error(line);
    }

    exchange(prompt: string, answer: string): void {
        this.record(TRANSCRIPT_PREFIX.PROMPT, prompt);
        this.record(TRANSCRIPT_PREFIX.USER, answer);
    }

    modelEcho(text: string): void {
        this.out.write(text + '\n');
        this.record(TRANSCRIPT_PREFIX.MODEL, text);
    }
}

/** In-memory transcript for tests and embedding. */
export class MemoryTranscript implements Transcript {
    readonly lines: string[] = [];

    print(message: string): void {
        this.lines.push(TRANSCRIPT_PREFIX.WRAPPER + message);
    }

    error(message: string): void {
        this.lines.push(TRANSCRIPT_PREFIX.ERROR + message);
    }

    diagnostic(e: StructuredError): void {
        const line = formatDiagnostic(e);
        if (e.severity === 'WARNING') this.print(line);
        else this.error(line);
    }

    exchange(prompt: string, answer: string): void {
        this.lines.push(TRANSCRIPT_PREFIX.PROMPT + prompt, TRANSCRIPT_PREFIX.USER + answer);
    }

    modelEcho(text: string): void {
        this.lines.push(TRANSCRIPT_PREFIX.MODEL + text);
    }

    /** lines carrying a diagnostic tag such as `[SECURITY-BLOCKED]` */
    tagged(tag: string): string[] {
        return this.lines.filter(l => l.includes(tag));
    }
}
