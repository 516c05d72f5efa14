/**
 * Sandbox Runner: the only way the rebound loop executes anything.
 *
 * One narrow rule: a relative path that resolves (symlinks included) to a
 * regular `.js` file under <projectRoot>/workbench/scripts, run by the current
 * Node binary without a shell, with a wall-clock timeout. No process
 * isolation, no resource limits, no network restriction.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { SANDBOX, TIMEOUTS } from './config';
import { createLogger } from './logger';
import { errnoCode } from './storage';

const log = createLogger('sandbox');

/** after SIGKILL, how long to wait for 'exit' before settling anyway */
const KILL_GRACE_MS = 1_000;

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type SandboxViolationCode =
    | 'EMPTY_PATH'
    | 'ABSOLUTE_PATH'
    | 'OUTSIDE_ROOT'
    | 'NOT_FOUND'
    | 'NOT_A_FILE'
    | 'INVALID_PATH'
    | 'EXTENSION_NOT_ALLOWED';

export class SandboxViolation extends Error {
    constructor(readonly code: SandboxViolationCode, message: string, readonly target: string) {
        super(message);
        this.name = 'SandboxViolation';
    }
}

export type SandboxValidation =
    | { ok: true; scriptPath: string }
    | { ok: false; violation: SandboxViolation };

export interface SandboxRunResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    truncated: boolean;
    durationMs: number;
}

export interface SandboxRunnerOptions {
    projectRoot: string;
    /** relative to projectRoot */
    scriptsDir?: string;
    timeoutMs?: number;
    maxCaptureBytes?: number;
    /** defaults to the running Node binary */
    interpreter?: string;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function isInside(root: string, candidate: string): boolean {
    const rel = path.relative(root, candidate);
    return rel !== '' && rel.split(path.sep)[0] !== '..' && !path.isAbsolute(rel);
}

function signalExitCode(signal: NodeJS.Signals | null): number {
    if (!signal) return 1;
    const num = os.constants.signals[signal];
    return typeof num === 'number' ? 128 + num : 1;
}

class CappedBuffer {
    private chunks: Buffer[] = [];
    private bytes = 0;
    truncated = false;

    constructor(private readonly cap: number) {}

    push(chunk: Buffer): void {
        const room = this.cap - this.bytes;
        if (room <= 0) {
            this.truncated = true;
            return;
        }
        const piece = chunk.length > room ? chunk.subarray(0, room) : chunk;
        if (piece.length < chunk.length) this.truncated = true;
        this.chunks.push(piece);
        this.bytes += piece.length;
    }

    text(): string {
        return Buffer.concat(this.chunks).toString('utf8');
    }
}

function appendNote(stream: string, note: string): string {
    if (!stream) return note;
    return stream.endsWith('\n') ? stream + note : `${stream}\n${note}`;
}

/* -------------------------------------------------------------------------- */
/* Runner                                                                     */
/* -------------------------------------------------------------------------- */

export class SandboxRunner {
    readonly projectRoot: string;
    readonly scriptsRoot: string;
    readonly timeoutMs: number;
    private readonly maxCaptureBytes: number;
    private readonly interpreter: string;

    constructor(opts: SandboxRunnerOptions) {
        this.projectRoot = path.resolve(opts.projectRoot);
        this.scriptsRoot = path.resolve(this.projectRoot, opts.scriptsDir ?? SANDBOX.SCRIPTS_DIR);
        this.timeoutMs = opts.timeoutMs ?? TIMEOUTS.SANDBOX_MS;
        this.maxCaptureBytes = opts.maxCaptureBytes ?? SANDBOX.MAX_CAPTURE_BYTES;
        this.interpreter = opts.interpreter ?? process.execPath;
    }

    validate(relativePath: string): SandboxValidation {
        const target = (relativePath || '').trim();
        const violation = (code: SandboxViolationCode, message: string): SandboxValidation =>
            ({ ok: false, violation: new SandboxViolation(code, message, target) });

        if (!target) return violation('EMPTY_PATH', 'Empty script path');
        if (target.includes('\0')) return violation('INVALID_PATH', 'Script path contains a NUL byte');
        if (path.isAbsolute(target) || path.win32.isAbsolute(target)) {
            return violation('ABSOLUTE_PATH', `Absolute paths are forbidden; give a path relative to ${SANDBOX.SCRIPTS_DIR}`);
        }

        const candidate = path.resolve(this.scriptsRoot, target);
        if (!isInside(this.scriptsRoot, candidate)) {
            return violation('OUTSIDE_ROOT', `Script path is outside ${SANDBOX.SCRIPTS_DIR}`);
        }
        if (path.extname(candidate).toLowerCase() !== SANDBOX.ALLOWED_EXTENSION) {
            return violation('EXTENSION_NOT_ALLOWED', `Only ${SANDBOX.ALLOWED_EXTENSION} scripts are allowed`);
        }

        // the target comes from the model; no fs error may escape validate
        const fsViolation = (e: unknown): SandboxValidation => {
            const code = errnoCode(e);
            if (code === 'ENOENT' || code === 'ENOTDIR') {
                return violation('NOT_FOUND', `Script not found: ${target}`);
            }
            return violation('INVALID_PATH', `Invalid script path: ${target} (${code ?? 'unreadable'})`);
        };

        let realRoot: string;
        let realCandidate: string;
        let isFile: boolean;
        try {
            realRoot = fs.realpathSync(this.scriptsRoot);
            realCandidate = fs.realpathSync(candidate);
        } catch (e) {
            return fsViolation(e);
        }

        if (!isInside(realRoot, realCandidate)) {
            return violation('OUTSIDE_ROOT', `Script resolves outside ${SANDBOX.SCRIPTS_DIR} through a symlink`);
        }
        try {
            isFile = fs.statSync(realCandidate).isFile();
        } catch (e) {
            return fsViolation(e);
        }
        if (!isFile) {
            return violation('NOT_A_FILE', `Not a file: ${target}`);
        }
        if (path.extname(realCandidate).toLowerCase() !== SANDBOX.ALLOWED_EXTENSION) {
            return violation('EXTENSION_NOT_ALLOWED', `Only ${SANDBOX.ALLOWED_EXTENSION} scripts are allowed`);
        }

        return { ok: true, scriptPath: realCandidate };
    }

    /**
     * Validate then execute. Throws SandboxViolation before any spawn when the
     * target is not allowed; every other failure is folded into the result.
     */
    async run(relativePath: string, args: readonly string[] = []): Promise<SandboxRunResult> {
        const checked = this.validate(relativePath);
        if (!checked.ok) throw checked.violation;
        return this.spawnScript(checked.scriptPath, args);
    }

    private spawnScript(scriptPath: string, args: readonly string[]): Promise<SandboxRunResult> {
        const started = Date.now();
        const stdout = new CappedBuffer(this.maxCaptureBytes);
        const stderr = new CappedBuffer(this.maxCaptureBytes);

        log.info('Executing sandbox script', { script: scriptPath, args: args.length });

        return new Promise<SandboxRunResult>((resolve) => {
            let settled = false;
            let timedOut = false;

            const finish = (exitCode: number, note?: string): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);

                const truncated = stdout.truncated || stderr.truncated;
                let err = stderr.text();
                if (truncated) err = appendNote(err, `[SANDBOX] Output truncated at ${this.maxCaptureBytes} bytes per stream`);
                if (note) err = appendNote(err, note);

                const result: SandboxRunResult = {
                    exitCode,
                    stdout: stdout.text(),
                    stderr: err,
                    timedOut,
                    truncated,
                    durationMs: Date.now() - started,
                };
                log.info('Sandbox script finished', { exit_code: exitCode, timed_out: timedOut, ms: result.durationMs });
                resolve(result);
            };

            let child: ReturnType<typeof spawn>;
            try {
                child = spawn(this.interpreter, [scriptPath, ...args], {
                    cwd: this.projectRoot,
                    shell: false,
                    stdio: ['ignore', 'pipe', 'pipe'],
                    windowsHide: true,
                });
            } catch (e) {
                const message = e instanceof Error ? e.message : String(e);
                resolve({
                    exitCode: 1,
                    stdout: '',
                    stderr: `[SANDBOX] Script execution failed: ${message}`,
                    timedOut: false,
                    truncated: false,
                    durationMs: Date.now() - started,
                });
                return;
            }

            // settle on 'exit' once killed: 'close' also waits for any
            // grandchild still holding the pipes
            let grace: NodeJS.Timeout | undefined;
            const finishTimedOut = (): void => {
                if (grace) clearTimeout(grace);
                const seconds = Math.round(this.timeoutMs / 100) / 10;
                finish(SANDBOX.TIMEOUT_EXIT_CODE, `[SANDBOX] Script timed out after ${seconds}s`);
                child.stdout?.destroy();
                child.stderr?.destroy();
            };

            const timer = setTimeout(() => {
                if (settled) return;
                timedOut = true;
                log.error(`Sandbox timeout after ${this.timeoutMs}ms`, { script: scriptPath });
                child.kill('SIGKILL');
                grace = setTimeout(finishTimedOut, KILL_GRACE_MS);
            }, this.timeoutMs);

            child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
            child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

            child.on('error', (e: Error) => {
                if (grace) clearTimeout(grace);
                finish(1, `[SANDBOX] Script execution failed: ${e.message}`);
            });

            child.on('exit', () => {
                if (timedOut) finishTimedOut();
            });

            child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
                if (timedOut) {
                    finishTimedOut();
                    return;
                }
                finish(code ?? signalExitCode(signal));
            });
        });
    }
}
