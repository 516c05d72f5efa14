// src/storage/lock.ts

import * as fs from "fs";
import * as path from "path";

export interface LockHandle {
    fd: number;
    lockPath: string;
}

export class LockHeldError extends Error {
    readonly code = "LOCK_HELD";

    constructor(public readonly lockPath: string, public readonly holder: LockIdentity | null) {
        super(`LOCK_HELD: ${lockPath}${holder?.pid ? ` (pid=${holder.pid})` : ""}`);
        this.name = "LockHeldError";
    }
}

export interface LockIdentity {
    pid?: number;
    started_utc?: string;
    started_ms?: number;
    [key: string]: unknown;
}

export function errnoCode(e: unknown): string | undefined {
    if (e && typeof e === "object" && "code" in e) {
        return typeof e.code === "string" ? e.code : undefined;
    }
    return undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    const v = 50 * Math.pow(2, attempt);
    return Math.min(v, 1000);
}

function readIdentity(lockPath: string): LockIdentity | null {
    try {
        const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
        if (isRecord(parsed)) {
            return {
                ...parsed,
                pid: typeof parsed.pid === "number" ? parsed.pid : undefined,
                started_utc: typeof parsed.started_utc === "string" ? parsed.started_utc : undefined,
                started_ms: typeof parsed.started_ms === "number" ? parsed.started_ms : undefined,
            };
        }
        return null;
    } catch {
        return null;
    }
}

function isPidAlive(pid: number): boolean {
    try {
        // signal 0 checks liveness without delivering anything
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: the process exists but belongs to someone else
        return errnoCode(e) === "EPERM";
    }
}

export async function acquireWriterLock(params: {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    identity: Record<string, unknown>;
    staleTtlMs?: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings, identity } = params;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;
    const staleLockMs = params.staleTtlMs ?? 600_000;

    while (true) {
        try {
            // O_CREAT | O_EXCL: only one process gets the fd
            const fd = fs.openSync(lockPath, "wx");

            const lockData: LockIdentity = {
                ...identity,
                pid: process.pid,
                started_utc: new Date().toISOString(),
                started_ms: Date.now(),
            };
            fs.writeSync(fd, JSON.stringify(lockData, null, 2));

            return { fd, lockPath };
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") {
                throw e;
            }

            const holder = readIdentity(lockPath);
            if (holder === null) {
                // corrupt or vanished between open and read
                try {
                    fs.unlinkSync(lockPath);
                    continue;
                } catch {
                    // someone else removed it first; fall through to retry
                }
            } else {
                let isStale = false;

                if (typeof holder.pid === "number" && holder.pid > 0 && !isPidAlive(holder.pid)) {
                    isStale = true;
                    warnings.push(`STALE_LOCK(PID_DEAD) ${lockPath} pid=${holder.pid}`);
                }

                const lockAge = Date.now() - (typeof holder.started_ms === "number" ? holder.started_ms : 0);
                if (!isStale && lockAge > staleLockMs) {
                    isStale = true;
                    warnings.push(`STALE_LOCK(AGE) ${lockPath} age=${lockAge}ms`);
                }

                if (isStale) {
                    try {
                        fs.unlinkSync(lockPath);
                    } catch (unlinkErr) {
                        if (errnoCode(unlinkErr) !== "ENOENT") throw unlinkErr;
                    }
                    continue;
                }
            }

            const elapsed = Date.now() - started;
            if (elapsed >= timeoutMs) {
                throw new LockHeldError(lockPath, holder);
            }

            const wait = backoff(attempt++);
            warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
            await sleep(wait);
        }
    }
}

export function releaseWriterLock(handle: LockHandle): void {
    try {
        fs.closeSync(handle.fd);
    } catch (e) {
        if (errnoCode(e) !== "EBADF") throw e;
    }
    try {
        fs.unlinkSync(handle.lockPath);
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
    }
}
