// src/storage/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { errnoCode } from "./lock";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function fsyncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${target}`);
    }
}

// warnings is required: callers decide whether best-effort fsync problems surface
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode?: number;
    fsyncMode?: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, warnings } = params;
    const mode = params.mode ?? 0o644;
    const fsyncMode = params.fsyncMode ?? "BEST_EFFORT";

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 until renamed into place
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        if (process.platform !== "win32") {
            fsyncPath(dir, "r", fsyncMode, warnings);
        }
    } catch (e) {
        try {
            if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
        } catch (cleanupErr) {
            warnings.push(`TMP_CLEANUP_WARN(${errnoCode(cleanupErr) || "UNKNOWN"}) on ${tmp}`);
        }
        throw e;
    }
}

export function atomicWriteJsonSync(params: {
    filePath: string;
    data: unknown;
    mode?: number;
    fsyncMode?: FsyncMode;
    warnings: string[];
}): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: JSON.stringify(params.data, null, 2),
        mode: params.mode,
        fsyncMode: params.fsyncMode,
        warnings: params.warnings,
    });
}
