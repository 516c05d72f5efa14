/**
 * Artifact Sink
 *
 * Materializes one turn's records into artifacts/<stepId>/, the turn's
 * quarantine directory. Nothing reaches the project tree from here; that is
 * the review pipeline's job.
 *
 * Per artifact: confine the untrusted path to the quarantine dir, write the
 * content, write a <file>.meta.json sidecar, log `artifact_generated`, track it
 * for the session manifest. A blocked or failed artifact never stops its
 * siblings. The raw trace name and the sidecar suffix are off limits.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

import { LAYOUT } from './config';
import { Ledger } from './ledger';
import { createLogger } from './logger';
import { selectNextAction } from './response_parser';
import { ArtifactSidecar, ArtifactSpec, NextAction, ResponseRecord, WrittenArtifact } from './rebound_types';
import { SessionArtifactList } from './session_artifacts';
import { atomicWriteJsonSync, errnoCode } from './storage';
import { ErrorFactory, StructuredError } from './structured_error';
import { Transcript } from './transcript';

const log = createLogger('sink');

export interface SinkResult {
    stepId: string;
    quarantineDir: string;
    tracePath: string;
    written: WrittenArtifact[];
    blocked: StructuredError[];
    failed: StructuredError[];
    nextAction: NextAction | null;
}

export type ConfinedPath =
    | { ok: true; absPath: string; relativePath: string }
    | { ok: false; reason: string };

function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}

/**
 * Resolve an untrusted relative path under `baseDir`. The result must be a
 * strict descendant, and no existing component below `baseDir` may be a
 * symlink. Backslashes are treated as separators.
 */
export function confineToDirectory(baseDir: string, requested: string): ConfinedPath {
    if (requested.trim() === '') return { ok: false, reason: 'empty path' };
    if (requested.includes('\0')) return { ok: false, reason: 'NUL byte in path' };

    const normalized = requested.replace(/\\/g, '/');
    if (path.posix.isAbsolute(normalized) || /^[a-zA-Z]:/.test(normalized)) {
        return { ok: false, reason: 'absolute path' };
    }

    const base = path.resolve(baseDir);
    const absPath = path.resolve(base, normalized);
    const rel = path.relative(base, absPath);
    if (rel === '' || rel.split(path.sep)[0] === '..' || path.isAbsolute(rel)) {
        return { ok: false, reason: 'escapes quarantine directory' };
    }

    let cur = base;
    for (const part of rel.split(path.sep)) {
        cur = path.join(cur, part);
        try {
            if (fs.lstatSync(cur).isSymbolicLink()) {
                return { ok: false, reason: `symlink component ${toPosix(path.relative(base, cur))}` };
            }
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') break;
            throw e;
        }
    }

    return { ok: true, absPath, relativePath: toPosix(rel) };
}

/** The trace and sidecars share the quarantine dir; artifacts may not take their names. */
function reservedName(confined: { absPath: string; relativePath: string }, tracePath: string): string | null {
    if (confined.absPath.toLowerCase() === tracePath.toLowerCase()) return 'reserved for the raw response trace';
    if (confined.relativePath.toLowerCase().endsWith(LAYOUT.SIDECAR_SUFFIX)) {
        return `reserved sidecar suffix ${LAYOUT.SIDECAR_SUFFIX}`;
    }
    return null;
}

export interface ArtifactSinkDeps {
    projectRoot: string;
    ledger: Ledger;
    sessionArtifacts: SessionArtifactList;
    transcript: Transcript;
}

export class ArtifactSink {
    constructor(private readonly deps: ArtifactSinkDeps) {}

    quarantineDirFor(stepId: string): string {
        return path.join(this.deps.projectRoot, LAYOUT.ARTIFACTS_DIR, stepId);
    }

    apply(stepId: string, rawText: string, records: readonly ResponseRecord[]): SinkResult {
        const quarantineDir = this.quarantineDirFor(stepId);
        const tracePath = path.join(quarantineDir, LAYOUT.RAW_TRACE_FILE);
        fs.mkdirSync(quarantineDir, { recursive: true });
        fs.writeFileSync(tracePath, rawText, 'utf8');

        const result: SinkResult = {
            stepId,
            quarantineDir,
            tracePath,
            written: [],
            blocked: [],
            failed: [],
            nextAction: null,
        };

        for (const record of records) {
            switch (record.kind) {
                case 'thought':
                    this.deps.transcript.print(`Thought: ${record.text}`);
                    break;
                case 'tool_mention':
                    this.deps.transcript.print(`Tool mentioned: ${record.name}`);
                    break;
                case 'message':
                    this.deps.transcript.print(record.text);
                    break;
                case 'artifact_batch':
                    for (const spec of record.artifacts) {
                        this.writeOne(stepId, quarantineDir, spec, result);
                    }
                    break;
                case 'next_action':
                    break;
                default: {
                    const _exhaustive: never = record;
                    log.warn('Unknown record kind', { record: _exhaustive });
                }
            }
        }

        const { action, ignored } = selectNextAction(records);
        if (ignored > 0) {
            log.warn('Multiple next_action records; keeping the first', { ignored });
        }
        result.nextAction = action;

        log.info('Turn materialized', {
            step_id: stepId,
            written: result.written.length,
            blocked: result.blocked.length,
            failed: result.failed.length,
        });
        return result;
    }

    private writeOne(stepId: string, quarantineDir: string, spec: ArtifactSpec, result: SinkResult): void {
        let confined: ConfinedPath;
        try {
            confined = confineToDirectory(quarantineDir, spec.path);
        } catch (e) {
            this.fail(spec.path, e, result);
            return;
        }

        if (!confined.ok) {
            const err = ErrorFactory.artifactPathBlocked(spec.path, quarantineDir, confined.reason);
            this.deps.transcript.diagnostic(err);
            result.blocked.push(err);
            log.warn('Artifact path blocked', { requested_path: spec.path, reason: confined.reason });
            return;
        }

        const reserved = reservedName(confined, result.tracePath);
        if (reserved) {
            const err = ErrorFactory.artifactPathBlocked(spec.path, quarantineDir, reserved);
            this.deps.transcript.diagnostic(err);
            result.blocked.push(err);
            log.warn('Artifact path blocked', { requested_path: spec.path, reason: reserved });
            return;
        }

        const projectRelativePath = toPosix(path.relative(this.deps.projectRoot, confined.absPath));
        try {
            const bytes = Buffer.from(spec.content, 'utf8');
            const sha256 = crypto.createHash('sha256').update(bytes).digest('hex');

            fs.mkdirSync(path.dirname(confined.absPath), { recursive: true });
            fs.writeFileSync(confined.absPath, bytes);

            const sidecar: ArtifactSidecar = {
                requested_path: spec.path,
                operation: spec.operation,
                local_path: projectRelativePath,
                step_id: stepId,
                sha256,
                bytes: bytes.length,
                written_utc: new Date().toISOString(),
            };
            const warnings: string[] = [];
            atomicWriteJsonSync({ filePath: confined.absPath + LAYOUT.SIDECAR_SUFFIX, data: sidecar, warnings });
            for (const w of warnings) log.debug(w);

            this.deps.ledger.logEvent('model', 'artifact_generated', null, [projectRelativePath]);
            this.deps.sessionArtifacts.add(projectRelativePath);

            result.written.push({
                stepId,
                requestedPath: spec.path,
                localPath: confined.absPath,
                relativePath: confined.relativePath,
                projectRelativePath,
                quarantineDir,
                sha256,
            });
            this.deps.transcript.print(`Artifact written: ${projectRelativePath}`);
        } catch (e) {
            this.fail(spec.path, e, result);
        }
    }

    private fail(requestedPath: string, e: unknown, result: SinkResult): void {
        const err = ErrorFactory.artifactWriteFailed(
            requestedPath,
            errnoCode(e),
            e instanceof Error ? e.message : String(e)
        );
        this.deps.transcript.diagnostic(err);
        result.failed.push(err);
        log.error('Artifact write failed', { requested_path: requestedPath, errno: errnoCode(e) ?? 'UNKNOWN' });
    }
}
