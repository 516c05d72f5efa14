/**
 * Session artifact tracking and the per-session integrity manifest.
 *
 * The list holds project-root relative paths of every artifact written since
 * the last manifest. generateManifest() hashes what still exists, writes
 * manifests/session_<id>_manifest.json atomically and clears the list
 * whether or not the write succeeded.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

import { LAYOUT } from './config';
import { createLogger } from './logger';
import { Manifest, ManifestEntry } from './rebound_types';
import { atomicWriteJsonSync, errnoCode } from './storage';

const log = createLogger('manifest');

export function sha256File(filePath: string): string {
    return crypto.createHash('sha256').update(fs.readFileSync(filePath)).digest('hex');
}

export function manifestFileName(sessionId: string): string {
    return `session_${sessionId}_manifest.json`;
}

export interface ManifestResult {
    /** project-root relative path, or null when the manifest could not be written */
    manifestPath: string | null;
    manifest: Manifest;
}

export class SessionArtifactList {
    private items: string[] = [];

    constructor(readonly projectRoot: string) {}

    add(projectRelativePath: string): void {
        if (projectRelativePath) this.items.push(projectRelativePath);
    }

    entries(): readonly string[] {
        return [...this.items];
    }

    get size(): number {
        return this.items.length;
    }

    generateManifest(sessionId: string): ManifestResult {
        const id = sessionId.trim() || 'unknown';
        const artifacts: ManifestEntry[] = [];
        const seen = new Set<string>();

        for (const rel of this.items) {
            if (seen.has(rel)) continue;
            seen.add(rel);

            const abs = path.resolve(this.projectRoot, rel);
            try {
                if (!fs.statSync(abs).isFile()) continue;
                artifacts.push({ path: rel, sha256: sha256File(abs) });
            } catch (e) {
                if (errnoCode(e) !== 'ENOENT') {
                    log.error('Manifest hashing failed', { path: rel, errno: errnoCode(e) ?? 'UNKNOWN' });
                }
            }
        }

        const manifest: Manifest = {
            session_id: id,
            timestamp: new Date().toISOString(),
            artifacts,
        };

        const rel = path.join(LAYOUT.MANIFESTS_DIR, manifestFileName(id));
        const warnings: string[] = [];
        try {
            atomicWriteJsonSync({ filePath: path.join(this.projectRoot, rel), data: manifest, warnings });
            for (const w of warnings) log.debug(w);
            log.info('Manifest written', { path: rel, artifacts: artifacts.length });
            return { manifestPath: rel, manifest };
        } catch (e) {
            log.error('Manifest write failed', {
                path: rel,
                errno: errnoCode(e) ?? 'UNKNOWN',
                message: e instanceof Error ? e.message : String(e),
            });
            return { manifestPath: null, manifest };
        } finally {
            this.items = [];
        }
    }
}
