/**
 * Context Builder: the read-only project pack sent with the first turn.
 *
 * Inclusion order: specs/*.md, impl-docs/**\/*.md, then src/** code files.
 * Scope picks which classes are included. File bodies are cached by
 * path + mtime + size so repeated sequences in one REPL session re-read only
 * what changed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';

import { CONTEXT } from './config';
import { createLogger } from './logger';
import { ContextScope } from './rebound_types';
import { errnoCode } from './storage';

const log = createLogger('context');

export const CONTEXT_HEADER = '=== PROJECT CONTEXT (READ-ONLY) ===';

const SKIPPED_DIRS = new Set(['node_modules', 'dist', 'build', 'coverage']);

type DocClass = 'specs' | 'docs' | 'code';

const SCOPE_CLASSES: Record<ContextScope, DocClass[]> = {
    full: ['specs', 'docs', 'code'],
    code: ['code'],
    specs: ['specs', 'docs'],
    minimal: [],
};

export interface BuiltContext {
    scope: ContextScope;
    text: string;
    /** project-relative paths, in inclusion order */
    files: string[];
    tokens: number;
}

export type AttachmentResult =
    | { ok: true; text: string; attached: string[] }
    | { ok: false; path: string; message: string };

/**
 * Conservative token estimate: ~3.3 chars/token for code and JSON, with a
 * word-count floor.
 */
export function estimateTokens(text: string): number {
    if (!text) return 0;
    const words = text.split(/\s+/).filter(Boolean).length;
    return Math.max(Math.ceil(text.length / 3.3), Math.ceil(words * 1.3));
}

// shared across builders: keys carry mtime and size, so stale entries never match
const fileCache = new LRUCache<string, string>({
    maxSize: CONTEXT.CACHE_MAX_BYTES,
    sizeCalculation: (s: string) => Math.max(1, s.length),
});

function isSkippedSegment(name: string): boolean {
    return name.startsWith('.') || name.startsWith('__') || SKIPPED_DIRS.has(name);
}

function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}

export class ContextBuilder {
    private readonly codeExtensions: Set<string>;

    constructor(
        readonly projectRoot: string,
        codeExtensions: readonly string[] = CONTEXT.CODE_EXTENSIONS,
        private readonly maxFileBytes: number = CONTEXT.MAX_FILE_BYTES
    ) {
        this.codeExtensions = new Set(codeExtensions.map(e => e.toLowerCase()));
    }

    build(scope: ContextScope): BuiltContext {
        const files: string[] = [];
        for (const cls of SCOPE_CLASSES[scope]) {
            files.push(...this.collect(cls));
        }

        const parts = [CONTEXT_HEADER, ...files.map(rel => this.renderFile(rel))];
        const text = parts.join('\n\n');
        const tokens = estimateTokens(text);

        log.info('Context built', { scope, files: files.length, tokens });
        return { scope, text, files, tokens };
    }

    /**
     * Read `-f` attachments (relative to `cwd`). The first unreadable file
     * aborts the whole set.
     */
    readAttachments(filePaths: readonly string[], cwd: string = this.projectRoot): AttachmentResult {
        const blocks: string[] = [];
        const attached: string[] = [];

        for (const fp of filePaths) {
            let content: string;
            try {
                content = fs.readFileSync(path.resolve(cwd, fp), 'utf8');
            } catch (e) {
                const code = errnoCode(e);
                const message = code === 'ENOENT'
                    ? `Attached file not found: ${fp}`
                    : `Failed to read attached file '${fp}': ${e instanceof Error ? e.message : String(e)}`;
                return { ok: false, path: fp, message };
            }
            attached.push(fp);
            blocks.push(`--- ATTACHED FILE: ${fp} ---\n${content}\n`);
        }

        return { ok: true, text: blocks.join('\n'), attached };
    }

    /* ---------------------------------------------------------------------- */

    private collect(cls: DocClass): string[] {
        switch (cls) {
            case 'specs':
                return this.walk('specs', false).filter(rel => rel.toLowerCase().endsWith('.md'));
            case 'docs':
                return this.walk('impl-docs', true).filter(rel => rel.toLowerCase().endsWith('.md'));
            case 'code':
                return this.walk('src', true).filter(rel => this.codeExtensions.has(path.extname(rel).toLowerCase()));
        }
    }

    private walk(relDir: string, recursive: boolean): string[] {
        const out: string[] = [];
        const visit = (rel: string): void => {
            let entries: fs.Dirent[];
            try {
                entries = fs.readdirSync(path.join(this.projectRoot, rel), { withFileTypes: true });
            } catch (e) {
                if (errnoCode(e) === 'ENOENT' || errnoCode(e) === 'ENOTDIR') return;
                throw e;
            }
            entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

            for (const ent of entries) {
                if (isSkippedSegment(ent.name)) continue;
                const child = path.join(rel, ent.name);
                if (ent.isDirectory()) {
                    if (recursive) visit(child);
                } else if (ent.isFile()) {
                    out.push(toPosix(child));
                }
            }
        };
        visit(relDir);
        return out;
    }

    private renderFile(rel: string): string {
        const abs = path.join(this.projectRoot, rel);
        try {
            const st = fs.statSync(abs);
            if (st.size > this.maxFileBytes) {
                return `<file path='${rel}'>[SKIPPED: ${st.size} bytes exceeds ${this.maxFileBytes}]</file>`;
            }

            const key = `${abs}:${st.mtimeMs}:${st.size}`;
            let content = fileCache.get(key);
            if (content === undefined) {
                content = fs.readFileSync(abs, 'utf8');
                fileCache.set(key, content);
            }
            return `<file path='${rel}'>\n${content}\n</file>`;
        } catch (e) {
            return `<file path='${rel}'>[ERROR READING FILE: ${e instanceof Error ? e.message : String(e)}]</file>`;
        }
    }
}

/** Instruction with attachment blocks appended, separated by one blank line. */
export function withAttachments(instruction: string, attachmentText: string): string {
    if (!attachmentText) return instruction;
    return `${instruction.trimEnd()}\n\n${attachmentText.trimStart()}`;
}
