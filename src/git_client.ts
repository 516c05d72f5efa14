/**
 * Git plumbing for the apply pipeline: stage explicit paths, commit, push.
 * Commands run through execFile (no shell) in the project root and never
 * throw; callers interpret the result.
 */

import { execFile } from 'child_process';

import { createLogger } from './logger';
import { errnoCode } from './storage';

const log = createLogger('git');

export interface GitResult {
    code: number;
    stdout: string;
    stderr: string;
}

export interface CommitResult {
    ok: boolean;
    /** true when git reported a clean tree and the commit was skipped */
    nothingToCommit: boolean;
    details: string;
}

export interface GitClient {
    add(paths: readonly string[]): Promise<GitResult>;
    commit(message: string): Promise<CommitResult>;
    push(): Promise<GitResult>;
    status(): Promise<GitResult>;
    lastCommit(): Promise<GitResult>;
}

export function isNothingToCommit(r: GitResult): boolean {
    if (r.code !== 1) return false;
    const combined = `${r.stdout}\n${r.stderr}`.toLowerCase();
    return combined.includes('nothing to commit') || combined.includes('working tree clean');
}

export class ShellGitClient implements GitClient {
    constructor(private readonly cwd: string, private readonly binary = 'git') {}

    run(args: readonly string[]): Promise<GitResult> {
        return new Promise<GitResult>((resolve) => {
            execFile(this.binary, [...args], { cwd: this.cwd, maxBuffer: 16 * 1024 * 1024 }, (err, stdout, stderr) => {
                if (!err) {
                    resolve({ code: 0, stdout, stderr });
                    return;
                }
                const missing = errnoCode(err) === 'ENOENT';
                const code = typeof err.code === 'number' ? err.code : missing ? 127 : 1;
                const detail = missing ? 'git executable not found' : stderr;
                log.debug('git command failed', { args: args.join(' '), code });
                resolve({ code, stdout, stderr: detail });
            });
        });
    }

    add(paths: readonly string[]): Promise<GitResult> {
        return this.run(['add', '--', ...paths]);
    }

    async commit(message: string): Promise<CommitResult> {
        const r = await this.run(['commit', '-m', message]);
        if (r.code === 0) return { ok: true, nothingToCommit: false, details: r.stdout.trim() };
        if (isNothingToCommit(r)) {
            log.warn('Nothing to commit (clean tree); proceeding');
            return { ok: true, nothingToCommit: true, details: r.stdout.trim() };
        }
        return { ok: false, nothingToCommit: false, details: (r.stderr || r.stdout).trim() };
    }

    push(): Promise<GitResult> {
        return this.run(['push']);
    }

    status(): Promise<GitResult> {
        return this.run(['status', '-s']);
    }

    lastCommit(): Promise<GitResult> {
        return this.run(['log', '-1', '--format=%h - %s (%cr)']);
    }
}
