/**
 * Review / apply / commit
 *
 * Phase 1 (review): one y/n/abort question per destination file, with a
 * change summary. Any answer other than yes rejects the whole set; nothing
 * is copied until every file is accepted.
 *
 * Phase 2 (merge): copy each accepted artifact from its quarantine dir to the
 * same relative path under the project root. When several turns wrote the
 * same path, the latest write wins.
 *
 * Phase 3 (git): add exactly the applied paths, commit with the instruction
 * as message (a clean tree counts as success), push.
 */

import * as fs from 'fs';
import * as path from 'path';

import { confineToDirectory } from './artifact_sink';
import { GitClient } from './git_client';
import { createLogger } from './logger';
import { ApplyOutcome, ReviewApplyPipeline, ReviewHandoff, WrittenArtifact } from './rebound_types';
import { errnoCode } from './storage';
import { Transcript } from './transcript';

const log = createLogger('apply');

export interface ReviewPrompter {
    ask(question: string): Promise<string>;
}

export type ReviewAnswer = 'yes' | 'no' | 'invalid';

export function parseReviewAnswer(raw: string): ReviewAnswer {
    const a = raw.trim().toLowerCase();
    if (a === 'y' || a === 'yes') return 'yes';
    if (a === 'n' || a === 'no' || a === 'abort') return 'no';
    return 'invalid';
}

function lineCount(s: string): number {
    if (!s) return 0;
    return s.split('\n').length - (s.endsWith('\n') ? 1 : 0);
}

/** One-line description of what applying `artifact` would do to `destPath`. */
export function summarizeChange(destPath: string, newContent: string): string {
    let current: string;
    try {
        current = fs.readFileSync(destPath, 'utf8');
    } catch (e) {
        if (errnoCode(e) === 'ENOENT') {
            return `new file, ${Buffer.byteLength(newContent)} bytes, ${lineCount(newContent)} lines`;
        }
        return `unreadable destination (${errnoCode(e) ?? 'UNKNOWN'})`;
    }

    if (current === newContent) return 'unchanged';
    return (
        `modified, ${Buffer.byteLength(current)} -> ${Buffer.byteLength(newContent)} bytes, ` +
        `${lineCount(current)} -> ${lineCount(newContent)} lines`
    );
}

/** Latest write per relative path, in first-seen order. */
export function collapseArtifacts(artifacts: readonly WrittenArtifact[]): WrittenArtifact[] {
    const byPath = new Map<string, WrittenArtifact>();
    for (const a of artifacts) byPath.set(a.relativePath, a);
    return [...byPath.values()];
}

export interface InteractiveApplyPipelineDeps {
    projectRoot: string;
    prompter: ReviewPrompter;
    git: GitClient;
    transcript: Transcript;
}

export class InteractiveApplyPipeline implements ReviewApplyPipeline {
    constructor(private readonly deps: InteractiveApplyPipelineDeps) {}

    async reviewAndApply(handoff: ReviewHandoff): Promise<ApplyOutcome> {
        const { transcript } = this.deps;
        const artifacts = collapseArtifacts(handoff.artifacts);
        if (artifacts.length === 0) {
            transcript.print('No artifact files to review.');
            return { status: 'NO_CHANGES' };
        }

        // Phase 1: review
        const plan: { artifact: WrittenArtifact; dest: string; rel: string }[] = [];
        transcript.print(`Reviewing ${artifacts.length} artifact file(s) from step ${handoff.stepId}`);

        for (const artifact of artifacts) {
            const dest = confineToDirectory(this.deps.projectRoot, artifact.relativePath);
            if (!dest.ok) {
                transcript.error(`Refusing to apply ${artifact.relativePath}: ${dest.reason}`);
                return { status: 'FAILED', reason: `unsafe destination ${artifact.relativePath}` };
            }

            let content: string;
            try {
                content = fs.readFileSync(artifact.localPath, 'utf8');
            } catch (e) {
                transcript.error(`Cannot read artifact file ${artifact.localPath}: ${e instanceof Error ? e.message : String(e)}`);
                return { status: 'FAILED', reason: `unreadable artifact ${artifact.projectRelativePath}` };
            }

            transcript.print(`[${dest.relativePath}] ${summarizeChange(dest.absPath, content)}`);

            const accepted = await this.confirm(`[${dest.relativePath}] Apply this change? [y/n/abort]: `);
            if (!accepted) {
                transcript.print('Aborted: No changes were applied.');
                return { status: 'REJECTED', reason: `declined at ${dest.relativePath}` };
            }
            plan.push({ artifact, dest: dest.absPath, rel: dest.relativePath });
        }

        // Phase 2: merge
        try {
            for (const item of plan) {
                fs.mkdirSync(path.dirname(item.dest), { recursive: true });
                fs.copyFileSync(item.artifact.localPath, item.dest);
            }
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            transcript.error(`Copy failed: ${message}`);
            return { status: 'FAILED', reason: `copy failed: ${message}` };
        }
        const appliedPaths = plan.map(p => p.rel);
        log.info('Artifacts applied', { count: appliedPaths.length });

        // Phase 3: git
        const { git } = this.deps;
        const added = await git.add(appliedPaths);
        if (added.code !== 0) {
            transcript.error(`[Git] add failed (rc=${added.code}). ${added.stderr.trim()}`);
            return { status: 'FAILED', reason: 'git add failed' };
        }

        const commit = await git.commit(handoff.instruction.trim());
        if (!commit.ok) {
            transcript.error(`[Git] Commit failed. ${commit.details}`);
            return { status: 'FAILED', reason: 'git commit failed' };
        }
        if (commit.nothingToCommit) {
            transcript.print('[Git] Nothing to commit (clean tree). Proceeding...');
        }

        const pushed = await git.push();
        if (pushed.code !== 0) {
            transcript.error(`[Git] push failed (rc=${pushed.code}). ${pushed.stderr.trim()}`);
            return { status: 'FAILED', reason: 'git push failed' };
        }

        transcript.print('Success: Changes applied and pushed.');
        return { status: 'COMMITTED', appliedPaths };
    }

    private async confirm(question: string): Promise<boolean> {
        for (;;) {
            const raw = await this.deps.prompter.ask(question);
            this.deps.transcript.exchange(question, raw);
            const answer = parseReviewAnswer(raw);
            if (answer === 'yes') return true;
            if (answer === 'no') return false;
            this.deps.transcript.print("Please answer with 'y', 'n', or 'abort'.");
        }
    }
}
