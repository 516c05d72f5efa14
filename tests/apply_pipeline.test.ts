import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
    InteractiveApplyPipeline,
    ReviewPrompter,
    collapseArtifacts,
    parseReviewAnswer,
    summarizeChange,
} from '../src/apply_pipeline';
import { CommitResult, GitClient, GitResult, isNothingToCommit } from '../src/git_client';
import type { ReviewHandoff, WrittenArtifact } from '../src/rebound_types';
import { MemoryTranscript } from '../src/transcript';

const OK: GitResult = { code: 0, stdout: '', stderr: '' };

class FakeGit implements GitClient {
    readonly calls: string[] = [];
    addResult: GitResult = OK;
    commitResult: CommitResult = { ok: true, nothingToCommit: false, details: '' };
    pushResult: GitResult = OK;

    async add(paths: readonly string[]): Promise<GitResult> {
        this.calls.push(`add ${paths.join(' ')}`);
        return this.addResult;
    }
    async commit(message: string): Promise<CommitResult> {
        this.calls.push(`commit ${message}`);
        return this.commitResult;
    }
    async push(): Promise<GitResult> {
        this.calls.push('push');
        return this.pushResult;
    }
    async status(): Promise<GitResult> {
        return OK;
    }
    async lastCommit(): Promise<GitResult> {
        return OK;
    }
}

class ScriptedPrompter implements ReviewPrompter {
    readonly questions: string[] = [];
    constructor(private readonly answers: string[]) {}
    async ask(question: string): Promise<string> {
        this.questions.push(question);
        return this.answers.shift() ?? 'n';
    }
}

function setup(answers: string[]) {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'apply-pipeline-'));
    const git = new FakeGit();
    const prompter = new ScriptedPrompter(answers);
    const transcript = new MemoryTranscript();
    const pipeline = new InteractiveApplyPipeline({ projectRoot: root, prompter, git, transcript });
    return { root, git, prompter, transcript, pipeline };
}

function quarantined(root: string, stepId: string, rel: string, content: string): WrittenArtifact {
    const qdir = path.join(root, 'artifacts', stepId);
    const localPath = path.join(qdir, rel);
    fs.mkdirSync(path.dirname(localPath), { recursive: true });
    fs.writeFileSync(localPath, content);
    return {
        stepId,
        requestedPath: rel,
        localPath,
        relativePath: rel,
        projectRelativePath: `artifacts/${stepId}/${rel}`,
        quarantineDir: qdir,
        sha256: 'unused',
    };
}

function handoff(artifacts: WrittenArtifact[], instruction = '  add greeting  '): ReviewHandoff {
    const last = artifacts[artifacts.length - 1];
    return {
        sessionId: '2026-02-02',
        stepId: last ? last.stepId : 'step_20260202T000000_000000',
        instruction,
        artifacts,
        quarantineDir: last ? last.quarantineDir : '',
        termination: 'MODEL_STOPPED',
    };
}

test('parseReviewAnswer', () => {
    assert.equal(parseReviewAnswer(' Y '), 'yes');
    assert.equal(parseReviewAnswer('yes'), 'yes');
    assert.equal(parseReviewAnswer('n'), 'no');
    assert.equal(parseReviewAnswer('ABORT'), 'no');
    assert.equal(parseReviewAnswer('maybe'), 'invalid');
    assert.equal(parseReviewAnswer(''), 'invalid');
});

test('summarizeChange describes new, unchanged and modified files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'summarize-'));
    try {
        const dest = path.join(dir, 'f.txt');
        assert.equal(summarizeChange(dest, 'a\nb\n'), 'new file, 4 bytes, 2 lines');
        fs.writeFileSync(dest, 'a\nb\n');
        assert.equal(summarizeChange(dest, 'a\nb\n'), 'unchanged');
        assert.equal(summarizeChange(dest, 'a\nb\nc'), 'modified, 4 -> 5 bytes, 2 -> 3 lines');
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('collapseArtifacts keeps the latest write per path in first-seen order', () => {
    const mk = (stepId: string, rel: string): WrittenArtifact => ({
        stepId,
        requestedPath: rel,
        localPath: `/q/${stepId}/${rel}`,
        relativePath: rel,
        projectRelativePath: `artifacts/${stepId}/${rel}`,
        quarantineDir: `/q/${stepId}`,
        sha256: '',
    });
    const out = collapseArtifacts([mk('s1', 'a'), mk('s1', 'b'), mk('s2', 'a')]);
    assert.deepEqual(out.map(a => `${a.stepId}:${a.relativePath}`), ['s2:a', 's1:b']);
});

test('isNothingToCommit recognizes a clean tree', () => {
    assert.equal(isNothingToCommit({ code: 1, stdout: 'nothing to commit, working tree clean', stderr: '' }), true);
    assert.equal(isNothingToCommit({ code: 1, stdout: '', stderr: 'fatal: bad' }), false);
    assert.equal(isNothingToCommit({ code: 0, stdout: 'nothing to commit', stderr: '' }), false);
});

test('an accepted set is copied, staged, committed with the instruction and pushed', async () => {
    const { root, git, prompter, transcript, pipeline } = setup(['y', 'yes']);
    try {
        const a = quarantined(root, 'step_20260202T000001_aaaaaa', 'src/hello.ts', 'hello v1');
        const b = quarantined(root, 'step_20260202T000001_aaaaaa', 'README.md', 'readme');
        const a2 = quarantined(root, 'step_20260202T000002_bbbbbb', 'src/hello.ts', 'hello v2');

        const outcome = await pipeline.reviewAndApply(handoff([a, b, a2]));
        assert.deepEqual(outcome, { status: 'COMMITTED', appliedPaths: ['src/hello.ts', 'README.md'] });

        assert.equal(fs.readFileSync(path.join(root, 'src', 'hello.ts'), 'utf8'), 'hello v2');
        assert.equal(fs.readFileSync(path.join(root, 'README.md'), 'utf8'), 'readme');
        assert.deepEqual(git.calls, ['add src/hello.ts README.md', 'commit add greeting', 'push']);
        assert.deepEqual(prompter.questions, [
            '[src/hello.ts] Apply this change? [y/n/abort]: ',
            '[README.md] Apply this change? [y/n/abort]: ',
        ]);
        assert.ok(transcript.lines.includes('[WRAPPER] >> [src/hello.ts] new file, 8 bytes, 1 lines'));
        assert.equal(transcript.lines[transcript.lines.length - 1], '[WRAPPER] >> Success: Changes applied and pushed.');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('one rejection applies nothing and skips git', async () => {
    const { root, git, pipeline, transcript } = setup(['y', 'abort']);
    try {
        const a = quarantined(root, 'step_20260202T000001_aaaaaa', 'one.txt', '1');
        const b = quarantined(root, 'step_20260202T000001_aaaaaa', 'two.txt', '2');

        const outcome = await pipeline.reviewAndApply(handoff([a, b]));
        assert.deepEqual(outcome, { status: 'REJECTED', reason: 'declined at two.txt' });
        assert.equal(fs.existsSync(path.join(root, 'one.txt')), false);
        assert.deepEqual(git.calls, []);
        assert.equal(transcript.lines[transcript.lines.length - 1], '[WRAPPER] >> Aborted: No changes were applied.');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('invalid answers are asked again and recorded in the transcript', async () => {
    const { root, prompter, pipeline, transcript } = setup(['what', 'n']);
    try {
        const a = quarantined(root, 'step_20260202T000001_aaaaaa', 'x.txt', 'x');
        const outcome = await pipeline.reviewAndApply(handoff([a]));
        assert.equal(outcome.status, 'REJECTED');
        assert.equal(prompter.questions.length, 2);
        assert.ok(transcript.lines.includes('[USER]    << what'));
        assert.ok(transcript.lines.includes("[WRAPPER] >> Please answer with 'y', 'n', or 'abort'."));
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('an empty artifact set is NO_CHANGES', async () => {
    const { root, git, pipeline } = setup([]);
    try {
        assert.deepEqual(await pipeline.reviewAndApply(handoff([])), { status: 'NO_CHANGES' });
        assert.deepEqual(git.calls, []);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('git failures surface as FAILED; a clean tree still pushes', async () => {
    const failing = setup(['y']);
    try {
        failing.git.commitResult = { ok: false, nothingToCommit: false, details: 'hook rejected' };
        const a = quarantined(failing.root, 'step_20260202T000001_aaaaaa', 'x.txt', 'x');
        assert.deepEqual(await failing.pipeline.reviewAndApply(handoff([a])), { status: 'FAILED', reason: 'git commit failed' });
        assert.deepEqual(failing.git.calls, ['add x.txt', 'commit add greeting']);
    } finally {
        fs.rmSync(failing.root, { recursive: true, force: true });
    }

    const clean = setup(['y']);
    try {
        clean.git.commitResult = { ok: true, nothingToCommit: true, details: '' };
        const a = quarantined(clean.root, 'step_20260202T000001_aaaaaa', 'x.txt', 'x');
        const outcome = await clean.pipeline.reviewAndApply(handoff([a]));
        assert.equal(outcome.status, 'COMMITTED');
        assert.deepEqual(clean.git.calls, ['add x.txt', 'commit add greeting', 'push']);
        assert.ok(clean.transcript.lines.includes('[WRAPPER] >> [Git] Nothing to commit (clean tree). Proceeding...'));
    } finally {
        fs.rmSync(clean.root, { recursive: true, force: true });
    }
});

test('a push failure is FAILED after files were applied', async () => {
    const { root, git, pipeline } = setup(['y']);
    try {
        git.pushResult = { code: 128, stdout: '', stderr: 'no upstream' };
        const a = quarantined(root, 'step_20260202T000001_aaaaaa', 'x.txt', 'x');
        assert.deepEqual(await pipeline.reviewAndApply(handoff([a])), { status: 'FAILED', reason: 'git push failed' });
        assert.equal(fs.readFileSync(path.join(root, 'x.txt'), 'utf8'), 'x');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});
