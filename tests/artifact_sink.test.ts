import test from 'node:test';
import assert from 'node:assert/strict';
import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ArtifactSink, confineToDirectory } from '../src/artifact_sink';
import { Ledger } from '../src/ledger';
import { parseResponse } from '../src/response_parser';
import type { ArtifactSidecar } from '../src/rebound_types';
import { SessionArtifactList } from '../src/session_artifacts';
import { MemoryTranscript } from '../src/transcript';

const STEP = 'step_20260101T120000_abcdef';

function setup() {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'artifact-sink-'));
    const ledger = new Ledger(root);
    const sessionArtifacts = new SessionArtifactList(root);
    const transcript = new MemoryTranscript();
    const sink = new ArtifactSink({ projectRoot: root, ledger, sessionArtifacts, transcript });
    return { root, ledger, sessionArtifacts, transcript, sink };
}

test('confineToDirectory accepts nested relative paths and rejects escapes', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'confine-'));
    try {
        const ok = confineToDirectory(base, 'src\\lib/util.ts');
        assert.ok(ok.ok);
        if (ok.ok) {
            assert.equal(ok.relativePath, 'src/lib/util.ts');
            assert.equal(ok.absPath, path.join(base, 'src', 'lib', 'util.ts'));
        }

        assert.deepEqual(confineToDirectory(base, ''), { ok: false, reason: 'empty path' });
        assert.deepEqual(confineToDirectory(base, 'a\0b'), { ok: false, reason: 'NUL byte in path' });
        assert.deepEqual(confineToDirectory(base, '/etc/passwd'), { ok: false, reason: 'absolute path' });
        assert.deepEqual(confineToDirectory(base, 'C:\\x.txt'), { ok: false, reason: 'absolute path' });
        assert.deepEqual(confineToDirectory(base, '../outside.txt'), { ok: false, reason: 'escapes quarantine directory' });
        assert.deepEqual(confineToDirectory(base, 'a/../../x'), { ok: false, reason: 'escapes quarantine directory' });
        assert.deepEqual(confineToDirectory(base, '.'), { ok: false, reason: 'escapes quarantine directory' });
    } finally {
        fs.rmSync(base, { recursive: true, force: true });
    }
});

test('confineToDirectory rejects a symlinked component', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'confine-link-'));
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), 'confine-out-'));
    try {
        fs.symlinkSync(outside, path.join(base, 'link'));
        assert.deepEqual(confineToDirectory(base, 'link/file.txt'), { ok: false, reason: 'symlink component link' });
    } finally {
        fs.rmSync(base, { recursive: true, force: true });
        fs.rmSync(outside, { recursive: true, force: true });
    }
});

test('apply writes artifacts, sidecars, the raw trace and ledger events', () => {
    const { root, ledger, sessionArtifacts, transcript, sink } = setup();
    try {
        const raw = JSON.stringify({
            thought_process: 'plan',
            message: 'hello operator',
            artifacts: [{ path: 'src/app.ts', content: 'export const x = 1;\n' }],
        });
        const result = sink.apply(STEP, raw, parseResponse(raw).records);

        const qdir = path.join(root, 'artifacts', STEP);
        assert.equal(result.quarantineDir, qdir);
        assert.equal(fs.readFileSync(path.join(qdir, 'raw_response_trace.txt'), 'utf8'), raw);
        assert.equal(fs.readFileSync(path.join(qdir, 'src', 'app.ts'), 'utf8'), 'export const x = 1;\n');

        const sha = crypto.createHash('sha256').update('export const x = 1;\n').digest('hex');
        assert.equal(result.written.length, 1);
        assert.deepEqual(result.written[0], {
            stepId: STEP,
            requestedPath: 'src/app.ts',
            localPath: path.join(qdir, 'src', 'app.ts'),
            relativePath: 'src/app.ts',
            projectRelativePath: `artifacts/${STEP}/src/app.ts`,
            quarantineDir: qdir,
            sha256: sha,
        });

        const sidecar: ArtifactSidecar = JSON.parse(fs.readFileSync(path.join(qdir, 'src', 'app.ts.meta.json'), 'utf8'));
        assert.equal(sidecar.sha256, sha);
        assert.equal(sidecar.operation, 'create');
        assert.equal(sidecar.bytes, 20);
        assert.equal(sidecar.local_path, `artifacts/${STEP}/src/app.ts`);

        const events = ledger.readEvents();
        assert.equal(events.length, 1);
        assert.equal(events[0].action_type, 'artifact_generated');
        assert.equal(events[0].actor, 'model');
        assert.deepEqual(events[0].artifacts_links, [`artifacts/${STEP}/src/app.ts`]);

        assert.deepEqual(sessionArtifacts.entries(), [`artifacts/${STEP}/src/app.ts`]);
        assert.deepEqual(transcript.lines, [
            '[WRAPPER] >> Thought: plan',
            '[WRAPPER] >> hello operator',
            `[WRAPPER] >> Artifact written: artifacts/${STEP}/src/app.ts`,
        ]);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('a blocked path never stops its siblings', () => {
    const { root, ledger, transcript, sink } = setup();
    try {
        const raw = JSON.stringify({
            artifacts: [
                { path: '../../escape.txt', content: 'bad' },
                { path: 'good.txt', content: 'ok' },
            ],
        });
        const result = sink.apply(STEP, raw, parseResponse(raw).records);

        assert.equal(result.blocked.length, 1);
        assert.equal(result.blocked[0].code, 'PATH_VIOLATION');
        assert.equal(result.written.length, 1);
        assert.equal(result.written[0].relativePath, 'good.txt');
        assert.equal(fs.existsSync(path.join(root, 'escape.txt')), false);
        assert.equal(fs.existsSync(path.resolve(root, 'artifacts', STEP, '../../escape.txt')), false);

        assert.deepEqual(transcript.tagged('[SECURITY-BLOCKED]'), [
            '[ERROR]   !! [SECURITY-BLOCKED] Blocked unsafe artifact path: ../../escape.txt (escapes quarantine directory)',
        ]);
        assert.equal(ledger.readEvents().length, 1);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('artifacts cannot take the trace name or the sidecar suffix', () => {
    const { root, sink, transcript } = setup();
    try {
        const raw = JSON.stringify({
            artifacts: [
                { path: 'raw_response_trace.txt', content: 'forged' },
                { path: 'x.txt', content: 'real' },
                { path: 'x.txt.meta.json', content: 'fake sidecar' },
            ],
        });
        const result = sink.apply(STEP, raw, parseResponse(raw).records);

        assert.equal(fs.readFileSync(result.tracePath, 'utf8'), raw);
        assert.deepEqual(result.written.map(w => w.relativePath), ['x.txt']);
        assert.equal(result.blocked.length, 2);

        const sidecar: ArtifactSidecar = JSON.parse(
            fs.readFileSync(path.join(root, 'artifacts', STEP, 'x.txt.meta.json'), 'utf8')
        );
        assert.equal(sidecar.requested_path, 'x.txt');

        assert.deepEqual(transcript.tagged('[SECURITY-BLOCKED]'), [
            '[ERROR]   !! [SECURITY-BLOCKED] Blocked unsafe artifact path: raw_response_trace.txt (reserved for the raw response trace)',
            '[ERROR]   !! [SECURITY-BLOCKED] Blocked unsafe artifact path: x.txt.meta.json (reserved sidecar suffix .meta.json)',
        ]);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('apply surfaces the first next_action', () => {
    const { root, sink } = setup();
    try {
        const raw =
            '{"next_action":{"type":"exec_and_chain","target":"a.js","continuation":"c1"}}' +
            '{"next_action":{"type":"exec_and_chain","target":"b.js"}}';
        const result = sink.apply(STEP, raw, parseResponse(raw).records);
        assert.deepEqual(result.nextAction, { type: 'exec_and_chain', target: 'a.js', args: [], continuation: 'c1' });
        assert.deepEqual(result.written, []);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('a trace is written even for a reply with no records', () => {
    const { root, sink } = setup();
    try {
        const result = sink.apply(STEP, 'plain prose', []);
        assert.equal(fs.readFileSync(result.tracePath, 'utf8'), 'plain prose');
        assert.equal(result.nextAction, null);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});
