import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { LockHeldError, acquireWriterLock, atomicWriteJsonSync, errnoCode, releaseWriterLock } from '..';

function tmpLockPath(): { dir: string; lockPath: string } {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'writer-lock-'));
    return { dir, lockPath: path.join(dir, 'ledger', '.writer.lock') };
}

test('lock is exclusive and records the holder', async () => {
    const { dir, lockPath } = tmpLockPath();
    try {
        const warnings: string[] = [];
        const handle = await acquireWriterLock({ lockPath, timeoutMs: 100, warnings, identity: { tool: 'test' } });

        const holder: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
        assert.deepEqual(Object.keys(Object(holder)).sort(), ['pid', 'started_ms', 'started_utc', 'tool']);

        await assert.rejects(
            acquireWriterLock({ lockPath, timeoutMs: 100, warnings, identity: {} }),
            (e: unknown) => e instanceof LockHeldError && e.holder?.pid === process.pid && e.lockPath === lockPath
        );
        assert.ok(warnings.some(w => w.startsWith('LOCK_RETRY')));

        releaseWriterLock(handle);
        assert.equal(fs.existsSync(lockPath), false);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a lock left by a dead process is taken over', async () => {
    const { dir, lockPath } = tmpLockPath();
    try {
        fs.mkdirSync(path.dirname(lockPath), { recursive: true });
        // pid far above any real pid_max
        fs.writeFileSync(lockPath, JSON.stringify({ pid: 2 ** 30, started_ms: Date.now() }));

        const warnings: string[] = [];
        const handle = await acquireWriterLock({ lockPath, timeoutMs: 100, warnings, identity: {} });
        assert.ok(warnings.some(w => w.startsWith('STALE_LOCK(PID_DEAD)')));
        releaseWriterLock(handle);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('an old lock is stale by age; a corrupt lock is replaced', async () => {
    const { dir, lockPath } = tmpLockPath();
    try {
        fs.mkdirSync(path.dirname(lockPath), { recursive: true });
        fs.writeFileSync(lockPath, JSON.stringify({ pid: process.pid, started_ms: Date.now() - 60_000 }));

        const warnings: string[] = [];
        const aged = await acquireWriterLock({ lockPath, timeoutMs: 100, warnings, identity: {}, staleTtlMs: 1_000 });
        assert.ok(warnings.some(w => w.startsWith('STALE_LOCK(AGE)')));
        releaseWriterLock(aged);

        fs.writeFileSync(lockPath, '{not json');
        const replaced = await acquireWriterLock({ lockPath, timeoutMs: 100, warnings: [], identity: {} });
        releaseWriterLock(replaced);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('releasing twice is harmless', async () => {
    const { dir, lockPath } = tmpLockPath();
    try {
        const handle = await acquireWriterLock({ lockPath, timeoutMs: 100, warnings: [], identity: {} });
        releaseWriterLock(handle);
        assert.doesNotThrow(() => releaseWriterLock(handle));
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('atomicWriteJsonSync writes pretty JSON and leaves no temp files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'atomic-write-'));
    try {
        const target = path.join(dir, 'nested', 'out.json');
        atomicWriteJsonSync({ filePath: target, data: { a: 1 }, warnings: [] });
        assert.equal(fs.readFileSync(target, 'utf8'), '{\n  "a": 1\n}');
        assert.deepEqual(fs.readdirSync(path.dirname(target)), ['out.json']);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('errnoCode reads string codes only', () => {
    assert.equal(errnoCode(Object.assign(new Error('x'), { code: 'ENOENT' })), 'ENOENT');
    assert.equal(errnoCode({ code: 5 }), undefined);
    assert.equal(errnoCode(null), undefined);
    assert.equal(errnoCode('ENOENT'), undefined);
});
