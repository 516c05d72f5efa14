import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { SandboxRunner, SandboxViolation } from '../src/sandbox_runner';
import { errnoCode } from '../src/storage';

function setup(opts: { timeoutMs?: number; maxCaptureBytes?: number } = {}) {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-runner-'));
    const scripts = path.join(root, 'workbench', 'scripts');
    fs.mkdirSync(scripts, { recursive: true });
    const runner = new SandboxRunner({ projectRoot: root, ...opts });
    const write = (rel: string, body: string): void => {
        fs.mkdirSync(path.dirname(path.join(scripts, rel)), { recursive: true });
        fs.writeFileSync(path.join(scripts, rel), body);
    };
    return { root, scripts, runner, write };
}

function violationCode(runner: SandboxRunner, target: string): string | null {
    const v = runner.validate(target);
    return v.ok ? null : v.violation.code;
}

test('validate rejects everything outside the one narrow rule', () => {
    const { root, scripts, runner, write } = setup();
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-outside-'));
    try {
        write('ok.js', '');
        write('tool.sh', '');
        fs.mkdirSync(path.join(scripts, 'dir.js'));
        fs.writeFileSync(path.join(outside, 'evil.js'), '');
        fs.symlinkSync(path.join(outside, 'evil.js'), path.join(scripts, 'link.js'));
        fs.writeFileSync(path.join(root, 'top.js'), '');

        assert.equal(violationCode(runner, 'ok.js'), null);
        assert.equal(violationCode(runner, ''), 'EMPTY_PATH');
        assert.equal(violationCode(runner, '   '), 'EMPTY_PATH');
        assert.equal(violationCode(runner, '/usr/bin/env.js'), 'ABSOLUTE_PATH');
        assert.equal(violationCode(runner, 'C:\\evil.js'), 'ABSOLUTE_PATH');
        assert.equal(violationCode(runner, '../../top.js'), 'OUTSIDE_ROOT');
        assert.equal(violationCode(runner, 'tool.sh'), 'EXTENSION_NOT_ALLOWED');
        assert.equal(violationCode(runner, 'missing.sh'), 'EXTENSION_NOT_ALLOWED');
        assert.equal(violationCode(runner, 'missing.js'), 'NOT_FOUND');
        assert.equal(violationCode(runner, 'dir.js'), 'NOT_A_FILE');
        assert.equal(violationCode(runner, 'link.js'), 'OUTSIDE_ROOT');

        const v = runner.validate('missing.js');
        assert.ok(!v.ok);
        if (!v.ok) assert.equal(v.violation.message, 'Script not found: missing.js');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
        fs.rmSync(outside, { recursive: true, force: true });
    }
});

test('validate reports NOT_FOUND when the scripts root is missing', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-empty-'));
    try {
        const runner = new SandboxRunner({ projectRoot: root });
        assert.equal(violationCode(runner, 'anything.js'), 'NOT_FOUND');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('validate turns unusable paths into violations instead of throwing', () => {
    const { root, runner } = setup();
    try {
        const long = 'x'.repeat(300) + '.js';
        const v = runner.validate(long);
        assert.ok(!v.ok);
        if (!v.ok) {
            assert.equal(v.violation.code, 'INVALID_PATH');
            assert.equal(v.violation.message, `Invalid script path: ${long} (ENAMETOOLONG)`);
        }

        const nul = runner.validate('a\u0000b.js');
        assert.ok(!nul.ok);
        if (!nul.ok) {
            assert.equal(nul.violation.code, 'INVALID_PATH');
            assert.equal(nul.violation.message, 'Script path contains a NUL byte');
        }
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('run throws SandboxViolation and never spawns for a blocked target', async () => {
    const { root, runner } = setup();
    try {
        await assert.rejects(
            runner.run('../../etc/passwd.js'),
            (e: unknown) => e instanceof SandboxViolation && e.code === 'OUTSIDE_ROOT'
        );
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('run captures stdout, stderr and the exit code, with cwd at the project root', async () => {
    const { root, runner, write } = setup();
    try {
        write(
            'tools/echo.js',
            [
                "process.stdout.write('args=' + process.argv.slice(2).join(',') + '\\n');",
                "process.stdout.write('cwd=' + process.cwd() + '\\n');",
                "process.stderr.write('warned\\n');",
                'process.exitCode = 3;',
            ].join('\n')
        );

        const r = await runner.run('tools/echo.js', ['a b', '--flag']);
        assert.equal(r.exitCode, 3);
        assert.equal(r.stdout, `args=a b,--flag\ncwd=${fs.realpathSync(root)}\n`);
        assert.equal(r.stderr, 'warned\n');
        assert.equal(r.timedOut, false);
        assert.equal(r.truncated, false);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('a script past its timeout is killed and reports 124', async () => {
    const { root, runner, write } = setup({ timeoutMs: 300 });
    try {
        write('hang.js', 'setInterval(() => {}, 1000);\n');

        const r = await runner.run('hang.js');
        assert.equal(r.exitCode, 124);
        assert.equal(r.timedOut, true);
        assert.equal(r.stderr, '[SANDBOX] Script timed out after 0.3s');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('the timeout holds even when a grandchild keeps the output pipes open', async () => {
    const { root, runner, write } = setup({ timeoutMs: 300 });
    let grandchild = 0;
    try {
        write(
            'fork.js',
            [
                "const { spawn } = require('child_process');",
                "const g = spawn(process.execPath, ['-e', 'setTimeout(() => {}, 8000)'], { stdio: 'inherit' });",
                "process.stdout.write(g.pid + '\\n');",
                'setInterval(() => {}, 1000);',
            ].join('\n')
        );

        const started = Date.now();
        const r = await runner.run('fork.js');
        const elapsed = Date.now() - started;
        grandchild = Number.parseInt(r.stdout, 10);

        assert.equal(r.exitCode, 124);
        assert.equal(r.timedOut, true);
        assert.ok(elapsed < 3000, `run took ${elapsed}ms`);
    } finally {
        if (grandchild > 0) {
            try {
                process.kill(grandchild, 'SIGKILL');
            } catch (e) {
                if (errnoCode(e) !== 'ESRCH') throw e;
            }
        }
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('output beyond the capture cap is truncated with a note', async () => {
    const { root, runner, write } = setup({ maxCaptureBytes: 10 });
    try {
        write('loud.js', "process.stdout.write('x'.repeat(100));\n");

        const r = await runner.run('loud.js');
        assert.equal(r.exitCode, 0);
        assert.equal(r.stdout, 'xxxxxxxxxx');
        assert.equal(r.truncated, true);
        assert.equal(r.stderr, '[SANDBOX] Output truncated at 10 bytes per stream');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});
