#!/usr/bin/env node
/**
 * CLI Entry Point: interactive REPL over one project root (the cwd).
 */

import * as readline from 'readline/promises';

import { InteractiveApplyPipeline, ReviewPrompter } from './apply_pipeline';
import { ConfigError, ProjectConfig, loadProjectConfig, resolveApiKey } from './config';
import { ContextBuilder } from './context_builder';
import { ShellGitClient } from './git_client';
import { EditorInstructionSource, InstructionSource } from './instruction_source';
import { Ledger, parseTimeframe } from './ledger';
import { createLogger } from './logger';
import { ModelRouter } from './model_router';
import { ReboundOrchestrator } from './rebound_orchestrator';
import { CONTEXT_SCOPES, ContextScope, isContextScope } from './rebound_types';
import { SandboxRunner, SandboxViolation } from './sandbox_runner';
import { SessionArtifactList } from './session_artifacts';
import { ErrorFactory, formatDiagnostic } from './structured_error';
import { FileTranscript, Transcript } from './transcript';

const log = createLogger('cli');

/* -------------------------------------------------------------------------- */
/* Command-line parsing                                                       */
/* -------------------------------------------------------------------------- */

/**
 * Split a command line into tokens. Single and double quotes group,
 * backslash escapes the next character outside single quotes.
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    let cur = '';
    let inToken = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quote) {
            if (ch === quote) quote = null;
            else if (ch === '\\' && quote === '"' && i + 1 < line.length) cur += line[++i];
            else cur += ch;
            continue;
        }
        if (ch === '"' || ch === "'") {
            quote = ch;
            inToken = true;
        } else if (ch === '\\' && i + 1 < line.length) {
            cur += line[++i];
            inToken = true;
        } else if (/\s/.test(ch)) {
            if (inToken) tokens.push(cur);
            cur = '';
            inToken = false;
        } else {
            cur += ch;
            inToken = true;
        }
    }
    if (quote) throw new Error('No closing quotation');
    if (inToken) tokens.push(cur);
    return tokens;
}

export interface ImplementArgs {
    files: string[];
    scope: ContextScope;
    warnings: string[];
}

/** `implement [-f file]... [--scope s | --scope=s]`; an invalid scope falls back to full. */
export function parseImplementArgs(tokens: readonly string[]): ImplementArgs {
    const out: ImplementArgs = { files: [], scope: 'full', warnings: [] };

    const takeScope = (raw: string): void => {
        const v = raw.trim().toLowerCase();
        if (isContextScope(v)) out.scope = v;
        else out.warnings.push(`Invalid scope '${raw}', using full (expected ${CONTEXT_SCOPES.join(', ')})`);
    };

    for (let i = 0; i < tokens.length; i++) {
        const t = tokens[i];
        if (t === '-f' || t === '--file') {
            const next = tokens[i + 1];
            if (next === undefined) out.warnings.push(`${t} expects a file path`);
            else out.files.push(next);
            i++;
        } else if (t.startsWith('--scope=')) {
            takeScope(t.slice('--scope='.length));
        } else if (t === '--scope') {
            const next = tokens[i + 1];
            if (next === undefined) out.warnings.push('--scope expects a value');
            else takeScope(next);
            i++;
        }
    }
    return out;
}

function formatInt(n: number): string {
    return n.toLocaleString('en-US');
}

/* -------------------------------------------------------------------------- */
/* REPL                                                                       */
/* -------------------------------------------------------------------------- */

class ReboundCLI {
    private readonly rl: readline.Interface;
    private readonly transcript: Transcript;
    private readonly ledger: Ledger;
    private readonly sessionArtifacts: SessionArtifactList;
    private readonly contextBuilder: ContextBuilder;
    private readonly sandbox: SandboxRunner;
    private readonly git: ShellGitClient;
    private readonly instructions: InstructionSource;
    private router: ModelRouter | null = null;

    constructor(private readonly config: ProjectConfig) {
        const root = config.projectRoot;
        this.rl = readline.createInterface({ input: process.stdin, output: process.stdout });
        this.transcript = new FileTranscript(root);
        this.ledger = new Ledger(root);
        this.sessionArtifacts = new SessionArtifactList(root);
        this.contextBuilder = new ContextBuilder(root);
        this.sandbox = new SandboxRunner({ projectRoot: root, timeoutMs: config.sandboxTimeoutMs });
        this.git = new ShellGitClient(root);
        this.instructions = new EditorInstructionSource(msg => this.transcript.print(msg));
    }

    private async ask(question: string): Promise<string> {
        const answer = await this.rl.question(question);
        this.transcript.exchange(question, answer);
        return answer;
    }

    async start(): Promise<void> {
        this.transcript.print('--- REBOUND KERNEL ---');
        this.transcript.print(`Project: ${this.config.projectName} (${this.config.slug} v${this.config.version})`);
        this.transcript.print(`Model: ${this.config.modelId}, max loops: ${this.config.maxLoops}`);

        let closed = false;
        this.rl.on('close', () => { closed = true; });

        while (!closed) {
            let line: string;
            try {
                line = await this.ask(`[${this.config.projectRoot}]\nCommand (implement, exec, status, report, help, clear, exit): `);
            } catch (e) {
                // readline rejects pending questions once stdin closes
                log.debug('Input closed', { message: e instanceof Error ? e.message : String(e) });
                break;
            }
            if (!(await this.dispatch(line))) break;
        }
        this.rl.close();
    }

    /** Returns false when the REPL should exit. */
    async dispatch(line: string): Promise<boolean> {
        let tokens: string[];
        try {
            tokens = tokenize(line);
        } catch (e) {
            this.transcript.error(`Failed to parse command: ${e instanceof Error ? e.message : String(e)}`);
            return true;
        }
        if (tokens.length === 0) return true;

        const cmd = tokens[0].toLowerCase();
        const rest = tokens.slice(1);
        try {
            switch (cmd) {
                case 'exit':
                case 'quit':
                    return false;
                case 'help':
                    this.showHelp();
                    break;
                case 'clear':
                    process.stdout.write('\x1Bc');
                    break;
                case 'status':
                    await this.runStatus();
                    break;
                case 'report':
                    this.runReport(rest[0]);
                    break;
                case 'exec':
                    await this.runExec(rest);
                    break;
                case 'implement':
                    await this.runImplement(rest);
                    break;
                default:
                    this.transcript.print(`Unknown command: ${cmd}. Type 'help'.`);
            }
        } catch (e) {
            const err = ErrorFactory.unexpected(cmd, e);
            log.error('Command failed', { command: cmd, message: err.message });
            this.transcript.diagnostic(err);
        }
        return true;
    }

    private showHelp(): void {
        const lines = [
            'Commands:',
            '  implement [-f file]... [--scope {full,code,specs,minimal}] - Run an implementation task',
            '  exec <script.js> [args...] - Run a script from workbench/scripts/',
            '  report [session|today|all] - Token usage and estimated cost',
            '  status - Git status and last commit',
            '  help - Show this help',
            '  clear - Clear the screen',
            '  exit - Quit',
            '',
            'Options for implement:',
            '  -f, --file   Attach a local file (transient context for this request)',
            '  --scope      Context scope to reduce tokens: full (default), code, specs, minimal',
        ];
        for (const l of lines) this.transcript.print(l);
    }

    private async runStatus(): Promise<void> {
        this.transcript.print('--- Repository Status ---');
        const st = await this.git.status();
        if (st.code !== 0) {
            this.transcript.error("Git status is unavailable. Ensure 'git' is installed and you are inside a git repository.");
            if (st.stderr.trim()) this.transcript.error(`Details: ${st.stderr.trim()}`);
            return;
        }
        this.transcript.print(st.stdout.trim() ? st.stdout.trimEnd() : 'Working tree clean.');

        const last = await this.git.lastCommit();
        if (last.code !== 0) {
            this.transcript.error('Git log is unavailable. Ensure this repository has commits.');
            return;
        }
        if (last.stdout.trim()) this.transcript.print(last.stdout.trim());
    }

    private runReport(rawTimeframe: string | undefined): void {
        const r = this.ledger.generateReport(parseTimeframe(rawTimeframe), this.config.pricingRates);
        this.transcript.print('--- Cost Report ---');
        this.transcript.print(`Timeframe:      ${r.timeframe}`);
        this.transcript.print(`Transactions:   ${formatInt(r.total_requests)}`);
        this.transcript.print(`Input tokens:   ${formatInt(r.total_input_tokens)}`);
        this.transcript.print(`Output tokens:  ${formatInt(r.total_output_tokens)}`);
        this.transcript.print(`Estimated cost: $${r.estimated_cost.toFixed(6)}`);
        this.transcript.print(
            `Rates:          $${r.pricing_rates.input_per_1m}/1M in, $${r.pricing_rates.output_per_1m}/1M out`
        );
        this.transcript.print(`Ledger:         ${r.ledger_file}`);
    }

    private async runExec(args: readonly string[]): Promise<void> {
        const [script, ...scriptArgs] = args;
        if (!script) {
            this.transcript.print('Usage: exec <script.js> [args...]');
            return;
        }

        try {
            const r = await this.sandbox.run(script, scriptArgs);
            if (r.stdout) this.transcript.print(r.stdout.trimEnd());
            if (r.stderr) this.transcript.error(r.stderr.trimEnd());
            this.transcript.print(`Exit code: ${r.exitCode}`);
        } catch (e) {
            if (!(e instanceof SandboxViolation)) throw e;
            this.transcript.diagnostic(ErrorFactory.sandboxTargetBlocked(script, e.code, e.message));
        }
    }

    private getRouter(): ModelRouter {
        if (!this.router) {
            this.router = new ModelRouter({
                apiKey: resolveApiKey(this.config.projectRoot),
                modelId: this.config.modelId,
                projectRoot: this.config.projectRoot,
                ledger: this.ledger,
            });
        }
        return this.router;
    }

    private async runImplement(args: readonly string[]): Promise<void> {
        const parsed = parseImplementArgs(args);
        for (const w of parsed.warnings) this.transcript.print(w);

        this.rl.pause();
        let instruction: string;
        try {
            instruction = await this.instructions.read('Describe the implementation task');
        } finally {
            this.rl.resume();
        }

        const prompter: ReviewPrompter = { ask: (q) => this.rl.question(q) };
        const orchestrator = new ReboundOrchestrator({
            projectRoot: this.config.projectRoot,
            backend: this.getRouter(),
            ledger: this.ledger,
            sessionArtifacts: this.sessionArtifacts,
            contextBuilder: this.contextBuilder,
            pipeline: new InteractiveApplyPipeline({
                projectRoot: this.config.projectRoot,
                prompter,
                git: this.git,
                transcript: this.transcript,
            }),
            transcript: this.transcript,
            sandbox: this.sandbox,
            maxLoops: this.config.maxLoops,
            pricingRates: this.config.pricingRates,
        });

        const outcome = await orchestrator.runSequence({
            instruction,
            scope: parsed.scope,
            attachments: parsed.files,
            attachmentCwd: process.cwd(),
        });
        log.info('Sequence finished', {
            termination: outcome.termination,
            turns: outcome.turns.length,
            apply: outcome.apply?.status ?? null,
        });
    }
}

/* -------------------------------------------------------------------------- */
/* Entry                                                                      */
/* -------------------------------------------------------------------------- */

async function main(): Promise<void> {
    let config: ProjectConfig;
    try {
        config = loadProjectConfig(process.cwd());
    } catch (e) {
        if (e instanceof ConfigError) {
            process.stderr.write(formatDiagnostic(ErrorFactory.invalidConfig(e.message, e.configPath)) + '\n');
            process.exitCode = 1;
            return;
        }
        throw e;
    }
    await new ReboundCLI(config).start();
}

if (require.main === module) {
    main().catch((e: unknown) => {
        log.error('Fatal', { message: e instanceof Error ? e.message : String(e) });
        process.exitCode = 1;
    });
}
