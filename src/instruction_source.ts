/**
 * Multi-line instruction capture through the operator's editor.
 * Opens $VISUAL / $EDITOR (nano when neither is set) on a temp file and
 * returns whatever was saved. An empty string means "cancelled".
 */

import { spawn } from 'child_process';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createLogger } from './logger';
import { errnoCode } from './storage';

const log = createLogger('instruction');

export interface InstructionSource {
    read(promptText: string): Promise<string>;
}

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string {
    return (env.VISUAL || env.EDITOR || 'nano').trim();
}

export class EditorInstructionSource implements InstructionSource {
    constructor(
        private readonly notify: (message: string) => void,
        private readonly editor: string = resolveEditor()
    ) {}

    async read(promptText: string): Promise<string> {
        const tmp = path.join(os.tmpdir(), `AI_TASK_${crypto.randomBytes(4).toString('hex')}.txt`);
        fs.writeFileSync(tmp, '', { mode: 0o600 });
        this.notify(`${promptText} (opening ${this.editor}; save + exit to continue)`);

        try {
            // EDITOR may carry flags, e.g. "code --wait"
            const [cmd, ...flags] = this.editor.split(/\s+/);
            await new Promise<void>((resolve, reject) => {
                const child = spawn(cmd, [...flags, tmp], { stdio: 'inherit', shell: false });
                child.on('error', reject);
                child.on('close', () => resolve());
            });
            return fs.readFileSync(tmp, 'utf8');
        } finally {
            try {
                fs.unlinkSync(tmp);
            } catch (e) {
                if (errnoCode(e) !== 'ENOENT') log.warn('Temp instruction file not removed', { path: tmp });
            }
        }
    }
}

/** Fixed answers, in order; '' once exhausted. */
export class StaticInstructionSource implements InstructionSource {
    private readonly queue: string[];

    constructor(instructions: readonly string[]) {
        this.queue = [...instructions];
    }

    async read(): Promise<string> {
        return this.queue.shift() ?? '';
    }
}
