/**
 * Status Indicator
 *
 * Terminal stand-in for a floating status window: prints Idle/Listening
 * whenever the session changes state, echoes transcription lines, and reads
 * one-letter menu commands from stdin.
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import * as Logging from '../logging';
import { describeError } from '../error';
import type { SessionStatus } from '../session';

export interface MenuHandlers {
    toggle(): Promise<void>;
    save(): Promise<string>;
    clear(): void;
    entries(): readonly string[];
    quit(): Promise<void>;
}

export interface IndicatorOptions {
    input?: Readable;
    output?: Writable;
    color?: boolean;
}

export interface IndicatorInstance {
    start(handlers: MenuHandlers): void;
    setStatus(status: SessionStatus): void;
    showLine(line: string): void;
    /** Resolves once the command currently being handled has finished */
    idle(): Promise<void>;
    close(): void;
}

const GREEN = '\u001b[32m';
const RED = '\u001b[31m';
const RESET = '\u001b[0m';

export const HELP_TEXT = [
    'Commands:',
    '  t  toggle listening',
    '  o  show transcription output',
    '  c  clear transcription output',
    '  s  save transcription output to a file',
    '  q  quit',
].join('\n');

type Command = 'toggle' | 'output' | 'clear' | 'save' | 'quit' | 'help';

const COMMANDS: ReadonlyMap<string, Command> = new Map([
    ['t', 'toggle'],
    ['toggle', 'toggle'],
    ['o', 'output'],
    ['output', 'output'],
    ['c', 'clear'],
    ['clear', 'clear'],
    ['s', 'save'],
    ['save', 'save'],
    ['q', 'quit'],
    ['quit', 'quit'],
    ['exit', 'quit'],
    ['h', 'help'],
    ['help', 'help'],
    ['?', 'help'],
]);

export const create = (options: IndicatorOptions = {}): IndicatorInstance => {
    const logger = Logging.getLogger();
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;
    const color = options.color ?? false;

    let rl: readline.Interface | null = null;
    let pending: Promise<void> = Promise.resolve();

    const write = (text: string) => {
        output.write(text + '\n');
    };

    const setStatus = (status: SessionStatus) => {
        const label = status === 'listening' ? 'Listening' : 'Idle';
        if (color) {
            write(`${status === 'listening' ? GREEN : RED}● ${label}${RESET}`);
        } else {
            write(`[${label}]`);
        }
    };

    const run = async (command: Command, handlers: MenuHandlers): Promise<void> => {
        switch (command) {
            case 'toggle':
                await handlers.toggle();
                return;
            case 'output': {
                const entries = handlers.entries();
                write(entries.length ? entries.join('\n') : '(no transcriptions yet)');
                return;
            }
            case 'clear':
                handlers.clear();
                write('Transcription output cleared');
                return;
            case 'save':
                await handlers.save();
                return;
            case 'quit':
                await handlers.quit();
                return;
            case 'help':
                write(HELP_TEXT);
                return;
        }
    };

    const start = (handlers: MenuHandlers) => {
        if (rl) {
            return;
        }
        rl = readline.createInterface({ input, terminal: false });
        rl.on('line', (line: string) => {
            const entry = line.trim().toLowerCase();
            if (!entry) {
                return;
            }
            const command = COMMANDS.get(entry);
            if (!command) {
                write(`Unknown command '${entry}' (h for help)`);
                return;
            }
            pending = pending.then(() => run(command, handlers)).catch((error: unknown) => {
                logger.error('Command %s failed: %s', command, describeError(error));
            });
        });
    };

    return {
        start,
        setStatus,
        showLine: write,
        idle: () => pending,
        close: () => {
            rl?.close();
            rl = null;
        },
    };
};
