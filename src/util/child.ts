import { execFile } from 'node:child_process';
import util from 'node:util';

export interface RunResult {
    stdout: string;
    stderr: string;
}

export type Runner = (file: string, args: string[]) => Promise<RunResult>;

/**
 * Run a program with arguments, without a shell. Rejects on a non-zero exit.
 */
export async function run(file: string, args: string[] = []): Promise<RunResult> {
    const execFilePromise = util.promisify(execFile);
    const result = await execFilePromise(file, args, { encoding: 'utf8' });
    return {
        stdout: result.stdout.toString(),
        stderr: result.stderr.toString()
    };
}

/**
 * Whether a program is on the PATH.
 */
export async function commandExists(name: string, runner: Runner = run): Promise<boolean> {
    try {
        await runner('which', [name]);
        return true;
    } catch {
        return false;
    }
}
